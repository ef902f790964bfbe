/**
 * RecordMapper - maps one harvested XML record to a canonical registry record
 *
 * Construction either fully succeeds or throws RecordParsingError; a partial
 * record is never returned.
 */

import { ActorResolutionError, RecordParsingError } from "../../errors.js";
import { mapperLogger } from "../../logger.js";
import {
  PREFERRED_LANGUAGES,
  type ActorExport,
  type ActorRole,
  type CanonicalRecord,
  type LanguageMap,
  type UrlReference,
} from "../../types/index.js";
import { mapAccessRights } from "./access-rights.js";
import { ActorSet, buildActor, type Actor } from "./actor.js";
import { CORPUS_RESOURCE_TYPE, type SourceDialect } from "./dialects.js";
import { lexvoUris, resolveIsoCodes } from "./languages.js";
import {
  FIELD_OF_SCIENCE_URL,
  MULTIPLE_PUBLISHERS_LABEL,
} from "./vocabularies.js";

import type { XmlElement } from "../../utils/xml.js";
import type { LanguageVocabulary } from "./language-vocabulary.js";

// ============================================================================
// Value Normalization
// ============================================================================

const URN_RESOLVER_PREFIX = /^(?:https?:\/\/)?urn\.fi\//;
const BARE_LOCAL_IDENTIFIER = /^lb-/;
const URN_NAMESPACE = "urn:nbn:fi:";

/**
 * Normalize a source identifier to its bare URN form.
 *
 * `http://urn.fi/urn:nbn:fi:lb-1` and `lb-1` both become `urn:nbn:fi:lb-1`.
 */
export function normalizePid(raw: string): string {
  const withoutResolver = raw.trim().replace(URN_RESOLVER_PREFIX, "");
  return BARE_LOCAL_IDENTIFIER.test(withoutResolver)
    ? `${URN_NAMESPACE}${withoutResolver}`
    : withoutResolver;
}

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

/**
 * Normalize `YYYY-MM-DD` or `YYYY-MM-DDTHH:MM:SSZ` to the full UTC form.
 *
 * Returns `undefined` for any other format or an impossible date.
 */
export function normalizeDate(raw: string): string | undefined {
  const value = raw.trim();
  const match = DATE_TIME.exec(value) ?? DATE_ONLY.exec(value);
  if (match === null) {
    return undefined;
  }

  const [year, month, day, hours = 0, minutes = 0, seconds = 0] = match
    .slice(1)
    .filter((part): part is string => part !== undefined)
    .map(Number);
  if (year === undefined || month === undefined || day === undefined) {
    return undefined;
  }

  const timestamp = new Date(
    Date.UTC(year, month - 1, day, hours, minutes, seconds)
  );
  // Date.UTC reads years 0-99 as 1900-1999
  timestamp.setUTCFullYear(year, month - 1, day);
  // Date.UTC rolls over out-of-range parts; reject instead
  if (
    timestamp.getUTCFullYear() !== year ||
    timestamp.getUTCMonth() !== month - 1 ||
    timestamp.getUTCDate() !== day ||
    timestamp.getUTCHours() !== hours ||
    timestamp.getUTCMinutes() !== minutes ||
    timestamp.getUTCSeconds() !== seconds
  ) {
    return undefined;
  }

  return `${timestamp.toISOString().slice(0, 19)}Z`;
}

// ============================================================================
// Mapper
// ============================================================================

export interface RecordMapperOptions {
  dialect: SourceDialect;
  catalogId: string;
  vocabulary: LanguageVocabulary;
}

export class RecordMapper {
  readonly dialect: SourceDialect;
  private readonly catalogId: string;
  private readonly vocabulary: LanguageVocabulary;

  constructor(options: RecordMapperOptions) {
    this.dialect = options.dialect;
    this.catalogId = options.catalogId;
    this.vocabulary = options.vocabulary;
  }

  /**
   * PID of the record; the OAI header identifier names the record in the
   * error when there is none
   */
  pid(root: XmlElement): string {
    const raw = root.findText(this.dialect.paths.pid);
    if (raw === undefined) {
      throw new RecordParsingError(
        "Could not determine PID",
        root.findText(this.dialect.paths.headerIdentifier) ?? null
      );
    }
    return normalizePid(raw);
  }

  /**
   * Best-effort identifier for operator messages; never throws
   */
  identifierOf(root: XmlElement): string | null {
    const raw = root.findText(this.dialect.paths.pid);
    return raw === undefined
      ? (root.findText(this.dialect.paths.headerIdentifier) ?? null)
      : normalizePid(raw);
  }

  /**
   * Resource type from the first of the dialect's locations that has one
   */
  findResourceType(root: XmlElement): string | undefined {
    for (const path of this.dialect.paths.resourceType) {
      const resourceType = root.findText(path);
      if (resourceType !== undefined) {
        return resourceType;
      }
    }
    return undefined;
  }

  resourceType(root: XmlElement): string {
    const resourceType = this.findResourceType(root);
    if (resourceType === undefined) {
      throw new RecordParsingError(
        "Could not determine resource type",
        this.identifierOf(root)
      );
    }
    return resourceType;
  }

  isCorpus(root: XmlElement): boolean {
    return this.resourceType(root) === CORPUS_RESOURCE_TYPE;
  }

  /**
   * Map a record. Throws RecordParsingError when any required part is missing.
   */
  async toRecord(root: XmlElement): Promise<CanonicalRecord> {
    const pid = this.pid(root);

    const resourceType = this.resourceType(root);
    if (resourceType !== CORPUS_RESOURCE_TYPE) {
      throw new RecordParsingError(
        `Resource type is "${resourceType}", not ${CORPUS_RESOURCE_TYPE}`,
        pid
      );
    }

    const modified = this.date(root, this.dialect.paths.modified, pid);
    const created = this.date(root, this.dialect.paths.created, pid);
    const actors = this.actors(root, pid);
    const language = await this.resourceLanguages(root, pid);

    mapperLogger.debug({ pid, actorCount: actors.length }, "Record mapped");

    return {
      data_catalog: this.catalogId,
      persistent_identifier: pid,
      title: this.languageMap(root, this.dialect.paths.title),
      description: this.languageMap(root, this.dialect.paths.description),
      created,
      modified,
      language,
      field_of_science: [{ url: FIELD_OF_SCIENCE_URL }],
      access_rights: mapAccessRights(root, this.dialect),
      actors,
      state: "published",
    };
  }

  /**
   * Text of the first element per preferred language; empty ones are left out
   */
  languageMap(root: XmlElement, path: string): LanguageMap {
    const elements = root.findAll(path);
    const result: LanguageMap = {};
    for (const lang of PREFERRED_LANGUAGES) {
      const element = elements.find(
        (candidate) =>
          candidate.attribute(this.dialect.languageAttribute) === lang
      );
      const text = element?.text.trim();
      if (text !== undefined && text !== "") {
        result[lang] = text;
      }
    }
    return result;
  }

  date(root: XmlElement, path: string, pid: string): string {
    const raw = root.findText(path);
    if (raw === undefined) {
      throw new RecordParsingError(`No date found at ${path}`, pid);
    }
    const normalized = normalizeDate(raw);
    if (normalized === undefined) {
      throw new RecordParsingError(`Unrecognized date "${raw}" at ${path}`, pid);
    }
    return normalized;
  }

  /**
   * Lexvo URIs of the resource languages that the vocabulary accepts.
   *
   * Each code contributes its ISO 639-3 URI when allowed, otherwise its ISO
   * 639-5 URI when allowed. Duplicates collapse.
   */
  async resourceLanguages(root: XmlElement, pid: string): Promise<UrlReference[]> {
    const uris = new Set<string>();

    for (const element of root.findAll(this.dialect.paths.languageIds)) {
      const rawCode = element.text.trim();
      if (rawCode === "") {
        continue;
      }

      const codes = resolveIsoCodes(rawCode, this.dialect.languageFallbacks);
      if (codes === undefined) {
        throw new RecordParsingError(
          `Could not determine ISO 639 language code for ${rawCode}`,
          pid
        );
      }

      for (const uri of lexvoUris(codes)) {
        if (await this.vocabulary.isAllowed(uri)) {
          uris.add(uri);
          break;
        }
      }
    }

    return [...uris].map((url) => ({ url }));
  }

  /**
   * Collect, merge and export the actors of a record.
   *
   * At least one creator and one publisher are required. Several distinct
   * publishers are replaced by a single placeholder publisher.
   */
  actors(root: XmlElement, pid: string): ActorExport[] {
    const actors = new ActorSet();

    for (const [role, paths] of this.dialect.actorPaths) {
      const requireAffiliation = this.dialect.affiliationRequiredRoles.has(role);
      for (const path of paths) {
        for (const element of root.findAll(path)) {
          const actor = this.resolveActor(element, role, requireAffiliation, pid);
          if (actor !== undefined) {
            actors.add(actor);
          }
        }
      }
    }

    if (actors.withRole("creator").length === 0) {
      throw new RecordParsingError(
        "No metadata creators (creator role) found",
        pid
      );
    }

    const publisherCount = actors.withRole("publisher").length;
    if (publisherCount === 0) {
      throw new RecordParsingError(
        "No distribution rights holders (publisher role) found",
        pid
      );
    }

    return publisherCount > 1
      ? collapsePublishers(actors.values())
      : actors.values().map((actor) => actor.toExport());
  }

  private resolveActor(
    element: XmlElement,
    role: ActorRole,
    requireAffiliation: boolean,
    pid: string
  ): Actor | undefined {
    try {
      return buildActor(element, [role], {
        languageAttribute: this.dialect.languageAttribute,
        requireAffiliation,
      });
    } catch (error) {
      if (!(error instanceof ActorResolutionError)) {
        throw error;
      }
      if (
        error.reason === "missing-name" &&
        this.dialect.missingPersonPolicy === "skip"
      ) {
        mapperLogger.debug(
          { pid, element: error.elementName },
          "Skipping actor without person data"
        );
        return undefined;
      }
      throw new RecordParsingError(error.message, pid);
    }
  }
}

/**
 * Drop the publisher role from every real actor (and actors left without
 * roles), then add one placeholder publisher pointing readers to the source
 */
export function collapsePublishers(actors: readonly Actor[]): ActorExport[] {
  const exported: ActorExport[] = [];
  for (const actor of actors) {
    const actorExport = actor.toExport();
    actorExport.roles = actorExport.roles.filter((role) => role !== "publisher");
    if (actorExport.roles.length > 0) {
      exported.push(actorExport);
    }
  }

  exported.push({
    roles: ["publisher"],
    organization: { pref_label: { en: MULTIPLE_PUBLISHERS_LABEL } },
  });
  return exported;
}
