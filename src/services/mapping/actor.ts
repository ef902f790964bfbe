/**
 * Actor resolution - persons and organizations attached to a record
 *
 * An actor element is first flattened into a field tree keyed by local element
 * name, with `_<lang>` appended for elements carrying a language attribute.
 * Repeated keys overwrite each other: the last sibling wins.
 */

import { ActorResolutionError } from "../../errors.js";
import {
  PREFERRED_LANGUAGES,
  type ActorExport,
  type ActorRole,
  type LanguageMap,
  type OrganizationExport,
  type OrganizationFallback,
  type PersonExport,
} from "../../types/index.js";
import { type XmlElement } from "../../utils/xml.js";
import {
  CONSORTIUM_NAME,
  ORGANIZATION_CODES,
  organizationUrl,
} from "./vocabularies.js";

// ============================================================================
// Field Tree
// ============================================================================

export type FieldValue = string | FieldTree;

export type FieldTree = ReadonlyMap<string, FieldValue>;

/**
 * Flatten the children of `element` into a field tree
 */
export function buildFieldTree(
  element: XmlElement,
  languageAttribute: string
): FieldTree {
  const fields = new Map<string, FieldValue>();

  for (const child of element.elements) {
    const language = child.attribute(languageAttribute);
    const key =
      language === undefined || language === ""
        ? child.localName
        : `${child.localName}_${language}`;

    const value: FieldValue =
      child.elements.length === 0
        ? child.text.trim()
        : buildFieldTree(child, languageAttribute);

    // Last duplicate wins
    fields.set(key, value);
  }

  return fields;
}

function textField(tree: FieldTree, key: string): string | undefined {
  const value = tree.get(key);
  return typeof value === "string" && value !== "" ? value : undefined;
}

function treeField(tree: FieldTree, key: string): FieldTree | undefined {
  const value = tree.get(key);
  return typeof value === "string" ? undefined : value;
}

/**
 * Language variants of a field, in preference order, then the unlabeled one
 */
function languageVariants(base: string): string[] {
  return [...PREFERRED_LANGUAGES.map((lang) => `${base}_${lang}`), base];
}

function firstTextField(tree: FieldTree, base: string): string | undefined {
  for (const key of languageVariants(base)) {
    const value = textField(tree, key);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

/**
 * Language map of a field; an unlabeled value is filed under `und` unless an
 * explicit `und` value exists
 */
function languageMapField(tree: FieldTree, base: string): LanguageMap {
  const result: LanguageMap = {};
  for (const lang of PREFERRED_LANGUAGES) {
    const value = textField(tree, `${base}_${lang}`);
    if (value !== undefined) {
      result[lang] = value;
    }
  }
  const unlabeled = textField(tree, base);
  if (unlabeled !== undefined && result.und === undefined) {
    result.und = unlabeled;
  }
  return result;
}

// ============================================================================
// Name, Email and Organization
// ============================================================================

/**
 * Full name in the first preferred language offering at least a surname
 */
export function resolveName(tree: FieldTree): string | undefined {
  for (const lang of PREFERRED_LANGUAGES) {
    const surname = textField(tree, `surname_${lang}`);
    if (surname !== undefined) {
      const givenName = textField(tree, `givenName_${lang}`);
      return givenName === undefined ? surname : `${givenName} ${surname}`;
    }
  }

  const surname = textField(tree, "surname");
  if (surname === undefined) {
    return undefined;
  }
  const givenName = textField(tree, "givenName");
  return givenName === undefined ? surname : `${givenName} ${surname}`;
}

function resolveEmail(tree: FieldTree): string | undefined {
  const communication = treeField(tree, "communicationInfo");
  return communication === undefined
    ? undefined
    : textField(communication, "email");
}

/**
 * The part of the tree describing an organization: a person's affiliation, an
 * `organizationInfo` block, or the actor itself for organization elements
 */
function organizationSource(tree: FieldTree): FieldTree | undefined {
  const nested =
    treeField(tree, "affiliation") ?? treeField(tree, "organizationInfo");
  if (nested !== undefined) {
    return nested;
  }
  return firstTextField(tree, "organizationName") === undefined
    ? undefined
    : tree;
}

/**
 * Resolve the organization of an actor.
 *
 * Consortium members are looked up by department name. Names without a code
 * produce a fallback block built from the raw name, homepage and email.
 */
export function resolveOrganization(
  tree: FieldTree
): OrganizationExport | undefined {
  const source = organizationSource(tree);
  if (source === undefined) {
    return undefined;
  }

  const statedName = firstTextField(source, "organizationName");
  const inConsortium =
    statedName === CONSORTIUM_NAME &&
    firstTextField(source, "departmentName") !== undefined;
  const nameField = inConsortium ? "departmentName" : "organizationName";

  for (const key of [`${nameField}_en`, `${nameField}_fi`, nameField]) {
    const displayName = textField(source, key);
    const code =
      displayName === undefined ? undefined : ORGANIZATION_CODES.get(displayName);
    if (code !== undefined) {
      return { url: organizationUrl(code) };
    }
  }

  const prefLabel = languageMapField(source, nameField);
  if (Object.keys(prefLabel).length === 0) {
    return undefined;
  }

  const fallback: OrganizationFallback = { pref_label: prefLabel };
  const communication = treeField(source, "communicationInfo");
  const homepage =
    communication === undefined ? undefined : textField(communication, "url");
  if (homepage !== undefined) {
    fallback.homepage = { identifier: homepage };
  }
  const email =
    communication === undefined ? undefined : textField(communication, "email");
  if (email !== undefined) {
    fallback.email = email;
  }
  return fallback;
}

// ============================================================================
// Actor
// ============================================================================

const ROLE_ORDER: readonly ActorRole[] = [
  "creator",
  "curator",
  "publisher",
  "rights_holder",
];

export class Actor {
  private readonly roleSet: Set<ActorRole>;

  constructor(
    readonly person: PersonExport | undefined,
    readonly organization: OrganizationExport | undefined,
    roles: Iterable<ActorRole>
  ) {
    this.roleSet = new Set(roles);
  }

  get name(): string | undefined {
    return this.person?.name;
  }

  get email(): string | undefined {
    return this.person?.email;
  }

  get roles(): ReadonlySet<ActorRole> {
    return this.roleSet;
  }

  hasRole(role: ActorRole): boolean {
    return this.roleSet.has(role);
  }

  /**
   * Identity used for merging: name, email and exported organization
   */
  get identityKey(): string {
    return JSON.stringify([
      this.name ?? null,
      this.email ?? null,
      this.organization ?? null,
    ]);
  }

  equals(other: Actor): boolean {
    return this.identityKey === other.identityKey;
  }

  addRoles(roles: Iterable<ActorRole>): void {
    for (const role of roles) {
      this.roleSet.add(role);
    }
  }

  removeRole(role: ActorRole): void {
    this.roleSet.delete(role);
  }

  /** Roles are sorted so the same actor always exports identically */
  toExport(): ActorExport {
    const exported: ActorExport = {
      roles: ROLE_ORDER.filter((role) => this.roleSet.has(role)),
    };
    if (this.person !== undefined) {
      exported.person = { ...this.person };
    }
    if (this.organization !== undefined) {
      exported.organization = this.organization;
    }
    return exported;
  }
}

export interface BuildActorOptions {
  languageAttribute: string;
  /** Fail when the actor carries no organization data at all */
  requireAffiliation?: boolean;
}

/**
 * Whether an actor element describes a person rather than an organization
 */
export function isPersonElement(element: XmlElement): boolean {
  return (
    element.localName.endsWith("Person") ||
    element.localName === "metadataCreator"
  );
}

/**
 * Build an Actor from one actor element.
 *
 * Throws ActorResolutionError when a person element has no usable name, when
 * a required affiliation is missing, or when the element has neither person
 * nor organization data.
 */
export function buildActor(
  element: XmlElement,
  roles: Iterable<ActorRole>,
  options: BuildActorOptions
): Actor {
  const tree = buildFieldTree(element, options.languageAttribute);
  const name = resolveName(tree);

  if (name === undefined && isPersonElement(element)) {
    throw new ActorResolutionError(
      `Could not determine person name for <${element.name}>`,
      element.name,
      "missing-name"
    );
  }

  let person: PersonExport | undefined;
  if (name !== undefined) {
    person = { name };
    const email = resolveEmail(tree);
    if (email !== undefined) {
      person.email = email;
    }
  }

  const organization = resolveOrganization(tree);

  if (organization === undefined && options.requireAffiliation === true) {
    throw new ActorResolutionError(
      `Could not find affiliation for ${name ?? `<${element.name}>`}`,
      element.name,
      "missing-affiliation"
    );
  }

  if (person === undefined && organization === undefined) {
    throw new ActorResolutionError(
      `No person or organization data in <${element.name}>`,
      element.name,
      "no-actor-data"
    );
  }

  return new Actor(person, organization, roles);
}

// ============================================================================
// Merging
// ============================================================================

/**
 * Merges actor mentions by identity, keeping the first-seen data and the union
 * of roles. Insertion order is preserved.
 */
export class ActorSet {
  private readonly actors = new Map<string, Actor>();

  add(actor: Actor): Actor {
    const existing = this.actors.get(actor.identityKey);
    if (existing !== undefined) {
      existing.addRoles(actor.roles);
      return existing;
    }
    this.actors.set(actor.identityKey, actor);
    return actor;
  }

  values(): Actor[] {
    return [...this.actors.values()];
  }

  withRole(role: ActorRole): Actor[] {
    return this.values().filter((actor) => actor.hasRole(role));
  }

  get size(): number {
    return this.actors.size;
  }
}
