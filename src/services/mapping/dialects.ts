/**
 * Source schema dialects.
 *
 * Both dialects describe the same kind of corpus metadata with slightly
 * different layouts. Paths use local element names (see utils/xml.ts).
 */

import type { SourceDialectName } from "../../config.js";
import type { ActorRole } from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

/**
 * What to do with a person-type actor element that has no usable name
 */
export type MissingPersonPolicy = "fail" | "skip";

export interface SourceDialect {
  name: SourceDialectName;
  /** Qualified attribute holding the language tag of multilingual elements */
  languageAttribute: string;
  paths: {
    pid: string;
    headerIdentifier: string;
    title: string;
    description: string;
    modified: string;
    created: string;
    /** Tried in order; the first location with a value wins */
    resourceType: readonly [string, string];
    languageIds: string;
    licenceInfo: string;
    availability: string;
    documentationStructured: string;
    documentationUnstructured: string;
  };
  actorPaths: ReadonlyArray<readonly [ActorRole, readonly string[]]>;
  missingPersonPolicy: MissingPersonPolicy;
  /** Roles for which an actor without any organization data is an error */
  affiliationRequiredRoles: ReadonlySet<ActorRole>;
  /** Non-standard language codes accepted in place of an ISO 639 code */
  languageFallbacks: ReadonlyMap<string, string>;
}

export const CORPUS_RESOURCE_TYPE = "corpus";

// ============================================================================
// Shared Layout
// ============================================================================

const SHARED_PATHS = {
  headerIdentifier: "//header/identifier",
  resourceType: [
    "//resourceComponentType/*/resourceType",
    "//resourceType",
  ],
  languageIds: "//languageInfo/languageId",
  licenceInfo: "//distributionInfo/licenceInfo",
  availability: "//distributionInfo/availability",
  documentationStructured:
    "//resourceDocumentationInfo/documentationStructured/documentInfo",
  documentationUnstructured:
    "//resourceDocumentationInfo/documentationUnstructured/documentUnstructured",
} as const;

const ACTOR_PATHS: SourceDialect["actorPaths"] = [
  ["creator", ["//metadataInfo/metadataCreator"]],
  [
    "publisher",
    [
      "//distributionInfo/licenceInfo/distributionRightsHolderPerson",
      "//distributionInfo/licenceInfo/distributionRightsHolderOrganization",
    ],
  ],
  ["curator", ["//resourceInfo/contactPerson"]],
  [
    "rights_holder",
    [
      "//distributionInfo/iprHolderPerson",
      "//distributionInfo/iprHolderOrganization",
    ],
  ],
];

// ============================================================================
// Dialects
// ============================================================================

export const CMDI_DIALECT: SourceDialect = {
  name: "cmdi",
  languageAttribute: "xml:lang",
  paths: {
    ...SHARED_PATHS,
    pid: "//Header/MdSelfLink",
    title: "//resourceName",
    description: "//description",
    modified: "//header/datestamp",
    created: "//Header/MdCreationDate",
  },
  actorPaths: ACTOR_PATHS,
  missingPersonPolicy: "fail",
  affiliationRequiredRoles: new Set<ActorRole>([
    "creator",
    "publisher",
    "curator",
    "rights_holder",
  ]),
  languageFallbacks: new Map(),
};

export const METASHARE_DIALECT: SourceDialect = {
  name: "metashare",
  languageAttribute: "lang",
  paths: {
    ...SHARED_PATHS,
    pid: "//identificationInfo/identifier",
    title: "//identificationInfo/resourceName",
    description: "//identificationInfo/description",
    modified: "//metadataInfo/metadataLastDateUpdated",
    created: "//metadataInfo/metadataCreationDate",
  },
  actorPaths: ACTOR_PATHS,
  missingPersonPolicy: "skip",
  affiliationRequiredRoles: new Set<ActorRole>(["publisher"]),
  // Easy-to-read Finnish was catalogued under ad hoc codes
  languageFallbacks: new Map([
    ["fin-selko", "fin"],
    ["selkokieli", "fin"],
  ]),
};

export const DIALECTS: Readonly<Record<SourceDialectName, SourceDialect>> = {
  cmdi: CMDI_DIALECT,
  metashare: METASHARE_DIALECT,
};
