/**
 * Fixed code tables used when mapping source records.
 *
 * Loaded once at start-up and never modified.
 */

const FAIRDATA_CODELIST = "http://uri.suomi.fi/codelist/fairdata";

// ============================================================================
// Licenses and Access
// ============================================================================

const LICENSE_BASE = `${FAIRDATA_CODELIST}/license/code`;

/**
 * Source licence token -> canonical license URI
 */
export const LICENSE_URLS: ReadonlyMap<string, string> = new Map([
  ["CLARIN_PUB", `${LICENSE_BASE}/ClarinPUB-1.0`],
  ["CLARIN_ACA", `${LICENSE_BASE}/ClarinACA-1.0`],
  ["CLARIN_ACA-NC", `${LICENSE_BASE}/ClarinACA+NC-1.0`],
  ["CLARIN_ACA+NC", `${LICENSE_BASE}/ClarinACA+NC-1.0`],
  ["CLARIN_RES", `${LICENSE_BASE}/ClarinRES-1.0`],
  ["other", `${LICENSE_BASE}/other`],
  ["underNegotiation", `${LICENSE_BASE}/undernegotiation`],
  ["proprietary", `${LICENSE_BASE}/other-closed`],
  ["CC-BY", `${LICENSE_BASE}/CC-BY-1.0`],
  ["CC-BY-ND", `${LICENSE_BASE}/CC-BY-ND-4.0`],
  ["CC-BY-NC", `${LICENSE_BASE}/CC-BY-NC-2.0`],
  ["CC-BY-SA", `${LICENSE_BASE}/CC-BY-SA-3.0`],
  ["CC-BY-NC-ND", `${LICENSE_BASE}/CC-BY-NC-ND-4.0`],
  ["CC-BY-NC-SA", `${LICENSE_BASE}/CC-BY-NC-SA-4.0`],
  ["CC-ZERO", `${LICENSE_BASE}/CC0-1.0`],
  ["ApacheLicence_2.0", `${LICENSE_BASE}/Apache-2.0`],
]);

export const OTHER_LICENSE_URL = `${LICENSE_BASE}/other`;

/** Licence tokens whose records may point to a custom license page */
export const CUSTOM_URL_LICENSES: ReadonlySet<string> = new Set([
  "CLARIN_RES",
  "other",
]);

/** Marker present in every ACA-family license URI */
export const ACA_LICENSE_MARKER = "ClarinACA";

export const OPEN_AVAILABILITY = "available-unrestrictedUse";

export const ACCESS_TYPE_URLS = {
  open: `${FAIRDATA_CODELIST}/access_type/code/open`,
  restricted: `${FAIRDATA_CODELIST}/access_type/code/restricted`,
} as const;

export const RESTRICTION_GROUNDS_URLS = {
  research: `${FAIRDATA_CODELIST}/restriction_grounds/code/research`,
  other: `${FAIRDATA_CODELIST}/restriction_grounds/code/other`,
} as const;

// ============================================================================
// Organizations
// ============================================================================

export const ORGANIZATION_CODE_BASE = `${FAIRDATA_CODELIST}/organization/code`;

/**
 * Umbrella consortium name; its members are identified by department name
 */
export const CONSORTIUM_NAME = "FIN-CLARIN";

/**
 * Organization display name -> organization codelist code
 */
export const ORGANIZATION_CODES: ReadonlyMap<string, string> = new Map([
  ["Aalto University", "10076"],
  ["CSC — IT Center for Science Ltd", "09206320"],
  ["Centre for Applied Language Studies", "01906-213060"],
  ["National Library of Finland", "01901-H981"],
  ["South Eastern Finland University of Applied Sciences", "10118"],
  ["University of Eastern Finland", "10088"],
  ["University of Helsinki", "01901"],
  ["University of Jyväskylä", "01906"],
  ["University of Oulu", "01904"],
  ["University of Tampere", "10122"],
  ["University of Turku", "10089"],
]);

export function organizationUrl(code: string): string {
  return `${ORGANIZATION_CODE_BASE}/${code}`;
}

// ============================================================================
// Record Constants
// ============================================================================

/** Linguistics, in the Finnish field of science classification */
export const FIELD_OF_SCIENCE_URL =
  "http://www.yso.fi/onto/okm-tieteenala/ta6121";

export const MULTIPLE_PUBLISHERS_LABEL =
  "Multiple publishers, check distribution rights holders in original " +
  "metadata by following its persistent identifier";
