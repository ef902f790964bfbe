// Canonical record types, shaped the way the dataset registry accepts them

// =====================
// Shared Value Types
// =====================

/**
 * Language tags used for multilingual text, in preference order
 */
export const PREFERRED_LANGUAGES = ["en", "fi", "und"] as const;

export type TextLanguage = (typeof PREFERRED_LANGUAGES)[number];

/**
 * Text keyed by language tag. A tag is present only when it has content.
 */
export type LanguageMap = Partial<Record<TextLanguage, string>>;

export interface UrlReference {
  url: string;
}

// =====================
// Actors
// =====================

export const ACTOR_ROLES = [
  "creator",
  "publisher",
  "curator",
  "rights_holder",
] as const;

export type ActorRole = (typeof ACTOR_ROLES)[number];

export interface PersonExport {
  name: string;
  email?: string;
}

/**
 * Organization that has no code in the organization codelist
 */
export interface OrganizationFallback {
  pref_label: LanguageMap;
  homepage?: { identifier: string };
  email?: string;
}

export type OrganizationExport = UrlReference | OrganizationFallback;

export interface ActorExport {
  roles: ActorRole[];
  person?: PersonExport;
  organization?: OrganizationExport;
}

// =====================
// Access Rights
// =====================

export interface LicenseReference {
  url: string;
  custom_url?: string;
}

export interface AccessRights {
  license: LicenseReference[];
  access_type: UrlReference;
  restriction_grounds?: UrlReference[];
}

// =====================
// Record
// =====================

export interface CanonicalRecord {
  data_catalog: string;
  persistent_identifier: string;
  title: LanguageMap;
  description: LanguageMap;
  created: string;
  modified: string;
  language: UrlReference[];
  field_of_science: UrlReference[];
  access_rights: AccessRights;
  actors: ActorExport[];
  state: "published";
}
