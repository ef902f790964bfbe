/**
 * ISO 639 language code resolution into Lexvo URIs
 */

import { readFileSync } from "node:fs";

import { iso6393 } from "iso-639-3";

const LEXVO_BASE = "http://lexvo.org/id";

// ============================================================================
// Code Tables
// ============================================================================

/** Any ISO 639-1/2/3 code -> ISO 639-3 code */
const PART3_BY_CODE = new Map<string, string>();

for (const language of iso6393) {
  PART3_BY_CODE.set(language.iso6393, language.iso6393);
}
// Secondary codes never shadow a 639-3 code
for (const language of iso6393) {
  for (const code of [language.iso6391, language.iso6392B, language.iso6392T]) {
    if (code !== undefined && !PART3_BY_CODE.has(code)) {
      PART3_BY_CODE.set(code, language.iso6393);
    }
  }
}

function loadLanguageFamilies(): ReadonlySet<string> {
  const path = new URL("../../../resources/iso639-5.json", import.meta.url);
  const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
  if (!Array.isArray(parsed)) {
    throw new Error(`Expected a JSON array of codes in ${path.pathname}`);
  }
  return new Set(parsed.filter((code): code is string => typeof code === "string"));
}

/** ISO 639-5 language family and group codes */
const LANGUAGE_FAMILIES = loadLanguageFamilies();

// ============================================================================
// Resolution
// ============================================================================

export interface IsoCodes {
  part3?: string;
  part5?: string;
}

/**
 * Look up the ISO 639-3 and ISO 639-5 codes for a raw language code.
 *
 * Returns `undefined` when the code is in neither standard.
 */
export function resolveIsoCodes(
  rawCode: string,
  fallbacks: ReadonlyMap<string, string> = new Map()
): IsoCodes | undefined {
  const normalized = rawCode.trim().toLowerCase();
  const code = fallbacks.get(normalized) ?? normalized;

  const codes: IsoCodes = {};
  const part3 = PART3_BY_CODE.get(code);
  if (part3 !== undefined) {
    codes.part3 = part3;
  }
  if (LANGUAGE_FAMILIES.has(code)) {
    codes.part5 = code;
  }

  return codes.part3 === undefined && codes.part5 === undefined
    ? undefined
    : codes;
}

/**
 * Lexvo URIs for the codes, ISO 639-3 first
 */
export function lexvoUris(codes: IsoCodes): string[] {
  const uris: string[] = [];
  if (codes.part3 !== undefined) {
    uris.push(`${LEXVO_BASE}/iso639-3/${codes.part3}`);
  }
  if (codes.part5 !== undefined) {
    uris.push(`${LEXVO_BASE}/iso639-5/${codes.part5}`);
  }
  return uris;
}
