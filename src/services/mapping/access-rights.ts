/**
 * License and access type mapping
 */

import {
  ACA_LICENSE_MARKER,
  ACCESS_TYPE_URLS,
  CUSTOM_URL_LICENSES,
  LICENSE_URLS,
  OPEN_AVAILABILITY,
  OTHER_LICENSE_URL,
  RESTRICTION_GROUNDS_URLS,
} from "./vocabularies.js";

import type { AccessRights, LicenseReference } from "../../types/index.js";
import type { XmlElement } from "../../utils/xml.js";
import type { SourceDialect } from "./dialects.js";

const LICENSE_KEYWORD = "license";
const URN_RESOLVER_PATTERN = /^(?:https?:\/\/)?urn\.fi\/urn:nbn:fi/i;

/**
 * Look for a "more information" license page in the resource documentation.
 *
 * A structured document whose English title mentions a license wins over a
 * free-text note mentioning one; from free text only urn.fi links are taken.
 */
export function findCustomLicenseUrl(
  root: XmlElement,
  dialect: SourceDialect
): string | undefined {
  for (const document of root.findAll(dialect.paths.documentationStructured)) {
    const englishTitle = document
      .findAll("title")
      .find((title) => title.attribute(dialect.languageAttribute) === "en");
    if (englishTitle?.text.toLowerCase().includes(LICENSE_KEYWORD) === true) {
      const url = document.findText("url");
      if (url !== undefined) {
        return url;
      }
    }
  }

  for (const note of root.findAll(dialect.paths.documentationUnstructured)) {
    const text = note.text.trim();
    if (!text.toLowerCase().includes(LICENSE_KEYWORD)) {
      continue;
    }
    const token = text
      .split(/\s+/)
      .find((word) => URN_RESOLVER_PATTERN.test(word));
    if (token !== undefined) {
      return token;
    }
  }

  return undefined;
}

/**
 * Map every licence element; unknown licence tokens are dropped
 */
export function mapLicenses(
  root: XmlElement,
  dialect: SourceDialect
): LicenseReference[] {
  const licenses: LicenseReference[] = [];
  let customUrl: string | null | undefined = null;

  for (const licenceInfo of root.findAll(dialect.paths.licenceInfo)) {
    const token = licenceInfo.findText("licence");
    const url = token === undefined ? undefined : LICENSE_URLS.get(token);
    if (token === undefined || url === undefined) {
      continue;
    }

    const license: LicenseReference = { url };
    if (CUSTOM_URL_LICENSES.has(token)) {
      // Searched at most once per record
      if (customUrl === null) {
        customUrl = findCustomLicenseUrl(root, dialect);
      }
      if (customUrl !== undefined) {
        license.custom_url = customUrl;
      }
    }
    licenses.push(license);
  }

  return licenses.length > 0 ? licenses : [{ url: OTHER_LICENSE_URL }];
}

/**
 * Map licenses, access type and restriction grounds.
 *
 * Only `available-unrestrictedUse` is open. Restricted resources always carry
 * restriction grounds: research use for ACA licenses, otherwise "other". Open
 * resources never carry any.
 */
export function mapAccessRights(
  root: XmlElement,
  dialect: SourceDialect
): AccessRights {
  const license = mapLicenses(root, dialect);
  const isOpen = root.findText(dialect.paths.availability) === OPEN_AVAILABILITY;

  if (isOpen) {
    return { license, access_type: { url: ACCESS_TYPE_URLS.open } };
  }

  const hasAcaLicense = license.some((entry) =>
    entry.url.includes(ACA_LICENSE_MARKER)
  );
  return {
    license,
    access_type: { url: ACCESS_TYPE_URLS.restricted },
    restriction_grounds: [
      {
        url: hasAcaLicense
          ? RESTRICTION_GROUNDS_URLS.research
          : RESTRICTION_GROUNDS_URLS.other,
      },
    ],
  };
}
