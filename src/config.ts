/**
 * Harvester configuration, read from the environment (and `.env`)
 */

import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigurationError } from "./errors.js";

// ============================================================================
// Schema
// ============================================================================

export const DEFAULT_LANGUAGE_VOCABULARY_URL =
  "https://metax.fairdata.fi/es/reference_data/language/_search?size=10000";

export const DEFAULT_STATE_DB_PATH = "./data/harvester.db";

export const EnvironmentSchema = Type.Object({
  OAI_PMH_URL: Type.String({ minLength: 1 }),
  OAI_METADATA_PREFIX: Type.String({ minLength: 1, default: "cmdi" }),
  OAI_SET: Type.String({ default: "FIN-CLARIN" }),
  SOURCE_DIALECT: Type.Union(
    [Type.Literal("cmdi"), Type.Literal("metashare")],
    { default: "cmdi" }
  ),
  REGISTRY_BASE_URL: Type.String({ minLength: 1 }),
  REGISTRY_API_TOKEN: Type.String({ minLength: 1 }),
  REGISTRY_CATALOG_ID: Type.String({ minLength: 1 }),
  LANGUAGE_VOCABULARY_URL: Type.String({
    minLength: 1,
    default: DEFAULT_LANGUAGE_VOCABULARY_URL,
  }),
  REQUEST_TIMEOUT_MS: Type.Integer({ minimum: 1, default: 30_000 }),
  STATE_DB_PATH: Type.String({ minLength: 1, default: DEFAULT_STATE_DB_PATH }),
});

export type Environment = Static<typeof EnvironmentSchema>;

export type SourceDialectName = Environment["SOURCE_DIALECT"];

export interface HarvesterConfig {
  source: {
    url: string;
    metadataPrefix: string;
    set: string | null;
    dialect: SourceDialectName;
  };
  registry: {
    baseUrl: string;
    apiToken: string;
    catalogId: string;
  };
  languageVocabularyUrl: string;
  requestTimeoutMs: number;
  stateDbPath: string;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Throws ConfigurationError unless `value` is an absolute http(s) URL
 */
export function assertHttpUrl(name: string, value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigurationError(`${name} is not a valid URL: "${value}"`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigurationError(
      `${name} must use http or https, got "${url.protocol}"`
    );
  }
  return value;
}

function pickDefined(env: NodeJS.ProcessEnv): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of Object.keys(EnvironmentSchema.properties)) {
    const value = env[key];
    if (value !== undefined) {
      picked[key] = value;
    }
  }
  return picked;
}

/**
 * Validate the environment and build the harvester configuration.
 *
 * Every problem is reported in one ConfigurationError so that operators can fix
 * the whole file at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarvesterConfig {
  const candidate = Value.Convert(
    EnvironmentSchema,
    Value.Default(EnvironmentSchema, pickDefined(env))
  );

  if (!Value.Check(EnvironmentSchema, candidate)) {
    const problems = [...Value.Errors(EnvironmentSchema, candidate)].map(
      (error) => `${error.path.replace(/^\//, "")}: ${error.message}`
    );
    throw new ConfigurationError(
      `Invalid configuration: ${problems.join("; ")}`
    );
  }

  return {
    source: {
      url: assertHttpUrl("OAI_PMH_URL", candidate.OAI_PMH_URL),
      metadataPrefix: candidate.OAI_METADATA_PREFIX,
      set: candidate.OAI_SET === "" ? null : candidate.OAI_SET,
      dialect: candidate.SOURCE_DIALECT,
    },
    registry: {
      baseUrl: assertHttpUrl(
        "REGISTRY_BASE_URL",
        candidate.REGISTRY_BASE_URL
      ).replace(/\/+$/, ""),
      apiToken: candidate.REGISTRY_API_TOKEN,
      catalogId: candidate.REGISTRY_CATALOG_ID,
    },
    languageVocabularyUrl: assertHttpUrl(
      "LANGUAGE_VOCABULARY_URL",
      candidate.LANGUAGE_VOCABULARY_URL
    ),
    requestTimeoutMs: candidate.REQUEST_TIMEOUT_MS,
    stateDbPath: candidate.STATE_DB_PATH,
  };
}

/**
 * State database path alone, for commands that never reach the network
 */
export function loadStateDbPath(env: NodeJS.ProcessEnv = process.env): string {
  const path = env.STATE_DB_PATH;
  return path !== undefined && path !== "" ? path : DEFAULT_STATE_DB_PATH;
}
