/**
 * Corpus metadata harvester: public API
 */

export { loadConfig, type HarvesterConfig } from "./config.js";
export * from "./errors.js";
export * from "./types/index.js";

export { RecordMapper, normalizeDate, normalizePid } from "./services/mapping/record-mapper.js";
export { Actor, ActorSet, buildActor } from "./services/mapping/actor.js";
export { mapAccessRights } from "./services/mapping/access-rights.js";
export {
  LanguageVocabulary,
  VocabularyCache,
} from "./services/mapping/language-vocabulary.js";
export {
  CMDI_DIALECT,
  DIALECTS,
  METASHARE_DIALECT,
  type SourceDialect,
} from "./services/mapping/dialects.js";

export { OaiPmhClient, type RecordSource } from "./source/oai-pmh.js";
export { SourceCatalogClient } from "./source/catalog.js";
export { RegistryClient } from "./registry/client.js";

export * from "./services/harvest/index.js";
