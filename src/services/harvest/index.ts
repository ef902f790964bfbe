/**
 * Harvest services and their composition from configuration
 */

import { createDatabase } from "../../db/index.js";
import { runMigration } from "../../db/migrate.js";
import { RegistryClient } from "../../registry/client.js";
import { SourceCatalogClient } from "../../source/catalog.js";
import { OaiPmhClient, type RecordSource } from "../../source/oai-pmh.js";
import { DIALECTS } from "../mapping/dialects.js";
import {
  LanguageVocabulary,
  VocabularyCache,
} from "../mapping/language-vocabulary.js";
import { RecordMapper } from "../mapping/record-mapper.js";
import { HarvestDriver } from "./driver.js";
import { HarvestStateStore } from "./state.js";

import type { HarvesterConfig } from "../../config.js";
import type { Database } from "../../db/types.js";
import type { Kysely } from "kysely";

export { HarvestDriver, summarizeHarvest } from "./driver.js";
export type {
  HarvestOptions,
  HarvestProgress,
  HarvestReport,
  RecordFailure,
} from "./driver.js";
export { HarvestStateStore, toUtcSeconds } from "./state.js";
export { backupFileName, writeBackup } from "./backup.js";

export interface HarvestContext {
  db: Kysely<Database>;
  vocabularyCache: VocabularyCache;
  mapper: RecordMapper;
  source: SourceCatalogClient;
  registry: RegistryClient;
  state: HarvestStateStore;
  driver: HarvestDriver;
}

export interface HarvestContextOverrides {
  db?: Kysely<Database>;
  recordSource?: RecordSource;
  now?: () => Date;
}

/**
 * Wire every collaborator of a harvest from configuration. The state schema
 * is migrated before the context is returned; callers destroy `db`.
 */
export async function createHarvestContext(
  config: HarvesterConfig,
  overrides: HarvestContextOverrides = {}
): Promise<HarvestContext> {
  const db = overrides.db ?? createDatabase(config.stateDbPath);
  await runMigration(db);

  const vocabularyCache = new VocabularyCache();
  const mapper = new RecordMapper({
    dialect: DIALECTS[config.source.dialect],
    catalogId: config.registry.catalogId,
    vocabulary: new LanguageVocabulary(
      config.languageVocabularyUrl,
      vocabularyCache,
      config.requestTimeoutMs
    ),
  });

  const source = new SourceCatalogClient(
    overrides.recordSource ??
      new OaiPmhClient(config.source.url, config.requestTimeoutMs),
    mapper,
    {
      metadataPrefix: config.source.metadataPrefix,
      set: config.source.set,
    }
  );

  const registry = new RegistryClient({
    ...config.registry,
    timeoutMs: config.requestTimeoutMs,
  });

  const state = new HarvestStateStore(db);
  const driver = new HarvestDriver({
    source,
    mapper,
    registry,
    state,
    now: overrides.now,
  });

  return { db, vocabularyCache, mapper, source, registry, state, driver };
}
