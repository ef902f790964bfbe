import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, SqliteDialect } from "kysely";

import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

export const IN_MEMORY = ":memory:";

/**
 * Open the harvest state database, creating its directory when needed
 */
export function createDatabase(path: string): Kysely<Database> {
  if (path !== IN_MEMORY) {
    // Ensure data directory exists
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  dbLogger.debug({ path }, "Opening state database");

  const dialect = new SqliteDialect({
    database: new SQLite(path),
  });

  return new Kysely<Database>({
    dialect,
  });
}

export * from "./types.js";
