import { sql, type Kysely } from "kysely";

import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Create the state tables. Safe to run on every start.
 */
export async function runMigration(db: Kysely<Database>): Promise<void> {
  dbLogger.debug("Running state database migration...");

  await db.schema
    .createTable("harvest_runs")
    .ifNotExists()
    .addColumn("id", "integer", (col) => col.primaryKey().autoIncrement())
    .addColumn("started_at", "text", (col) => col.notNull())
    .addColumn("finished_at", "text")
    .addColumn("status", "text", (col) =>
      col.notNull().check(sql`status in ('RUNNING', 'SUCCEEDED', 'FAILED')`)
    )
    .addColumn("from_timestamp", "text")
    .addColumn("harvested_count", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("faulty_count", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("backup_failure_count", "integer", (col) =>
      col.notNull().defaultTo(0)
    )
    .addColumn("deleted_count", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("error", "text")
    .execute();

  await db.schema
    .createIndex("idx_harvest_runs_status_started")
    .ifNotExists()
    .on("harvest_runs")
    .columns(["status", "started_at"])
    .execute();

  dbLogger.debug("State database migration completed");
}
