/**
 * Harvest State Store - run history of the harvester
 *
 * The start time of the latest successful run is the `from` timestamp of the
 * next incremental harvest.
 */

import { dbLogger } from "../../logger.js";

import type { Database, HarvestRun } from "../../db/types.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface RunCounts {
  harvested: number;
  faulty: number;
  backupFailures: number;
  deleted: number;
}

export type FinishedRunStatus = "SUCCEEDED" | "FAILED";

/**
 * UTC timestamp with second precision: `YYYY-MM-DDTHH:MM:SSZ`
 */
export function toUtcSeconds(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

// ============================================================================
// State Store
// ============================================================================

export class HarvestStateStore {
  constructor(private db: Kysely<Database>) {}

  /**
   * Record the start of a run and return its id
   */
  async startRun(startedAt: string, from: string | null): Promise<number> {
    const row = await this.db
      .insertInto("harvest_runs")
      .values({
        started_at: startedAt,
        finished_at: null,
        status: "RUNNING",
        from_timestamp: from,
        error: null,
      })
      .returning("id")
      .executeTakeFirstOrThrow();

    dbLogger.debug({ runId: row.id, startedAt, from }, "Harvest run started");
    return row.id;
  }

  async finishRun(
    id: number,
    status: FinishedRunStatus,
    counts: RunCounts,
    finishedAt: string,
    error: string | null = null
  ): Promise<void> {
    await this.db
      .updateTable("harvest_runs")
      .set({
        status,
        finished_at: finishedAt,
        harvested_count: counts.harvested,
        faulty_count: counts.faulty,
        backup_failure_count: counts.backupFailures,
        deleted_count: counts.deleted,
        error,
      })
      .where("id", "=", id)
      .execute();

    dbLogger.debug({ runId: id, status }, "Harvest run finished");
  }

  /**
   * Start time of the most recent successful run, or null when there is none
   */
  async lastSuccessfulHarvest(): Promise<string | null> {
    const row = await this.db
      .selectFrom("harvest_runs")
      .select("started_at")
      .where("status", "=", "SUCCEEDED")
      .orderBy("started_at", "desc")
      .orderBy("id", "desc")
      .executeTakeFirst();

    return row?.started_at ?? null;
  }

  async recentRuns(limit = 10): Promise<HarvestRun[]> {
    return this.db
      .selectFrom("harvest_runs")
      .selectAll()
      .orderBy("id", "desc")
      .limit(limit)
      .execute();
  }
}
