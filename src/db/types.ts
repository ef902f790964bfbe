import type { Generated, Insertable, Selectable, Updateable } from "kysely";

// ============================================================================
// Enum Types
// ============================================================================

export type HarvestRunStatus = "RUNNING" | "SUCCEEDED" | "FAILED";

// ============================================================================
// Tables
// ============================================================================

/**
 * One harvest run. Timestamps are UTC `YYYY-MM-DDTHH:MM:SSZ` strings.
 */
export interface HarvestRunsTable {
  id: Generated<number>;
  started_at: string;
  finished_at: string | null;
  status: HarvestRunStatus;
  /** Lower bound passed to the source; null for a full harvest */
  from_timestamp: string | null;
  harvested_count: Generated<number>;
  faulty_count: Generated<number>;
  backup_failure_count: Generated<number>;
  deleted_count: Generated<number>;
  error: string | null;
}

export interface Database {
  harvest_runs: HarvestRunsTable;
}

// ============================================================================
// Row Types
// ============================================================================

export type HarvestRun = Selectable<HarvestRunsTable>;
export type NewHarvestRun = Insertable<HarvestRunsTable>;
export type HarvestRunUpdate = Updateable<HarvestRunsTable>;
