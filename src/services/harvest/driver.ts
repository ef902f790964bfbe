/**
 * Harvest Driver - one harvest pass from the source into the registry
 *
 * 1. Harvest corpus records changed since the last successful run
 * 2. Map each record and send it to the registry
 * 3. Delete registry records absent from a full source listing
 *
 * A faulty record is tallied and the pass continues. Misconfiguration and
 * failures outside a single record abort the run.
 */

import {
  ConfigurationError,
  RecordParsingError,
  errorMessage,
} from "../../errors.js";
import { harvestLogger } from "../../logger.js";
import { writeBackup } from "./backup.js";
import {
  toUtcSeconds,
  type HarvestStateStore,
  type RunCounts,
} from "./state.js";

import type { DeletedRecord, RegistryClient } from "../../registry/client.js";
import type { SourceCatalogClient } from "../../source/catalog.js";
import type { HarvestedRecord } from "../../source/oai-pmh.js";
import type { CanonicalRecord } from "../../types/index.js";
import type { RecordMapper } from "../mapping/record-mapper.js";

// ============================================================================
// Types
// ============================================================================

export interface HarvestOptions {
  /** Ignore the last successful run and harvest everything */
  full?: boolean;
  /** Write each harvested record's XML here before mapping */
  backupDir?: string;
  skipDeletions?: boolean;
}

export interface RecordFailure {
  identifier: string;
  message: string;
}

export interface HarvestReport {
  runId: number;
  /** Lower bound of the harvest; null for a full harvest */
  from: string | null;
  harvested: number;
  created: number;
  updated: number;
  faulty: RecordFailure[];
  backupFailures: RecordFailure[];
  deleted: DeletedRecord[];
  /** Why the deletion pass was aborted, if it was */
  deletionAborted: string | null;
  deletionSkipped: boolean;
  success: boolean;
}

export interface HarvestProgress {
  phase: "harvest" | "deletion";
  current: number;
  currentItem?: string;
}

type ProgressCallback = (progress: HarvestProgress) => void;

export interface HarvestDriverDeps {
  source: SourceCatalogClient;
  mapper: RecordMapper;
  registry: RegistryClient;
  state: HarvestStateStore;
  now?: () => Date;
}

const UNKNOWN_IDENTIFIER = "<unknown>";

/**
 * One-line run summary; always names the harvested and faulty counts
 */
export function summarizeHarvest(report: HarvestReport): string {
  const counts = `harvested: ${String(report.harvested)}, faulty: ${String(report.faulty.length)}`;
  if (report.success) {
    const scope =
      report.from === null
        ? "all records harvested"
        : `records harvested since ${report.from}`;
    return `Success, ${scope} (${counts})`;
  }

  const problems = [
    counts,
    `backup failures: ${String(report.backupFailures.length)}`,
  ];
  if (report.deletionAborted !== null) {
    problems.push("deletion pass aborted");
  }
  return `Failure, not all records could be processed (${problems.join(", ")})`;
}

// ============================================================================
// Harvest Driver
// ============================================================================

export class HarvestDriver {
  private readonly source: SourceCatalogClient;
  private readonly mapper: RecordMapper;
  private readonly registry: RegistryClient;
  private readonly state: HarvestStateStore;
  private readonly now: () => Date;
  private onProgress?: ProgressCallback;

  constructor(deps: HarvestDriverDeps) {
    this.source = deps.source;
    this.mapper = deps.mapper;
    this.registry = deps.registry;
    this.state = deps.state;
    this.now = deps.now ?? (() => new Date());
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  /**
   * Run one harvest pass and record it in the state store
   */
  async run(options: HarvestOptions = {}): Promise<HarvestReport> {
    const startedAt = toUtcSeconds(this.now());
    const from =
      options.full === true ? null : await this.state.lastSuccessfulHarvest();
    const runId = await this.state.startRun(startedAt, from);

    const report: HarvestReport = {
      runId,
      from,
      harvested: 0,
      created: 0,
      updated: 0,
      faulty: [],
      backupFailures: [],
      deleted: [],
      deletionAborted: null,
      deletionSkipped: options.skipDeletions === true,
      success: false,
    };

    harvestLogger.info(
      { runId, from, full: from === null },
      from === null
        ? "Harvesting all records"
        : `Harvesting records changed since ${from}`
    );

    try {
      for await (const record of this.source.corpora(from)) {
        await this.harvestRecord(record, report, options.backupDir);
      }

      if (!report.deletionSkipped) {
        await this.deleteRemovedRecords(report);
      }
    } catch (error) {
      const message = errorMessage(error);
      harvestLogger.error(
        { runId, error: message, harvested: report.harvested },
        "Failure, harvest aborted"
      );
      await this.state.finishRun(
        runId,
        "FAILED",
        this.counts(report),
        toUtcSeconds(this.now()),
        message
      );
      throw error;
    }

    report.success =
      report.faulty.length === 0 &&
      report.backupFailures.length === 0 &&
      report.deletionAborted === null;

    await this.state.finishRun(
      runId,
      report.success ? "SUCCEEDED" : "FAILED",
      this.counts(report),
      toUtcSeconds(this.now()),
      report.deletionAborted
    );

    const summary = summarizeHarvest(report);
    const fields = {
      runId,
      ...this.counts(report),
      created: report.created,
      updated: report.updated,
    };
    if (report.success) {
      harvestLogger.info(fields, summary);
    } else {
      harvestLogger.error(fields, summary);
    }

    return report;
  }

  // ==========================================================================
  // Harvest Phase
  // ==========================================================================

  private async harvestRecord(
    record: HarvestedRecord,
    report: HarvestReport,
    backupDir: string | undefined
  ): Promise<void> {
    const identifier =
      this.mapper.identifierOf(record.element) ??
      record.headerIdentifier ??
      UNKNOWN_IDENTIFIER;

    this.onProgress?.({
      phase: "harvest",
      current: report.harvested + report.faulty.length + 1,
      currentItem: identifier,
    });

    if (backupDir !== undefined) {
      await this.backup(record, identifier, backupDir, report);
    }

    let canonical: CanonicalRecord;
    try {
      canonical = await this.mapper.toRecord(record.element);
    } catch (error) {
      if (!(error instanceof RecordParsingError)) {
        throw error;
      }
      this.recordFailure(report, error.identifier ?? identifier, error.message);
      return;
    }

    try {
      const result = await this.registry.send(canonical);
      if (result.action === "created") {
        report.created++;
      } else {
        report.updated++;
      }
      report.harvested++;
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      this.recordFailure(
        report,
        canonical.persistent_identifier,
        errorMessage(error)
      );
    }
  }

  private async backup(
    record: HarvestedRecord,
    identifier: string,
    backupDir: string,
    report: HarvestReport
  ): Promise<void> {
    if (identifier === UNKNOWN_IDENTIFIER) {
      report.backupFailures.push({
        identifier,
        message: "Record has no identifier to name its backup file",
      });
      return;
    }
    try {
      const path = await writeBackup(backupDir, identifier, record.element.toXml());
      harvestLogger.debug({ pid: identifier, path }, "Record backed up");
    } catch (error) {
      const message = errorMessage(error);
      harvestLogger.warn({ pid: identifier, error: message }, "Backup failed");
      report.backupFailures.push({ identifier, message });
    }
  }

  private recordFailure(
    report: HarvestReport,
    identifier: string,
    message: string
  ): void {
    harvestLogger.warn({ pid: identifier, error: message }, "Faulty record");
    report.faulty.push({ identifier, message });
  }

  // ==========================================================================
  // Deletion Phase
  // ==========================================================================

  /**
   * Delete registry records whose PID is gone from the source. A record that
   * cannot be parsed while listing the source aborts the pass before anything
   * is deleted.
   */
  private async deleteRemovedRecords(report: HarvestReport): Promise<void> {
    this.onProgress?.({ phase: "deletion", current: 0 });
    try {
      report.deleted = await this.registry.deleteRecordsNotIn(
        this.source.corpusPids()
      );
    } catch (error) {
      if (!(error instanceof RecordParsingError)) {
        throw error;
      }
      report.deletionAborted = error.toString();
      harvestLogger.error(
        { pid: error.identifier, error: error.message },
        "Deletion pass aborted"
      );
      return;
    }
    this.onProgress?.({ phase: "deletion", current: report.deleted.length });
    harvestLogger.info(
      { count: report.deleted.length },
      "Deleted records missing from the source"
    );
  }

  private counts(report: HarvestReport): RunCounts {
    return {
      harvested: report.harvested,
      faulty: report.faulty.length,
      backupFailures: report.backupFailures.length,
      deleted: report.deleted.length,
    };
  }
}
