/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import { summarizeHarvest } from "../../services/harvest/index.js";

import type { HarvestRun } from "../../db/types.js";
import type {
  HarvestReport,
  RecordFailure,
} from "../../services/harvest/index.js";

/**
 * One `<identifier>: <message>` line per failure on stderr
 */
export function displayRecordFailures(failures: RecordFailure[]): void {
  for (const failure of failures) {
    console.error(`${failure.identifier}: ${failure.message}`);
  }
}

/**
 * Display the outcome of a harvest run
 */
export function displayHarvestReport(report: HarvestReport): void {
  const table = new CliTable3({
    head: [chalk.cyan("Metric"), chalk.cyan("Count")],
    colWidths: [24, 10],
  });

  table.push(
    ["Created", String(report.created)],
    ["Updated", String(report.updated)],
    ["Faulty", String(report.faulty.length)],
    ["Backup failures", String(report.backupFailures.length)],
    [
      "Deleted",
      report.deletionSkipped ? chalk.gray("skipped") : String(report.deleted.length),
    ]
  );

  console.log(chalk.bold(`\nHarvest run #${String(report.runId)}`));
  console.log(
    `  Scope: ${report.from === null ? "all records" : `changed since ${report.from}`}`
  );
  console.log(table.toString());

  for (const record of report.deleted) {
    console.log(`  ${chalk.red("deleted")} ${record.pid} (${record.id})`);
  }

  if (report.deletionAborted !== null) {
    console.error(chalk.red(`Deletion pass aborted: ${report.deletionAborted}`));
  }

  const summary = summarizeHarvest(report);
  console.log(report.success ? chalk.green(summary) : chalk.red(summary));
}

function formatStatus(status: HarvestRun["status"]): string {
  switch (status) {
    case "SUCCEEDED":
      return chalk.green(status);
    case "FAILED":
      return chalk.red(status);
    case "RUNNING":
      return chalk.yellow(status);
  }
}

/**
 * Display recent harvest runs in a formatted table
 */
export function displayRunsTable(runs: HarvestRun[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("#"),
      chalk.cyan("Started"),
      chalk.cyan("Status"),
      chalk.cyan("From"),
      chalk.cyan("Harvested"),
      chalk.cyan("Faulty"),
      chalk.cyan("Deleted"),
    ],
  });

  for (const run of runs) {
    table.push([
      String(run.id),
      run.started_at,
      formatStatus(run.status),
      run.from_timestamp ?? chalk.gray("full"),
      String(run.harvested_count),
      String(run.faulty_count),
      String(run.deleted_count),
    ]);
  }

  console.log(table.toString());
}

/**
 * Display a list of PIDs under a heading
 */
export function displayPidList(title: string, pids: string[]): void {
  console.log(chalk.bold(`\n${title} (${String(pids.length)}):\n`));
  for (const pid of pids) {
    console.log(`  ${pid}`);
  }
  console.log();
}
