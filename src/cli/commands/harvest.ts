import ora from "ora";

import { errorMessage } from "../../errors.js";
import { withHarvestContext } from "../utils/context.js";
import {
  displayHarvestReport,
  displayRecordFailures,
} from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Harvest Command
// ============================================================================

export function registerHarvestCommand(program: Command): void {
  program
    .command("harvest")
    .description(
      "Harvest corpus records from the source and synchronize the registry"
    )
    .option("--full", "Harvest all records, not only those changed since the last successful run")
    .option("--backup-dir <dir>", "Write the XML of every harvested record into this directory")
    .option("--skip-deletions", "Do not delete registry records missing from the source")
    .action(
      async (options: {
        full?: boolean;
        backupDir?: string;
        skipDeletions?: boolean;
      }) => {
        const spinner = ora("Harvesting records...").start();

        try {
          const report = await withHarvestContext(async ({ driver }) => {
            driver.setProgressCallback((progress) => {
              spinner.text =
                progress.phase === "harvest"
                  ? `Harvesting record ${String(progress.current)} (${progress.currentItem ?? ""})`
                  : "Deleting records missing from the source...";
            });
            return driver.run({
              full: options.full,
              backupDir: options.backupDir,
              skipDeletions: options.skipDeletions,
            });
          });

          if (report.success) {
            spinner.succeed("Harvest completed");
          } else {
            spinner.fail("Harvest completed with failures");
            process.exitCode = 1;
          }

          displayRecordFailures(report.faulty);
          displayRecordFailures(report.backupFailures);
          displayHarvestReport(report);
        } catch (error) {
          spinner.fail(`Harvest aborted: ${errorMessage(error)}`);
          process.exitCode = 1;
        }
      }
    );
}
