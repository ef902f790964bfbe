import chalk from "chalk";

import { loadStateDbPath } from "../../config.js";
import { createDatabase } from "../../db/index.js";
import { runMigration } from "../../db/migrate.js";
import { errorMessage } from "../../errors.js";
import { HarvestStateStore } from "../../services/harvest/index.js";
import { displayRunsTable } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// History Command
// ============================================================================

export function registerHistoryCommand(program: Command): void {
  program
    .command("history")
    .description("Show recent harvest runs")
    .option("-l, --limit <n>", "Number of runs to show", "10")
    .action(async (options: { limit: string }) => {
      const limit = Number.parseInt(options.limit, 10);
      if (!Number.isInteger(limit) || limit < 1) {
        console.error(chalk.red(`Invalid limit: ${options.limit}`));
        process.exitCode = 1;
        return;
      }

      const db = createDatabase(loadStateDbPath());
      try {
        await runMigration(db);
        const state = new HarvestStateStore(db);
        const runs = await state.recentRuns(limit);

        if (runs.length === 0) {
          console.log("No harvest runs recorded yet");
          return;
        }

        displayRunsTable(runs);

        const lastSuccess = await state.lastSuccessfulHarvest();
        console.log(
          `\nNext incremental harvest starts from: ${lastSuccess ?? chalk.gray("beginning (full harvest)")}`
        );
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      } finally {
        await db.destroy();
      }
    });
}
