import chalk from "chalk";
import ora from "ora";

import { errorMessage } from "../../errors.js";
import { withHarvestContext } from "../utils/context.js";
import { displayPidList } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Registry Record Commands
// ============================================================================

export function registerRecordsCommand(program: Command): void {
  const records = program
    .command("records")
    .description("Inspect and manage records in the registry");

  // records delete <pid>
  records
    .command("delete <pid>")
    .description("Delete the registry record with this PID")
    .action(async (pid: string) => {
      try {
        await withHarvestContext(async ({ registry }) => {
          const id = await registry.recordId(pid);
          if (id === null) {
            console.log(`Record ${pid} not found in registry`);
            return;
          }
          console.log(`Deleting record ${pid} (registry identifier ${id})`);
          await registry.delete(id);
          console.log("Record deleted");
        });
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  // records show <pid>
  records
    .command("show <pid>")
    .description("Show the registry record with this PID")
    .option("--json", "Print the full registry record")
    .action(async (pid: string, options: { json?: boolean }) => {
      try {
        await withHarvestContext(async ({ registry }) => {
          const id = await registry.recordId(pid);
          if (id === null) {
            console.log(`Record ${pid} not found in registry`);
            return;
          }
          console.log(`${chalk.bold(pid)}: registry identifier ${chalk.cyan(id)}`);
          if (options.json === true) {
            console.log(JSON.stringify(await registry.getRecord(id), null, 2));
          }
        });
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  // records orphans
  records
    .command("orphans")
    .description(
      "List registry records whose PID is missing from the source (nothing is deleted)"
    )
    .action(async () => {
      const spinner = ora("Comparing source and registry...").start();

      try {
        const candidates = await withHarvestContext(({ registry, source }) =>
          registry.deletionCandidates(source.corpusPids())
        );
        spinner.succeed("Comparison completed");
        displayPidList("Registry records missing from the source", candidates);
      } catch (error) {
        spinner.fail(`Failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
