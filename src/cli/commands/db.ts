import ora from "ora";

import { loadStateDbPath } from "../../config.js";
import { createDatabase } from "../../db/index.js";
import { runMigration } from "../../db/migrate.js";
import { errorMessage } from "../../errors.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("State database commands");

  // db migrate
  db.command("migrate")
    .description("Create the harvest state schema")
    .action(async () => {
      const path = loadStateDbPath();
      const spinner = ora(`Running migration on ${path}...`).start();
      const database = createDatabase(path);

      try {
        await runMigration(database);
        spinner.succeed("Migration completed successfully");
      } catch (error) {
        spinner.fail(`Migration failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await database.destroy();
      }
    });
}
