#!/usr/bin/env node

/**
 * Corpus Harvester CLI
 *
 * Harvests corpus metadata over OAI-PMH and keeps a dataset registry in sync.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerHarvestCommand } from "./commands/harvest.js";
import { registerHistoryCommand } from "./commands/history.js";
import { registerRecordsCommand } from "./commands/records.js";

const program = new Command();

program
  .name("corpus-harvester")
  .description("Corpus metadata harvester and registry synchronizer")
  .version("0.4.0");

// Register all commands
registerHarvestCommand(program);
registerRecordsCommand(program);
registerHistoryCommand(program);
registerDbCommand(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

await program.parseAsync();
