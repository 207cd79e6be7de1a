#!/usr/bin/env node

/**
 * Partner presence CLI
 *
 * Resolves per-country partner presence (3W) tables into canonical
 * organization and operational presence tables.
 */

import { Command } from "commander";

import { registerCheckConfigCommand } from "./commands/check-config.js";
import { registerLookupCommand } from "./commands/lookup.js";
import { registerRunCommand } from "./commands/run.js";

const program = new Command();

program
  .name("presence")
  .description("Partner presence entity resolution and normalization")
  .version("0.1.0");

registerRunCommand(program);
registerLookupCommand(program);
registerCheckConfigCommand(program);

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
