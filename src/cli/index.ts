#!/usr/bin/env node

/**
 * dom-licenses CLI
 *
 * Loads the housing license registry and related records from dom.gosuslugi.ru.
 */

import { Command } from "commander";

import { registerLicensesCommand } from "./commands/licenses.js";
import { registerPortalCommands } from "./commands/portal.js";
import { registerRegionsCommand } from "./commands/regions.js";

const program = new Command();

program
  .name("dom-licenses")
  .description("dom.gosuslugi.ru housing license registry loader")
  .version("0.1.0");

registerRegionsCommand(program);
registerLicensesCommand(program);
registerPortalCommands(program);

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
