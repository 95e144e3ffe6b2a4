/**
 * Regions command - List the region reference table
 */

import { listRegions } from "../../licenses/regions.js";
import { displayRegionsTable } from "../utils/display.js";

import type { Command } from "commander";

export function registerRegionsCommand(program: Command): void {
  program
    .command("regions [search]")
    .description("List region codes accepted by the licenses command")
    .action((search?: string) => {
      const needle = search?.trim().toLowerCase();
      const regions = listRegions().filter(
        (region) =>
          needle === undefined ||
          needle === "" ||
          region.name.toLowerCase().includes(needle)
      );

      if (regions.length === 0) {
        console.log(`No regions match "${search ?? ""}"`);
        return;
      }

      displayRegionsTable(regions);
    });
}
