/**
 * Portal commands - Organizations, houses and home management lookups
 */

import { parsePositiveInt } from "../../config.js";
import { GosUslugiClient } from "../../scraper/client.js";
import { printError, printJson, showLoading } from "../utils/display.js";

import type { PortalResponse } from "../../types/index.js";
import type { Command } from "commander";

async function run(
  message: string,
  request: (client: GosUslugiClient) => Promise<PortalResponse>
): Promise<void> {
  const stopLoading = showLoading(message);

  try {
    const data = await request(new GosUslugiClient());
    stopLoading();
    printJson(data);
  } catch (error) {
    stopLoading();
    printError(error instanceof Error ? error.message : "Unknown error");
    process.exitCode = 1;
  }
}

export function registerPortalCommands(program: Command): void {
  program
    .command("organizations <inn>")
    .description("Search registered organizations by INN")
    .action((inn: string) =>
      run("Searching organizations...", (client) =>
        client.getOrganizations(inn)
      )
    );

  program
    .command("organization <guid>")
    .description("Show an organization by GUID")
    .action((guid: string) =>
      run("Fetching organization...", (client) => client.getOrganization(guid))
    );

  program
    .command("houses <houseCode>")
    .description("Look up FIAS houses by house code")
    .option("--not-actual", "Show houses that are no longer actual")
    .action((houseCode: string, options: { actual?: boolean }) =>
      run("Fetching houses...", (client) =>
        options.actual === false
          ? client.getNotActualHouses(houseCode)
          : client.getActualHouses(houseCode)
      )
    );

  program
    .command("house-info <houseGuid>")
    .description("Show disclosed information about a house")
    .action((houseGuid: string) =>
      run("Fetching house info...", (client) => client.getHouseInfo(houseGuid))
    );

  program
    .command("home-management <guid>")
    .description("Show a home management record by GUID")
    .action((guid: string) =>
      run("Fetching home management...", (client) =>
        client.getHomeManagement(guid)
      )
    );

  program
    .command("home-managements <organizationGuid>")
    .description("List houses managed by an organization")
    .option("-p, --per-page <n>", "Houses per page", "10")
    .option("-s, --start-page <n>", "First page to fetch", "1")
    .action(
      async (
        organizationGuid: string,
        options: { perPage: string; startPage: string }
      ) => {
        const client = new GosUslugiClient();
        const pages = client.getHomeManagements(
          organizationGuid,
          parsePositiveInt(options.startPage, 1),
          parsePositiveInt(options.perPage, 10)
        );

        try {
          for await (const page of pages) {
            printJson(page);
          }
        } catch (error) {
          printError(error instanceof Error ? error.message : "Unknown error");
          process.exitCode = 1;
        }
      }
    );
}
