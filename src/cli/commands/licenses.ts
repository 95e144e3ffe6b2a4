/**
 * Licenses command - Download and normalize the license registry of regions
 */

import { once } from "node:events";
import { createWriteStream } from "node:fs";
import { finished } from "node:stream/promises";

import ora from "ora";

import { loadConfig, parsePositiveInt } from "../../config.js";
import { RegionNotFoundError } from "../../errors.js";
import { toLicenseRecord } from "../../licenses/rows.js";
import { GosUslugiClient } from "../../scraper/client.js";
import {
  displayLicenseSummary,
  printError,
  printSuccess,
  printWarning,
  type RegionSummary,
} from "../utils/display.js";

import type { LicenseWorkbook } from "../../licenses/workbooks.js";
import type { LicenseRow } from "../../types/index.js";
import type { Command } from "commander";

interface LicensesOptions {
  output: string;
  limit?: string;
  timeout?: string;
}

/**
 * Parse region codes given on the command line
 */
export function parseRegionCodes(values: string[]): number[] {
  return values.map((value) => {
    const code = Number(value);
    if (!Number.isInteger(code) || code < 1) {
      throw new Error(`Invalid region code: ${value}`);
    }
    return code;
  });
}

/**
 * Feed every row of every workbook to `write`, stopping after `limit` rows.
 * Stopping early abandons the sequences, which closes the open workbook.
 */
export async function exportLicenseRows(
  workbooks: Iterable<LicenseWorkbook>,
  write: (row: LicenseRow, regionName: string) => Promise<void> | void,
  limit = Infinity
): Promise<RegionSummary[]> {
  const summaries = new Map<string, RegionSummary>();
  let total = 0;

  if (limit <= 0) {
    return [];
  }

  for (const workbook of workbooks) {
    const summary = summaries.get(workbook.regionName) ?? {
      regionName: workbook.regionName,
      workbooks: 0,
      rows: 0,
      inRegister: 0,
    };
    summaries.set(workbook.regionName, summary);
    summary.workbooks += 1;

    for (const row of workbook.rows()) {
      await write(row, workbook.regionName);
      summary.rows += 1;
      if (row.isInformationInRegister) {
        summary.inRegister += 1;
      }

      total += 1;
      if (total >= limit) {
        break;
      }
    }

    if (total >= limit) {
      break;
    }
  }

  return [...summaries.values()];
}

/**
 * Write the rows as NDJSON lines `{ region_name, ...record }` to `path`.
 * The file is opened before any workbook is read; open and write failures
 * reject the returned promise.
 */
export async function writeLicenseRecords(
  workbooks: Iterable<LicenseWorkbook>,
  path: string,
  limit = Infinity
): Promise<RegionSummary[]> {
  const output = createWriteStream(path, { encoding: "utf-8" });
  let failure: Error | undefined;
  output.on("error", (error) => {
    failure = error;
  });
  await once(output, "open");

  try {
    return await exportLicenseRows(
      workbooks,
      async (row, regionName) => {
        if (failure !== undefined) {
          throw failure;
        }
        const line = JSON.stringify({
          region_name: regionName,
          ...toLicenseRecord(row),
        });
        if (!output.write(line + "\n")) {
          await once(output, "drain");
        }
      },
      limit
    );
  } finally {
    output.end();
    await finished(output);
  }
}

export function registerLicensesCommand(program: Command): void {
  program
    .command("licenses <codes...>")
    .description("Download license registries of regions as NDJSON")
    .option("-o, --output <file>", "Output file", "licenses.ndjson")
    .option("-l, --limit <n>", "Stop after n rows")
    .option("-t, --timeout <ms>", "Request timeout in milliseconds")
    .action(async (codes: string[], options: LicensesOptions) => {
      const spinner = ora("Downloading license archives...").start();

      try {
        const regionCodes = parseRegionCodes(codes);
        const limit = parsePositiveInt(options.limit, Infinity);
        const client = new GosUslugiClient({
          timeoutMs: parsePositiveInt(options.timeout, loadConfig().timeoutMs),
        });

        const workbooks = await client.getLicenses(regionCodes);
        spinner.text = "Normalizing license rows...";

        const summaries = await writeLicenseRecords(
          workbooks,
          options.output,
          limit
        );
        spinner.stop();

        displayLicenseSummary(summaries);
        const rowCount = summaries.reduce((acc, s) => acc + s.rows, 0);
        if (summaries.length < regionCodes.length) {
          printWarning(
            `${String(regionCodes.length - summaries.length)} region(s) produced no workbook`
          );
        }
        printSuccess(`${String(rowCount)} row(s) written to ${options.output}`);
      } catch (error) {
        spinner.stop();
        if (error instanceof RegionNotFoundError) {
          printError(`${error.message}. Run 'dom-licenses regions' to list codes.`);
        } else {
          printError(error instanceof Error ? error.message : "Unknown error");
        }
        process.exitCode = 1;
      }
    });
}
