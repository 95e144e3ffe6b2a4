/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { Region } from "../../types/index.js";

export interface RegionSummary {
  regionName: string;
  workbooks: number;
  rows: number;
  inRegister: number;
}

/**
 * Display the region reference table
 */
export function displayRegionsTable(regions: Region[]): void {
  const table = new CliTable3({
    head: [chalk.cyan("Code"), chalk.cyan("Name")],
    colWidths: [8, 60],
    wordWrap: true,
  });

  for (const region of regions) {
    table.push([String(region.code).padStart(2, "0"), region.name]);
  }

  console.log(table.toString());
}

/**
 * Display per-region row counts after a licenses export
 */
export function displayLicenseSummary(summaries: RegionSummary[]): void {
  if (summaries.length === 0) {
    console.log(chalk.yellow("No license workbooks were downloaded"));
    return;
  }

  const table = new CliTable3({
    head: [
      chalk.cyan("Region"),
      chalk.cyan("Workbooks"),
      chalk.cyan("Rows"),
      chalk.cyan("In register"),
    ],
    colWidths: [45, 11, 10, 13],
    wordWrap: true,
  });

  for (const summary of summaries) {
    table.push([
      summary.regionName,
      String(summary.workbooks),
      String(summary.rows),
      String(summary.inRegister),
    ]);
  }

  console.log(table.toString());
}

/**
 * Pretty-print a portal JSON response
 */
export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Display a spinner-like message (for long operations)
 */
export function showLoading(message: string): () => void {
  const frames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
  let i = 0;

  const interval = setInterval(() => {
    process.stdout.write(`\r${chalk.cyan(frames[i])} ${message}`);
    i = (i + 1) % frames.length;
  }, 80);

  return () => {
    clearInterval(interval);
    process.stdout.write("\r" + " ".repeat(message.length + 3) + "\r");
  };
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(chalk.green("Success:"), message);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow("Warning:"), message);
}
