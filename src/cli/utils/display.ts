/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import { ConfigurationError } from "../../errors.js";

import type { Diagnostic, DiagnosticKind } from "../../services/diagnostics.js";
import type { CountryRowCounts } from "../../services/pipeline/orchestrator.js";

const KIND_COLORS: Record<DiagnosticKind, (text: string) => string> = {
  info: chalk.gray,
  missing_value: chalk.yellow,
  warning: chalk.yellow,
  error: chalk.red,
};

/**
 * Display per-country row counts
 */
export function displayRowCounts(counts: readonly CountryRowCounts[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Country"),
      chalk.cyan("Dataset"),
      chalk.cyan("Read"),
      chalk.cyan("Filtered"),
      chalk.cyan("Rejected"),
      chalk.cyan("Output"),
    ],
    colWidths: [10, 50, 8, 10, 10, 8],
    wordWrap: true,
  });

  for (const count of counts) {
    table.push([
      chalk.green(count.countryCode),
      count.datasetName,
      String(count.rowsRead),
      String(count.rowsFiltered),
      count.rowsRejected > 0
        ? chalk.red(String(count.rowsRejected))
        : String(count.rowsRejected),
      String(count.rowsOut),
    ]);
  }

  console.log(table.toString());
}

/**
 * Display collected diagnostics grouped by kind
 */
export function displayDiagnostics(
  diagnostics: readonly Diagnostic[],
  limit = 50
): void {
  if (diagnostics.length === 0) {
    console.log(chalk.green("\nNo diagnostics"));
    return;
  }

  const table = new CliTable3({
    head: [chalk.cyan("Kind"), chalk.cyan("Dataset"), chalk.cyan("Message")],
    colWidths: [15, 35, 70],
    wordWrap: true,
  });

  for (const diagnostic of diagnostics.slice(0, limit)) {
    table.push([
      KIND_COLORS[diagnostic.kind](diagnostic.kind),
      diagnostic.identifier,
      diagnostic.text,
    ]);
  }

  console.log(table.toString());
  if (diagnostics.length > limit) {
    console.log(
      chalk.gray(
        `... (showing first ${String(limit)} of ${String(diagnostics.length)})`
      )
    );
  }
}

/**
 * Display a two-column key/value table
 */
export function displayKeyValues(
  title: string,
  entries: readonly [string, string][]
): void {
  console.log(chalk.bold(`\n${title}\n`));
  const table = new CliTable3({ colWidths: [25, 70], wordWrap: true });
  for (const [key, value] of entries) {
    table.push([chalk.cyan(key), value === "" ? chalk.gray("(none)") : value]);
  }
  console.log(table.toString());
}

/**
 * Print the validation details a configuration error carries
 */
export function printErrorDetails(error: unknown): void {
  if (error instanceof ConfigurationError && error.details) {
    for (const detail of error.details) {
      console.error(chalk.red(`  - ${detail}`));
    }
  }
}
