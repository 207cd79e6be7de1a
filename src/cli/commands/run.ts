import { join } from "node:path";

import chalk from "chalk";
import ora from "ora";

import { errorMessage } from "../../errors.js";
import { FileSourceReader } from "../../reader/file-reader.js";
import {
  organizationTable,
  presenceTable,
} from "../../services/pipeline/output.js";
import { PresencePipeline } from "../../services/pipeline/orchestrator.js";
import { toIsoString } from "../../utils/dates.js";
import { writeCsvRecords, writeCsvTable } from "../../writer/csv.js";
import {
  displayDiagnostics,
  displayRowCounts,
  printErrorDetails,
} from "../utils/display.js";
import { loadProject } from "../utils/project.js";

import type { Command } from "commander";

export const PRESENCE_FILE = "operational_presence.csv";
export const ORGANIZATIONS_FILE = "organisations.csv";
export const ORG_MAP_FILE = "org_map.csv";
export const REJECTED_FILE = "rejected_rows.csv";

interface RunOptions {
  config?: string;
  input?: string;
  output?: string;
  country?: string[];
  orgMap?: boolean;
  rejected?: boolean;
  diagnostics?: boolean;
}

// ============================================================================
// Run Command
// ============================================================================

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description(
      "Resolve every configured country and write the presence tables"
    )
    .option("-c, --config <path>", "Project configuration file")
    .option("-i, --input <dir>", "Directory holding the source resources")
    .option("-o, --output <dir>", "Directory the tables are written to")
    .option(
      "--country <codes...>",
      "Only process these ISO3 country codes"
    )
    .option("--org-map", "Also write the organization lookup audit table")
    .option("--rejected", "Also write the rows that produced no record")
    .option("--no-diagnostics", "Do not print collected diagnostics")
    .action(async (options: RunOptions) => {
      const spinner = ora("Loading configuration...").start();

      try {
        const { settings, config, countries, context } = loadProject({
          config: options.config,
          input: options.input,
          output: options.output,
          countries: options.country,
        });
        spinner.text = `Loaded ${String(countries.length)} country configurations`;

        const pipeline = new PresencePipeline(
          context,
          new FileSourceReader(settings.inputDir)
        );
        pipeline.setProgressCallback((progress) => {
          spinner.text = `[${progress.phase}] ${String(progress.current)}/${String(progress.total)} ${progress.currentItem ?? ""}`;
        });

        const result = await pipeline.process(countries);

        spinner.text = "Writing tables...";
        const { outputDir } = settings;
        writeCsvTable(
          join(outputDir, PRESENCE_FILE),
          presenceTable(result.presence, config.hxltags)
        );
        writeCsvTable(
          join(outputDir, ORGANIZATIONS_FILE),
          organizationTable(result.organizations, config.orgHxltags)
        );
        if (options.orgMap === true) {
          writeCsvRecords(
            join(outputDir, ORG_MAP_FILE),
            context.organizations.identityMapRows()
          );
        }
        if (options.rejected === true) {
          writeCsvRecords(join(outputDir, REJECTED_FILE), result.rejected);
        }

        spinner.succeed(
          `Wrote ${String(result.presence.length)} presence rows and ${String(result.organizations.length)} organizations to ${outputDir}`
        );

        console.log(chalk.bold("\nCountries:\n"));
        displayRowCounts(result.rowCounts);
        if (result.startDate && result.endDate) {
          console.log(
            `\nReference period: ${toIsoString(result.startDate)} - ${toIsoString(result.endDate)}`
          );
        }

        context.diagnostics.logAll();
        const counts = context.diagnostics.counts();
        console.log(
          `\nDiagnostics: ${chalk.red(String(counts.error))} errors, ${chalk.yellow(String(counts.warning))} warnings, ${chalk.yellow(String(counts.missing_value))} unmapped values`
        );
        if (options.diagnostics !== false) {
          displayDiagnostics(context.diagnostics.list());
        }
        console.log(
          `Fuzzy lookups: ${String(context.nameCodeResolver.fuzzyLookups)}`
        );

        const dropped = countries.length - result.countries.length;
        if (dropped > 0) {
          console.log(
            chalk.red(`\n${String(dropped)} countries excluded after errors`)
          );
          process.exitCode = 1;
        }
      } catch (error) {
        spinner.fail(`Run failed: ${errorMessage(error)}`);
        printErrorDetails(error);
        process.exitCode = 1;
      }
    });
}
