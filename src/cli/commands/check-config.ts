import chalk from "chalk";
import CliTable3 from "cli-table3";

import {
  getSettings,
  loadCountryConfigRecords,
  loadProjectConfig,
} from "../../config/index.js";
import { errorMessage } from "../../errors.js";
import { loadReferenceData } from "../../reader/reference.js";
import { parseCountryConfig } from "../../services/pipeline/country-config.js";
import { parseFilter } from "../../services/pipeline/filter.js";
import {
  ORG_COLUMNS,
  PRESENCE_COLUMNS,
} from "../../services/pipeline/output.js";
import { printErrorDetails } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Check Config Command
// ============================================================================

export function registerCheckConfigCommand(program: Command): void {
  program
    .command("check-config")
    .description("Validate the configuration and reference files")
    .option("-c, --config <path>", "Project configuration file")
    .action((options: { config?: string }) => {
      const configPath = options.config ?? getSettings().configPath;
      try {
        const config = loadProjectConfig(configPath);
        console.log(chalk.green(`✓ ${configPath}`));

        const unknownColumns = [
          ...Object.keys(config.hxltags).filter(
            (header) => !(header in PRESENCE_COLUMNS)
          ),
          ...Object.keys(config.orgHxltags).filter(
            (header) => !(header in ORG_COLUMNS)
          ),
        ];
        for (const header of unknownColumns) {
          console.log(chalk.red(`✗ Unknown output column ${header}`));
        }

        const reference = loadReferenceData(config);
        console.log(
          chalk.green(
            `✓ Reference data: ${String(reference.sectors.length)} sectors, ${String(reference.orgTypes.length)} org types, ${String(reference.organizations.length)} organizations, ${String(reference.adminPcodes.length)} pcodes`
          )
        );

        const records = loadCountryConfigRecords(config.countriesFile);
        const table = new CliTable3({
          head: [
            chalk.cyan("Country"),
            chalk.cyan("Dataset"),
            chalk.cyan("Status"),
          ],
          colWidths: [10, 50, 40],
          wordWrap: true,
        });

        let failures = unknownColumns.length;
        for (const record of records) {
          let status = chalk.green("ok");
          const country = parseCountryConfig(record);
          if (record.exclude === true) {
            status = chalk.gray("excluded");
          } else if (country === null) {
            status = chalk.yellow("ignored: missing columns");
          } else if (country.filter !== "") {
            try {
              parseFilter(country.filter);
            } catch (error) {
              status = chalk.red(errorMessage(error));
              failures++;
            }
          }
          table.push([record.countryCode, record.dataset, status]);
        }
        console.log(table.toString());

        if (failures > 0) {
          console.log(chalk.red(`\n${String(failures)} problems found`));
          process.exitCode = 1;
        }
      } catch (error) {
        console.error(chalk.red(`✗ ${errorMessage(error)}`));
        printErrorDetails(error);
        process.exitCode = 1;
      }
    });
}
