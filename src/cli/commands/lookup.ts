import chalk from "chalk";

import { errorMessage } from "../../errors.js";
import { splitColumns } from "../../services/pipeline/country-config.js";
import { displayKeyValues, printErrorDetails } from "../utils/display.js";
import { loadProject } from "../utils/project.js";

import type { Command } from "commander";

interface LookupOptions {
  config?: string;
}

/**
 * Print a vocabulary lookup result
 */
function showCode(
  kind: string,
  text: string,
  code: string | null,
  name: string
): void {
  if (code === null) {
    console.log(chalk.yellow(`${kind} ${text} could not be mapped`));
    process.exitCode = 1;
    return;
  }
  displayKeyValues(`${kind} ${text}`, [
    ["Code", code],
    ["Name", name],
  ]);
}

// ============================================================================
// Lookup Command
// ============================================================================

export function registerLookupCommand(program: Command): void {
  const lookup = program
    .command("lookup")
    .description("Resolve text against the reference data")
    .option("-c, --config <path>", "Project configuration file");

  lookup
    .command("sector <text>")
    .description("Resolve a sector name or code")
    .action((text: string) => {
      const options = lookup.opts<LookupOptions>();
      try {
        const { context } = loadProject({ config: options.config });
        const code = context.sectors.getCode(text);
        showCode("sector", text, code, context.sectors.getName(code ?? ""));
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        printErrorDetails(error);
        process.exitCode = 1;
      }
    });

  lookup
    .command("org-type <text>")
    .description("Resolve an organization type name or code")
    .action((text: string) => {
      const options = lookup.opts<LookupOptions>();
      try {
        const { context } = loadProject({ config: options.config });
        const code = context.orgTypes.getCode(text);
        showCode("org type", text, code, context.orgTypes.getName(code ?? ""));
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        printErrorDetails(error);
        process.exitCode = 1;
      }
    });

  lookup
    .command("org <text>")
    .description("Resolve an organization name or acronym within a country")
    .requiredOption("--country <code>", "ISO3 country code")
    .action((text: string, commandOptions: { country: string }) => {
      const options = lookup.opts<LookupOptions>();
      try {
        const { context } = loadProject({ config: options.config });
        const identity = context.organizations.getIdentity(
          text,
          commandOptions.country.toUpperCase()
        );
        displayKeyValues(`org ${text}`, [
          ["Canonical name", identity.canonicalName],
          ["Acronym", identity.acronym],
          ["Type code", identity.typeCode],
          [
            "Type description",
            context.organizations.getTypeDescription(identity.typeCode),
          ],
          ["Known", identity.complete ? "yes" : "no"],
        ]);
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        printErrorDetails(error);
        process.exitCode = 1;
      }
    });

  lookup
    .command("admin")
    .description("Resolve admin names and codes within a country")
    .requiredOption("--country <code>", "ISO3 country code")
    .option("--names <names>", "Comma-separated names, admin 1 first", "")
    .option("--codes <codes>", "Comma-separated pcodes, admin 1 first", "")
    .action(
      (commandOptions: { country: string; names: string; codes: string }) => {
        const options = lookup.opts<LookupOptions>();
        try {
          const { context } = loadProject({ config: options.config });
          const resolution = context.admins.resolve(
            commandOptions.country.toUpperCase(),
            splitColumns(commandOptions.names),
            splitColumns(commandOptions.codes)
          );
          displayKeyValues("admin", [
            ...resolution.codes.map((code, i): [string, string] => [
              `Admin ${String(i + 1)}`,
              code === "" ? "" : `${code} ${resolution.names[i] ?? ""}`,
            ]),
            ["Level", String(resolution.level)],
          ]);
          for (const warning of resolution.warnings) {
            console.log(chalk.yellow(warning));
          }
        } catch (error) {
          console.error(chalk.red(`Error: ${errorMessage(error)}`));
          printErrorDetails(error);
          process.exitCode = 1;
        }
      }
    );
}
