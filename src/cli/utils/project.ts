import {
  getSettings,
  loadCountryConfigRecords,
  loadProjectConfig,
  type ProjectConfig,
  type Settings,
} from "../../config/index.js";
import { loadReferenceData } from "../../reader/reference.js";
import { ResolverContext } from "../../services/canonical/context.js";
import { parseCountryConfig } from "../../services/pipeline/country-config.js";

import type { CountryConfig } from "../../types/index.js";

export interface LoadedProject {
  settings: Settings;
  config: ProjectConfig;
  countries: CountryConfig[];
  context: ResolverContext;
}

export interface ProjectOptions {
  config?: string;
  input?: string;
  output?: string;
  /** Only these ISO3 codes */
  countries?: string[];
}

/**
 * Load configuration, country records and reference data for one run
 */
export function loadProject(options: ProjectOptions = {}): LoadedProject {
  const defaults = getSettings();
  const settings: Settings = {
    configPath: options.config ?? defaults.configPath,
    inputDir: options.input ?? defaults.inputDir,
    outputDir: options.output ?? defaults.outputDir,
  };

  const config = loadProjectConfig(settings.configPath);
  const wanted =
    options.countries && options.countries.length > 0
      ? new Set(options.countries.map((code) => code.toUpperCase()))
      : null;

  const countries: CountryConfig[] = [];
  for (const record of loadCountryConfigRecords(config.countriesFile)) {
    if (wanted && !wanted.has(record.countryCode.toUpperCase())) continue;
    const country = parseCountryConfig(record);
    if (country) countries.push(country);
  }

  const context = new ResolverContext(undefined, config.matching).populate(
    loadReferenceData(config)
  );
  return { settings, config, countries, context };
}
