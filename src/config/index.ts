import { readFileSync } from "node:fs";
import { dirname, isAbsolute, join, resolve } from "node:path";

import { Value } from "@sinclair/typebox/value";

import {
  CountryConfigFileSchema,
  ProjectConfigSchema,
  type CountryConfigRecord,
  type ProjectConfig,
} from "./schema.js";
import { ConfigurationError, errorMessage } from "../errors.js";

import type { TSchema, Static } from "@sinclair/typebox";

// ============================================================================
// Process Settings
// ============================================================================

export interface Settings {
  configPath: string;
  inputDir: string;
  outputDir: string;
}

/**
 * Settings from the environment (.env is loaded with the logger)
 */
export function getSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    configPath: env.PRESENCE_CONFIG ?? "config/project-configuration.json",
    inputDir: env.PRESENCE_INPUT_DIR ?? "data/input",
    outputDir: env.PRESENCE_OUTPUT_DIR ?? "data/output",
  };
}

// ============================================================================
// Loading
// ============================================================================

function readJson(path: string): unknown {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read configuration file ${path}: ${errorMessage(error)}`
    );
  }
  try {
    return JSON.parse(content) as unknown;
  } catch (error) {
    throw new ConfigurationError(
      `Configuration file ${path} is not valid JSON: ${errorMessage(error)}`
    );
  }
}

/**
 * Apply schema defaults and validate
 */
export function validate<T extends TSchema>(
  schema: T,
  value: unknown,
  source: string
): Static<T> {
  const withDefaults = Value.Default(schema, value);
  if (Value.Check(schema, withDefaults)) {
    return withDefaults;
  }
  const details = [...Value.Errors(schema, withDefaults)].map(
    (error) => `${error.path || "/"}: ${error.message}`
  );
  throw new ConfigurationError(`Invalid configuration in ${source}`, details);
}

export function resolvePath(baseDir: string, path: string): string {
  return isAbsolute(path) ? path : join(baseDir, path);
}

/**
 * Load the project configuration. Relative file names inside it are resolved
 * against the directory of the configuration file.
 */
export function loadProjectConfig(path: string): ProjectConfig {
  const absolute = resolve(path);
  const config = validate(ProjectConfigSchema, readJson(absolute), absolute);
  const baseDir = dirname(absolute);
  return {
    ...config,
    countriesFile: resolvePath(baseDir, config.countriesFile),
    referenceFiles: {
      sectors: resolvePath(baseDir, config.referenceFiles.sectors),
      orgTypes: resolvePath(baseDir, config.referenceFiles.orgTypes),
      organizations: resolvePath(baseDir, config.referenceFiles.organizations),
      adminPcodes: resolvePath(baseDir, config.referenceFiles.adminPcodes),
    },
  };
}

export function loadCountryConfigRecords(path: string): CountryConfigRecord[] {
  return validate(CountryConfigFileSchema, readJson(path), path);
}

export type {
  ProjectConfig,
  CountryConfigRecord,
  MatchingConfig,
} from "./schema.js";
