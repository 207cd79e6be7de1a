import { readFileSync } from "node:fs";

import { parse } from "csv-parse/sync";

import { ConfigurationError, errorMessage } from "../errors.js";
import { readerLogger } from "../logger.js";

import type { ProjectConfig } from "../config/schema.js";
import type { ReferenceData } from "../services/canonical/context.js";
import type {
  AdminReferenceRow,
  OrgReferenceRow,
  VocabularyEntry,
} from "../types/index.js";

type CsvRecord = Record<string, string>;

/**
 * Read a reference CSV and check it carries the expected columns
 */
export function readReferenceCsv(
  path: string,
  requiredColumns: readonly string[]
): CsvRecord[] {
  let records: CsvRecord[];
  try {
    records = parse(readFileSync(path), {
      bom: true,
      columns: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read reference file ${path}: ${errorMessage(error)}`
    );
  }

  const first = records[0];
  if (first) {
    const missing = requiredColumns.filter((column) => !(column in first));
    if (missing.length > 0) {
      throw new ConfigurationError(
        `Reference file ${path} is missing columns`,
        missing
      );
    }
  }
  readerLogger.debug({ path, rows: records.length }, "Reference file read");
  return records;
}

export function toVocabularyEntries(records: CsvRecord[]): VocabularyEntry[] {
  return records.map((record) => ({
    code: record.code ?? "",
    label: record.name ?? "",
  }));
}

export function toOrgReferenceRows(records: CsvRecord[]): OrgReferenceRow[] {
  return records.map((record) => ({
    countryCode: record.country_code ?? "",
    name: record.name ?? "",
    acronym: record.acronym ?? "",
    pattern: record.pattern ?? "",
    typeCode: record.type_code ?? "",
  }));
}

/**
 * Rows with a level outside 1..3 are skipped
 */
export function toAdminReferenceRows(
  records: CsvRecord[]
): AdminReferenceRow[] {
  const rows: AdminReferenceRow[] = [];
  for (const record of records) {
    const level = Number.parseInt(record.level ?? "", 10);
    if (!(level >= 1 && level <= 3)) {
      readerLogger.warn(
        { pcode: record.pcode, level: record.level },
        "Skipping pcode with invalid level"
      );
      continue;
    }
    rows.push({
      countryCode: record.country_code ?? "",
      level,
      pcode: record.pcode ?? "",
      name: record.name ?? "",
      parentPcode: record.parent_pcode ?? "",
    });
  }
  return rows;
}

/**
 * Load every reference table named in the project configuration
 */
export function loadReferenceData(config: ProjectConfig): ReferenceData {
  const files = config.referenceFiles;
  return {
    sectors: toVocabularyEntries(
      readReferenceCsv(files.sectors, ["code", "name"])
    ),
    orgTypes: toVocabularyEntries(
      readReferenceCsv(files.orgTypes, ["code", "name"])
    ),
    organizations: toOrgReferenceRows(
      readReferenceCsv(files.organizations, [
        "country_code",
        "name",
        "acronym",
        "pattern",
        "type_code",
      ])
    ),
    adminPcodes: toAdminReferenceRows(
      readReferenceCsv(files.adminPcodes, [
        "country_code",
        "level",
        "pcode",
        "name",
        "parent_pcode",
      ])
    ),
    sectorMap: config.sectorMap,
    orgTypeMap: config.orgTypeMap,
  };
}
