import { pipelineLogger } from "../../logger.js";
import { ADMIN_LEVELS } from "../canonical/admin-hierarchy.js";

import type {
  ColumnMapping,
  CountryConfig,
  CountryConfigRecord,
} from "../../types/index.js";

function clean(value: string | undefined): string {
  return value?.trim() ?? "";
}

/**
 * Positional admin columns: "adm1,,adm3" -> ["adm1", "", "adm3"]
 */
export function splitColumns(value: string): string[] {
  const columns =
    value === "" ? [] : value.split(",").map((column) => column.trim());
  while (columns.length < ADMIN_LEVELS) columns.push("");
  return columns.slice(0, ADMIN_LEVELS);
}

/**
 * "2" -> 2, "1,2" -> [1, 2]
 */
export function parseHeaderRows(
  value: string
): number | number[] | undefined {
  if (value === "") return undefined;
  const rows = value
    .split(",")
    .map((row) => Number.parseInt(row.trim(), 10))
    .filter((row) => !Number.isNaN(row));
  if (rows.length === 0) return undefined;
  return rows.length === 1 ? rows[0] : rows;
}

function formatFromResource(resource: string): string {
  const dot = resource.lastIndexOf(".");
  return dot === -1 ? "csv" : resource.slice(dot + 1).toLowerCase();
}

/**
 * Turn an operator-maintained record into a usable configuration.
 * @returns null when the country is excluded or the record lacks the
 * columns needed to produce any output
 */
export function parseCountryConfig(
  record: CountryConfigRecord
): CountryConfig | null {
  const countryCode = record.countryCode.trim().toUpperCase();
  const log = pipelineLogger.child({ countryCode });

  if (record.exclude === true) {
    log.info("Country excluded in configuration");
    return null;
  }

  const orgName = clean(record.orgNameColumn);
  const sector = clean(record.sectorColumn);
  const admCodeColumns = clean(record.admCodeColumns);
  const admNameColumns = clean(record.admNameColumns);

  if (orgName === "") {
    log.warn("Ignoring country because it has no org name column");
    return null;
  }
  if (sector === "") {
    log.warn("Ignoring country because it has no sector column");
    return null;
  }
  if (admCodeColumns === "" && admNameColumns === "") {
    log.warn(
      "Ignoring country because it has no admin code and no admin name columns"
    );
    return null;
  }

  const columns: ColumnMapping = {
    orgName,
    // The org name column doubles as acronym column when none is given
    orgAcronym: clean(record.orgAcronymColumn) || orgName,
    orgType: clean(record.orgTypeColumn),
    sector,
    admCodes: splitColumns(admCodeColumns),
    admNames: splitColumns(admNameColumns),
    startDate: clean(record.startDateColumn),
    endDate: clean(record.endDateColumn),
  };

  const resource = clean(record.resource);
  const datasetStart = clean(record.datasetStartDate);
  const datasetEnd = clean(record.datasetEndDate);
  const startDate = clean(record.startDate);
  const endDate = clean(record.endDate);

  const config: CountryConfig = {
    countryCode,
    source: {
      countryCode,
      dataset: clean(record.dataset),
      resource,
      format: clean(record.format).toLowerCase() || formatFromResource(resource),
      sheet: clean(record.sheet) || undefined,
      headers: parseHeaderRows(clean(record.headers)),
      useHxl: orgName.startsWith("#"),
      datasetPeriod:
        datasetStart !== "" && datasetEnd !== ""
          ? { start: datasetStart, end: datasetEnd }
          : undefined,
    },
    columns,
    filter: clean(record.filter),
    filenameDates: record.filenameDates === true,
  };

  if (startDate !== "" && endDate !== "") {
    config.explicitPeriod = { start: startDate, end: endDate };
  } else if (startDate !== "" || endDate !== "") {
    log.warn("Ignoring configured dates because only one bound is set");
  }

  return config;
}
