import { ConfigurationError } from "../../errors.js";

import type { OrganizationRecord, OutputRecord } from "../../types/index.js";

// ============================================================================
// Column Definitions
// ============================================================================

type ColumnGetter<T> = (record: T) => string;

/**
 * Output header -> value for an operational presence record
 */
export const PRESENCE_COLUMNS: Readonly<
  Record<string, ColumnGetter<OutputRecord>>
> = {
  "Country ISO3 Code": (r) => r.countryCode,
  "Admin 1 PCode": (r) => r.admin1Code,
  "Admin 1 Name": (r) => r.admin1Name,
  "Admin 2 PCode": (r) => r.admin2Code,
  "Admin 2 Name": (r) => r.admin2Name,
  "Admin 3 PCode": (r) => r.admin3Code,
  "Admin 3 Name": (r) => r.admin3Name,
  "Admin Level": (r) => String(r.adminLevel),
  "Provider Admin 1 Name": (r) => r.providerAdmin1Name,
  "Provider Admin 2 Name": (r) => r.providerAdmin2Name,
  "Provider Admin 3 Name": (r) => r.providerAdmin3Name,
  "Org Acronym": (r) => r.orgAcronym,
  "Org Name": (r) => r.orgName,
  "Org Type Code": (r) => r.orgTypeCode,
  "Org Type Description": (r) => r.orgTypeDescription,
  "Sector Code": (r) => r.sectorCode,
  "Sector Name": (r) => r.sectorName,
  "Reference Period Start": (r) => r.referencePeriodStart,
  "Reference Period End": (r) => r.referencePeriodEnd,
  "Dataset Name": (r) => r.datasetName,
  "Resource Name": (r) => r.resourceName,
  Warning: (r) => r.warning,
  Error: (r) => r.error,
};

export const ORG_COLUMNS: Readonly<
  Record<string, ColumnGetter<OrganizationRecord>>
> = {
  Acronym: (r) => r.acronym,
  Name: (r) => r.name,
  "Org Type Code": (r) => r.typeCode,
};

// ============================================================================
// Table Building
// ============================================================================

/**
 * Header row, HXL tag row and data rows, ready to be written
 */
export interface OutputTable {
  headers: string[];
  hxlTags: string[];
  rows: string[][];
}

/**
 * Build a table whose columns, in order, are the keys of `hxltags`
 */
export function buildTable<T>(
  records: readonly T[],
  columns: Readonly<Record<string, ColumnGetter<T>>>,
  hxltags: Readonly<Record<string, string>>
): OutputTable {
  const headers = Object.keys(hxltags);
  const getters = headers.map((header) => {
    const getter = columns[header];
    if (!getter) {
      throw new ConfigurationError(`Unknown output column ${header}`);
    }
    return getter;
  });

  return {
    headers,
    hxlTags: headers.map((header) => hxltags[header] ?? ""),
    rows: records.map((record) => getters.map((getter) => getter(record))),
  };
}

export function presenceTable(
  records: readonly OutputRecord[],
  hxltags: Readonly<Record<string, string>>
): OutputTable {
  return buildTable(records, PRESENCE_COLUMNS, hxltags);
}

export function organizationTable(
  records: readonly OrganizationRecord[],
  hxltags: Readonly<Record<string, string>>
): OutputTable {
  return buildTable(records, ORG_COLUMNS, hxltags);
}
