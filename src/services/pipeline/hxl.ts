import { ConfigurationError } from "../../errors.js";

import type { ColumnMapping, SourceRow } from "../../types/index.js";

/**
 * "#org +name" and "#org+Name" are the same tag
 */
export function normalizeHxlTag(tag: string): string {
  return tag.toLowerCase().replaceAll(/\s+/g, "");
}

/**
 * Invert a header -> tag row into a tag -> header lookup
 */
export function buildTagLookup(headerToTag: SourceRow): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const [header, tag] of Object.entries(headerToTag)) {
    const normalized = normalizeHxlTag(tag);
    if (normalized !== "" && !lookup.has(normalized)) {
      lookup.set(normalized, header);
    }
  }
  return lookup;
}

/**
 * Column header for a configured column, which may be an HXL tag
 */
export function columnForTag(
  lookup: Map<string, string>,
  column: string
): string {
  if (column === "" || !column.startsWith("#")) return column;
  const header = lookup.get(normalizeHxlTag(column));
  if (header === undefined) {
    throw new ConfigurationError(`HXL tag ${column} not found in source`);
  }
  return header;
}

/**
 * Replace HXL tags in the column mapping by the headers they tag
 */
export function translateColumns(
  columns: ColumnMapping,
  headerToTag: SourceRow
): ColumnMapping {
  const lookup = buildTagLookup(headerToTag);
  const translate = (column: string): string => columnForTag(lookup, column);
  return {
    orgName: translate(columns.orgName),
    orgAcronym: translate(columns.orgAcronym),
    orgType: translate(columns.orgType),
    sector: translate(columns.sector),
    admCodes: columns.admCodes.map(translate),
    admNames: columns.admNames.map(translate),
    startDate: translate(columns.startDate),
    endDate: translate(columns.endDate),
  };
}
