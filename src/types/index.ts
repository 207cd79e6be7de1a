// Partner presence domain types

// =====================
// Source tables
// =====================

/**
 * One row of a source table, keyed by column header
 */
export type SourceRow = Record<string, string>;

/**
 * Describes which table to read for a country
 */
export interface SourceDescriptor {
  countryCode: string;
  dataset: string;
  resource: string;
  format: string;
  sheet?: string;
  /** 1-based header row, or several rows joined into one header */
  headers?: number | number[];
  /** First row after the header holds HXL tags */
  useHxl: boolean;
  /** Period of the dataset itself, used when nothing better is known */
  datasetPeriod?: { start: string; end: string };
}

export interface SourceTable {
  headers: string[];
  rows: SourceRow[];
}

/**
 * External collaborator that yields rows for a dataset resource
 */
export interface SourceReader {
  read(descriptor: SourceDescriptor): Promise<SourceTable>;
}

// =====================
// Country configuration
// =====================

export type { CountryConfigRecord } from "../config/schema.js";

/**
 * Column identifiers of a source table. Admin columns are positional:
 * index 0 is admin level 1. An empty string means "no column at this level".
 */
export interface ColumnMapping {
  orgName: string;
  orgAcronym: string;
  orgType: string;
  sector: string;
  admCodes: string[];
  admNames: string[];
  startDate: string;
  endDate: string;
}

/**
 * Validated configuration for one country
 */
export interface CountryConfig {
  countryCode: string;
  source: SourceDescriptor;
  columns: ColumnMapping;
  filter: string;
  filenameDates: boolean;
  explicitPeriod?: { start: string; end: string };
}

// =====================
// Reference tables
// =====================

export interface VocabularyEntry {
  code: string;
  label: string;
}

export interface OrgReferenceRow {
  /** ISO3 country code, or "*" / "" for global entries */
  countryCode: string;
  name: string;
  acronym: string;
  /** Alternate spelling the organization appears under */
  pattern: string;
  typeCode: string;
}

export interface AdminReferenceRow {
  countryCode: string;
  level: number;
  pcode: string;
  name: string;
  parentPcode: string;
}

// =====================
// Output
// =====================

/**
 * One canonical "who does what, where" record
 */
export interface OutputRecord {
  countryCode: string;
  providerAdmin1Name: string;
  providerAdmin2Name: string;
  providerAdmin3Name: string;
  admin1Code: string;
  admin1Name: string;
  admin2Code: string;
  admin2Name: string;
  admin3Code: string;
  admin3Name: string;
  adminLevel: number;
  orgAcronym: string;
  orgName: string;
  orgTypeCode: string;
  orgTypeDescription: string;
  sectorCode: string;
  sectorName: string;
  referencePeriodStart: string;
  referencePeriodEnd: string;
  datasetName: string;
  resourceName: string;
  warning: string;
  error: string;
}

export interface OrganizationRecord {
  acronym: string;
  name: string;
  typeCode: string;
}

/**
 * A source row that could not become an output record
 */
export interface RejectedRow {
  countryCode: string;
  datasetName: string;
  rowNumber: number;
  orgName: string;
  sector: string;
  error: string;
}
