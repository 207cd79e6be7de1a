/**
 * TypeBox schemas for the project and country configuration files
 */

import { Type, type Static } from "@sinclair/typebox";

// ============================================================================
// Project Configuration
// ============================================================================

export const MatchingSchema = Type.Object({
  fuzzyMinLength: Type.Integer({ minimum: 0, default: 5 }),
  phoneticThreshold: Type.Integer({ minimum: 0, default: 2 }),
  acronymMaxLength: Type.Integer({ minimum: 1, default: 32 }),
  adminFuzzyMinLength: Type.Integer({ minimum: 0, default: 3 }),
  maxAdminLevel: Type.Integer({ minimum: 1, maximum: 3, default: 3 }),
});

export const ReferenceFilesSchema = Type.Object({
  sectors: Type.String(),
  orgTypes: Type.String(),
  organizations: Type.String(),
  adminPcodes: Type.String(),
});

/** Output column header -> HXL tag */
export const HxlTagsSchema = Type.Record(Type.String(), Type.String());

export const ProjectConfigSchema = Type.Object({
  countriesFile: Type.String(),
  referenceFiles: ReferenceFilesSchema,
  matching: MatchingSchema,
  sectorMap: Type.Record(Type.String(), Type.String(), { default: {} }),
  orgTypeMap: Type.Record(Type.String(), Type.String(), { default: {} }),
  hxltags: HxlTagsSchema,
  orgHxltags: HxlTagsSchema,
});

export type MatchingConfig = Static<typeof MatchingSchema>;
export type ProjectConfig = Static<typeof ProjectConfigSchema>;

// ============================================================================
// Country Configuration
// ============================================================================

export const CountryConfigRecordSchema = Type.Object({
  countryCode: Type.String({ minLength: 3, maxLength: 3 }),
  exclude: Type.Optional(Type.Boolean()),
  dataset: Type.String(),
  resource: Type.String(),
  format: Type.Optional(Type.String()),
  sheet: Type.Optional(Type.String()),
  headers: Type.Optional(Type.String()),
  startDate: Type.Optional(Type.String()),
  endDate: Type.Optional(Type.String()),
  filter: Type.Optional(Type.String()),
  filenameDates: Type.Optional(Type.Boolean()),
  startDateColumn: Type.Optional(Type.String()),
  endDateColumn: Type.Optional(Type.String()),
  admCodeColumns: Type.Optional(Type.String()),
  admNameColumns: Type.Optional(Type.String()),
  orgNameColumn: Type.Optional(Type.String()),
  orgAcronymColumn: Type.Optional(Type.String()),
  orgTypeColumn: Type.Optional(Type.String()),
  sectorColumn: Type.Optional(Type.String()),
  datasetStartDate: Type.Optional(Type.String()),
  datasetEndDate: Type.Optional(Type.String()),
});

export const CountryConfigFileSchema = Type.Array(CountryConfigRecordSchema);

/**
 * Per-country configuration as maintained by the operators
 */
export type CountryConfigRecord = Static<typeof CountryConfigRecordSchema>;
