export * from "./types/index.js";
export * from "./errors.js";
export {
  getSettings,
  loadCountryConfigRecords,
  loadProjectConfig,
  validate,
} from "./config/index.js";
export type { MatchingConfig, ProjectConfig } from "./config/index.js";

export { NameCodeResolver } from "./services/canonical/name-code-resolver.js";
export type { Vocabulary } from "./services/canonical/name-code-resolver.js";
export { CodeVocabulary } from "./services/canonical/vocabulary.js";
export { SectorVocabulary } from "./services/canonical/sectors.js";
export { OrgTypeVocabulary } from "./services/canonical/org-types.js";
export { OrganizationIdentityResolver } from "./services/canonical/organizations.js";
export type {
  CanonicalOrg,
  OrgIdentity,
} from "./services/canonical/organizations.js";
export { AdminHierarchyResolver } from "./services/canonical/admin-hierarchy.js";
export type { AdminResolution } from "./services/canonical/admin-hierarchy.js";
export { ResolverContext } from "./services/canonical/context.js";
export type { ReferenceData } from "./services/canonical/context.js";
export { DiagnosticsCollector } from "./services/diagnostics.js";
export type {
  Diagnostic,
  DiagnosticKind,
  DiagnosticsSink,
} from "./services/diagnostics.js";

export { PresencePipeline } from "./services/pipeline/orchestrator.js";
export type {
  CountryRowCounts,
  PipelineResult,
} from "./services/pipeline/orchestrator.js";
export { parseCountryConfig } from "./services/pipeline/country-config.js";
export { compileFilter, parseFilter } from "./services/pipeline/filter.js";
export {
  organizationTable,
  presenceTable,
} from "./services/pipeline/output.js";
export type { OutputTable } from "./services/pipeline/output.js";

export { FileSourceReader } from "./reader/file-reader.js";
export { loadReferenceData } from "./reader/reference.js";
export { formatCsvTable, writeCsvTable } from "./writer/csv.js";
