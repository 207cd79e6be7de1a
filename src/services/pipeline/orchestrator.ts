import { PresenceRecordSet } from "./dedup.js";
import { compileFilter, type RowPredicate } from "./filter.js";
import { buildTagLookup, columnForTag, translateColumns } from "./hxl.js";
import { errorMessage } from "../../errors.js";
import { countryLogger, pipelineLogger, type Logger } from "../../logger.js";
import {
  MIN_VALID_YEAR,
  getDatesFromFilename,
  parseDate,
  parseEndDate,
  toIsoString,
  type DateRange,
} from "../../utils/dates.js";

import type {
  ColumnMapping,
  CountryConfig,
  OrganizationRecord,
  OutputRecord,
  RejectedRow,
  SourceReader,
  SourceRow,
} from "../../types/index.js";
import type { ResolverContext } from "../canonical/context.js";

// ============================================================================
// Types
// ============================================================================

/**
 * A source row kept after preprocessing. Rows with an error are kept for
 * auditing but never become output records.
 */
export interface PreparedRow {
  rowNumber: number;
  row: SourceRow;
  orgString: string;
  sectorText: string;
  sectorCode: string | null;
  error: string;
}

export interface PreparedCountry {
  config: CountryConfig;
  /** Column mapping with HXL tags replaced by headers */
  columns: ColumnMapping;
  rows: PreparedRow[];
  /** Audit entries, committed only when the whole country prepares */
  rejected: RejectedRow[];
  period: DateRange;
}

export interface CountryRowCounts {
  countryCode: string;
  datasetName: string;
  rowsRead: number;
  rowsFiltered: number;
  rowsRejected: number;
  rowsOut: number;
}

export interface PipelineResult {
  countries: string[];
  startDate: Date | null;
  endDate: Date | null;
  organizations: OrganizationRecord[];
  presence: OutputRecord[];
  rejected: RejectedRow[];
  rowCounts: CountryRowCounts[];
}

export interface PipelineProgress {
  phase: "preprocess" | "process";
  current: number;
  total: number;
  currentItem?: string;
}

type ProgressCallback = (progress: PipelineProgress) => void;

function cell(row: SourceRow, column: string): string {
  if (column === "") return "";
  return (row[column] ?? "").trim();
}

// ============================================================================
// Presence Pipeline
// ============================================================================

/**
 * Two passes per country: preprocessing resolves sectors and organizations
 * so that identities are complete before production builds the records.
 */
export class PresencePipeline {
  private records = new PresenceRecordSet();
  private rejected: RejectedRow[] = [];
  private rowCounts = new Map<string, CountryRowCounts>();
  private earliestStart: Date | null = null;
  private latestEnd: Date | null = null;
  private onProgress?: ProgressCallback;

  constructor(
    private context: ResolverContext,
    private reader: SourceReader
  ) {}

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  /**
   * Run both passes for every country. A country that fails preprocessing
   * is logged and left out; the others continue.
   */
  async process(configs: readonly CountryConfig[]): Promise<PipelineResult> {
    const prepared: PreparedCountry[] = [];

    for (const [index, config] of configs.entries()) {
      this.onProgress?.({
        phase: "preprocess",
        current: index + 1,
        total: configs.length,
        currentItem: config.countryCode,
      });
      try {
        const country = await this.preprocessCountry(config);
        prepared.push(country);
        this.rejected.push(...country.rejected);
      } catch (error) {
        const message = errorMessage(error);
        this.rowCounts.delete(config.countryCode);
        pipelineLogger.error(
          {
            countryCode: config.countryCode,
            dataset: config.source.dataset,
            err: error,
          },
          "Country preprocessing failed"
        );
        this.context.diagnostics.error(
          config.source.dataset,
          `${config.countryCode} excluded: ${message}`
        );
      }
    }

    for (const [index, country] of prepared.entries()) {
      this.onProgress?.({
        phase: "process",
        current: index + 1,
        total: prepared.length,
        currentItem: country.config.countryCode,
      });
      this.processCountry(country);
    }
    pipelineLogger.info(
      { countries: prepared.length, records: this.records.size },
      "Presence records deduplicated"
    );

    return {
      countries: prepared.map((country) => country.config.countryCode),
      startDate: this.earliestStart,
      endDate: this.latestEnd,
      organizations: this.organizationRows(),
      presence: this.presenceRows(),
      rejected: [...this.rejected],
      rowCounts: [...this.rowCounts.values()],
    };
  }

  /**
   * Read a country's rows, resolve sector and organization for each and
   * work out the reference period
   */
  async preprocessCountry(config: CountryConfig): Promise<PreparedCountry> {
    const { countryCode } = config;
    const datasetName = config.source.dataset;
    const { diagnostics, sectors, organizations } = this.context;
    const log = countryLogger(countryCode, datasetName);

    const table = await this.reader.read(config.source);
    let sourceRows = table.rows;
    let columns = config.columns;
    let predicate: RowPredicate;

    if (config.source.useHxl) {
      const [headerToTag, ...dataRows] = sourceRows;
      if (!headerToTag) {
        throw new Error(`No HXL tag row in ${config.source.resource}`);
      }
      sourceRows = dataRows;
      columns = translateColumns(columns, headerToTag);
      const lookup = buildTagLookup(headerToTag);
      predicate = compileFilter(config.filter, (field) =>
        columnForTag(lookup, field)
      );
    } else {
      predicate = compileFilter(config.filter);
    }

    const counts: CountryRowCounts = {
      countryCode,
      datasetName,
      rowsRead: 0,
      rowsFiltered: 0,
      rowsRejected: 0,
      rowsOut: 0,
    };
    this.rowCounts.set(countryCode, counts);

    const observed: { start: Date | null; end: Date | null } = {
      start: null,
      end: null,
    };
    const rows: PreparedRow[] = [];
    const rejected: RejectedRow[] = [];

    for (const [index, row] of sourceRows.entries()) {
      counts.rowsRead++;
      if (!predicate(row)) {
        counts.rowsFiltered++;
        continue;
      }
      this.observeDates(row, columns, observed, log);

      const acronym = cell(row, columns.orgAcronym);
      const orgString = cell(row, columns.orgName) || acronym;
      const sectorText = cell(row, columns.sector);
      const prepared: PreparedRow = {
        rowNumber: index + 1,
        row,
        orgString,
        sectorText,
        sectorCode: null,
        error: "",
      };
      rows.push(prepared);

      if (sectorText === "") {
        this.reject(
          rejected,
          prepared,
          countryCode,
          datasetName,
          `org ${orgString} missing sector`
        );
        continue;
      }
      if (orgString === "") {
        this.reject(
          rejected,
          prepared,
          countryCode,
          datasetName,
          `sector ${sectorText} missing org`
        );
        continue;
      }

      prepared.sectorCode = sectors.getCode(sectorText);
      if (prepared.sectorCode === null) {
        diagnostics.missingValue(datasetName, "sector", sectorText);
      }

      const identity = organizations.getIdentity(orgString, countryCode);
      if (!identity.complete || !identity.used) {
        const typeLabel =
          columns.orgType === "" ? undefined : cell(row, columns.orgType);
        organizations.completeIdentity(
          identity,
          acronym,
          typeLabel,
          datasetName
        );
        organizations.mergeOrRegister(identity, datasetName);
      }
    }

    const period = this.resolvePeriod(config, observed);
    const summary = `${String(counts.rowsRead)} rows preprocessed from ${datasetName}`;
    log.info(
      { rows: counts.rowsRead, filtered: counts.rowsFiltered },
      summary
    );
    diagnostics.info(datasetName, summary);
    return { config, columns, rows, rejected, period };
  }

  /**
   * Build output records for a preprocessed country
   */
  processCountry(country: PreparedCountry): DateRange {
    const { config, columns, period } = country;
    const { countryCode } = config;
    const datasetName = config.source.dataset;
    const { organizations, sectors, admins } = this.context;
    const counts = this.rowCounts.get(countryCode);
    const periodStart = toIsoString(period.start);
    const periodEnd = toIsoString(period.end);

    let rowsIn = 0;
    let rowsOut = 0;
    for (const prepared of country.rows) {
      rowsIn++;
      if (prepared.error !== "") continue;

      const { row } = prepared;
      const identity = organizations.getIdentity(
        prepared.orgString,
        countryCode
      );
      const providerNames = columns.admNames.map((column) =>
        cell(row, column)
      );
      const providedCodes = columns.admCodes.map((column) =>
        cell(row, column)
      );
      const admin = admins.resolve(countryCode, providerNames, providedCodes);

      const errors: string[] = [];
      if (prepared.sectorCode === null) {
        errors.push(`sector ${prepared.sectorText} could not be mapped`);
      }
      const sectorCode = prepared.sectorCode ?? "";

      this.records.add({
        countryCode,
        providerAdmin1Name: providerNames[0] ?? "",
        providerAdmin2Name: providerNames[1] ?? "",
        providerAdmin3Name: providerNames[2] ?? "",
        admin1Code: admin.codes[0] ?? "",
        admin1Name: admin.names[0] ?? "",
        admin2Code: admin.codes[1] ?? "",
        admin2Name: admin.names[1] ?? "",
        admin3Code: admin.codes[2] ?? "",
        admin3Name: admin.names[2] ?? "",
        adminLevel: admin.level,
        orgAcronym: identity.acronym,
        orgName: identity.canonicalName,
        orgTypeCode: identity.typeCode,
        orgTypeDescription: organizations.getTypeDescription(
          identity.typeCode
        ),
        sectorCode,
        sectorName: sectors.getName(sectorCode),
        referencePeriodStart: periodStart,
        referencePeriodEnd: periodEnd,
        datasetName,
        resourceName: config.source.resource,
        warning: admin.warnings.join("|"),
        error: errors.join("|"),
      });
      rowsOut++;
    }

    if (counts) counts.rowsOut = rowsOut;
    if (this.earliestStart === null || period.start < this.earliestStart) {
      this.earliestStart = period.start;
    }
    if (this.latestEnd === null || period.end > this.latestEnd) {
      this.latestEnd = period.end;
    }

    const summary = `${String(rowsIn)} rows processed from ${datasetName} producing ${String(rowsOut)} rows`;
    countryLogger(countryCode, datasetName).info({ rowsIn, rowsOut }, summary);
    this.context.diagnostics.info(datasetName, summary);
    return period;
  }

  /**
   * Deduplicated presence records in output order
   */
  presenceRows(): OutputRecord[] {
    return this.records.sorted();
  }

  organizationRows(): OrganizationRecord[] {
    return this.context.organizations.canonicalOrgs();
  }

  private reject(
    rejected: RejectedRow[],
    prepared: PreparedRow,
    countryCode: string,
    datasetName: string,
    error: string
  ): void {
    prepared.error = error;
    this.context.diagnostics.error(datasetName, error);
    rejected.push({
      countryCode,
      datasetName,
      rowNumber: prepared.rowNumber,
      orgName: prepared.orgString,
      sector: prepared.sectorText,
      error,
    });
    const counts = this.rowCounts.get(countryCode);
    if (counts) counts.rowsRejected++;
  }

  /**
   * Widen the observed range with the row's date columns. Unparseable and
   * pre-2000 values are skipped.
   */
  private observeDates(
    row: SourceRow,
    columns: ColumnMapping,
    observed: { start: Date | null; end: Date | null },
    log: Logger
  ): void {
    const checks: [string, (text: string) => Date | null][] = [
      [columns.startDate, parseDate],
      [columns.endDate, parseEndDate],
    ];
    for (const [column, parse] of checks) {
      const text = cell(row, column);
      if (text === "") continue;
      const date = parse(text);
      if (date === null || date.getUTCFullYear() < MIN_VALID_YEAR) {
        log.debug(
          { column, value: text },
          "Ignoring invalid date"
        );
        continue;
      }
      if (observed.start === null || date < observed.start) {
        observed.start = date;
      }
      if (observed.end === null || date > observed.end) {
        observed.end = date;
      }
    }
  }

  /**
   * Configured dates, then dates in the file name, then dates seen in the
   * rows, then the dataset's own period
   */
  private resolvePeriod(
    config: CountryConfig,
    observed: { start: Date | null; end: Date | null }
  ): DateRange {
    const datasetName = config.source.dataset;

    if (config.explicitPeriod) {
      const start = parseDate(config.explicitPeriod.start);
      const end = parseEndDate(config.explicitPeriod.end);
      if (start && end) return { start, end };
      this.context.diagnostics.warning(
        datasetName,
        `configured dates ${config.explicitPeriod.start} - ${config.explicitPeriod.end} could not be parsed`
      );
    }

    if (config.filenameDates) {
      const { broken, period } = getDatesFromFilename(config.source.resource);
      if (period) return period;
      if (broken) {
        this.context.diagnostics.warning(
          datasetName,
          `${config.countryCode}: filename dates broken in ${config.source.resource}`
        );
      }
    }

    if (observed.start && observed.end) {
      return { start: observed.start, end: observed.end };
    }

    const datasetPeriod = config.source.datasetPeriod;
    if (datasetPeriod) {
      const start = parseDate(datasetPeriod.start);
      const end = parseEndDate(datasetPeriod.end);
      if (start && end) return { start, end };
    }

    throw new Error(`No reference period found for ${datasetName}`);
  }
}
