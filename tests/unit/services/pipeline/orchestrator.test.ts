import { describe, it, expect, beforeEach, vi } from "vitest";

import { ResolverContext } from "../../../../src/services/canonical/context.js";
import {
  PresencePipeline,
  type PipelineProgress,
} from "../../../../src/services/pipeline/orchestrator.js";

import type {
  ColumnMapping,
  CountryConfig,
  OrgReferenceRow,
  SourceDescriptor,
  SourceReader,
  SourceRow,
  SourceTable,
} from "../../../../src/types/index.js";

const loggers = vi.hoisted(() => {
  const make = () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  });
  const pipelineLogger = make();
  return {
    logger: make(),
    pipelineLogger,
    readerLogger: make(),
    resolverLogger: make(),
    countryLogger: vi.fn(() => pipelineLogger),
  };
});

vi.mock("../../../../src/logger.js", () => loggers);

// ============================================================================
// Fixtures
// ============================================================================

/**
 * Serves tables from memory, keyed by resource name
 */
class MemoryReader implements SourceReader {
  constructor(private tables: Record<string, SourceRow[]>) {}

  read(descriptor: SourceDescriptor): Promise<SourceTable> {
    const rows = this.tables[descriptor.resource];
    if (!rows) {
      return Promise.reject(new Error(`No table ${descriptor.resource}`));
    }
    return Promise.resolve({ headers: Object.keys(rows[0] ?? {}), rows });
  }
}

const WHO_REFERENCE: OrgReferenceRow = {
  countryCode: "*",
  name: "World Health Organization",
  acronym: "WHO",
  pattern: "",
  typeCode: "40",
};

const COLUMNS: ColumnMapping = {
  orgName: "Org",
  orgAcronym: "Org",
  orgType: "",
  sector: "Sector",
  admCodes: ["Province Code", "", ""],
  admNames: ["Province", "District", "Village"],
  startDate: "",
  endDate: "",
};

function createContext(organizations: OrgReferenceRow[] = []): ResolverContext {
  return new ResolverContext().populate({
    sectors: [
      { code: "HEA", label: "Health" },
      { code: "EDU", label: "Education" },
    ],
    orgTypes: [
      { code: "22", label: "National NGO" },
      { code: "40", label: "Multilateral" },
    ],
    organizations,
    adminPcodes: [
      {
        countryCode: "AAA",
        level: 1,
        pcode: "AA01",
        name: "Northland",
        parentPcode: "",
      },
      {
        countryCode: "AAA",
        level: 2,
        pcode: "AA0101",
        name: "Riverbend",
        parentPcode: "AA01",
      },
    ],
  });
}

function country(
  countryCode: string,
  resource: string,
  overrides: Partial<CountryConfig> = {}
): CountryConfig {
  return {
    countryCode,
    source: {
      countryCode,
      dataset: `${countryCode.toLowerCase()}-ds`,
      resource,
      format: "csv",
      useHxl: false,
    },
    columns: COLUMNS,
    filter: "",
    filenameDates: false,
    explicitPeriod: { start: "2025-01-01", end: "2025-03-31" },
    ...overrides,
  };
}

function row(overrides: SourceRow = {}): SourceRow {
  return {
    Org: "WHO",
    Sector: "Health",
    "Province Code": "AA01",
    Province: "Northland",
    District: "Riverbend",
    Village: "Mill Town",
    ...overrides,
  };
}

function run(
  context: ResolverContext,
  tables: Record<string, SourceRow[]>,
  configs: CountryConfig[]
) {
  return new PresencePipeline(context, new MemoryReader(tables)).process(
    configs
  );
}

describe("services/pipeline/orchestrator", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  // ============================================================================
  // End to end
  // ============================================================================

  describe("three row country", () => {
    it("should produce one record and flag the row without sector", async () => {
      const context = createContext();
      const result = await run(
        context,
        {
          "aaa.csv": [row({ Sector: "" }), row(), row({ Village: "Mill Twn" })],
        },
        [country("AAA", "aaa.csv")]
      );

      expect(result.presence).toHaveLength(1);
      expect(result.presence[0]).toEqual({
        countryCode: "AAA",
        providerAdmin1Name: "Northland",
        providerAdmin2Name: "Riverbend",
        providerAdmin3Name: "Mill Twn",
        admin1Code: "AA01",
        admin1Name: "Northland",
        admin2Code: "AA0101",
        admin2Name: "Riverbend",
        admin3Code: "",
        admin3Name: "",
        adminLevel: 3,
        orgAcronym: "WHO",
        orgName: "WHO",
        orgTypeCode: "",
        orgTypeDescription: "",
        sectorCode: "HEA",
        sectorName: "Health",
        referencePeriodStart: "2025-01-01T00:00:00",
        referencePeriodEnd: "2025-03-31T23:59:59",
        datasetName: "aaa-ds",
        resourceName: "aaa.csv",
        warning: "admin 3 name Mill Twn could not be matched in AAA",
        error: "",
      });
      expect(result.rejected).toEqual([
        {
          countryCode: "AAA",
          datasetName: "aaa-ds",
          rowNumber: 1,
          orgName: "WHO",
          sector: "",
          error: "org WHO missing sector",
        },
      ]);
      expect(context.diagnostics.list("error")).toEqual([
        { kind: "error", identifier: "aaa-ds", text: "org WHO missing sector" },
      ]);
      expect(result.organizations).toEqual([
        { acronym: "WHO", name: "WHO", typeCode: "" },
      ]);
      expect(result.rowCounts).toEqual([
        {
          countryCode: "AAA",
          datasetName: "aaa-ds",
          rowsRead: 3,
          rowsFiltered: 0,
          rowsRejected: 1,
          rowsOut: 2,
        },
      ]);
      expect(result.countries).toEqual(["AAA"]);
    });

    it("should report row counts as info diagnostics", async () => {
      const context = createContext();
      await run(
        context,
        {
          "aaa.csv": [row({ Sector: "" }), row(), row({ Village: "Mill Twn" })],
        },
        [country("AAA", "aaa.csv")]
      );

      expect(context.diagnostics.list("info")).toEqual([
        {
          kind: "info",
          identifier: "aaa-ds",
          text: "3 rows preprocessed from aaa-ds",
        },
        {
          kind: "info",
          identifier: "aaa-ds",
          text: "3 rows processed from aaa-ds producing 2 rows",
        },
      ]);
      expect(loggers.countryLogger).toHaveBeenCalledWith("AAA", "aaa-ds");
    });
  });

  // ============================================================================
  // Resolution
  // ============================================================================

  describe("resolution", () => {
    it("should use reference organizations", async () => {
      const result = await run(
        createContext([WHO_REFERENCE]),
        { "aaa.csv": [row({ Org: "World Health Organization" })] },
        [country("AAA", "aaa.csv")]
      );

      expect(result.presence[0]).toMatchObject({
        orgAcronym: "WHO",
        orgName: "World Health Organization",
        orgTypeCode: "40",
        orgTypeDescription: "Multilateral",
      });
      expect(result.organizations).toEqual([
        { acronym: "WHO", name: "World Health Organization", typeCode: "40" },
      ]);
    });

    it("should converge organizations across countries", async () => {
      const result = await run(
        createContext([WHO_REFERENCE]),
        {
          "aaa.csv": [row({ Org: "World Health Organization" })],
          "bbb.csv": [row({ Org: "WHO" })],
        },
        [country("AAA", "aaa.csv"), country("BBB", "bbb.csv")]
      );

      expect(result.presence.map((record) => record.orgName)).toEqual([
        "World Health Organization",
        "World Health Organization",
      ]);
      expect(result.organizations).toHaveLength(1);
    });

    it("should keep records whose sector cannot be mapped", async () => {
      const context = createContext();
      const result = await run(
        context,
        { "aaa.csv": [row({ Sector: "Logistics" })] },
        [country("AAA", "aaa.csv")]
      );

      expect(result.presence[0]).toMatchObject({
        sectorCode: "",
        sectorName: "",
        error: "sector Logistics could not be mapped",
      });
      expect(context.diagnostics.list("missing_value")).toEqual([
        {
          kind: "missing_value",
          identifier: "aaa-ds",
          text: "sector Logistics could not be mapped",
        },
      ]);
    });

    it("should apply the row filter", async () => {
      const result = await run(
        createContext(),
        {
          "aaa.csv": [
            row({ Status: "Active" }),
            row({ Status: "Closed", Sector: "Education" }),
          ],
        },
        [country("AAA", "aaa.csv", { filter: 'Status != "Closed"' })]
      );

      expect(result.presence.map((record) => record.sectorCode)).toEqual([
        "HEA",
      ]);
      expect(result.rowCounts[0]?.rowsFiltered).toBe(1);
    });

    it("should translate HXL tagged columns", async () => {
      const hxlColumns: ColumnMapping = {
        orgName: "#org+name",
        orgAcronym: "#org+name",
        orgType: "",
        sector: "#sector",
        admCodes: ["", "", ""],
        admNames: ["#adm1+name", "", ""],
        startDate: "",
        endDate: "",
      };
      const config = country("AAA", "aaa.csv", {
        columns: hxlColumns,
        filter: '#status == "Active"',
      });
      config.source.useHxl = true;

      const result = await run(
        createContext(),
        {
          "aaa.csv": [
            {
              Partner: "#org+name",
              Cluster: "#sector",
              Region: "#adm1+name",
              Status: "#status",
            },
            {
              Partner: "WHO",
              Cluster: "Health",
              Region: "Northland",
              Status: "Active",
            },
            {
              Partner: "WHO",
              Cluster: "Education",
              Region: "Northland",
              Status: "Closed",
            },
          ],
        },
        [config]
      );

      expect(result.presence).toHaveLength(1);
      expect(result.presence[0]).toMatchObject({
        admin1Code: "AA01",
        adminLevel: 1,
        orgAcronym: "WHO",
        sectorCode: "HEA",
      });
      expect(result.rowCounts[0]).toMatchObject({
        rowsRead: 2,
        rowsFiltered: 1,
      });
    });
  });

  // ============================================================================
  // Reference period
  // ============================================================================

  describe("reference period", () => {
    it("should read the period from the resource name", async () => {
      const resource = "aaa-3w-january-march-2025.csv";
      const result = await run(createContext(), { [resource]: [row()] }, [
        country("AAA", resource, {
          explicitPeriod: undefined,
          filenameDates: true,
        }),
      ]);

      expect(result.presence[0]).toMatchObject({
        referencePeriodStart: "2025-01-01T00:00:00",
        referencePeriodEnd: "2025-03-31T23:59:59",
      });
    });

    it("should fall back to the date columns", async () => {
      const context = createContext();
      const resource = "aaa-3w-data-file-2025.csv";
      const result = await run(
        context,
        {
          [resource]: [
            row({ Start: "2025-02-01", End: "2025-06-30" }),
            row({ Sector: "Education", Start: "1999-01-01", End: "2025-05-31" }),
          ],
        },
        [
          country("AAA", resource, {
            explicitPeriod: undefined,
            filenameDates: true,
            columns: { ...COLUMNS, startDate: "Start", endDate: "End" },
          }),
        ]
      );

      expect(result.presence[0]).toMatchObject({
        referencePeriodStart: "2025-02-01T00:00:00",
        referencePeriodEnd: "2025-06-30T23:59:59",
      });
      expect(context.diagnostics.list("warning")).toEqual([
        {
          kind: "warning",
          identifier: "aaa-ds",
          text: "AAA: filename dates broken in aaa-3w-data-file-2025.csv",
        },
      ]);
    });

    it("should fall back to the dataset period", async () => {
      const config = country("AAA", "aaa.csv", { explicitPeriod: undefined });
      config.source.datasetPeriod = { start: "2024", end: "2024" };

      const result = await run(createContext(), { "aaa.csv": [row()] }, [
        config,
      ]);

      expect(result.presence[0]).toMatchObject({
        referencePeriodStart: "2024-01-01T00:00:00",
        referencePeriodEnd: "2024-12-31T23:59:59",
      });
      expect(result.startDate?.toISOString()).toBe("2024-01-01T00:00:00.000Z");
      expect(result.endDate?.toISOString()).toBe("2024-12-31T23:59:59.999Z");
    });
  });

  // ============================================================================
  // Failure isolation
  // ============================================================================

  describe("failure isolation", () => {
    it("should drop a failing country and continue", async () => {
      const context = createContext();
      const result = await run(context, { "bbb.csv": [row()] }, [
        country("AAA", "missing.csv"),
        country("BBB", "bbb.csv"),
      ]);

      expect(result.countries).toEqual(["BBB"]);
      expect(result.presence.map((record) => record.countryCode)).toEqual([
        "BBB",
      ]);
      expect(result.rowCounts.map((counts) => counts.countryCode)).toEqual([
        "BBB",
      ]);
      expect(context.diagnostics.list("error")).toEqual([
        {
          kind: "error",
          identifier: "aaa-ds",
          text: "AAA excluded: No table missing.csv",
        },
      ]);
      expect(loggers.pipelineLogger.error).toHaveBeenCalledWith(
        expect.objectContaining({ countryCode: "AAA" }),
        "Country preprocessing failed"
      );
    });

    it("should drop a country without reference period", async () => {
      const context = createContext();
      const result = await run(context, { "aaa.csv": [row()] }, [
        country("AAA", "aaa.csv", { explicitPeriod: undefined }),
      ]);

      expect(result.countries).toEqual([]);
      expect(result.presence).toEqual([]);
      expect(result.startDate).toBeNull();
      expect(context.diagnostics.list("error")[0]?.text).toBe(
        "AAA excluded: No reference period found for aaa-ds"
      );
    });

    it("should not keep rejected rows of a dropped country", async () => {
      const context = createContext();
      const result = await run(
        context,
        {
          "aaa.csv": [row({ Org: "Ghost Org", Sector: "" })],
          "bbb.csv": [row({ Sector: "" }), row()],
        },
        [
          country("AAA", "aaa.csv", { explicitPeriod: undefined }),
          country("BBB", "bbb.csv"),
        ]
      );

      expect(result.countries).toEqual(["BBB"]);
      expect(result.rejected).toEqual([
        {
          countryCode: "BBB",
          datasetName: "bbb-ds",
          rowNumber: 1,
          orgName: "WHO",
          sector: "",
          error: "org WHO missing sector",
        },
      ]);
      expect(result.rowCounts.map((counts) => counts.countryCode)).toEqual([
        "BBB",
      ]);
    });
  });

  describe("progress", () => {
    it("should report both phases", async () => {
      const pipeline = new PresencePipeline(
        createContext(),
        new MemoryReader({ "aaa.csv": [row()] })
      );
      const updates: PipelineProgress[] = [];
      pipeline.setProgressCallback((progress) => updates.push(progress));

      await pipeline.process([country("AAA", "aaa.csv")]);

      expect(updates).toEqual([
        { phase: "preprocess", current: 1, total: 1, currentItem: "AAA" },
        { phase: "process", current: 1, total: 1, currentItem: "AAA" },
      ]);
    });
  });
});
