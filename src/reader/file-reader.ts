import { readFile } from "node:fs/promises";
import { join } from "node:path";

import { parse } from "csv-parse/sync";
import * as XLSX from "xlsx";

import { tableFromGrid } from "./table.js";
import { SourceReadError, errorMessage } from "../errors.js";
import { readerLogger } from "../logger.js";

import type {
  SourceDescriptor,
  SourceReader,
  SourceTable,
} from "../types/index.js";

const SPREADSHEET_FORMATS = new Set(["xlsx", "xls", "xlsm", "ods"]);

/**
 * Parse CSV text into a grid of cells, keeping ragged rows
 */
export function parseCsvGrid(content: string | Buffer): string[][] {
  return parse(content, {
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true,
  });
}

/**
 * Read one worksheet as a grid of formatted cell text
 */
export function parseSpreadsheetGrid(
  content: Buffer,
  sheet?: string
): string[][] {
  const workbook = XLSX.read(content, { type: "buffer", cellDates: false });
  const sheetName = sheet ?? workbook.SheetNames[0];
  const worksheet =
    sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!worksheet) {
    throw new Error(`Sheet ${sheetName ?? "(none)"} not found`);
  }
  const grid: unknown[][] = XLSX.utils.sheet_to_json(worksheet, {
    header: 1,
    raw: false,
    defval: "",
    blankrows: false,
  });
  return grid.map((row) =>
    row.map((cell) => (cell === null || cell === undefined ? "" : String(cell)))
  );
}

/**
 * Reads dataset resources from a local directory. The resource name is the
 * file name inside that directory.
 */
export class FileSourceReader implements SourceReader {
  constructor(private inputDir: string) {}

  async read(descriptor: SourceDescriptor): Promise<SourceTable> {
    const path = join(this.inputDir, descriptor.resource);
    const log = readerLogger.child({
      countryCode: descriptor.countryCode,
      resource: descriptor.resource,
    });

    let content: Buffer;
    try {
      content = await readFile(path);
    } catch (error) {
      throw new SourceReadError(
        `Cannot read ${path}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const format = descriptor.format.toLowerCase();
    let grid: string[][];
    try {
      if (format === "csv") {
        grid = parseCsvGrid(content);
      } else if (SPREADSHEET_FORMATS.has(format)) {
        grid = parseSpreadsheetGrid(content, descriptor.sheet);
      } else {
        throw new Error(`Unsupported format ${descriptor.format}`);
      }
    } catch (error) {
      throw new SourceReadError(
        `Cannot parse ${descriptor.resource}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const table = tableFromGrid(grid, descriptor.headers);
    log.debug(
      { columns: table.headers.length, rows: table.rows.length },
      "Source table read"
    );
    return table;
  }
}
