import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import { stringify } from "csv-stringify/sync";

import { pipelineLogger } from "../logger.js";

import type { OutputTable } from "../services/pipeline/output.js";

/**
 * CSV text with the header row, then the HXL tag row, then the data rows
 */
export function formatCsvTable(table: OutputTable): string {
  return stringify([table.headers, table.hxlTags, ...table.rows]);
}

export function writeCsvTable(path: string, table: OutputTable): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, formatCsvTable(table), "utf-8");
  pipelineLogger.info({ path, rows: table.rows.length }, "Table written");
}

/**
 * Plain CSV for audit dumps that have no HXL tags
 */
export function writeCsvRecords(
  path: string,
  records: readonly object[]
): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, stringify([...records], { header: true }), "utf-8");
  pipelineLogger.info({ path, rows: records.length }, "Table written");
}
