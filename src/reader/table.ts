import type { SourceRow, SourceTable } from "../types/index.js";

/**
 * Header cell text for a column spanning several header rows,
 * e.g. ["Location", "Admin 1"] -> "Location Admin 1"
 */
function joinHeaderCells(cells: readonly string[]): string {
  return cells
    .map((cell) => cell.trim())
    .filter((cell) => cell !== "")
    .join(" ");
}

/**
 * Turn a grid of cells into keyed rows. `headers` holds 1-based row numbers;
 * data starts after the last of them. Blank rows are dropped.
 */
export function tableFromGrid(
  grid: readonly (readonly string[])[],
  headers: number | number[] = 1
): SourceTable {
  const headerNumbers = Array.isArray(headers) ? headers : [headers];
  const headerRows = headerNumbers.map((row) => grid[row - 1] ?? []);
  const lastHeaderRow = Math.max(0, ...headerNumbers);
  const width = Math.max(0, ...headerRows.map((row) => row.length));

  const names: string[] = [];
  for (let column = 0; column < width; column++) {
    names.push(joinHeaderCells(headerRows.map((row) => row[column] ?? "")));
  }

  const rows: SourceRow[] = [];
  for (const cells of grid.slice(lastHeaderRow)) {
    if (cells.every((cell) => cell.trim() === "")) continue;
    const row: SourceRow = {};
    names.forEach((name, column) => {
      if (name === "" || name in row) return;
      row[name] = cells[column] ?? "";
    });
    rows.push(row);
  }

  return { headers: names.filter((name) => name !== ""), rows };
}
