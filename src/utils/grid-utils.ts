import type { GridRows } from "../types/grid-types";
import { InvalidGridError, assertRectangularGrid } from "../simulation/validation";

/**
 * Render a grid one row per line, every value right-aligned to the widest
 * value in the grid and separated by a single space.
 */
export function formatGrid(rows: GridRows): string {
  let width = 0;
  for (const row of rows) {
    for (const val of row) width = Math.max(width, String(val).length);
  }
  return rows.map((row) => row.map((val) => String(val).padStart(width)).join(" ")).join("\n");
}

/** Parse a grid from JSON text such as `[[1, 2], [3, 4]]`. */
export function parseGrid(text: string): number[][] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new InvalidGridError(`not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }

  if (!Array.isArray(parsed)) throw new InvalidGridError("expected an array of rows");
  const list: readonly unknown[] = parsed;

  const rows: number[][] = [];
  for (const [r, row] of list.entries()) {
    if (!Array.isArray(row)) throw new InvalidGridError(`row ${r} is not an array`);
    const cells: readonly unknown[] = row;
    const values: number[] = [];
    for (const [c, val] of cells.entries()) {
      if (typeof val !== "number") throw new InvalidGridError(`cell (${r}, ${c}) is not a number`);
      values.push(val);
    }
    rows.push(values);
  }

  assertRectangularGrid(rows);
  return rows;
}
