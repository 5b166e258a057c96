import type { GridRows } from "../types/grid-types";

/**
 * Thrown when a grid is empty, jagged, or holds a value that is not an integer.
 */
export class InvalidGridError extends Error {
  constructor(reason: string) {
    super(`Invalid grid: ${reason}.`);
    this.name = "InvalidGridError";
  }
}

/**
 * Thrown when a round count is negative or not an integer.
 */
export class InvalidRoundCountError extends Error {
  constructor(rounds: number) {
    super(`Invalid round count: ${rounds}. Expected a non-negative integer.`);
    this.name = "InvalidRoundCountError";
  }
}

export function assertRectangularGrid(rows: GridRows): void {
  if (rows.length === 0) throw new InvalidGridError("expected at least one row");

  const cols = rows[0].length;
  if (cols === 0) throw new InvalidGridError("expected at least one column");

  for (let r = 0; r < rows.length; r++) {
    const row = rows[r];
    if (row.length !== cols) {
      throw new InvalidGridError(`row ${r} has ${row.length} columns, expected ${cols}`);
    }
    for (let c = 0; c < cols; c++) {
      if (!Number.isInteger(row[c])) {
        throw new InvalidGridError(`cell (${r}, ${c}) is ${row[c]}, expected an integer`);
      }
    }
  }
}

export function assertRoundCount(rounds: number): void {
  if (!Number.isInteger(rounds) || rounds < 0) throw new InvalidRoundCountError(rounds);
}
