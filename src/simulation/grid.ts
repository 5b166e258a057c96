import type { GridRows, IGrid, Position } from "../types/grid-types";

/** Orthogonal offsets in the order transfers are made: up, left, right, down. */
const DIRECTIONS: readonly Position[] = [
  { row: -1, col: 0 },
  { row: 0, col: -1 },
  { row: 0, col: 1 },
  { row: 1, col: 0 },
];

/**
 * Rectangular integer grid stored row-major in a flat array.
 *
 * values[r * cols + c] = value of the cell at row r, column c
 *
 * Neither axis wraps: a cell on an edge simply has fewer neighbours.
 */
export class Grid implements IGrid {
  readonly rows: number;
  readonly cols: number;
  readonly values: Float64Array;

  constructor(rows: number, cols: number, values?: Float64Array) {
    this.rows = rows;
    this.cols = cols;
    this.values = values ?? new Float64Array(rows * cols);
  }

  /** Copies nested rows into a new grid. The rows are assumed rectangular. */
  static fromRows(rows: GridRows): Grid {
    const cols = rows.length > 0 ? rows[0].length : 0;
    const grid = new Grid(rows.length, cols);
    for (let r = 0; r < grid.rows; r++) {
      for (let c = 0; c < cols; c++) {
        grid.values[r * cols + c] = rows[r][c];
      }
    }
    return grid;
  }

  get size(): number {
    return this.rows * this.cols;
  }

  idx(r: number, c: number): number {
    return r * this.cols + c;
  }

  positionAt(i: number): Position {
    return { row: Math.floor(i / this.cols), col: i % this.cols };
  }

  inBounds(r: number, c: number): boolean {
    return r >= 0 && r < this.rows && c >= 0 && c < this.cols;
  }

  get(r: number, c: number): number {
    return this.values[this.idx(r, c)];
  }

  set(r: number, c: number, val: number): void {
    this.values[this.idx(r, c)] = val;
  }

  /** Flat indices of the in-bounds orthogonal neighbours of (r, c), in up/left/right/down order. */
  neighbors(r: number, c: number): number[] {
    const result: number[] = [];
    for (const d of DIRECTIONS) {
      const nr = r + d.row;
      const nc = c + d.col;
      if (this.inBounds(nr, nc)) result.push(this.idx(nr, nc));
    }
    return result;
  }

  total(): number {
    let sum = 0;
    for (let i = 0; i < this.size; i++) sum += this.values[i];
    return sum;
  }

  clone(): Grid {
    return new Grid(this.rows, this.cols, new Float64Array(this.values));
  }

  toRows(): number[][] {
    const rows: number[][] = [];
    for (let r = 0; r < this.rows; r++) {
      rows.push(Array.from(this.values.subarray(r * this.cols, (r + 1) * this.cols)));
    }
    return rows;
  }
}
