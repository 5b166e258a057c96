/** A (row, column) pair. Valid when 0 <= row < rows and 0 <= col < cols. */
export interface Position {
  readonly row: number;
  readonly col: number;
}

/**
 * Read-only interface for a simulation grid.
 * Used by traversal orders and round callbacks that inspect grid state without modifying it.
 */
export interface IGrid {
  readonly rows: number;
  readonly cols: number;
  readonly values: Float64Array;
  get(r: number, c: number): number;
  total(): number;
}

/** A grid as nested rows, the shape callers hand to and receive from the simulator. */
export type GridRows = readonly (readonly number[])[];

/**
 * Order in which a round visits cells while computing deltas.
 * Must yield every flat cell index exactly once.
 */
export type CellOrder = (grid: IGrid) => Iterable<number>;
