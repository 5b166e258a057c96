import { Grid } from "./grid";
import { applyDeltas, overflowDeltas } from "./overflow";
import { rowMajor } from "./traversal";
import { assertRectangularGrid, assertRoundCount } from "./validation";
import type { CellOrder, GridRows, IGrid } from "../types/grid-types";

export interface SimulateOptions {
  /** Order in which cells are visited while computing deltas. Does not change the result. */
  order?: CellOrder;
  /**
   * Called after each committed round with the 1-based round number and a
   * copy of the grid; changes to the copy do not reach the simulation.
   */
  onRound?: (round: number, grid: IGrid) => void;
}

/**
 * Advance one round in place.
 *
 * 1. Compute every cell's delta from the current grid (read-only)
 * 2. Commit all deltas at once
 *
 * Merging the two phases into a single sweep would let a cell's new value
 * decide whether a later-visited neighbour overflows in the same round.
 */
export function step(grid: Grid, order: CellOrder = rowMajor): void {
  const deltas = overflowDeltas(grid, order);
  applyDeltas(grid, deltas);
}

/**
 * Run `rounds` rounds of the overflow rule and return the resulting rows.
 * The input is never modified; zero rounds returns a copy of it.
 *
 * Throws InvalidGridError or InvalidRoundCountError before any round runs.
 */
export function simulate(rows: GridRows, rounds: number, options: SimulateOptions = {}): number[][] {
  assertRectangularGrid(rows);
  assertRoundCount(rounds);

  const { order = rowMajor, onRound } = options;
  const grid = Grid.fromRows(rows);
  for (let round = 1; round <= rounds; round++) {
    step(grid, order);
    onRound?.(round, grid.clone());
  }
  return grid.toRows();
}
