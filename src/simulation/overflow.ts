import { Grid } from "./grid";
import { rowMajor } from "./traversal";
import { OVERFLOW_THRESHOLD, TRANSFER_PER_NEIGHBOR } from "../constants";
import type { CellOrder, IGrid } from "../types/grid-types";

/**
 * Compute the net change every cell receives in one round, reading only the
 * grid as it is now.
 *
 * For each cell with value >= OVERFLOW_THRESHOLD, and each in-bounds
 * neighbour n (up, left, right, down):
 *   delta[n]    += 1
 *   delta[cell] -= 1
 *
 * Out-of-bounds neighbours are skipped, so a corner loses at most 2 and an
 * edge cell at most 3. Deltas are plain sums, so the visiting order does not
 * affect the result.
 *
 * The caller commits the result with applyDeltas.
 */
export function overflowDeltas(grid: Grid, order: CellOrder = rowMajor): Float64Array {
  const deltas = new Float64Array(grid.size);

  for (const i of order(grid)) {
    if (grid.values[i] < OVERFLOW_THRESHOLD) continue;

    const { row, col } = grid.positionAt(i);
    for (const n of grid.neighbors(row, col)) {
      deltas[n] += TRANSFER_PER_NEIGHBOR;
      deltas[i] -= TRANSFER_PER_NEIGHBOR;
    }
  }

  return deltas;
}

/** Add each delta to its cell. */
export function applyDeltas(grid: Grid, deltas: Float64Array): void {
  for (let i = 0; i < grid.size; i++) {
    grid.values[i] += deltas[i];
  }
}

/** Number of cells that will overflow in the next round. */
export function countActive(grid: IGrid): number {
  let count = 0;
  for (const val of grid.values) {
    if (val >= OVERFLOW_THRESHOLD) count++;
  }
  return count;
}
