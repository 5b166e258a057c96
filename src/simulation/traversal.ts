import seedrandom from "seedrandom";
import type { CellOrder, IGrid } from "../types/grid-types";

/** Visits row 0 left to right, then row 1, and so on. */
export const rowMajor: CellOrder = function* (grid: IGrid) {
  const size = grid.rows * grid.cols;
  for (let i = 0; i < size; i++) yield i;
};

/** Visits column 0 top to bottom, then column 1, and so on. */
export const columnMajor: CellOrder = function* (grid: IGrid) {
  for (let c = 0; c < grid.cols; c++) {
    for (let r = 0; r < grid.rows; r++) yield r * grid.cols + c;
  }
};

/**
 * Returns an order that visits cells in a pseudo-random permutation
 * (Fisher-Yates driven by seedrandom). The same seed and grid shape always
 * give the same permutation.
 */
export function shuffledOrder(seed: string): CellOrder {
  return (grid: IGrid) => {
    const rng = seedrandom(seed);
    const order = Array.from(rowMajor(grid));
    for (let i = order.length - 1; i > 0; i--) {
      const j = Math.floor(rng() * (i + 1));
      const tmp = order[i];
      order[i] = order[j];
      order[j] = tmp;
    }
    return order;
  };
}

export type CellOrderName = "row-major" | "column-major" | "shuffled";

export const CELL_ORDER_NAMES: readonly CellOrderName[] = ["row-major", "column-major", "shuffled"];

export function isCellOrderName(name: string): name is CellOrderName {
  return (CELL_ORDER_NAMES as readonly string[]).includes(name);
}

export function cellOrderByName(name: CellOrderName, seed: string): CellOrder {
  switch (name) {
    case "row-major": return rowMajor;
    case "column-major": return columnMajor;
    case "shuffled": return shuffledOrder(seed);
  }
}
