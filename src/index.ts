export * from "./simulation";
export { formatGrid, parseGrid } from "./utils/grid-utils";
export { OVERFLOW_THRESHOLD } from "./constants";
export type { CellOrder, GridRows, IGrid, Position } from "./types/grid-types";
