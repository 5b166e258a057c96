export { Grid } from "./grid";
export { overflowDeltas, applyDeltas, countActive } from "./overflow";
export { step, simulate } from "./simulation";
export type { SimulateOptions } from "./simulation";
export { rowMajor, columnMajor, shuffledOrder, cellOrderByName, isCellOrderName, CELL_ORDER_NAMES } from "./traversal";
export type { CellOrderName } from "./traversal";
export { InvalidGridError, InvalidRoundCountError, assertRectangularGrid, assertRoundCount } from "./validation";
