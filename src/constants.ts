// ── Simulation ──

/** A cell whose value is at least this overflows at the start of a round. */
export const OVERFLOW_THRESHOLD = 4;

/** Units a cell sends to each in-bounds orthogonal neighbour when it overflows. */
export const TRANSFER_PER_NEIGHBOR = 1;

// ── CLI ──

/** Rounds run when neither --rounds nor ROUNDS is given. */
export const DEFAULT_ROUNDS = 2;

/** Grid file read when neither --grid nor --file is given, relative to the package root. */
export const DEFAULT_GRID_FILE = "data/sample-grid.json";

/** winston level used until the configuration has been read. */
export const DEFAULT_LOG_LEVEL = "info";

/** Seed for the shuffled traversal order. */
export const DEFAULT_SHUFFLE_SEED = "1";
