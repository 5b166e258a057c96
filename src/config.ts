import commandLineArgs from "command-line-args";
import { readFileSync } from "fs";
import path from "path";

import { DEFAULT_GRID_FILE, DEFAULT_LOG_LEVEL, DEFAULT_ROUNDS, DEFAULT_SHUFFLE_SEED } from "./constants";
import { CellOrderName, isCellOrderName, CELL_ORDER_NAMES } from "./simulation/traversal";
import { parseGrid } from "./utils/grid-utils";

export interface CliConfig {
  rounds: number;
  grid: number[][];
  /** Where the grid came from, for log messages. */
  gridSource: string;
  order: CellOrderName;
  seed: string;
  logLevel: string;
}

/**
 * Thrown when an option is missing, malformed, or points at an unreadable file.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

interface CliOption {
  name: string;
  env: string;
  type: (input: string) => unknown;
}

const OPTIONS: CliOption[] = [
  { name: "rounds", env: "ROUNDS", type: Number },
  { name: "grid", env: "GRID", type: String },
  { name: "file", env: "GRID_FILE", type: String },
  { name: "order", env: "CELL_ORDER", type: String },
  { name: "seed", env: "SHUFFLE_SEED", type: String },
  { name: "log-level", env: "LOG_LEVEL", type: String },
];

const PACKAGE_ROOT = path.resolve(__dirname, "..");

function readString(values: Map<string, unknown>, name: string, fallback: string): string {
  const value = values.get(name);
  if (value === undefined) return fallback;
  if (typeof value !== "string" || value === "") throw new ConfigError(`Option ${name} needs a value`);
  return value;
}

function readGridFile(file: string): number[][] {
  let text: string;
  try {
    text = readFileSync(file, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read grid file ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseGrid(text);
}

/**
 * Build the CLI configuration. Environment variables are read first, then
 * command line arguments override them, then defaults fill the rest.
 *
 * @param argv - arguments after the script name
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv): CliConfig {
  const values = new Map<string, unknown>();
  for (const option of OPTIONS) {
    const raw = env[option.env];
    if (raw) values.set(option.name, option.type(raw));
  }

  let cliArgs: commandLineArgs.CommandLineOptions;
  try {
    cliArgs = commandLineArgs(OPTIONS, { argv });
  } catch (err) {
    // UNKNOWN_OPTION, UNKNOWN_VALUE and friends from command-line-args
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
  for (const [name, value] of Object.entries(cliArgs)) {
    values.set(name, value);
  }

  const roundsValue = values.has("rounds") ? values.get("rounds") : DEFAULT_ROUNDS;
  if (typeof roundsValue !== "number" || Number.isNaN(roundsValue)) {
    throw new ConfigError("Option rounds must be a number");
  }

  const order = readString(values, "order", "row-major");
  if (!isCellOrderName(order)) {
    throw new ConfigError(`Unknown cell order ${order}, expected one of ${CELL_ORDER_NAMES.join(", ")}`);
  }

  let grid: number[][];
  let gridSource: string;
  if (values.has("grid")) {
    grid = parseGrid(readString(values, "grid", ""));
    gridSource = "--grid";
  } else {
    // A user-supplied path is relative to the working directory; the sample grid ships with the package.
    const file = values.has("file")
      ? path.resolve(readString(values, "file", ""))
      : path.resolve(PACKAGE_ROOT, DEFAULT_GRID_FILE);
    grid = readGridFile(file);
    gridSource = file;
  }

  return {
    rounds: roundsValue,
    grid,
    gridSource,
    order,
    seed: readString(values, "seed", DEFAULT_SHUFFLE_SEED),
    logLevel: readString(values, "log-level", DEFAULT_LOG_LEVEL),
  };
}
