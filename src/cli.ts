import * as dotenv from "dotenv";
import { Logger } from "winston";

import { loadConfig } from "./config";
import { DEFAULT_LOG_LEVEL } from "./constants";
import { createCliLogger } from "./logger";
import { countActive } from "./simulation/overflow";
import { simulate } from "./simulation/simulation";
import { cellOrderByName } from "./simulation/traversal";
import { formatGrid } from "./utils/grid-utils";

/**
 * Load the configuration, run the simulation and write the resulting grid.
 * Errors propagate to the caller.
 */
export function run(
  argv: string[],
  env: NodeJS.ProcessEnv,
  logger: Logger,
  write: (text: string) => void,
): number[][] {
  const config = loadConfig(argv, env);
  logger.level = config.logLevel;

  const rows = config.grid.length;
  const cols = config.grid[0].length;
  logger.debug(`Loaded ${rows}x${cols} grid from ${config.gridSource}`);
  logger.debug(`Running ${config.rounds} rounds in ${config.order} order`);

  const result = simulate(config.grid, config.rounds, {
    order: cellOrderByName(config.order, config.seed),
    onRound: (round, grid) => {
      logger.debug(`Round ${round}: total ${grid.total()}, ${countActive(grid)} cells over threshold`);
    },
  });

  write(formatGrid(result) + "\n");
  logger.info(`Simulated ${config.rounds} rounds on a ${rows}x${cols} grid`);
  return result;
}

function main(): void {
  dotenv.config();
  const logger = createCliLogger(DEFAULT_LOG_LEVEL);
  try {
    run(process.argv.slice(2), process.env, logger, (text) => process.stdout.write(text));
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main();
}
