import winston, { createLogger, Logger } from "winston";

/**
 * Console logger for the CLI. Every level goes to stderr so that stdout
 * carries only the resulting grid.
 */
export function createCliLogger(level: string): Logger {
  return createLogger({
    level,
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple(),
    ),
    transports: [
      new winston.transports.Console({ stderrLevels: Object.keys(winston.config.npm.levels) }),
    ],
  });
}
