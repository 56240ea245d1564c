import { getConfig, type LogLevel } from "../state/config.js";

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_RANK[getConfig().logLevel] >= LEVEL_RANK[level];
}

export function createLogger(scope: string): Logger {
  const prefix = `[drill-data:${scope}]`;

  return {
    error(message) {
      if (enabled("error")) {
        console.error(`${prefix} error: ${message}`);
      }
    },
    warn(message) {
      if (enabled("warn")) {
        console.error(`${prefix} warn: ${message}`);
      }
    },
    info(message) {
      if (enabled("info")) {
        console.error(`${prefix} info: ${message}`);
      }
    },
    debug(message) {
      if (enabled("debug")) {
        console.error(`${prefix} debug: ${message}`);
      }
    },
  };
}
