// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Scoped console logger. Each line is prefixed with the component scope,
 * e.g. "[Transfers] moved 40 from ...", and filtered by `logging.level`.
 */

import chalk from "chalk";

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

const RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

/** Anything shaped like `console`. Tests pass an array-backed sink. */
export interface LogSink {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface Logger {
  readonly scope: string;
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export function createLogger(scope: string, level: LogLevel = "INFO", sink: LogSink = console): Logger {
  const enabled = (at: LogLevel): boolean => RANK[at] >= RANK[level];
  const line = (message: string): string => `[${scope}] ${message}`;

  return {
    scope,
    level,
    debug(message) {
      if (enabled("DEBUG")) sink.log(chalk.gray(line(message)));
    },
    info(message) {
      if (enabled("INFO")) sink.log(chalk.blue(line(message)));
    },
    warn(message) {
      if (enabled("WARNING")) sink.warn(chalk.yellow(line(message)));
    },
    error(message) {
      if (enabled("ERROR")) sink.error(chalk.red(line(message)));
    },
    child(childScope) {
      return createLogger(childScope, level, sink);
    },
  };
}

/** Logger that drops everything. Used when a component is built without one. */
export const silentLogger: Logger = createLogger("silent", "ERROR", {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
});
