import pino, { type DestinationStream, type Logger } from "pino";

import type { LogLevel } from "./domain";

export type { Logger } from "pino";

const PINO_LEVELS: Record<LogLevel, pino.Level> = {
  ERROR: "error",
  WARN: "warn",
  INFO: "info",
  DEBUG: "debug",
};

export interface LoggerOptions {
  level?: LogLevel;
  /** Forces debug output regardless of `level`. */
  verbose?: boolean;
  /** Defaults to stderr, keeping stdout free for command output. */
  destination?: DestinationStream;
}

export function toPinoLevel(level: LogLevel, verbose = false): pino.Level {
  return verbose ? "debug" : PINO_LEVELS[level];
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = toPinoLevel(options.level ?? "INFO", options.verbose);
  return pino(
    { name: "sitewarden", level, base: { pid: process.pid } },
    options.destination ?? pino.destination(2),
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
