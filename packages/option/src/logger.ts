/**
 * Structured logging.
 *
 * Uses pino for JSON-structured logs; pino-pretty in development.
 */

import pino from "pino";
import type { Logger, LevelWithSilent } from "pino";

export type { Logger };

export interface LoggerOptions {
  readonly level?: LevelWithSilent | undefined;
  readonly pretty?: boolean | undefined;
}

export function createLogger(options?: LoggerOptions): Logger {
  return pino({
    level: options?.level ?? "info",
    ...(options?.pretty === true ? { transport: { target: "pino-pretty" } } : {}),
  });
}

/** A logger that discards everything. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
