/**
 * Structured logging.
 *
 * One pino root logger per host, pretty-printed in development.
 * Components receive a child logger with their own bindings.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";

export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/** A logger that drops everything. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
