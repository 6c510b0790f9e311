/**
 * Structured logging.
 *
 * Uses pino for JSON-structured logs. Components receive a root logger
 * and derive a child bound to their own name.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";
import { loadConfig } from "./config.js";

export type { Logger };

/**
 * Create the root logger from configuration.
 *
 * Pretty-prints in development, plain JSON otherwise.
 */
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

let rootLogger: Logger | undefined;

/**
 * Process-wide logger built from the environment, created on first use.
 */
export function defaultLogger(): Logger {
  if (rootLogger === undefined) {
    rootLogger = createLogger(loadConfig());
  }
  return rootLogger;
}

/**
 * Child logger for one engine component.
 */
export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}
