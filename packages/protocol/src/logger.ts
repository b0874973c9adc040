/**
 * Root logger.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import type { CovenantConfig } from "./config.js";

export type { Logger };

export function createLogger(
  config: Pick<CovenantConfig, "LOG_LEVEL" | "LOG_PRETTY">,
): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.LOG_PRETTY ? { transport: { target: "pino-pretty" } } : {}),
  });
}

/** Logger that discards everything. Default for accounts built without one. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
