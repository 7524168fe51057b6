import { Logger } from "tslog";
import type { SaleLogger } from "./gateway/types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const MIN_LEVEL: Record<LogLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

/** Default logger used when the host does not inject one. */
export function createDefaultLogger(name = "sale-core", level: LogLevel = "info"): SaleLogger {
  const logger = new Logger({ name, minLevel: MIN_LEVEL[level], type: "pretty" });
  return {
    debug: (message) => {
      logger.debug(message);
    },
    info: (message) => {
      logger.info(message);
    },
    warn: (message) => {
      logger.warn(message);
    },
    error: (message) => {
      logger.error(message);
    },
  };
}

/** Logger that drops everything; handy for tests and embedded use. */
export const silentLogger: SaleLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
