// pattern: Imperative Shell

import { createLogger, mapLogLevelToPinoLevel } from "./config.js";

import type { LogFormat, LogLevel } from "./types.js";
import type { Logger } from "pino";

// Global logger instance
let LOGGER: Logger | undefined;

// Initialize logger with format and interactive preferences
export function initializeLogger(
  format: LogFormat,
  nonInteractive: boolean
): void {
  LOGGER = createLogger(format, nonInteractive);
}

// Current logger; library callers that never initialised one get JSON on stderr
export function getLogger(): Logger {
  LOGGER ??= createLogger("json", true);
  return LOGGER;
}

// Set the log level on the global logger
export function setCliLogLevel(logLevel: LogLevel): void {
  if (!LOGGER) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  LOGGER.level = mapLogLevelToPinoLevel(logLevel);
}

// Create a proxy object that always refers to the current logger instance
export const CLI_LOGGER = new Proxy({} as Logger, {
  get(_target, prop) {
    if (!LOGGER) {
      throw new Error("Logger not initialized. Call initializeLogger() first.");
    }
    const value: unknown = Reflect.get(LOGGER, prop);
    if (typeof value === "function") {
      return value.bind(LOGGER);
    }
    return value;
  },
});
