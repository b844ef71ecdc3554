// pattern: Imperative Shell

import pino from "pino";

import {
  createLogger,
  type LoggerOptions,
  mapLogLevelToPinoLevel,
} from "./config.js";
import { type LogFormat, type LogLevel } from "./types.js";

// Global logger instance
let LOGGER: pino.Logger | undefined;

// Initialize logger with format and output preferences
export function initializeLogger(
  format: LogFormat,
  options: LoggerOptions = {}
): void {
  LOGGER = createLogger(format, options);
}

// Set the log level on the global logger
export function setCliLogLevel(logLevel: LogLevel): void {
  if (!LOGGER) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  LOGGER.level = mapLogLevelToPinoLevel(logLevel);
}

// Create a proxy object that always refers to the current logger instance
export const CLI_LOGGER = new Proxy({} as pino.Logger, {
  get(_target, prop) {
    if (!LOGGER) {
      throw new Error("Logger not initialized. Call initializeLogger() first.");
    }
    const value = LOGGER[prop as keyof pino.Logger];
    if (typeof value === "function") {
      return value.bind(LOGGER);
    }
    return value;
  },
});
