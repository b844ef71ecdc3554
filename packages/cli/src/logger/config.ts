// pattern: Functional Core

import pino, { type Level } from "pino";

import { COLLECTOR_NAME } from "../config/settings.js";

import createRenderer from "./renderer.js";
import { type LogFormat, type OutputSink } from "./types.js";

// Map our LogLevel enum to pino's string levels
export function mapLogLevelToPinoLevel(logLevel: Level): pino.LevelWithSilent {
  switch (logLevel) {
    case "error":
      return "error";
    case "warn":
      return "warn";
    case "info":
      return "info";
    case "debug":
      return "debug";
    case "trace":
      return "trace";
    default:
      return "info";
  }
}

export interface LoggerOptions {
  // Defaults to stderr; stdout is reserved for the report itself
  sink?: OutputSink;
  // Only consulted by the nice format; chalk's stderr detection by default
  colorize?: boolean;
}

export function createLogger(
  format: LogFormat,
  options: LoggerOptions = {}
): pino.Logger {
  const sink = options.sink ?? process.stderr;

  const baseConfig: pino.LoggerOptions = {
    name: COLLECTOR_NAME,
    level: "info", // Default level
    serializers: {
      err: (err: unknown) => {
        if (!(err instanceof Error)) return err;

        // The nice renderer prints a trimmed stack under the message
        if (format === "nice") {
          return {
            message: err.message,
            stack: err.stack ? err.stack.split("\n").slice(1, 9) : undefined,
          };
        }

        return pino.stdSerializers.err(err);
      },
    },
  };

  if (format === "nice") {
    // Pino emits JSON lines; the renderer turns them into readable text
    const renderer = createRenderer(
      options.colorize === undefined ? {} : { colorize: options.colorize }
    );
    renderer.on("data", (chunk: Buffer | string) => {
      sink.write(chunk.toString());
    });
    return pino(baseConfig, renderer);
  }

  return pino(baseConfig, {
    write: (msg: string) => {
      sink.write(msg);
    },
  });
}
