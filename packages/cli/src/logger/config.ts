// pattern: Functional Core

import { pino } from "pino";

import createRenderer from "./renderer.js";

import type { LogFormat, LogLevel } from "./types.js";

// Map our LogLevel union to pino's string levels
export function mapLogLevelToPinoLevel(logLevel: LogLevel): pino.LevelWithSilent {
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

function isErrorLike(value: unknown): value is Error {
  return (
    typeof value === "object" &&
    value !== null &&
    "message" in value &&
    typeof value.message === "string"
  );
}

// Create pino logger with stream configuration
export function createLogger(
  format: LogFormat,
  nonInteractive: boolean
): pino.Logger {
  const baseConfig: pino.LoggerOptions = {
    name: "pkgprobe",
    level: "info", // Default level
    // Custom serializer for error objects to make them more readable
    serializers: {
      err: (err: unknown) => {
        if (!isErrorLike(err)) return err;

        // For nice format, the renderer prints message and a short stack
        if (format === "nice" && !nonInteractive) {
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
    // For nice format, use the renderer to convert JSON to nice format
    const renderer = createRenderer({ colorize: !nonInteractive });
    renderer.pipe(process.stderr);
    return pino(baseConfig, renderer);
  }

  // For JSON format, output JSON directly to stderr
  return pino(baseConfig, pino.destination(2));
}
