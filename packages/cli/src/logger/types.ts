// pattern: Functional Core

import type { Level } from "pino";

export type LogFormat = "nice" | "json";

export type LogLevel = Extract<Level, "error" | "warn" | "info" | "debug" | "trace">;

export const LOG_LEVELS: readonly LogLevel[] = [
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

export const LOG_FORMATS: readonly LogFormat[] = ["nice", "json"];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some(format => format === value);
}
