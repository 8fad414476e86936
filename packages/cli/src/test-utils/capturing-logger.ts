// pattern: Functional Core
// pino logger that keeps every emitted line for assertions

import { Writable } from "node:stream";

import { pino, type Logger } from "pino";

export interface CapturingLogger {
  logger: Logger;
  /** Emitted lines parsed back into objects */
  entries: () => Record<string, unknown>[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createCapturingLogger(): CapturingLogger {
  const lines: string[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback): void {
      lines.push(chunk.toString());
      callback();
    },
  });

  return {
    logger: pino({ level: "debug" }, sink),
    entries: () =>
      lines.flatMap(line => {
        const parsed: unknown = JSON.parse(line);
        return isRecord(parsed) ? [parsed] : [];
      }),
  };
}
