// pattern: Functional Core

import { Chalk, type ChalkInstance } from "chalk";
import { Transform } from "node:stream";

// Pino log object interface
interface PinoLogObject {
  level: number;
  time?: number;
  pid?: number;
  hostname?: string;
  msg?: string;
  [key: string]: unknown;
}

// Renderer options interface
export interface RendererOptions {
  colorize?: boolean;
}

function isPinoLogObject(value: unknown): value is PinoLogObject {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number"
  );
}

// Format error object with stack trace
function formatErrorObject(err: unknown, chalk: ChalkInstance): string {
  if (!err || typeof err !== "object") {
    return "";
  }

  const lines: string[] = [];

  // Add error message with indentation
  if ("message" in err && typeof err.message === "string" && err.message) {
    lines.push(chalk.yellow(`    ${err.message}`));
  }

  // The serializer may hand us the stack pre-split or as a single string
  if ("stack" in err) {
    const stackLines = Array.isArray(err.stack)
      ? err.stack.filter((line): line is string => typeof line === "string")
      : typeof err.stack === "string"
        ? err.stack.split("\n").slice(1, 9)
        : [];

    for (const line of stackLines) {
      const trimmedLine = line.trim();
      if (trimmedLine) {
        lines.push(chalk.dim(chalk.yellow(`        ${trimmedLine}`)));
      }
    }
  }

  return lines.length > 0 ? `\n${lines.join("\n")}` : "";
}

// Format a single log object to a nice string
function formatLogObject(logObj: PinoLogObject, chalk: ChalkInstance): string {
  const {
    level,
    time: _time,
    msg,
    pid: _pid,
    hostname: _hostname,
    name: _name,
    err,
    ...extra
  } = logObj;

  // Map pino levels to display format
  let levelDisplay = "";
  let msgColor: ChalkInstance = chalk.reset;

  switch (level) {
    case 10: // trace
      levelDisplay = chalk.green("+");
      break;
    case 20: // debug
      levelDisplay = chalk.cyan("=");
      break;
    case 30: // info
      levelDisplay = chalk.gray(">");
      break;
    case 40: // warn
      levelDisplay = chalk.yellowBright("W");
      msgColor = chalk.yellow;
      break;
    case 50: // error
      levelDisplay = chalk.inverse.red("E");
      msgColor = chalk.red;
      break;
    case 60: // fatal
      levelDisplay = chalk.inverse.redBright("E");
      msgColor = chalk.red;
      break;
    default:
      levelDisplay = chalk.gray("  LOG  ");
  }

  const formattedMsg = msgColor(msg ?? "");
  const errorStr = err ? formatErrorObject(err, chalk) : "";
  const extraStr =
    Object.keys(extra).length > 0 ? ` ${chalk.dim(JSON.stringify(extra))}` : "";

  return `${levelDisplay} ${formattedMsg}${extraStr}${errorStr}`;
}

/**
 * Render one newline-delimited pino JSON line for humans.
 * Lines that are not pino JSON are returned unchanged.
 */
export function formatLogLine(line: string, options: RendererOptions = {}): string {
  const chalk = new Chalk({ level: options.colorize === false ? 0 : 1 });
  try {
    const parsed: unknown = JSON.parse(line);
    return isPinoLogObject(parsed) ? formatLogObject(parsed, chalk) : line;
  } catch {
    return line;
  }
}

// Create a pretty renderer stream like pino-pretty
export default function createRenderer(options: RendererOptions = {}): Transform {
  return new Transform({
    objectMode: false, // Pino sends newline-delimited JSON strings, not objects
    transform(chunk: Buffer | string, _encoding, callback): void {
      const lines = chunk.toString().split("\n");
      const formattedLines: string[] = [];

      for (const line of lines) {
        if (line.trim()) {
          formattedLines.push(`${formatLogLine(line, options)}\n`);
        }
      }

      callback(null, formattedLines.join(""));
    },
  });
}
