#!/usr/bin/env node
// pattern: Imperative Shell

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { Command, Option } from "@commander-js/extra-typings";

import { logLevelFromEnv, nonInteractiveFromEnv } from "../config/resolve.js";
import {
  LOG_FORMATS,
  LOG_LEVELS,
  isLogFormat,
  isLogLevel,
  type LogFormat,
  type LogLevel,
} from "../logger/index.js";

import { makeEnvCommand } from "./env/index.js";
import { CLI_LOGGER, initializeLogger, setCliLogLevel } from "./_deps.js";
import { setConfigPath, setLogLevelFromFlag, setNoParentFlag } from "./_globals.js";
import { makeDiagnoseCommand } from "./diagnose.js";
import { makeInfoCommand } from "./info.js";
import { makeNamesCommand } from "./names.js";

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new Error(
      `Invalid log level: ${value}. Valid levels are: ${LOG_LEVELS.join(", ")}`
    );
  }
  return value;
}

function parseLogFormat(value: string): LogFormat {
  if (!isLogFormat(value)) {
    throw new Error(
      `Invalid log format: ${value}. Valid formats are: ${LOG_FORMATS.join(", ")}`
    );
  }
  return value;
}

function isNonInteractive(): boolean {
  return !process.stderr.isTTY || nonInteractiveFromEnv();
}

function getDefaultLogFormat(): LogFormat {
  return isNonInteractive() ? "json" : "nice";
}

// Define the root command
export const rootCommand = new Command("pkgprobe")
  .version("0.1.0")
  .description("install, probe and uninstall Python packages, and query the package index")
  .addOption(
    new Option("-l, --log-level <level>", "Set log level")
      .choices(LOG_LEVELS)
      .default(logLevelFromEnv() ?? "info")
      .argParser(parseLogLevel)
  )
  .addOption(
    new Option("--non-interactive", "Disable colours and interactive output").default(
      isNonInteractive()
    )
  )
  .addOption(
    new Option("-f, --format <format>", "Log format")
      .choices(LOG_FORMATS)
      .default(getDefaultLogFormat())
      .argParser(parseLogFormat)
  )
  .addOption(new Option("-c, --config <file>", "Settings file to use"))
  .addOption(
    new Option(
      "--no-parent",
      "Only look for a settings file in the working directory, not its parents"
    )
  );

// Configure CLI_LOGGER and settings lookup before any action runs
function applyGlobalOptions(): void {
  const options = rootCommand.opts();

  initializeLogger(options.format, options.nonInteractive);
  setCliLogLevel(options.logLevel);
  setLogLevelFromFlag(rootCommand.getOptionValueSource("logLevel") === "cli");
  CLI_LOGGER.debug(
    `Log level configured to: ${options.logLevel}, format: ${options.format}, non-interactive: ${String(options.nonInteractive)}`
  );

  setConfigPath(options.config);
  if (options.config) {
    CLI_LOGGER.debug(`Settings file override: ${options.config}`);
  }

  setNoParentFlag(!options.parent);
}

rootCommand
  .hook("preAction", applyGlobalOptions)
  .addCommand(makeDiagnoseCommand())
  .addCommand(makeInfoCommand())
  .addCommand(makeNamesCommand())
  .addCommand(makeEnvCommand());

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) {
    return false;
  }
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  // Logger for errors raised before the preAction hook runs
  initializeLogger(getDefaultLogFormat(), isNonInteractive());

  await rootCommand.parseAsync(process.argv);
}
