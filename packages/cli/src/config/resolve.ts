// pattern: Functional Core
// Layering CLI flags, the settings file and the process environment

import { dirname, isAbsolute, resolve } from "node:path";

import {
  currentEnvironmentPath,
  resolveEnvironmentPath,
  type EnvironmentHandle,
} from "../environment/index.js";
import { isLogLevel, type LogLevel } from "../logger/types.js";
import { JSON_URL_PATTERN } from "../pypi/client.js";
import { SIMPLE_INDEX_URL } from "../pypi/simple-index.js";

import type { EnvironmentV1, Settings } from "./types/index.js";

export const LOG_LEVEL_ENV_VAR = "PKGPROBE_LOG_LEVEL";
export const NON_INTERACTIVE_ENV_VAR = "PKGPROBE_NON_INTERACTIVE";

/**
 * Flags given on the command line; absent means "not given"
 */
export interface CliOverrides {
  environment?: string;
  diagnoses?: string[];
  store?: string;
  installIfMissing?: boolean;
  verbose?: boolean;
  logLevel?: LogLevel;
}

export interface ResolvedOptions {
  environment: EnvironmentHandle | null;
  /** Undefined runs the default diagnoses */
  diagnoses: string[] | undefined;
  store: string;
  installIfMissing: boolean;
  verbose: boolean;
  logLevel: LogLevel;
  jsonUrlPattern: string;
  simpleUrl: string;
}

export interface LoadedSettings {
  settings: Settings;
  /** Relative paths in the file resolve against its directory */
  path: string;
}

function settingsEnvironment(
  environment: EnvironmentV1,
  settingsDir: string
): EnvironmentHandle {
  if ("path" in environment) {
    return resolveEnvironmentPath(environment.path, settingsDir);
  }
  const baseDir = environment.baseDir ?? "";
  return resolveEnvironmentPath(
    environment.name,
    isAbsolute(baseDir) || baseDir.startsWith("~") ? baseDir : resolve(settingsDir, baseDir)
  );
}

function settingsStore(store: string, settingsDir: string): string {
  return store === "dict" ? store : resolve(settingsDir, store);
}

export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel | undefined {
  const value = env[LOG_LEVEL_ENV_VAR]?.toLowerCase();
  return value !== undefined && isLogLevel(value) ? value : undefined;
}

export function nonInteractiveFromEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[NON_INTERACTIVE_ENV_VAR]?.toLowerCase();
  return value === "1" || value === "true" || value === "yes";
}

/**
 * Effective options: CLI flag, then settings file, then environment variables,
 * then defaults
 */
export function resolveOptions(
  cli: CliOverrides,
  loaded: LoadedSettings | null,
  env: NodeJS.ProcessEnv = process.env
): ResolvedOptions {
  const settings = loaded?.settings;
  const settingsDir = loaded ? dirname(loaded.path) : process.cwd();

  let environment: EnvironmentHandle | null;
  if (cli.environment !== undefined) {
    environment = resolveEnvironmentPath(cli.environment);
  } else if (settings?.environment) {
    environment = settingsEnvironment(settings.environment, settingsDir);
  } else {
    environment = currentEnvironmentPath(env);
  }

  return {
    environment,
    diagnoses: cli.diagnoses ?? settings?.diagnoses,
    store:
      cli.store ??
      (settings?.store !== undefined ? settingsStore(settings.store, settingsDir) : "dict"),
    installIfMissing: cli.installIfMissing ?? settings?.installIfMissing ?? true,
    verbose: cli.verbose ?? settings?.verbose ?? true,
    logLevel: cli.logLevel ?? settings?.logLevel ?? logLevelFromEnv(env) ?? "info",
    jsonUrlPattern: settings?.index?.jsonUrlPattern ?? JSON_URL_PATTERN,
    simpleUrl: settings?.index?.simpleUrl ?? SIMPLE_INDEX_URL,
  };
}
