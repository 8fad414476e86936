// pattern: Imperative Shell
// Helpers for environments managed by pyenv-virtualenv

import which from "which";

import { EnvironmentError } from "../utils/errors.js";

import type { EnvironmentHandle } from "./index.js";
import type { CommandRunner } from "../utils/command/index.js";
import type { Logger } from "pino";

/**
 * Looks pyenv up on PATH
 */
export type BinaryLocator = (binary: string) => Promise<string | null>;

export const locateOnPath: BinaryLocator = binary =>
  which(binary, { nothrow: true });

export async function pyenvAvailable(
  locate: BinaryLocator = locateOnPath
): Promise<boolean> {
  return (await locate("pyenv")) !== null;
}

/**
 * Prefix of a pyenv virtualenv, or null when pyenv does not know it
 */
export async function pyenvEnvironmentPath(
  name: string,
  runner: CommandRunner
): Promise<EnvironmentHandle | null> {
  const result = await runner("pyenv", ["virtualenv-prefix", name]);
  const prefix = result.stdout.trim();
  return result.exitCode === 0 && prefix ? prefix : null;
}

export interface PyenvOptions {
  runner: CommandRunner;
  logger: Logger;
  locate?: BinaryLocator;
}

/**
 * Create a pyenv virtualenv unless it exists.
 * Returns its prefix, or null when `pyenv virtualenv` fails.
 */
export async function createPyenvEnvironment(
  name: string,
  options: PyenvOptions
): Promise<EnvironmentHandle | null> {
  const { runner, logger, locate = locateOnPath } = options;

  if (!(await pyenvAvailable(locate))) {
    throw new EnvironmentError("pyenv not found on PATH");
  }

  const existing = await pyenvEnvironmentPath(name, runner);
  if (existing) {
    logger.info({ environment: existing }, "Virtual environment already exists");
    return existing;
  }

  const result = await runner("pyenv", ["virtualenv", name]);
  if (result.exitCode !== 0) {
    logger.warn(
      { name, stderr: result.stderr.trim() },
      "pyenv could not create the virtual environment"
    );
    return null;
  }

  return pyenvEnvironmentPath(name, runner);
}
