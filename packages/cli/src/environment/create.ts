// pattern: Imperative Shell

import { access } from "node:fs/promises";
import { join } from "node:path";

import { EnvironmentError } from "../utils/errors.js";

import {
  type EnvironmentHandle,
  environmentExists,
  resolveEnvironmentPath,
} from "./index.js";

import type { CommandRunner } from "../utils/command/index.js";
import type { Logger } from "pino";

export type EnvironmentManager = "venv" | "pyenv";

export interface CreateEnvironmentOptions {
  /** Directory the environment name is resolved against */
  baseDir?: string;
  /** Interpreter used to run `-m venv` */
  python?: string;
  runner: CommandRunner;
  logger: Logger;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a venv unless one already exists at the resolved path.
 * Returns the environment path either way.
 */
export async function createEnvironment(
  name: string,
  options: CreateEnvironmentOptions
): Promise<EnvironmentHandle> {
  const { baseDir = "", python = "python3", runner, logger } = options;
  const environment = resolveEnvironmentPath(name, baseDir);

  if (await environmentExists(environment)) {
    logger.info({ environment }, "Virtual environment already exists");
    return environment;
  }

  logger.info({ environment }, "Creating virtual environment");
  const result = await runner(python, ["-m", "venv", environment]);
  if (result.exitCode !== 0) {
    throw new EnvironmentError(
      `Failed to create virtual environment at ${environment}: ${
        result.failure ?? result.stderr.trim()
      }`,
      environment
    );
  }

  return environment;
}

/**
 * Tell which tool made the environment at `name` (below `baseDir`), if any
 */
export async function detectEnvironmentManager(
  name: string,
  baseDir = ""
): Promise<EnvironmentManager | null> {
  const environment = join(baseDir, name);

  if (await fileExists(join(environment, "pyvenv.cfg"))) {
    return "venv";
  }
  if (await fileExists(join(environment, ".python-version"))) {
    return "pyenv";
  }
  return null;
}
