// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { createEnvironment } from "../../environment/create.js";
import { createPyenvEnvironment, type BinaryLocator } from "../../environment/pyenv.js";
import { createCommandRunner, type CommandRunner } from "../../utils/command/index.js";
import { EnvironmentError } from "../../utils/errors.js";
import { CLI_LOGGER } from "../_deps.js";
import { withErrorHandling } from "../_utils/with-error-handling.js";

import type { Logger } from "pino";

export interface EnvCreateOptions {
  baseDir?: string | undefined;
  python?: string | undefined;
  pyenv: boolean;
}

export interface EnvCreateDeps {
  runner: CommandRunner;
  logger: Logger;
  locate?: BinaryLocator;
}

/**
 * Create (or find) the environment and return its path
 */
export async function runEnvCreate(
  name: string,
  options: EnvCreateOptions,
  deps: EnvCreateDeps
): Promise<string> {
  if (options.pyenv) {
    const environment = await createPyenvEnvironment(name, {
      runner: deps.runner,
      logger: deps.logger,
      ...(deps.locate && { locate: deps.locate }),
    });
    if (environment === null) {
      throw new EnvironmentError(`pyenv could not create the virtual environment ${name}`);
    }
    return environment;
  }

  return createEnvironment(name, {
    runner: deps.runner,
    logger: deps.logger,
    ...(options.baseDir !== undefined && { baseDir: options.baseDir }),
    ...(options.python !== undefined && { python: options.python }),
  });
}

/**
 * Creates the `env create` command
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeEnvCreateCommand() {
  return new Command("create")
    .description("Create a virtual environment to install packages into")
    .argument("<name>", "Environment name or path")
    .option("-b, --base-dir <dir>", "Directory the name is resolved against")
    .option("--python <binary>", "Interpreter used to create the venv")
    .option("--pyenv", "Create a pyenv virtualenv instead of a venv", false)
    .action(
      withErrorHandling(async (name: string, options: EnvCreateOptions) => {
        const environment = await runEnvCreate(name, options, {
          runner: createCommandRunner(CLI_LOGGER),
          logger: CLI_LOGGER,
        });
        process.stdout.write(`${environment}\n`);
      })
    );
}
