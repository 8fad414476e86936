// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { resolveOptions } from "../../config/resolve.js";
import { detectEnvironmentManager } from "../../environment/create.js";
import {
  environmentExists,
  resolveEnvironmentPath,
  type EnvironmentHandle,
} from "../../environment/index.js";
import { EnvironmentError } from "../../utils/errors.js";
import { withSettingsAndErrorHandling } from "../_utils/with-settings.js";

import type { JsonObject } from "../../utils/json.js";

/**
 * Where an environment lives, whether it exists and which tool made it
 */
export async function describeEnvironment(
  environment: EnvironmentHandle
): Promise<JsonObject> {
  return {
    path: environment,
    exists: await environmentExists(environment),
    manager: await detectEnvironmentManager(environment),
  };
}

/**
 * The environment named on the command line, or else the configured one
 */
export function pickEnvironment(
  name: string | undefined,
  baseDir: string | undefined,
  configured: EnvironmentHandle | null
): EnvironmentHandle {
  if (name !== undefined) {
    return resolveEnvironmentPath(name, baseDir);
  }
  if (configured === null) {
    throw new EnvironmentError(
      "No virtual environment configured: name one, set VIRTUAL_ENV, or add `environment` to pkgprobe.yaml"
    );
  }
  return configured;
}

/**
 * Creates the `env show` command
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeEnvShowCommand() {
  return new Command("show")
    .description("Show where a virtual environment lives and whether it exists")
    .argument("[name]", "Environment name or path (default: the configured one)")
    .option("-b, --base-dir <dir>", "Directory the name is resolved against")
    .action((name, options) =>
      withSettingsAndErrorHandling(async loaded => {
        const { environment } = resolveOptions({}, loaded);
        const description = await describeEnvironment(
          pickEnvironment(name, options.baseDir, environment)
        );
        process.stdout.write(`${JSON.stringify(description, null, 2)}\n`);
      })()
    );
}
