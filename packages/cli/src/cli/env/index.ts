// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { makeEnvCreateCommand } from "./create.js";
import { makeEnvShowCommand } from "./show.js";

/**
 * Creates the env command for creating and probing virtual environments
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeEnvCommand() {
  return new Command("env")
    .description("Create and inspect virtual environments")
    .addHelpText(
      "after",
      `
Examples:
  pkgprobe env create probe --base-dir ~/venvs   Create ~/venvs/probe
  pkgprobe env create probe --pyenv              Create a pyenv virtualenv
  pkgprobe env show                              Describe the configured environment
      `
    )
    .addCommand(makeEnvCreateCommand())
    .addCommand(makeEnvShowCommand());
}
