// pattern: Imperative Shell
// CLI command running the install/diagnose/uninstall pipeline

import { Command } from "@commander-js/extra-typings";

import { resolveOptions, type CliOverrides, type ResolvedOptions } from "../config/resolve.js";
import { DIAGNOSIS_REGISTRY } from "../diagnoses/registry.js";
import { diagnosePkgs } from "../orchestrator/diagnose.js";

import { CLI_LOGGER } from "./_deps.js";
import { withSettingsAndErrorHandling } from "./_utils/with-settings.js";

import type { InstallationManager } from "../orchestrator/installation-lease.js";
import type { FetchLike } from "../pypi/client.js";
import type { CommandRunner } from "../utils/command/index.js";
import type { JsonObject } from "../utils/json.js";
import type { Logger } from "pino";

export const RESULTS_HEADER = "------ RESULTS ------";

export interface DiagnoseCommandOptions {
  diagnoses?: string[] | undefined;
  store?: string | undefined;
  env?: string | undefined;
  install: boolean;
  quietPip?: true | undefined;
}

export interface DiagnoseCommandDeps {
  logger: Logger;
  runner?: CommandRunner;
  fetch?: FetchLike;
  installer?: InstallationManager;
}

/**
 * Flags that were actually given, as settings overrides.
 * `installFromCli` tells an explicit --no-install from commander's default.
 */
export function diagnoseOverrides(
  options: DiagnoseCommandOptions,
  installFromCli: boolean
): CliOverrides {
  const overrides: CliOverrides = {};
  if (options.diagnoses) overrides.diagnoses = options.diagnoses;
  if (options.store !== undefined) overrides.store = options.store;
  if (options.env !== undefined) overrides.environment = options.env;
  if (installFromCli) overrides.installIfMissing = options.install;
  if (options.quietPip) overrides.verbose = false;
  return overrides;
}

export function formatResults(results: JsonObject): string {
  return `${RESULTS_HEADER}\n${JSON.stringify(results, null, 2)}\n`;
}

/**
 * Diagnose `packages` and render the results block.
 * A single argument may be the path of a requirements-style file.
 */
export async function runDiagnose(
  packages: string[],
  resolved: ResolvedOptions,
  deps: DiagnoseCommandDeps
): Promise<string> {
  const input = packages.length === 1 && packages[0] !== undefined ? packages[0] : packages;

  const results = await diagnosePkgs(input, {
    logger: deps.logger,
    environment: resolved.environment,
    store: resolved.store,
    installIfMissing: resolved.installIfMissing,
    verbose: resolved.verbose,
    urlPattern: resolved.jsonUrlPattern,
    ...(resolved.diagnoses && { diagnoses: resolved.diagnoses }),
    ...(deps.runner && { runner: deps.runner }),
    ...(deps.fetch && { fetch: deps.fetch }),
    ...(deps.installer && { installer: deps.installer }),
  });

  return formatResults(results);
}

/**
 * Create the 'pkgprobe diagnose' command
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeDiagnoseCommand() {
  const diagnosisNames = [...DIAGNOSIS_REGISTRY.keys()];

  return new Command("diagnose")
    .description("Install packages, run diagnoses on them and uninstall them again")
    .argument("<packages...>", "Package names, or the path of a requirements file")
    .addHelpText(
      "before",
      `
Each package is installed into the configured virtual environment when it is
missing, diagnosed, and removed again. Packages already installed are left alone.

Registered diagnoses:
${diagnosisNames.map(name => `  • ${name}`).join("\n")}
      `
    )
    .addHelpText(
      "after",
      `
Examples:
  pkgprobe diagnose six                          Run the default diagnoses on six
  pkgprobe diagnose six attrs -d json_info       Only fetch index metadata
  pkgprobe diagnose requirements.txt --store out Write out/<package>.json files
  pkgprobe diagnose six --no-install             Probe whatever is installed
      `
    )
    .option("-d, --diagnoses <names...>", "Diagnoses to run, in order")
    .option("-s, --store <store>", 'Result store: "dict" or an existing folder')
    .option("-e, --env <path>", "Virtual environment to install into")
    .option("--no-install", "Do not install missing packages (nor uninstall them)")
    .option("--quiet-pip", "Hide pip output")
    .action((packages, options, command) =>
      withSettingsAndErrorHandling(async loaded => {
        const resolved = resolveOptions(
          diagnoseOverrides(options, command.getOptionValueSource("install") === "cli"),
          loaded
        );
        CLI_LOGGER.debug({ resolved }, "Resolved diagnose options");

        const output = await runDiagnose(packages, resolved, { logger: CLI_LOGGER });
        process.stdout.write(output);
      })()
    );
}
