// pattern: Imperative Shell
// CLI command printing package metadata from the index

import { Command } from "@commander-js/extra-typings";

import { resolveOptions } from "../config/resolve.js";
import { extractJsonInfo } from "../diagnoses/json-info.js";
import { fetchJsonPackageInfo, type FetchLike } from "../pypi/client.js";
import { lastReleaseDate, latestVersion } from "../pypi/releases.js";

import { CLI_LOGGER } from "./_deps.js";
import { withSettingsAndErrorHandling } from "./_utils/with-settings.js";

import type { Logger } from "pino";

export interface InfoDeps {
  logger: Logger;
  urlPattern: string;
  fetch?: FetchLike;
}

/**
 * The json_info extraction of a package (or its raw metadata with `full`),
 * as indented JSON
 */
export async function runInfo(
  packageName: string,
  full: boolean,
  deps: InfoDeps
): Promise<string> {
  const metadata = await fetchJsonPackageInfo(packageName, {
    urlPattern: deps.urlPattern,
    logger: deps.logger,
    ...(deps.fetch && { fetch: deps.fetch }),
  });

  if (Object.keys(metadata).length === 0) {
    deps.logger.warn({ package: packageName }, "The package index has no metadata for this package");
  } else {
    deps.logger.info(
      {
        package: packageName,
        latest: latestVersion(metadata),
        lastRelease: lastReleaseDate(metadata),
      },
      "Fetched package metadata"
    );
  }

  const shown = full ? metadata : extractJsonInfo(metadata);
  return `${JSON.stringify(shown, null, 2)}\n`;
}

/**
 * Create the 'pkgprobe info' command
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeInfoCommand() {
  return new Command("info")
    .description("Show package metadata from the package index")
    .argument("<package>", "Package name")
    .option("--full", "Print the raw metadata instead of the summary", false)
    .addHelpText(
      "after",
      `
Examples:
  pkgprobe info six            Summary fields, release count and last release
  pkgprobe info six --full     Everything the index returns
      `
    )
    .action((packageName, options) =>
      withSettingsAndErrorHandling(async loaded => {
        const { jsonUrlPattern } = resolveOptions({}, loaded);
        const output = await runInfo(packageName, options.full, {
          logger: CLI_LOGGER,
          urlPattern: jsonUrlPattern,
        });
        process.stdout.write(output);
      })()
    );
}
