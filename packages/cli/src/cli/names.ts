// pattern: Imperative Shell
// CLI command listing project names from the simple index

import { join } from "node:path";

import { Command } from "@commander-js/extra-typings";
import envPaths from "env-paths";

import { resolveOptions } from "../config/resolve.js";
import { fetchPackageNames } from "../pypi/simple-index.js";

import { CLI_LOGGER } from "./_deps.js";
import { withSettingsAndErrorHandling } from "./_utils/with-settings.js";

import type { FetchLike } from "../pypi/client.js";
import type { Logger } from "pino";

export function defaultNamesCacheFile(): string {
  return join(envPaths("pkgprobe", { suffix: "" }).cache, "package-names.json");
}

export interface NamesOptions {
  cacheFile: string;
  refresh: boolean;
  list: boolean;
  url: string;
}

export interface NamesDeps {
  logger: Logger;
  fetch?: FetchLike;
}

/**
 * Count (and optionally list) the project names on the simple index
 */
export async function runNames(options: NamesOptions, deps: NamesDeps): Promise<string> {
  const stubs = await fetchPackageNames({
    url: options.url,
    cacheFile: options.cacheFile,
    refresh: options.refresh,
    logger: deps.logger,
    ...(deps.fetch && { fetch: deps.fetch }),
  });

  const names = Object.keys(stubs);
  const lines = [`${names.length} package names`];
  if (options.list) {
    lines.push(...names);
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Create the 'pkgprobe names' command
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeNamesCommand() {
  return new Command("names")
    .description("Count the project names published on the package index")
    .option("--refresh", "Ignore the cache and fetch the listing again", false)
    .option("--cache <file>", "Cache file for the name listing", defaultNamesCacheFile())
    .option("--list", "Print every name, one per line", false)
    .addHelpText(
      "after",
      `
Examples:
  pkgprobe names                 Count names, fetching the listing once
  pkgprobe names --refresh       Fetch the listing again
  pkgprobe names --list          Print every name
      `
    )
    .action(options =>
      withSettingsAndErrorHandling(async loaded => {
        const { simpleUrl } = resolveOptions({}, loaded);
        const output = await runNames(
          {
            cacheFile: options.cache,
            refresh: options.refresh,
            list: options.list,
            url: simpleUrl,
          },
          { logger: CLI_LOGGER }
        );
        process.stdout.write(output);
      })()
    );
}
