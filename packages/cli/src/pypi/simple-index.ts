// pattern: Mixed (unavoidable)
// Listing every project name from the simple index, cached as JSON

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { FileSystemError, NetworkError, errorMessage } from "../utils/errors.js";

import type { FetchLike } from "./client.js";
import type { Logger } from "pino";

export const SIMPLE_INDEX_URL = "https://pypi.org/simple";

/** Project name → its `/simple/{name}/` stub */
export type PackageNameStubs = Record<string, string>;

const ANCHOR = /<a\s[^>]*?href="(\/simple\/([^"/]+)\/)"[^>]*>([^<]*)<\/a>/gi;

/**
 * Extract project names from a simple-index HTML page.
 * Only anchors whose href is `/simple/{name}/` count; the anchor text is the name.
 */
export function parseSimpleIndex(html: string): PackageNameStubs {
  const stubs: PackageNameStubs = {};
  for (const match of html.matchAll(ANCHOR)) {
    const [, href, , text] = match;
    const name = text?.trim();
    if (href && name) {
      stubs[name] = href;
    }
  }
  return stubs;
}

export interface PackageNamesOptions {
  url?: string;
  cacheFile: string;
  /** Ignore the cache and fetch again */
  refresh?: boolean;
  fetch?: FetchLike;
  logger: Logger;
}

async function readCache(cacheFile: string): Promise<PackageNameStubs | null> {
  let content: string;
  try {
    content = await readFile(cacheFile, "utf8");
  } catch {
    return null;
  }
  const data: unknown = JSON.parse(content);
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new FileSystemError(
      `Package name cache is not a JSON object: ${cacheFile}`,
      "read",
      cacheFile
    );
  }
  const stubs: PackageNameStubs = {};
  for (const [name, stub] of Object.entries(data)) {
    if (typeof stub === "string") stubs[name] = stub;
  }
  return stubs;
}

/**
 * Project names from the cache file, fetching and saving them when absent
 */
export async function fetchPackageNames(
  options: PackageNamesOptions
): Promise<PackageNameStubs> {
  const { url = SIMPLE_INDEX_URL, cacheFile, refresh = false, logger } = options;
  const fetchFn = options.fetch ?? fetch;

  if (!refresh) {
    const cached = await readCache(cacheFile);
    if (cached) {
      logger.debug({ cacheFile }, "Using cached package names");
      return cached;
    }
  }

  logger.info({ url }, "Fetching package names from the simple index");
  let response: Response;
  try {
    response = await fetchFn(url);
  } catch (error) {
    throw new NetworkError(
      `Failed to fetch the simple index: ${errorMessage(error)}`,
      url
    );
  }
  if (!response.ok) {
    throw new NetworkError(
      `Simple index answered HTTP ${response.status}`,
      url
    );
  }

  const stubs = parseSimpleIndex(await response.text());
  await mkdir(dirname(cacheFile), { recursive: true });
  await writeFile(cacheFile, JSON.stringify(stubs), "utf8");
  logger.debug(
    { cacheFile, count: Object.keys(stubs).length },
    "Saved package names"
  );
  return stubs;
}
