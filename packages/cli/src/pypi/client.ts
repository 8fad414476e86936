// pattern: Mixed (unavoidable)
// Fetching package metadata from the Python package index

import { NetworkError, errorMessage } from "../utils/errors.js";
import { isJsonObject, type JsonObject } from "../utils/json.js";

import type { Logger } from "pino";

export const JSON_URL_PATTERN = "https://pypi.python.org/pypi/{package}/json";

export type FetchLike = (url: string) => Promise<Response>;

export interface PypiClientOptions {
  /** URL with a `{package}` placeholder */
  urlPattern?: string;
  fetch?: FetchLike;
  logger?: Logger;
}

export function packageJsonUrl(
  packageName: string,
  urlPattern: string = JSON_URL_PATTERN
): string {
  return urlPattern.replaceAll("{package}", encodeURIComponent(packageName));
}

/**
 * Fetch the JSON metadata of a package.
 *
 * A non-OK response (unknown package, index hiccup) yields `{}`.
 * A request that cannot be made at all throws NetworkError.
 */
export async function fetchJsonPackageInfo(
  packageName: string,
  options: PypiClientOptions = {}
): Promise<JsonObject> {
  const { urlPattern = JSON_URL_PATTERN, fetch: fetchFn = fetch, logger } = options;
  const url = packageJsonUrl(packageName, urlPattern);

  let response: Response;
  try {
    logger?.debug({ url }, "Fetching package metadata");
    response = await fetchFn(url);
  } catch (error) {
    throw new NetworkError(
      `Failed to reach the package index for ${packageName}: ${errorMessage(error)}`,
      url
    );
  }

  if (!response.ok) {
    logger?.debug(
      { url, status: response.status },
      "Package index returned no metadata"
    );
    return {};
  }

  const data: unknown = await response.json();
  return isJsonObject(data) ? data : {};
}
