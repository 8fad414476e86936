// pattern: Functional Core
// Reading release information out of package JSON metadata

import { getPath, isJsonObject, type JsonObject } from "../utils/json.js";

export function latestVersion(info: JsonObject): string | null {
  const version = getPath(info, "info.version");
  return typeof version === "string" ? version : null;
}

function releases(info: JsonObject): JsonObject {
  const value = getPath(info, "releases");
  return isJsonObject(value) ? value : {};
}

/**
 * Every version that has a release entry, in index order
 */
export function releaseVersions(info: JsonObject): string[] {
  return Object.keys(releases(info));
}

/**
 * Upload time of the last file of each release; releases without files are skipped
 */
export function releaseDates(info: JsonObject): string[] {
  const dates: string[] = [];
  for (const files of Object.values(releases(info))) {
    if (!Array.isArray(files)) continue;
    const last = files.at(-1);
    if (isJsonObject(last) && typeof last["upload_time"] === "string") {
      dates.push(last["upload_time"]);
    }
  }
  return dates;
}

export function lastReleaseDate(info: JsonObject): string | null {
  return releaseDates(info).at(-1) ?? null;
}

/**
 * Bump the last numeric component: "1.2.3" becomes "1.2.4"
 */
export function incrementVersion(version: string): string {
  const parts = version.split(".").map(part => {
    const num = Number.parseInt(part, 10);
    if (Number.isNaN(num)) {
      throw new Error(`Not a numeric version: ${version}`);
    }
    return num;
  });
  const last = parts.pop() ?? 0;
  return [...parts, last + 1].join(".");
}
