// pattern: Functional Core

import { getPath, isJsonObject, pathsGetter, type JsonObject } from "../utils/json.js";

import type { DiagnosisFn } from "./types.js";

const extractInfoFields = pathsGetter([
  "info.description",
  "info.summary",
  "info.author",
  "info.version",
  "info.project_urls",
  "info.home_page",
]);

/**
 * Pick the interesting fields out of package JSON metadata.
 * Missing fields come back as null; release figures are added when known.
 */
export function extractJsonInfo(metadata: JsonObject): JsonObject {
  const extracted = extractInfoFields(metadata);
  const releases = getPath(metadata, "releases");
  const releaseMap = isJsonObject(releases) ? releases : {};

  extracted["n_releases"] = Object.keys(releaseMap).length;

  const version = extracted["info.version"];
  const files = typeof version === "string" ? releaseMap[version] : undefined;
  const release = Array.isArray(files) ? files[0] : undefined;
  if (isJsonObject(release)) {
    extracted["last_release.size"] = release["size"] ?? null;
    extracted["last_release.upload_time_iso_8601"] =
      release["upload_time_iso_8601"] ?? null;
  }

  return extracted;
}

export const jsonInfoDiagnosis: DiagnosisFn = async (packageName, context) =>
  extractJsonInfo(await context.fetchPackageInfo(packageName));

/**
 * The raw index metadata, unfiltered
 */
export const allJsonInfoDiagnosis: DiagnosisFn = (packageName, context) =>
  context.fetchPackageInfo(packageName);
