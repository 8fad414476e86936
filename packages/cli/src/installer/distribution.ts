// pattern: Functional Core
// Parsing `pip show` output

import type { DistributionInfo } from "./types.js";

/**
 * Parse the RFC 822 style `Key: value` block printed by `pip show`.
 * Continuation lines and lines without a colon are ignored.
 */
export function parsePipShow(output: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const line of output.split(/\r?\n/)) {
    const match = /^([A-Za-z][\w-]*):\s?(.*)$/.exec(line);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      fields[match[1]] = match[2].trim();
    }
  }
  return fields;
}

export function toDistributionInfo(output: string): DistributionInfo | null {
  const fields = parsePipShow(output);
  const { Name: name, Version: version, Location: location } = fields;
  if (!name || !location) {
    return null;
  }
  return { name, version: version ?? "", location };
}

/**
 * Directory holding a distribution's importable package
 */
export function packageFolderName(packageName: string): string {
  return packageName.replace(/-/g, "_");
}
