// pattern: Imperative Shell

import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";

import { packageFolderName } from "../installer/distribution.js";

import type { DiagnosisFn } from "./types.js";

export type FolderStats = {
  total_files: number;
  total_bytes: number;
};

/**
 * Count files and bytes below `folder`. Directories that cannot be read,
 * including a missing `folder`, and entries that cannot be stat'ed, such as
 * broken symlinks, contribute nothing.
 */
export async function folderStats(folder: string): Promise<FolderStats> {
  const stats: FolderStats = { total_files: 0, total_bytes: 0 };
  const pending = [folder];

  for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
    const entries = await readdir(dir, { withFileTypes: true }).catch(() => []);
    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(path);
        continue;
      }
      // Symlinked directories are not descended into
      const info = await stat(path).catch(() => null);
      if (info === null || info.isDirectory()) continue;
      stats.total_files += 1;
      stats.total_bytes += info.size;
    }
  }

  return stats;
}

/**
 * Size up the installed package folder
 */
export const folderDiagnosis: DiagnosisFn = async (packageName, context) => {
  const distribution = await context.locateDistribution(packageName);
  if (!distribution) {
    context.logger.error({ package: packageName }, "Package not found");
    return null;
  }
  return folderStats(join(distribution.location, packageFolderName(packageName)));
};
