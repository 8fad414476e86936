// pattern: Imperative Shell

import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";

/**
 * Result of creating a temporary directory
 */
export interface TempDir {
  /** Path to the temporary directory */
  path: string;
  /** Cleanup function to remove the temporary directory */
  cleanup: () => Promise<void>;
  /** Write a file below the temporary directory, creating parents */
  writeFile: (relativePath: string, content: string) => Promise<string>;
  /** Create a directory below the temporary directory */
  mkdir: (relativePath: string) => Promise<string>;
}

/**
 * Creates a temporary directory for filesystem-backed tests
 */
export async function createTempDir(prefix = "pkgprobe-test-"): Promise<TempDir> {
  const tempDir = await mkdtemp(join(tmpdir(), prefix));

  return {
    path: tempDir,
    cleanup: async () => {
      await rm(tempDir, { recursive: true, force: true });
    },
    writeFile: async (relativePath: string, content: string) => {
      const fullPath = join(tempDir, relativePath);
      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, content, "utf8");
      return fullPath;
    },
    mkdir: async (relativePath: string) => {
      const fullPath = join(tempDir, relativePath);
      await mkdir(fullPath, { recursive: true });
      return fullPath;
    },
  };
}
