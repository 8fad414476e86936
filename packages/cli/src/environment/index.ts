// pattern: Functional Core
// Locating virtual environments on disk

import { stat } from "node:fs/promises";
import { homedir } from "node:os";
import { isAbsolute, join, normalize, resolve } from "node:path";

/**
 * Absolute filesystem path of an isolated Python environment.
 * Existence is checked with {@link environmentExists}, never assumed.
 */
export type EnvironmentHandle = string;

export const VIRTUAL_ENV_VAR = "VIRTUAL_ENV";

export type EnvironmentTool = "python" | "pip";

/**
 * Path of the virtual environment the process runs in, from VIRTUAL_ENV
 */
export function currentEnvironmentPath(
  env: NodeJS.ProcessEnv = process.env
): EnvironmentHandle | null {
  const value = env[VIRTUAL_ENV_VAR];
  return value ? value : null;
}

export async function environmentExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Expand a leading `~` to the user's home directory
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") {
    return home;
  }
  if (path.startsWith("~/") || path.startsWith("~\\")) {
    return join(home, path.slice(2));
  }
  return path;
}

/**
 * Join `baseDir` and `name` into an absolute, normalised path.
 * An absolute (or home-relative) name ignores `baseDir`.
 */
export function resolveEnvironmentPath(
  name: string,
  baseDir = ""
): EnvironmentHandle {
  const target = expandHome(name);
  if (isAbsolute(target)) {
    return normalize(target);
  }
  return resolve(expandHome(baseDir), target);
}

/**
 * Path of an executable inside an environment
 */
export function environmentBinary(
  environment: EnvironmentHandle,
  tool: EnvironmentTool,
  platform: NodeJS.Platform = process.platform
): string {
  return platform === "win32"
    ? join(environment, "Scripts", `${tool}.exe`)
    : join(environment, "bin", tool);
}
