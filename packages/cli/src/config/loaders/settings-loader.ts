// pattern: Functional Core
import { parse as parseToml } from "@iarna/toml";
import { access, constants, readFile } from "fs/promises";
import { basename, dirname, extname, join, resolve } from "path";
import { parse as parseYaml } from "yaml";

import { ajv } from "../../utils/ajv.js";
import {
  ConfigurationError,
  FileSystemError,
  ValidationError,
} from "../../utils/errors.js";
import { Settings } from "../types/index.js";

export const SETTINGS_FILENAMES = [
  "pkgprobe.yaml",
  "pkgprobe.yml",
  "pkgprobe.json",
  "pkgprobe.toml",
] as const;

// Compile schema once for reuse
const validateSettings = ajv.compile(Settings);

/**
 * Loads and parses settings from a file path, detecting the format
 * by file extension (.json, .yaml/.yml, .toml)
 */
export async function loadSettingsFromFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new FileSystemError(
        `Settings file not found: ${filePath}`,
        "read",
        filePath
      );
    }
    throw error;
  }
  const ext = extname(filePath).toLowerCase();

  switch (ext) {
    case ".json":
      return JSON.parse(content);
    case ".yaml":
    case ".yml":
      return parseYaml(content);
    case ".toml":
      return parseToml(content);
    default:
      throw new ConfigurationError(
        `Unsupported file format: ${ext}. Supported formats: .json, .yaml, .yml, .toml`
      );
  }
}

/**
 * Validates a parsed object against the settings schema
 */
export function validateSettingsObject(data: unknown): data is Settings {
  if (validateSettings(data)) {
    return true;
  }

  const messages = (validateSettings.errors ?? []).map(
    err => `${err.instancePath || "root"}: ${err.message ?? "invalid"}`
  );
  throw new ValidationError(
    `Settings validation failed: ${messages.join(", ")}`,
    messages
  );
}

/**
 * Search for a pkgprobe settings file in `startDir` and its parents.
 * Two settings files side by side are an error.
 */
export async function findSettingsFile(
  startDir: string = process.cwd(),
  noParent = false
): Promise<string | null> {
  let currentDir = resolve(startDir);

  for (;;) {
    const found: string[] = [];
    for (const filename of SETTINGS_FILENAMES) {
      const candidate = join(currentDir, filename);
      try {
        await access(candidate, constants.F_OK);
        found.push(candidate);
      } catch {
        // not here
      }
    }

    if (found.length > 1) {
      throw new ConfigurationError(
        `Multiple pkgprobe settings files found in ${currentDir}: ${found
          .map(path => basename(path))
          .join(", ")}. Please keep only one.`
      );
    }
    if (found[0] !== undefined) {
      return found[0];
    }

    const parent = dirname(currentDir);
    if (noParent || parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

/**
 * Loads and validates settings from file
 */
export async function loadAndValidateSettings(filePath: string): Promise<Settings> {
  const data = await loadSettingsFromFile(filePath);

  if (validateSettingsObject(data)) {
    return data;
  }

  // validateSettingsObject throws instead of returning false
  throw new Error("Unexpected validation state");
}
