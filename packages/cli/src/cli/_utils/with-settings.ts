// pattern: Imperative Shell

import { findSettingsFile, loadAndValidateSettings } from "../../config/loaders/settings-loader.js";
import { CLI_LOGGER, setCliLogLevel } from "../_deps.js";
import { getConfigPath, getNoParentFlag, isLogLevelFromFlag } from "../_globals.js";

import { withErrorHandling } from "./with-error-handling.js";

import type { LoadedSettings } from "../../config/resolve.js";

/**
 * Load the settings file named with --config, or the nearest one found
 * upward from the working directory. Null when there is none.
 */
export async function loadCliSettings(): Promise<LoadedSettings | null> {
  const path = getConfigPath() ?? (await findSettingsFile(process.cwd(), getNoParentFlag()));
  if (path === undefined || path === null) {
    CLI_LOGGER.debug("No pkgprobe settings file found; using defaults");
    return null;
  }

  const settings = await loadAndValidateSettings(path);
  CLI_LOGGER.debug(`Settings loaded from: ${path}`);

  // A level in the settings file beats the environment but not --log-level
  if (settings.logLevel && !isLogLevelFromFlag()) {
    setCliLogLevel(settings.logLevel);
  }
  return { settings, path };
}

/**
 * Like withErrorHandling, with the loaded settings passed first
 */
export function withSettingsAndErrorHandling<Args extends unknown[]>(
  action: (loaded: LoadedSettings | null, ...args: Args) => Promise<void> | void
): (...args: Args) => Promise<void> {
  return withErrorHandling(async (...args: Args) => {
    const loaded = await loadCliSettings();
    await action(loaded, ...args);
  });
}
