// pattern: Imperative Shell

import { resolve } from "node:path";

// Settings file named with --config
let CONFIG_PATH: string | undefined;

// Global no-parent flag
let NO_PARENT_FLAG = false;

// Whether the log level came from --log-level rather than its default
let LOG_LEVEL_FROM_FLAG = false;

/**
 * Set the settings file override
 */
export function setConfigPath(path: string | undefined): void {
  CONFIG_PATH = path ? resolve(path) : undefined;
}

/**
 * Settings file given with --config, if any
 */
export function getConfigPath(): string | undefined {
  return CONFIG_PATH;
}

/**
 * Set the no-parent flag
 * This affects whether settings file search climbs parent directories
 */
export function setNoParentFlag(noParent: boolean): void {
  NO_PARENT_FLAG = noParent;
}

export function getNoParentFlag(): boolean {
  return NO_PARENT_FLAG;
}

export function setLogLevelFromFlag(fromFlag: boolean): void {
  LOG_LEVEL_FROM_FLAG = fromFlag;
}

export function isLogLevelFromFlag(): boolean {
  return LOG_LEVEL_FROM_FLAG;
}
