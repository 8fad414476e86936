// pattern: Functional Core
// Barrel file for logger exports

export { createLogger, mapLogLevelToPinoLevel } from "./config.js";
export { CLI_LOGGER, getLogger, initializeLogger, setCliLogLevel } from "./instance.js";
export { default as createRenderer, formatLogLine } from "./renderer.js";
export * from "./types.js";
