// pattern: Imperative Shell
// Shared CLI dependencies, importable by every command

export {
  CLI_LOGGER,
  initializeLogger,
  setCliLogLevel,
} from "../logger/index.js";
