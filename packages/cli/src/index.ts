// pattern: Functional Core
// Library entry point

export * from "./environment/index.js";
export {
  createEnvironment,
  detectEnvironmentManager,
  type CreateEnvironmentOptions,
  type EnvironmentManager,
} from "./environment/create.js";
export {
  createPyenvEnvironment,
  locateOnPath,
  pyenvAvailable,
  pyenvEnvironmentPath,
  type BinaryLocator,
  type PyenvOptions,
} from "./environment/pyenv.js";

export { PackageInstaller, type PackageInstallerOptions } from "./installer/package-installer.js";
export { packageFolderName, parsePipShow, toDistributionInfo } from "./installer/distribution.js";
export type { DistributionInfo, OperationOutcome } from "./installer/types.js";

export * from "./diagnoses/types.js";
export {
  DEFAULT_DIAGNOSES,
  DIAGNOSIS_REGISTRY,
  createDiagnosisRegistry,
  resolveDiagnoses,
} from "./diagnoses/registry.js";
export { importDiagnosis } from "./diagnoses/import-diagnosis.js";
export { folderDiagnosis, folderStats, type FolderStats } from "./diagnoses/folder-diagnosis.js";
export { summarizePytestOutput, testDiagnosis } from "./diagnoses/test-diagnosis.js";
export {
  allJsonInfoDiagnosis,
  extractJsonInfo,
  jsonInfoDiagnosis,
} from "./diagnoses/json-info.js";

export {
  createDiagnosisContext,
  diagnosePkg,
  diagnosePkgs,
  generateDiagnoses,
  resolvePackages,
  type DiagnoseManyOptions,
  type DiagnoseOptions,
  type DiagnosisContextOptions,
} from "./orchestrator/diagnose.js";
export {
  LeasePhase,
  withInstallation,
  type InstallationLease,
  type InstallationManager,
  type LeaseOptions,
} from "./orchestrator/installation-lease.js";

export * from "./stores/result-store.js";

export * from "./pypi/client.js";
export * from "./pypi/releases.js";
export * from "./pypi/simple-index.js";

export {
  findSettingsFile,
  loadAndValidateSettings,
  loadSettingsFromFile,
  validateSettingsObject,
} from "./config/loaders/settings-loader.js";
export { resolveOptions, type CliOverrides, type ResolvedOptions } from "./config/resolve.js";
export type { Settings } from "./config/types/index.js";

export { createLogger, getLogger, type LogFormat, type LogLevel } from "./logger/index.js";
export * from "./utils/errors.js";
export type { JsonObject, JsonValue } from "./utils/json.js";
export {
  createCommandRunner,
  type CommandResult,
  type CommandRunner,
} from "./utils/command/index.js";
