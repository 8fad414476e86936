// pattern: Functional Core
// Types shared by diagnoses, the registry and the orchestrator

import type { EnvironmentHandle } from "../environment/index.js";
import type { DistributionInfo } from "../installer/types.js";
import type { CommandResult } from "../utils/command/index.js";
import type { JsonObject, JsonValue } from "../utils/json.js";
import type { Logger } from "pino";

/**
 * Whatever a diagnosis reports. `null` means the probe could not run.
 */
export type DiagnosisResult = JsonValue;

/**
 * Capabilities a diagnosis may use. Diagnoses get these handed in rather
 * than reaching for the interpreter or the network themselves.
 */
export interface DiagnosisContext {
  /** Environment the package was installed into, if any */
  environment: EnvironmentHandle | null;
  logger: Logger;
  /** Run the environment's interpreter (or the active one without an environment) */
  python: (args: string[]) => Promise<CommandResult>;
  /** Find where a distribution is installed */
  locateDistribution: (packageName: string) => Promise<DistributionInfo | null>;
  /** Package metadata from the index; `{}` when the index has none */
  fetchPackageInfo: (packageName: string) => Promise<JsonObject>;
}

export type DiagnosisFn = (
  packageName: string,
  context: DiagnosisContext
) => DiagnosisResult | Promise<DiagnosisResult>;

export type DiagnosisPair = readonly [name: string, diagnosis: DiagnosisFn];

/**
 * Ways a caller may name the diagnoses to run:
 * a mapping (used as-is), one registered name, or a sequence of
 * registered names and explicit pairs.
 */
export type DiagnosesInput =
  | ReadonlyMap<string, DiagnosisFn>
  | Readonly<Record<string, DiagnosisFn>>
  | string
  | Iterable<string | DiagnosisPair>;

export type DiagnosisRegistry = ReadonlyMap<string, DiagnosisFn>;

/**
 * Reported when one diagnosis throws; the batch carries on
 */
export interface DiagnosisFailure {
  packageName: string;
  diagnosisName: string;
  error: unknown;
}

export type DiagnosisErrorReporter = (failure: DiagnosisFailure) => void;
