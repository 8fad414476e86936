// pattern: Functional Core
// Named diagnoses and resolution of caller-supplied diagnosis sets

import { UnknownDiagnosisError } from "../utils/errors.js";

import { folderDiagnosis } from "./folder-diagnosis.js";
import { importDiagnosis } from "./import-diagnosis.js";
import { allJsonInfoDiagnosis, jsonInfoDiagnosis } from "./json-info.js";
import { testDiagnosis } from "./test-diagnosis.js";

import type {
  DiagnosesInput,
  DiagnosisFn,
  DiagnosisPair,
  DiagnosisRegistry,
} from "./types.js";

/**
 * Diagnoses run when the caller names none, in run order
 */
export const DEFAULT_DIAGNOSES: readonly DiagnosisPair[] = Object.freeze([
  ["json_info", jsonInfoDiagnosis],
  ["pkg_diagnosis_result", importDiagnosis],
  ["pkg_folder_diagnosis_result", folderDiagnosis],
  ["test_diagnosis_result", testDiagnosis],
] as const);

/**
 * Build a registry from the defaults plus `extra` (which may override them)
 */
export function createDiagnosisRegistry(
  extra: Iterable<DiagnosisPair> = []
): DiagnosisRegistry {
  return new Map<string, DiagnosisFn>([
    ...DEFAULT_DIAGNOSES,
    ["all_json_info", allJsonInfoDiagnosis],
    ...extra,
  ]);
}

/**
 * Every diagnosis that can be named on the command line
 */
export const DIAGNOSIS_REGISTRY: DiagnosisRegistry = createDiagnosisRegistry();

function isIterable(value: object): value is Iterable<string | DiagnosisPair> {
  return Symbol.iterator in value;
}

/**
 * Turn any accepted diagnosis description into an ordered name → function map.
 * Bare names must be in `registry`; the first unknown one throws
 * UnknownDiagnosisError. Later duplicates replace earlier entries.
 */
export function resolveDiagnoses(
  input: DiagnosesInput,
  registry: DiagnosisRegistry = DIAGNOSIS_REGISTRY
): Map<string, DiagnosisFn> {
  if (typeof input === "string") {
    return resolveDiagnoses([input], registry);
  }
  if (input instanceof Map) {
    return new Map(input);
  }
  if (!isIterable(input)) {
    return new Map(Object.entries(input));
  }

  const resolved = new Map<string, DiagnosisFn>();
  for (const item of input) {
    if (typeof item === "string") {
      const diagnosis = registry.get(item);
      if (!diagnosis) {
        throw new UnknownDiagnosisError(item);
      }
      resolved.set(item, diagnosis);
    } else {
      const [name, diagnosis] = item;
      resolved.set(name, diagnosis);
    }
  }
  return resolved;
}
