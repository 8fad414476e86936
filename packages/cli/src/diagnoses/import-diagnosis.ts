// pattern: Functional Core

import { moduleName, runPythonProbe } from "./python-probe.js";

import type { DiagnosisFn } from "./types.js";

const IMPORT_PROBE = [
  "import importlib, json, sys",
  "try:",
  "    module = importlib.import_module(sys.argv[1])",
  "except ImportError:",
  "    print('null')",
  "else:",
  "    names = [name for name in dir(module) if not name.startswith('__')]",
  "    print(json.dumps({'non_dunder_attributes_count': len(names)}))",
].join("\n");

/**
 * Import the package in the environment and count its public attributes.
 * A package that cannot be imported reports null.
 */
export const importDiagnosis: DiagnosisFn = (packageName, context) =>
  runPythonProbe(context, IMPORT_PROBE, [moduleName(packageName)]);
