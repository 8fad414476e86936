// pattern: Imperative Shell

import { join } from "node:path";

import { packageFolderName } from "../installer/distribution.js";
import { ProcessError } from "../utils/errors.js";

import { moduleName, runPythonProbe } from "./python-probe.js";

import type { DiagnosisContext, DiagnosisFn } from "./types.js";
import type { JsonObject, JsonValue } from "../utils/json.js";

const DOCTEST_PROBE = [
  "import doctest, importlib, json, sys",
  "module = importlib.import_module(sys.argv[1])",
  "results = doctest.testmod(module)",
  "print(json.dumps({'attempts': results.attempted, 'failures': results.failed}))",
].join("\n");

const UNITTEST_PROBE = [
  "import json, sys, unittest",
  "suite = unittest.TestLoader().discover(sys.argv[1], pattern='test_*.py')",
  "result = unittest.TextTestRunner(stream=sys.stderr, verbosity=2).run(suite)",
  "print(json.dumps({",
  "    'total_tests_found': result.testsRun,",
  "    'total_failures': len(result.failures),",
  "    'total_errors': len(result.errors),",
  "}))",
].join("\n");

function countOccurrences(text: string, marker: string): number {
  return text.split(marker).length - 1;
}

/**
 * Summarise `pytest -v` output by counting PASSED and FAILED markers
 */
export function summarizePytestOutput(stdout: string): JsonObject {
  const passed = countOccurrences(stdout, "PASSED");
  const failed = countOccurrences(stdout, "FAILED");
  return {
    total_tests_found: passed + failed,
    total_passed_tests: passed,
    total_failed_tests: failed,
  };
}

async function runPytest(
  context: DiagnosisContext,
  folder: string
): Promise<JsonObject> {
  const result = await context.python(["-m", "pytest", "-v", folder]);
  if (result.failure !== undefined) {
    throw new ProcessError(`pytest could not be started: ${result.failure}`, "pytest");
  }
  return summarizePytestOutput(result.stdout);
}

type SubProbe = readonly [name: string, run: () => Promise<JsonValue>];

/**
 * Run the package's doctests, unittest suites and pytest suites.
 * Each sub-probe that fails is left out of the result.
 */
export const testDiagnosis: DiagnosisFn = async (packageName, context) => {
  const distribution = await context.locateDistribution(packageName);
  if (!distribution) {
    return null;
  }
  const folder = join(distribution.location, packageFolderName(packageName));

  const probes: SubProbe[] = [
    ["doctest_results", () => runPythonProbe(context, DOCTEST_PROBE, [moduleName(packageName)])],
    ["unittest_results", () => runPythonProbe(context, UNITTEST_PROBE, [folder])],
    ["pytest_results", () => runPytest(context, folder)],
  ];

  const results: JsonObject = {};
  for (const [name, run] of probes) {
    try {
      results[name] = await run();
    } catch (error) {
      context.logger.debug(
        { package: packageName, probe: name, err: error },
        "Test sub-probe failed; leaving it out"
      );
    }
  }
  return results;
};
