// pattern: Functional Core
// Running short Python snippets and reading their JSON answer

import { ProcessError } from "../utils/errors.js";

import type { DiagnosisContext } from "./types.js";
import type { JsonValue } from "../utils/json.js";

/**
 * Parse the last non-empty stdout line as JSON. Probes print their answer
 * last so anything the imported package prints comes before it.
 */
export function parseLastJsonLine(stdout: string): JsonValue {
  const lines = stdout.split(/\r?\n/).filter(line => line.trim() !== "");
  const last = lines.at(-1);
  if (last === undefined) {
    throw new ProcessError("Python probe printed nothing", "python");
  }
  // JSON.parse is typed as any; the probes only ever print JSON
  const parsed: JsonValue = JSON.parse(last);
  return parsed;
}

/**
 * Run `python -c <script> ...args` and return the JSON it printed last
 */
export async function runPythonProbe(
  context: DiagnosisContext,
  script: string,
  args: string[]
): Promise<JsonValue> {
  const result = await context.python(["-c", script, ...args]);
  if (result.exitCode !== 0) {
    throw new ProcessError(
      `Python probe failed: ${result.failure ?? result.stderr.trim()}`,
      "python",
      result.exitCode ?? undefined
    );
  }
  return parseLastJsonLine(result.stdout);
}

/**
 * Importable module name for a distribution name
 */
export function moduleName(packageName: string): string {
  return packageName.replace(/-/g, "_");
}
