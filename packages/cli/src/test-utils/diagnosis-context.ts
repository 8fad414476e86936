// pattern: Functional Core
// Building DiagnosisContext objects for tests

import { testLogger } from "./command-runner.js";

import type { DiagnosisContext } from "../diagnoses/types.js";
import type { CommandResult } from "../utils/command/index.js";

/**
 * A context whose capabilities all report "nothing there" unless overridden
 */
export function createTestContext(
  overrides: Partial<DiagnosisContext> = {}
): DiagnosisContext {
  return {
    environment: "/venvs/test",
    logger: testLogger,
    python: (): Promise<CommandResult> =>
      Promise.resolve({ exitCode: 0, stdout: "", stderr: "" }),
    locateDistribution: () => Promise.resolve(null),
    fetchPackageInfo: () => Promise.resolve({}),
    ...overrides,
  };
}
