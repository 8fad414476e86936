// pattern: Imperative Shell

import { CLI_LOGGER } from "../_deps.js";

import { analyzeError } from "./error-analysis.js";

/**
 * Wraps a Commander action: any error is analysed, logged with its
 * suggestions, and the process exits with code 1.
 */
export function withErrorHandling<T extends unknown[]>(
  action: (...args: T) => Promise<void> | void
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      const analyzed = analyzeError(error);

      CLI_LOGGER.error(analyzed.userMessage);
      for (const suggestion of analyzed.suggestions) {
        CLI_LOGGER.error(`  • ${suggestion}`);
      }

      if (CLI_LOGGER.isLevelEnabled("debug")) {
        CLI_LOGGER.debug(
          { err: error, category: analyzed.category },
          analyzed.technicalMessage
        );
      }

      // Ensure logs are flushed before exit
      CLI_LOGGER.flush();
      process.exitCode = 1;
      setTimeout(() => {
        process.exit(1);
      }, 100);
    }
  };
}
