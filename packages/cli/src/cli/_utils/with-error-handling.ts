// pattern: Imperative Shell

import { CLI_LOGGER } from "../_deps.js";

import { analyzeError } from "./error-analysis.js";

/**
 * Higher-order function that wraps Commander.js actions with consistent error handling
 *
 * Errors that reach this point are fatal for the run: the analyzed message
 * and suggestions go to the log stream (stderr) and the exit code is set to 1.
 * Nothing is written to stdout.
 *
 * @param action The action function to wrap with error handling
 * @param setExitCode Receives the exit code; defaults to process.exitCode
 */
export function withErrorHandling<T extends unknown[]>(
  action: (...args: T) => Promise<void> | void,
  setExitCode: (code: number) => void = code => {
    process.exitCode = code;
  }
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      const analyzed = analyzeError(error);

      CLI_LOGGER.error(analyzed.userMessage);

      analyzed.suggestions.forEach(suggestion => {
        CLI_LOGGER.error(`  • ${suggestion}`);
      });

      // Technical details, with the serialized error and its stack, in debug mode
      CLI_LOGGER.debug({ err: error }, analyzed.technicalMessage);

      CLI_LOGGER.flush();
      setExitCode(1);
    }
  };
}
