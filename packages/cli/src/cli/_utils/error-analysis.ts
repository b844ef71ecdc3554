// pattern: Functional Core

import { RUNTIME_NAME, SHOW_CONFIG_PATHS_FLAG } from "../../config/settings.js";
import {
  CollectDataError,
  PrivilegeError,
  RuntimeNotFoundError,
  RuntimeQueryError,
} from "../../utils/errors.js";

/**
 * Represents a categorized error with user-friendly messaging
 */
export interface AnalyzedError {
  category: "privilege" | "runtime" | "unknown";
  userMessage: string;
  technicalMessage: string;
  suggestions: string[];
}

/**
 * Analyzes a fatal error and provides a message plus suggestions for the user.
 *
 * @param error The error to analyze (can be Error, string, or unknown)
 */
export function analyzeError(error: unknown): AnalyzedError {
  if (error instanceof CollectDataError) {
    const errorMessage = error.message;

    if (error instanceof PrivilegeError) {
      return {
        category: "privilege",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions: ["Re-run the command as root, for example with sudo"],
      };
    }

    if (error instanceof RuntimeNotFoundError) {
      return {
        category: "runtime",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions: [
          `Check that ${error.runtimeName} is installed`,
          `Ensure the directory containing ${error.runtimeName} is on PATH`,
        ],
      };
    }

    if (error instanceof RuntimeQueryError) {
      return {
        category: "runtime",
        userMessage: errorMessage,
        technicalMessage: `${errorMessage} [runtime version: ${error.runtimeVersion || "unknown"}]`,
        suggestions: [
          `Upgrade ${RUNTIME_NAME} to a release that supports ${SHOW_CONFIG_PATHS_FLAG}`,
        ],
      };
    }
  }

  const technicalMessage =
    error instanceof Error ? error.message : String(error);

  return {
    category: "unknown",
    userMessage: `Unexpected error: ${technicalMessage}`,
    technicalMessage,
    suggestions: [
      "Run again with CC_COLLECT_LOG_LEVEL=debug for more detail",
    ],
  };
}
