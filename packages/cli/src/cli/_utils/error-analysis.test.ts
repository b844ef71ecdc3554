// pattern: Functional Core

import { describe, expect, it } from "vitest";

import {
  PrivilegeError,
  RuntimeNotFoundError,
  RuntimeQueryError,
} from "../../utils/errors.js";

import { analyzeError } from "./error-analysis.js";

describe("analyzeError", () => {
  describe("collector errors", () => {
    it("should categorize a missing root privilege", () => {
      const result = analyzeError(new PrivilegeError());

      expect(result).toEqual({
        category: "privilege",
        userMessage: "Need to run as root",
        technicalMessage: "Need to run as root",
        suggestions: ["Re-run the command as root, for example with sudo"],
      });
    });

    it("should categorize a runtime missing from PATH", () => {
      const result = analyzeError(new RuntimeNotFoundError("cc-runtime"));

      expect(result.category).toBe("runtime");
      expect(result.userMessage).toBe("cannot find runtime 'cc-runtime'");
      expect(result.suggestions).toEqual([
        "Check that cc-runtime is installed",
        "Ensure the directory containing cc-runtime is on PATH",
      ]);
    });

    it("should include the runtime version in technical details", () => {
      const result = analyzeError(
        new RuntimeQueryError(
          "failed to check config files - runtime is probably too old (cc-runtime 2.0.0)",
          "cc-runtime 2.0.0"
        )
      );

      expect(result.category).toBe("runtime");
      expect(result.technicalMessage).toBe(
        "failed to check config files - runtime is probably too old (cc-runtime 2.0.0) [runtime version: cc-runtime 2.0.0]"
      );
      expect(result.suggestions).toEqual([
        "Upgrade cc-runtime to a release that supports --cc-show-default-config-paths",
      ]);
    });

    it("should fall back to unknown when no version was reported", () => {
      const result = analyzeError(new RuntimeQueryError("query failed", ""));

      expect(result.technicalMessage).toBe(
        "query failed [runtime version: unknown]"
      );
    });
  });

  describe("unknown errors", () => {
    it("should wrap generic errors", () => {
      const result = analyzeError(new Error("socket hang up"));

      expect(result.category).toBe("unknown");
      expect(result.userMessage).toBe("Unexpected error: socket hang up");
      expect(result.suggestions).toEqual([
        "Run again with CC_COLLECT_LOG_LEVEL=debug for more detail",
      ]);
    });

    it("should handle non-Error values", () => {
      const result = analyzeError("something broke");

      expect(result.technicalMessage).toBe("something broke");
      expect(result.userMessage).toBe("Unexpected error: something broke");
    });
  });
});
