// pattern: Functional Core
import { describe, expect, it } from "vitest";

import { loadSettings } from "./env.js";

describe("loadSettings", () => {
  it("should use defaults when nothing is set", () => {
    expect(loadSettings({})).toEqual({
      settings: { problemLimit: 50, logLevel: "info" },
      warnings: [],
    });
  });

  it("should read PROBLEM_LIMIT and the log level", () => {
    expect(
      loadSettings({ PROBLEM_LIMIT: "10", CC_COLLECT_LOG_LEVEL: "debug" })
        .settings
    ).toEqual({ problemLimit: 10, logLevel: "debug" });
  });

  it("should accept a zero problem limit", () => {
    expect(loadSettings({ PROBLEM_LIMIT: "0" }).settings.problemLimit).toBe(0);
  });

  it("should treat an empty value as unset", () => {
    expect(loadSettings({ PROBLEM_LIMIT: "" })).toEqual({
      settings: { problemLimit: 50, logLevel: "info" },
      warnings: [],
    });
  });

  it("should warn about and ignore invalid values", () => {
    const { settings, warnings } = loadSettings({
      PROBLEM_LIMIT: "-5",
      CC_COLLECT_LOG_LEVEL: "loud",
    });

    expect(settings).toEqual({ problemLimit: 50, logLevel: "info" });
    expect(warnings).toHaveLength(2);
    expect(warnings[0]).toMatch(/^Ignoring PROBLEM_LIMIT="-5" \(.+\); using the default$/);
    expect(warnings[1]).toMatch(
      /^Ignoring CC_COLLECT_LOG_LEVEL="loud" \(.+\); using the default$/
    );
  });
});
