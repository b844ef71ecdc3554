// pattern: Functional Core
import { describe, expect, it } from "vitest";

import {
  commandOutput,
  renderBlock,
  renderReport,
  renderSection,
  toolPresence,
} from "./formatter.js";

describe("renderBlock", () => {
  it("should pad subheadings with blank lines", () => {
    expect(renderBlock({ kind: "subheading", title: "Runtime logs" })).toEqual(
      ["", "## Runtime logs", ""]
    );
  });

  it("should fence quoted text", () => {
    expect(renderBlock({ kind: "quoted", text: "a\nb" })).toEqual([
      "```",
      "a\nb",
      "```",
    ]);
  });

  it("should label command output with its command line", () => {
    expect(
      renderBlock({
        kind: "command",
        commandLine: "docker info",
        output: "Runtimes: runc",
      })
    ).toEqual(['Output of "`docker info`":', "```", "Runtimes: runc", "```"]);
  });
});

describe("commandOutput", () => {
  it("should quote arguments containing whitespace", () => {
    expect(
      commandOutput({
        command: "/usr/bin/cc-runtime",
        args: ["--log", "a b"],
        exitCode: 0,
        failed: false,
        timedOut: false,
        stdout: "ok",
        output: "ok",
        failureMessage: "",
      })
    ).toEqual({
      kind: "command",
      commandLine: '/usr/bin/cc-runtime --log "a b"',
      output: "ok",
    });
  });
});

describe("toolPresence", () => {
  it("should say whether the tool was found", () => {
    expect(toolPresence("docker", true)).toEqual({
      kind: "text",
      text: "Have `docker`",
    });
    expect(toolPresence("docker", false)).toEqual({
      kind: "text",
      text: "No `docker`",
    });
  });
});

describe("renderReport", () => {
  it("should close every section with a rule", () => {
    const section = {
      id: "meta" as const,
      title: "Meta details",
      blocks: [{ kind: "text" as const, text: "hello" }],
    };

    expect(renderSection(section)).toEqual([
      "# Meta details",
      "",
      "hello",
      "",
      "---",
      "",
    ]);
    expect(renderReport({ sections: [section, section] })).toBe(
      "# Meta details\n\nhello\n\n---\n\n# Meta details\n\nhello\n\n---\n"
    );
  });
});
