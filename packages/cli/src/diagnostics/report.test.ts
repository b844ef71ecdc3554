// pattern: Functional Core
import { describe, expect, it } from "vitest";

import {
  createTestDeps,
  FakeProcessRunner,
} from "../test-utils/fake-runner.js";

import {
  buildReport,
  collectMetaSection,
  REPORT_SECTION_ORDER,
  type SectionProducer,
} from "./report.js";

import type { ReportContext, ReportSectionId } from "./types.js";

const context: ReportContext = {
  runtime: { path: "/usr/bin/cc-runtime" },
  problemLimit: 50,
  generatedAt: new Date("2026-10-18T10:00:00.000Z"),
};

function recordingProducers(started: string[]) {
  const producer =
    (id: ReportSectionId, delayMs: number): SectionProducer =>
    async () => {
      started.push(`start:${id}`);
      await new Promise(resolve => setTimeout(resolve, delayMs));
      started.push(`end:${id}`);
      return { id, title: id, blocks: [] };
    };

  return {
    meta: producer("meta", 5),
    runtime: producer("runtime", 0),
    "runtime-configs": producer("runtime-configs", 3),
    logs: producer("logs", 0),
    "container-managers": producer("container-managers", 1),
    packages: producer("packages", 0),
  };
}

describe("collectMetaSection", () => {
  it("should name the collector, its version and the timestamp", async () => {
    const section = await collectMetaSection(context);

    expect(section).toEqual({
      id: "meta",
      title: "Meta details",
      blocks: [
        {
          kind: "text",
          text: "Running `cc-collect-data` version `0.1.0` at `2026-10-18T10:00:00.000Z`.",
        },
      ],
    });
  });
});

describe("buildReport", () => {
  it("should list sections in the fixed order", () => {
    expect(REPORT_SECTION_ORDER).toEqual([
      "meta",
      "runtime",
      "runtime-configs",
      "logs",
      "container-managers",
      "packages",
    ]);
  });

  it("should run producers one at a time in section order", async () => {
    const events: string[] = [];
    const deps = createTestDeps(new FakeProcessRunner());

    const report = await buildReport(
      context,
      deps,
      recordingProducers(events)
    );

    expect(report.sections.map(section => section.id)).toEqual([
      ...REPORT_SECTION_ORDER,
    ]);
    expect(events).toEqual(
      REPORT_SECTION_ORDER.flatMap(id => [`start:${id}`, `end:${id}`])
    );
  });

  it("should stop at the first fatal producer error", async () => {
    const events: string[] = [];
    const producers = {
      ...recordingProducers(events),
      "runtime-configs": async () => {
        throw new Error("runtime is probably too old");
      },
    };

    await expect(
      buildReport(context, createTestDeps(new FakeProcessRunner()), producers)
    ).rejects.toThrow("runtime is probably too old");
    expect(events).toEqual([
      "start:meta",
      "end:meta",
      "start:runtime",
      "end:runtime",
    ]);
  });
});
