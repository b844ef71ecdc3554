// pattern: Functional Core
// Report assembly in a fixed, explicit section order

import { COLLECTOR_NAME, COLLECTOR_VERSION } from "../config/settings.js";

import { collectConfigSection } from "./config-resolver.js";
import { collectContainerManagerSection } from "./container-manager-probe.js";
import { text } from "./formatter.js";
import { collectLogSection } from "./log-scanner.js";
import { collectPackageSection } from "./package-probe.js";
import { collectRuntimeSection } from "./runtime.js";

import type {
  DiagnosticDeps,
  Report,
  ReportContext,
  ReportSection,
  ReportSectionId,
} from "./types.js";

export const REPORT_SECTION_ORDER = [
  "meta",
  "runtime",
  "runtime-configs",
  "logs",
  "container-managers",
  "packages",
] as const satisfies readonly ReportSectionId[];

export type SectionProducer = (
  context: ReportContext,
  deps: DiagnosticDeps
) => Promise<ReportSection>;

export async function collectMetaSection(
  context: ReportContext
): Promise<ReportSection> {
  const timestamp = context.generatedAt.toISOString();
  return {
    id: "meta",
    title: "Meta details",
    blocks: [
      text(
        `Running \`${COLLECTOR_NAME}\` version \`${COLLECTOR_VERSION}\` at \`${timestamp}\`.`
      ),
    ],
  };
}

export const SECTION_PRODUCERS: Readonly<
  Record<ReportSectionId, SectionProducer>
> = Object.freeze({
  meta: collectMetaSection,
  runtime: collectRuntimeSection,
  "runtime-configs": collectConfigSection,
  logs: collectLogSection,
  "container-managers": collectContainerManagerSection,
  packages: collectPackageSection,
});

/**
 * Collect every section, one after another, in REPORT_SECTION_ORDER.
 * Sections never run concurrently so the output order is stable between runs.
 * A fatal error from any producer aborts the whole report.
 */
export async function buildReport(
  context: ReportContext,
  deps: DiagnosticDeps,
  producers: Readonly<Record<ReportSectionId, SectionProducer>> = SECTION_PRODUCERS
): Promise<Report> {
  const sections: ReportSection[] = [];

  for (const id of REPORT_SECTION_ORDER) {
    deps.logger.debug({ section: id }, "Collecting report section");
    sections.push(await producers[id](context, deps));
  }

  return { sections };
}
