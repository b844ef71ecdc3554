// pattern: Functional Core
// Per-component problem scan over the system journal

import { COMPONENT_SOURCES } from "../config/settings.js";
import { type CommandResult } from "../utils/command/index.js";

import { quoted, subheading, text } from "./formatter.js";
import { PROBLEM_MATCHER, type ProblemMatcher } from "./problem-pattern.js";

import type {
  ComponentSource,
  DiagnosticDeps,
  LogScanResult,
  ReportBlock,
  ReportContext,
  ReportSection,
  SelectorKind,
} from "./types.js";

export const JOURNAL_COMMAND = "journalctl";
export const JOURNAL_DATA_SOURCE = "system journal";

// Structured runtime entries carry a logfmt timestamp; anything else is
// continuation output (stack traces, blank separators)
const TIMESTAMP_MARKER = "time=";

const SELECTOR_FLAGS: Record<SelectorKind, string> = {
  identifier: "-t",
  unit: "-u",
};

/**
 * Journal query for one component: every entry, oldest first, message text only.
 */
export function buildLogQueryArgs(source: ComponentSource): string[] {
  return [
    "-q",
    "-o",
    "cat",
    "-a",
    SELECTOR_FLAGS[source.selectorKind],
    source.program,
  ];
}

/**
 * Keeps the most recent `limit` timestamped lines the matcher flags, in the
 * order they were added. Memory stays bounded by `limit` however many lines
 * are fed in.
 */
export class ProblemLineCollector {
  private readonly limit: number;
  private readonly matcher: ProblemMatcher;
  private readonly recent: string[] = [];

  constructor(limit: number, matcher: ProblemMatcher = PROBLEM_MATCHER) {
    this.limit = limit;
    this.matcher = matcher;
  }

  add(line: string): void {
    if (this.limit <= 0 || !line.includes(TIMESTAMP_MARKER)) {
      return;
    }
    if (!this.matcher.matches(line)) {
      return;
    }

    this.recent.push(line);
    if (this.recent.length > this.limit) {
      this.recent.shift();
    }
  }

  lines(): string[] {
    return [...this.recent];
  }
}

export function selectProblemLines(
  output: string,
  limit: number,
  matcher: ProblemMatcher = PROBLEM_MATCHER
): string[] {
  const collector = new ProblemLineCollector(limit, matcher);
  output.split("\n").forEach(line => {
    collector.add(line);
  });
  return collector.lines();
}

function describeFailure(result: CommandResult): string {
  const reason = result.failureMessage.split("\n")[0]?.trim() || "no output";
  const detail = result.output.split("\n")[0]?.trim();
  return detail && detail !== reason ? `${reason} (${detail})` : reason;
}

export async function scanComponentLog(
  source: ComponentSource,
  limit: number,
  deps: DiagnosticDeps
): Promise<LogScanResult> {
  const logger = deps.logger.child({ component: source.name });

  if (!(await deps.runner.which(JOURNAL_COMMAND))) {
    logger.debug("Journal not available, skipping log scan");
    return {
      source,
      lines: [],
      found: false,
      note: `\`${JOURNAL_COMMAND}\` not available`,
    };
  }

  // The full history can be far larger than memory allows; filter as it streams
  const collector = new ProblemLineCollector(limit);
  const result = await deps.runner.streamLines(
    JOURNAL_COMMAND,
    buildLogQueryArgs(source),
    line => {
      collector.add(line);
    }
  );

  if (result.failed) {
    logger.warn({ exitCode: result.exitCode }, "Journal query failed");
    return {
      source,
      lines: [],
      found: false,
      note: `could not read the ${JOURNAL_DATA_SOURCE}: ${describeFailure(result)}`,
    };
  }

  const lines = collector.lines();
  logger.debug({ problems: lines.length }, "Journal scan complete");

  return { source, lines, found: lines.length > 0 };
}

export function renderLogScan(scan: LogScanResult): ReportBlock[] {
  const { name } = scan.source;

  if (scan.found) {
    return [
      text(`Recent ${name} problems found in ${JOURNAL_DATA_SOURCE}:`),
      quoted(scan.lines.join("\n")),
    ];
  }

  const blocks = [
    text(`No recent ${name} problems found in ${JOURNAL_DATA_SOURCE}.`),
  ];
  if (scan.note) {
    blocks.push(text(`Note: ${scan.note}.`));
  }
  return blocks;
}

function componentTitle(source: ComponentSource): string {
  return `${source.name.charAt(0).toUpperCase()}${source.name.slice(1)} logs`;
}

export async function collectLogSection(
  context: ReportContext,
  deps: DiagnosticDeps,
  sources: readonly ComponentSource[] = COMPONENT_SOURCES
): Promise<ReportSection> {
  const blocks: ReportBlock[] = [];

  // One component at a time so the section reads in a fixed order
  for (const source of sources) {
    const scan = await scanComponentLog(source, context.problemLimit, deps);
    blocks.push(subheading(componentTitle(source)), ...renderLogScan(scan));
  }

  return { id: "logs", title: "Logfiles", blocks };
}
