// pattern: Functional Core
// Types for diagnostic data structures

import type { CommandResult, ProcessRunner } from "../utils/command/index.js";
import type { Logger } from "pino";

// How a component's entries are picked out of the system journal
export type SelectorKind = "identifier" | "unit";

export interface ComponentSource {
  readonly name: string;
  readonly program: string;
  readonly selectorKind: SelectorKind;
}

export interface LogScanResult {
  source: ComponentSource;
  lines: string[];
  found: boolean;
  // Why the journal could not be read, when it could not
  note?: string;
}

export interface RuntimeHandle {
  // Resolved on PATH once, then reused by every section
  path: string;
}

export interface ConfigPathResolution {
  reported: string[];
  paths: string[];
}

export type ConfigFileEntry =
  | { path: string; status: "found"; contents: string }
  | { path: string; status: "missing" }
  | { path: string; status: "unreadable"; error: string };

export interface PackageListing {
  manager: string;
  result: CommandResult;
  // Installed lines matching one of the known package names
  matches: string[];
}

export interface ContainerManagerStatus {
  tool: string;
  title: string;
  available: boolean;
  probes: CommandResult[];
  nested: ContainerManagerStatus[];
}

export type ReportSectionId =
  | "meta"
  | "runtime"
  | "runtime-configs"
  | "logs"
  | "container-managers"
  | "packages";

export type ReportBlock =
  | { kind: "subheading"; title: string }
  | { kind: "text"; text: string }
  | { kind: "quoted"; text: string }
  | { kind: "command"; commandLine: string; output: string };

export interface ReportSection {
  id: ReportSectionId;
  title: string;
  blocks: ReportBlock[];
}

export interface Report {
  sections: ReportSection[];
}

export interface ReportContext {
  runtime: RuntimeHandle;
  problemLimit: number;
  generatedAt: Date;
}

export interface DiagnosticDeps {
  runner: ProcessRunner;
  logger: Logger;
}
