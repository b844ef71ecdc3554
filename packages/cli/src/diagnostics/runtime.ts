// pattern: Functional Core
// Runtime binary resolution and its environment summary

import { ENV_SUBCOMMAND, RUNTIME_NAME } from "../config/settings.js";
import { type ProcessRunner } from "../utils/command/index.js";
import { RuntimeNotFoundError } from "../utils/errors.js";

import { commandOutput, text } from "./formatter.js";

import type {
  DiagnosticDeps,
  ReportContext,
  ReportSection,
  RuntimeHandle,
} from "./types.js";

/**
 * Locate the runtime once; every later section reuses this handle.
 */
export async function resolveRuntime(
  runner: ProcessRunner,
  name: string = RUNTIME_NAME
): Promise<RuntimeHandle> {
  const path = await runner.which(name);
  if (!path) {
    throw new RuntimeNotFoundError(name);
  }
  return { path };
}

export async function collectRuntimeSection(
  context: ReportContext,
  deps: DiagnosticDeps
): Promise<ReportSection> {
  const result = await deps.runner.run(context.runtime.path, [ENV_SUBCOMMAND]);

  return {
    id: "runtime",
    title: `\`${ENV_SUBCOMMAND}\``,
    blocks: [text(`Runtime is \`${context.runtime.path}\`.`), commandOutput(result)],
  };
}
