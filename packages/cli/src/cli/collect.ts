// pattern: Imperative Shell
// Default action: collect the diagnostic report and print it to stdout

import {
  buildReport,
  renderReport,
  resolveRuntime,
} from "../diagnostics/index.js";
import {
  createProcessRunner,
  type ProcessRunner,
} from "../utils/command/index.js";
import { PrivilegeError } from "../utils/errors.js";

import { CLI_LOGGER } from "./_deps.js";

import type { CollectSettings } from "../config/env.js";
import type { OutputSink } from "../logger/index.js";

export interface CollectDeps {
  stdout: OutputSink;
  isPrivileged: () => boolean;
  now: () => Date;
  // Defaults to running real commands
  runner?: ProcessRunner;
}

export async function collectCli(
  deps: CollectDeps,
  settings: CollectSettings
): Promise<void> {
  // Fatal preconditions are checked before anything is probed
  if (!deps.isPrivileged()) {
    throw new PrivilegeError();
  }

  const runner = deps.runner ?? createProcessRunner(CLI_LOGGER);
  const runtime = await resolveRuntime(runner);

  CLI_LOGGER.info(`Collecting diagnostic data for ${runtime.path}...`);

  const report = await buildReport(
    {
      runtime,
      problemLimit: settings.problemLimit,
      generatedAt: deps.now(),
    },
    { runner, logger: CLI_LOGGER }
  );

  // The report is only written once every section has been collected
  deps.stdout.write(`${renderReport(report)}\n`);

  CLI_LOGGER.info("Diagnostic report generated");
}
