// pattern: Imperative Shell
// In-process stand-in for the ProcessRunner used by diagnostics tests

import pino from "pino";

import {
  type CommandResult,
  formatCommandLine,
  type ProcessRunner,
} from "../utils/command/index.js";

import type { DiagnosticDeps } from "../diagnostics/types.js";

export interface FakeCommand {
  // Combined output for run(), stderr for streamLines(); defaults to stdout
  output?: string;
  stdout?: string;
  exitCode?: number;
}

export interface FakeRunnerConfig {
  // Command name -> resolved path, for everything "installed"
  installed?: Record<string, string>;
  // Full command line (see formatCommandLine) -> canned result
  commands?: Record<string, FakeCommand>;
}

export class FakeProcessRunner implements ProcessRunner {
  readonly lookups: string[] = [];
  readonly calls: string[] = [];
  private readonly installed: Record<string, string>;
  private readonly commands: Record<string, FakeCommand>;

  constructor(config: FakeRunnerConfig = {}) {
    this.installed = config.installed ?? {};
    this.commands = config.commands ?? {};
  }

  async which(command: string): Promise<string | undefined> {
    this.lookups.push(command);
    return this.installed[command];
  }

  async run(command: string, args: readonly string[]): Promise<CommandResult> {
    return this.settle(command, args, false);
  }

  async streamLines(
    command: string,
    args: readonly string[],
    onLine: (line: string) => void
  ): Promise<CommandResult> {
    const result = this.settle(command, args, true);
    // Lines are delivered even when the command goes on to fail
    if (result.stdout.length > 0) {
      result.stdout.split("\n").forEach(line => {
        onLine(line);
      });
    }
    return { ...result, stdout: "" };
  }

  private settle(
    command: string,
    args: readonly string[],
    streaming: boolean
  ): CommandResult {
    const commandLine = formatCommandLine(command, args);
    this.calls.push(commandLine);

    const canned = this.commands[commandLine];
    if (!canned) {
      const failureMessage = `Command failed with ENOENT: ${commandLine}`;
      return {
        command,
        args: [...args],
        exitCode: undefined,
        failed: true,
        timedOut: false,
        failureMessage,
        stdout: "",
        output: failureMessage,
      };
    }

    const exitCode = canned.exitCode ?? 0;
    const failed = exitCode !== 0;
    const stdout = canned.stdout ?? "";
    const failureMessage = failed
      ? `Command failed with exit code ${exitCode}: ${commandLine}`
      : "";
    return {
      command,
      args: [...args],
      exitCode,
      failed,
      timedOut: false,
      failureMessage,
      stdout,
      // A streamed stdout never ends up in the output
      output: canned.output ?? (streaming ? failureMessage : stdout),
    };
  }
}

export function createTestDeps(runner: FakeProcessRunner): DiagnosticDeps {
  return { runner, logger: pino({ level: "silent" }) };
}
