// pattern: Mixed (unavoidable)
// Command execution requires integration of pure logic with side effects
import { execa } from "execa";
import which from "which";

import { COMMAND_TIMEOUT_MS } from "../../config/settings.js";

import type { Logger } from "pino";

/**
 * Outcome of one external command. Never thrown: callers decide whether a
 * failure is fatal or just something to show in the report.
 */
export interface CommandResult {
  command: string;
  args: string[];
  exitCode: number | undefined;
  failed: boolean;
  timedOut: boolean;
  /** stdout alone, for commands whose output is parsed */
  stdout: string;
  /** stdout and stderr interleaved, or the spawn error when nothing ran */
  output: string;
  /** execa's one-line failure summary; empty when the command succeeded */
  failureMessage: string;
}

// Fields shared by every settled execa result
interface SettledRun {
  exitCode?: number | undefined;
  failed: boolean;
  timedOut: boolean;
  durationMs: number;
}

/**
 * The only way the collector touches other programs.
 */
export interface ProcessRunner {
  /** Resolve a command on PATH; undefined when it is not installed */
  which(command: string): Promise<string | undefined>;
  run(command: string, args: readonly string[]): Promise<CommandResult>;
  /** Like run(), but stdout is delivered line by line instead of buffered */
  streamLines(
    command: string,
    args: readonly string[],
    onLine: (line: string) => void
  ): Promise<CommandResult>;
}

/**
 * Render a command line for display. Arguments are never re-parsed by a shell.
 */
export function formatCommandLine(
  command: string,
  args: readonly string[] = []
): string {
  return [command, ...args]
    .map(part => (/\s/.test(part) ? `"${part}"` : part))
    .join(" ");
}

/**
 * Fluent builder around execa with per-process child logging.
 */
export class CommandBuilder {
  private command: string;
  private args: string[];
  private timeoutMs: number;
  private childLogger: Logger;

  constructor(command: string, logger: Logger) {
    this.command = command;
    this.args = [];
    this.timeoutMs = COMMAND_TIMEOUT_MS;

    // Extract process name (first part of command, without path or extension)
    const processName = command.split(/[/\\]/).pop()?.split(".")[0] ?? command;
    this.childLogger = logger.child({ process: processName });
  }

  /**
   * Add multiple command arguments
   */
  addArgs(args: readonly string[]): this {
    this.args.push(...args);
    return this;
  }

  /**
   * Kill the command after this many milliseconds (0 disables the limit)
   */
  timeout(ms: number): this {
    this.timeoutMs = ms;
    return this;
  }

  private logStart(mode: "buffered" | "lines"): void {
    this.childLogger.debug(
      {
        command: this.command,
        argCount: this.args.length,
        timeoutMs: this.timeoutMs,
        mode,
      },
      "Executing command"
    );
  }

  private settle(
    result: SettledRun,
    stdout: string,
    output: string
  ): CommandResult {
    const failureMessage =
      result.failed &&
      "shortMessage" in result &&
      typeof result.shortMessage === "string"
        ? result.shortMessage
        : "";

    if (result.failed) {
      this.childLogger.debug(
        {
          exitCode: result.exitCode,
          timedOut: result.timedOut,
          error: failureMessage,
        },
        "Command failed"
      );
    } else {
      this.childLogger.debug(
        { exitCode: result.exitCode, duration: result.durationMs },
        "Command completed successfully"
      );
    }

    return {
      command: this.command,
      args: [...this.args],
      exitCode: result.exitCode,
      failed: result.failed,
      timedOut: result.timedOut,
      failureMessage,
      stdout,
      output: output || failureMessage,
    };
  }

  /**
   * Execute the command, capturing stdout and stderr together.
   * Non-zero exits, timeouts and spawn failures are reported, not thrown.
   */
  async run(): Promise<CommandResult> {
    this.logStart("buffered");

    const result = await execa(this.command, this.args, {
      all: true,
      reject: false,
      stdin: "ignore",
      timeout: this.timeoutMs,
    });

    return this.settle(
      result,
      typeof result.stdout === "string" ? result.stdout : "",
      typeof result.all === "string" ? result.all : ""
    );
  }

  /**
   * Execute the command and hand each stdout line to `onLine` as it arrives.
   * stdout is never held in memory, so output size is unbounded; the result's
   * `output` carries stderr only.
   */
  async runLines(onLine: (line: string) => void): Promise<CommandResult> {
    this.logStart("lines");

    const subprocess = execa(this.command, this.args, {
      buffer: { stdout: false },
      reject: false,
      stdin: "ignore",
      timeout: this.timeoutMs,
    });

    try {
      for await (const line of subprocess) {
        onLine(line);
      }
    } catch (error) {
      // The settled result below reports the failure to the caller
      this.childLogger.debug({ err: error }, "Line stream interrupted");
    }

    const result = await subprocess;
    return this.settle(
      result,
      "",
      typeof result.stderr === "string" ? result.stderr : ""
    );
  }
}

/**
 * Create a new command builder with the specified command and logger
 */
export function createCommand(command: string, logger: Logger): CommandBuilder {
  return new CommandBuilder(command, logger);
}

/**
 * Process runner backed by execa and which
 */
export function createProcessRunner(
  logger: Logger,
  timeoutMs: number = COMMAND_TIMEOUT_MS
): ProcessRunner {
  return {
    async which(command) {
      const resolved = await which(command, { nothrow: true });
      return resolved ?? undefined;
    },
    run(command, args) {
      return createCommand(command, logger)
        .addArgs(args)
        .timeout(timeoutMs)
        .run();
    },
    streamLines(command, args, onLine) {
      return createCommand(command, logger)
        .addArgs(args)
        .timeout(timeoutMs)
        .runLines(onLine);
    },
  };
}
