// pattern: Imperative Shell

import {
  Argument,
  Command,
  CommanderError,
} from "@commander-js/extra-typings";
import { supportsColorStderr } from "chalk";

import { loadSettings } from "../config/env.js";
import {
  BUG_REPORT_URL,
  COLLECTOR_NAME,
  COLLECTOR_VERSION,
  RUNTIME_NAME,
} from "../config/settings.js";
import { type LogFormat, type OutputSink } from "../logger/index.js";

import { CLI_LOGGER, initializeLogger, setCliLogLevel } from "./_deps.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";
import { collectCli, type CollectDeps } from "./collect.js";
import { HelpTextPatterns } from "./utils/command-factory.js";

export interface CliDeps extends CollectDeps {
  env: NodeJS.ProcessEnv;
  stderr: OutputSink;
  // Interactive terminals get the nice log format
  isTTY: boolean;
  // Colour for the nice format, independent of the format choice
  colorize: boolean;
}

export function createDefaultCliDeps(): CliDeps {
  return {
    env: process.env,
    stdout: process.stdout,
    stderr: process.stderr,
    isTTY: process.stderr.isTTY === true,
    colorize: supportsColorStderr !== false,
    isPrivileged: () => process.getuid?.() === 0,
    now: () => new Date(),
  };
}

// Define the root command
export function createRootCommand(
  deps: CliDeps,
  setExitCode: (code: number) => void
) {
  const { settings, warnings } = loadSettings(deps.env);

  return new Command(COLLECTOR_NAME)
    .description(`Collect data about an installation of ${RUNTIME_NAME}.`)
    .version(
      `${COLLECTOR_NAME} version ${COLLECTOR_VERSION}`,
      "-v, --version",
      "Show program version"
    )
    .helpOption("-h, --help", "Show this usage summary")
    .addArgument(
      new Argument("[action]", 'pass "help" to show this usage summary').choices(
        ["help"] as const
      )
    )
    .addHelpText(
      "after",
      HelpTextPatterns.description([
        `Run this command as root to obtain a markdown-formatted summary`,
        `of the environment of the ${RUNTIME_NAME} installation.`,
        `Set PROBLEM_LIMIT to change how many problem lines are shown per component.`,
      ]) + HelpTextPatterns.reportIssue(BUG_REPORT_URL)
    )
    .configureOutput({
      writeOut: str => {
        deps.stdout.write(str);
      },
      writeErr: str => {
        deps.stderr.write(str);
      },
    })
    .exitOverride()
    .hook("preAction", () => {
      setCliLogLevel(settings.logLevel);
      CLI_LOGGER.debug(`Log level configured to: ${settings.logLevel}`);
      warnings.forEach(warning => {
        CLI_LOGGER.warn(warning);
      });
    })
    .action(async (action, _options, command) => {
      if (action === "help") {
        command.outputHelp();
        return;
      }

      await withErrorHandling(
        () => collectCli(deps, settings),
        setExitCode
      )();
    });
}

/**
 * Parse argv and run the collector. Resolves to the process exit code.
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDeps = createDefaultCliDeps()
): Promise<number> {
  const format: LogFormat = deps.isTTY ? "nice" : "json";
  initializeLogger(format, { sink: deps.stderr, colorize: deps.colorize });

  let exitCode = 0;
  const program = createRootCommand(deps, code => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    // Help, version and usage errors surface here because of exitOverride()
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
