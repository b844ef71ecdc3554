// pattern: Functional Core
// Environment overrides, validated against TypeBox schemas

import { type Static, type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { DEFAULT_PROBLEM_LIMIT } from "./settings.js";

import type { LogLevel } from "../logger/index.js";

export const LOG_LEVELS = ["error", "warn", "info", "debug", "trace"] as const;

export const PROBLEM_LIMIT_ENV = "PROBLEM_LIMIT";
export const LOG_LEVEL_ENV = "CC_COLLECT_LOG_LEVEL";

export const ProblemLimitSetting = Type.String({
  pattern: "^[0-9]+$",
  description:
    "Maximum number of problem lines reported for a single component.",
});

export const LogLevelSetting = Type.Union(
  LOG_LEVELS.map(level => Type.Literal(level)),
  { description: "Verbosity of the collector's own log output." }
);

export interface CollectSettings {
  problemLimit: number;
  logLevel: LogLevel;
}

export interface LoadedSettings {
  settings: CollectSettings;
  // Rejected overrides, reported once the logger is configured
  warnings: string[];
}

function readSetting<T extends TSchema>(
  env: NodeJS.ProcessEnv,
  name: string,
  schema: T,
  warnings: string[]
): Static<T> | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return undefined;
  }

  if (Value.Check(schema, raw)) {
    return raw;
  }

  const reason = Value.Errors(schema, raw).First()?.message ?? "invalid value";
  warnings.push(
    `Ignoring ${name}=${JSON.stringify(raw)} (${reason}); using the default`
  );
  return undefined;
}

export function loadSettings(env: NodeJS.ProcessEnv): LoadedSettings {
  const warnings: string[] = [];

  const problemLimit = readSetting(
    env,
    PROBLEM_LIMIT_ENV,
    ProblemLimitSetting,
    warnings
  );
  const logLevel = readSetting(env, LOG_LEVEL_ENV, LogLevelSetting, warnings);

  return {
    settings: {
      problemLimit:
        problemLimit === undefined
          ? DEFAULT_PROBLEM_LIMIT
          : Number.parseInt(problemLimit, 10),
      logLevel: logLevel ?? "info",
    },
    warnings,
  };
}
