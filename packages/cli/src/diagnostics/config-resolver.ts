// pattern: Functional Core
// Runtime configuration discovery and dump

import { readFile } from "node:fs/promises";

import {
  FALLBACK_CONFIG_PATHS,
  SHOW_CONFIG_PATHS_FLAG,
} from "../config/settings.js";
import { RuntimeQueryError } from "../utils/errors.js";

import { quoted, subheading, text } from "./formatter.js";

import type {
  ConfigFileEntry,
  ConfigPathResolution,
  DiagnosticDeps,
  ReportBlock,
  ReportContext,
  ReportSection,
  RuntimeHandle,
} from "./types.js";

// The runtime prints its search path separated by newlines or spaces
export function splitPathList(output: string): string[] {
  return output.split(/\s+/).filter(path => path.length > 0);
}

/**
 * Union with the well-known locations, deduplicated and sorted so two runs
 * on the same host list files identically.
 */
export function mergeConfigPaths(
  reported: readonly string[],
  fallbacks: readonly string[] = FALLBACK_CONFIG_PATHS
): string[] {
  return [...new Set([...reported, ...fallbacks])].sort();
}

async function describeRuntimeVersion(
  runtime: RuntimeHandle,
  deps: DiagnosticDeps
): Promise<string> {
  const result = await deps.runner.run(runtime.path, ["--version"]);
  return result.output.trim().replaceAll("\n", " ");
}

export async function resolveConfigPaths(
  runtime: RuntimeHandle,
  deps: DiagnosticDeps
): Promise<ConfigPathResolution> {
  const result = await deps.runner.run(runtime.path, [SHOW_CONFIG_PATHS_FLAG]);

  if (result.failed) {
    const version = await describeRuntimeVersion(runtime, deps);
    throw new RuntimeQueryError(
      `failed to check config files - runtime is probably too old (${version})`,
      version
    );
  }

  const reported = splitPathList(result.stdout);
  deps.logger.debug({ reported }, "Runtime reported config paths");

  return { reported, paths: mergeConfigPaths(reported) };
}

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

export async function readConfigFiles(
  paths: readonly string[]
): Promise<ConfigFileEntry[]> {
  const entries: ConfigFileEntry[] = [];

  for (const path of paths) {
    try {
      entries.push({
        path,
        status: "found",
        contents: await readFile(path, "utf8"),
      });
    } catch (error) {
      if (isMissingFileError(error)) {
        entries.push({ path, status: "missing" });
      } else {
        entries.push({
          path,
          status: "unreadable",
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  return entries;
}

export function renderConfigFile(entry: ConfigFileEntry): ReportBlock[] {
  switch (entry.status) {
    case "found":
      return [text(`Config file \`${entry.path}\`:`), quoted(entry.contents)];
    case "missing":
      return [text(`Config file \`${entry.path}\` not found`)];
    case "unreadable":
      return [
        text(`Config file \`${entry.path}\` could not be read: ${entry.error}`),
      ];
  }
}

export async function collectConfigSection(
  context: ReportContext,
  deps: DiagnosticDeps
): Promise<ReportSection> {
  const resolution = await resolveConfigPaths(context.runtime, deps);
  const files = await readConfigFiles(resolution.paths);

  return {
    id: "runtime-configs",
    title: "Runtime config files",
    blocks: [
      subheading("Runtime default config files"),
      quoted(resolution.reported.join("\n")),
      subheading("Runtime config file contents"),
      ...files.flatMap(renderConfigFile),
    ],
  };
}
