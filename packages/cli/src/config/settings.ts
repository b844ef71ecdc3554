// pattern: Functional Core
// Fixed project constants shared by the collector

import type { ComponentSource } from "../diagnostics/types.js";

export const COLLECTOR_NAME = "cc-collect-data";
export const COLLECTOR_VERSION = "0.1.0";

export const PROJECT_TYPE = "cc";
export const PROJECT_TAG = "clear-containers";
export const RUNTIME_NAME = `${PROJECT_TYPE}-runtime`;
export const BUG_REPORT_URL =
  "https://github.com/clearcontainers/runtime/issues/new";

// Runtime sub-commands
export const SHOW_CONFIG_PATHS_FLAG = `--${PROJECT_TYPE}-show-default-config-paths`;
export const ENV_SUBCOMMAND = `${PROJECT_TYPE}-env`;

// Always listed alongside whatever the runtime reports
export const FALLBACK_CONFIG_PATHS: readonly string[] = Object.freeze([
  `/etc/${PROJECT_TAG}/configuration.toml`,
  `/usr/share/defaults/${PROJECT_TAG}/configuration.toml`,
]);

export const DEFAULT_PROBLEM_LIMIT = 50;

// Upper bound for any single external command
export const COMMAND_TIMEOUT_MS = 60_000;

export const COMPONENT_SOURCES: readonly ComponentSource[] = Object.freeze([
  { name: "runtime", program: RUNTIME_NAME, selectorKind: "identifier" },
  { name: "proxy", program: `${PROJECT_TYPE}-proxy`, selectorKind: "unit" },
  { name: "shim", program: `${PROJECT_TYPE}-shim`, selectorKind: "identifier" },
]);

export const PACKAGE_NAMES: readonly string[] = Object.freeze([
  // 2.x project names
  "cc-oci-runtime",
  "cc-runtime",
  "cc-proxy",
  "cc-shim",
  "cc-ksm-throttler",
  // assets
  "clear-containers-image",
  "linux-container",
  // hypervisors
  "qemu-lite",
  "qemu-system-x86",
]);
