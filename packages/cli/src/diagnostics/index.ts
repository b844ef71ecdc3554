// pattern: Functional Core
// Barrel file for diagnostics library exports

export * from "./config-resolver.js";
export * from "./container-manager-probe.js";
export * from "./formatter.js";
export * from "./log-scanner.js";
export * from "./package-probe.js";
export * from "./problem-pattern.js";
export * from "./report.js";
export * from "./runtime.js";
export * from "./types.js";
