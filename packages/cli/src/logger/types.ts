// pattern: Functional Core

import type { Level } from "pino";

export type LogFormat = "nice" | "json";

export type LogLevel = Level;

// Minimal writable target: stdout, stderr, or a test buffer
export interface OutputSink {
  write(chunk: string): unknown;
}
