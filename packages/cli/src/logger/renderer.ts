// pattern: Functional Core

import { Chalk, type ChalkInstance, chalkStderr } from "chalk";
import { Transform } from "node:stream";

// Pino log object interface
interface PinoLogObject {
  level: number;
  time: number;
  pid: number;
  hostname: string;
  msg?: string;
  [key: string]: unknown;
}

// Renderer options interface
export interface RendererOptions {
  // false forces plain text; otherwise colour follows stderr support
  colorize?: boolean;
}

function isPinoLogObject(value: unknown): value is PinoLogObject {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number"
  );
}

// Format error object with stack trace
function formatErrorObject(err: unknown, paint: ChalkInstance): string {
  if (!err || typeof err !== "object") {
    return "";
  }

  const lines: string[] = [];

  if ("message" in err && typeof err.message === "string") {
    lines.push(paint.yellow(`    ${err.message}`));
  }

  // The serializer already trimmed the stack to at most 8 frames
  if ("stack" in err && Array.isArray(err.stack)) {
    for (const line of err.stack) {
      const trimmedLine = String(line).trim();
      if (trimmedLine) {
        lines.push(paint.dim(paint.yellow(`        ${trimmedLine}`)));
      }
    }
  }

  return lines.length > 0 ? `\n${lines.join("\n")}` : "";
}

// Format a single log object to a nice string
export function formatLogObject(
  logObj: PinoLogObject,
  paint: ChalkInstance = chalkStderr
): string {
  const {
    level,
    time: _time,
    msg,
    pid: _pid,
    hostname: _hostname,
    err,
    ...extra
  } = logObj;

  delete extra["name"];

  // Map pino levels to display format
  let levelDisplay: string;
  let msgColor: ChalkInstance = paint.reset;

  switch (level) {
    case 10: // trace
      levelDisplay = paint.green("+");
      break;
    case 20: // debug
      levelDisplay = paint.cyan("=");
      break;
    case 30: // info
      levelDisplay = paint.gray(">");
      break;
    case 40: // warn
      levelDisplay = paint.yellowBright("W");
      msgColor = paint.yellow;
      break;
    case 50: // error
      levelDisplay = paint.inverse.red("E");
      msgColor = paint.red;
      break;
    case 60: // fatal
      levelDisplay = paint.inverse.redBright("E");
      msgColor = paint.red;
      break;
    default:
      levelDisplay = paint.gray("  LOG  ");
  }

  const formattedMsg = msgColor(msg ?? "");
  const errorStr = err ? formatErrorObject(err, paint) : "";
  const extraStr =
    Object.keys(extra).length > 0 ? ` ${paint.dim(JSON.stringify(extra))}` : "";

  return `${levelDisplay} ${formattedMsg}${extraStr}${errorStr}\n`;
}

// Create a pretty renderer stream like pino-pretty
export default function createRenderer(
  options: RendererOptions = {}
): Transform {
  const paint =
    options.colorize === false ? new Chalk({ level: 0 }) : chalkStderr;

  return new Transform({
    objectMode: false, // Pino sends newline-delimited JSON strings, not objects
    transform(chunk: Buffer | string, _encoding, callback) {
      const formattedLines: string[] = [];

      for (const line of chunk.toString().split("\n")) {
        if (!line.trim()) {
          continue;
        }
        try {
          const parsed: unknown = JSON.parse(line);
          formattedLines.push(
            isPinoLogObject(parsed)
              ? formatLogObject(parsed, paint)
              : `${line}\n`
          );
        } catch {
          // Not JSON; pass the line through as-is
          formattedLines.push(`${line}\n`);
        }
      }

      callback(null, formattedLines.join(""));
    },
  });
}
