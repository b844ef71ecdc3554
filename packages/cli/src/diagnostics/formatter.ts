// pattern: Functional Core
// Markdown rendering for the collected report

import { type CommandResult, formatCommandLine } from "../utils/command/index.js";

import type { Report, ReportBlock, ReportSection } from "./types.js";

const FENCE = "```";

export function text(value: string): ReportBlock {
  return { kind: "text", text: value };
}

export function quoted(value: string): ReportBlock {
  return { kind: "quoted", text: value };
}

export function subheading(title: string): ReportBlock {
  return { kind: "subheading", title };
}

export function commandOutput(result: CommandResult): ReportBlock {
  return {
    kind: "command",
    commandLine: formatCommandLine(result.command, result.args),
    output: result.output,
  };
}

// "Have `x`" / "No `x`" lines tell the reader whether a tool was checked at all
export function toolPresence(tool: string, available: boolean): ReportBlock {
  return text(available ? `Have \`${tool}\`` : `No \`${tool}\``);
}

function fenced(value: string): string[] {
  return [FENCE, value, FENCE];
}

export function renderBlock(block: ReportBlock): string[] {
  switch (block.kind) {
    case "subheading":
      return ["", `## ${block.title}`, ""];
    case "text":
      return [block.text];
    case "quoted":
      return fenced(block.text);
    case "command":
      return [`Output of "\`${block.commandLine}\`":`, ...fenced(block.output)];
  }
}

export function renderSection(section: ReportSection): string[] {
  return [
    `# ${section.title}`,
    "",
    ...section.blocks.flatMap(renderBlock),
    "",
    "---",
    "",
  ];
}

export function renderReport(report: Report): string {
  return report.sections.flatMap(renderSection).join("\n");
}
