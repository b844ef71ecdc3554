// pattern: Functional Core
// Installed package versions, per available package manager

import { PACKAGE_NAMES } from "../config/settings.js";
import { formatCommandLine } from "../utils/command/index.js";

import { commandOutput, quoted, text, toolPresence } from "./formatter.js";

import type {
  DiagnosticDeps,
  PackageListing,
  ReportBlock,
  ReportContext,
  ReportSection,
} from "./types.js";

export interface PackageManagerSpec {
  name: string;
  listArgs: readonly string[];
}

export const PACKAGE_MANAGERS: readonly PackageManagerSpec[] = Object.freeze([
  { name: "dpkg", listArgs: ["-l"] },
  { name: "rpm", listArgs: ["-qa"] },
]);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function buildPackagePattern(
  names: readonly string[] = PACKAGE_NAMES
): RegExp {
  return new RegExp(`(${names.map(escapeRegExp).join("|")})`);
}

export function filterPackageLines(
  output: string,
  pattern: RegExp = buildPackagePattern()
): string[] {
  return output.split("\n").filter(line => pattern.test(line));
}

/**
 * List installed packages with each manager found on PATH. Managers that are
 * not installed are left out of the result.
 */
export async function probePackages(
  deps: DiagnosticDeps,
  managers: readonly PackageManagerSpec[] = PACKAGE_MANAGERS
): Promise<PackageListing[]> {
  const listings: PackageListing[] = [];

  for (const manager of managers) {
    if (!(await deps.runner.which(manager.name))) {
      deps.logger.debug({ manager: manager.name }, "Package manager not found");
      continue;
    }

    const result = await deps.runner.run(manager.name, manager.listArgs);
    listings.push({
      manager: manager.name,
      result,
      matches: result.failed ? [] : filterPackageLines(result.stdout),
    });
  }

  return listings;
}

export function renderPackageListing(listing: PackageListing): ReportBlock[] {
  const blocks = [toolPresence(listing.manager, true)];

  if (listing.result.failed) {
    // Show whatever the manager said, error text included
    blocks.push(commandOutput(listing.result));
  } else if (listing.matches.length > 0) {
    const commandLine = formatCommandLine(
      listing.result.command,
      listing.result.args
    );
    blocks.push(
      text(`Output of "\`${commandLine}\`" (filtered by package name):`),
      quoted(listing.matches.join("\n"))
    );
  } else {
    blocks.push(text("No matching packages installed."));
  }

  return blocks;
}

export async function collectPackageSection(
  _context: ReportContext,
  deps: DiagnosticDeps
): Promise<ReportSection> {
  const listings = await probePackages(deps);

  return {
    id: "packages",
    title: "Packages",
    blocks:
      listings.length > 0
        ? listings.flatMap(renderPackageListing)
        : [text("No package managers found.")],
  };
}
