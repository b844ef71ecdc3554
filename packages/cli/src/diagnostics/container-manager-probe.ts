// pattern: Functional Core
// Container manager status probes (docker, kubernetes, cri-o)

import { commandOutput, subheading, toolPresence } from "./formatter.js";

import type {
  ContainerManagerStatus,
  DiagnosticDeps,
  ReportBlock,
  ReportContext,
  ReportSection,
} from "./types.js";

type ProbeCommand = readonly [string, ...string[]];

export interface ContainerManagerSpec {
  tool: string;
  title: string;
  probes: readonly ProbeCommand[];
  // Only checked when the parent tool is installed
  nested?: readonly ContainerManagerSpec[];
}

export const CONTAINER_MANAGERS: readonly ContainerManagerSpec[] =
  Object.freeze([
    {
      tool: "docker",
      title: "Docker",
      probes: [
        ["docker", "version"],
        ["docker", "info"],
        ["systemctl", "show", "docker"],
      ],
    },
    {
      tool: "kubectl",
      title: "Kubernetes",
      probes: [
        ["kubectl", "version"],
        ["kubectl", "config", "view"],
        ["systemctl", "show", "kubelet"],
      ],
      // cri-o is only relevant on a kubernetes node
      nested: [
        {
          tool: "crio",
          title: "CRI-O",
          probes: [
            ["crio", "--version"],
            ["systemctl", "show", "crio"],
          ],
        },
      ],
    },
  ]);

async function probeContainerManager(
  spec: ContainerManagerSpec,
  deps: DiagnosticDeps
): Promise<ContainerManagerStatus> {
  const available = (await deps.runner.which(spec.tool)) !== undefined;
  const status: ContainerManagerStatus = {
    tool: spec.tool,
    title: spec.title,
    available,
    probes: [],
    nested: [],
  };

  if (!available) {
    deps.logger.debug({ tool: spec.tool }, "Container manager not found");
    return status;
  }

  // A failing sub-probe is recorded with its output; the next one still runs
  for (const [command, ...args] of spec.probes) {
    status.probes.push(await deps.runner.run(command, args));
  }

  for (const nested of spec.nested ?? []) {
    status.nested.push(await probeContainerManager(nested, deps));
  }

  return status;
}

export async function probeContainerManagers(
  deps: DiagnosticDeps,
  managers: readonly ContainerManagerSpec[] = CONTAINER_MANAGERS
): Promise<ContainerManagerStatus[]> {
  const statuses: ContainerManagerStatus[] = [];
  for (const manager of managers) {
    statuses.push(await probeContainerManager(manager, deps));
  }
  return statuses;
}

function renderProbes(status: ContainerManagerStatus): ReportBlock[] {
  if (!status.available) {
    return [toolPresence(status.tool, false)];
  }

  return [
    ...status.probes.map(commandOutput),
    ...status.nested.flatMap(renderProbes),
  ];
}

export function renderContainerManager(
  status: ContainerManagerStatus
): ReportBlock[] {
  return [subheading(status.title), ...renderProbes(status)];
}

export async function collectContainerManagerSection(
  _context: ReportContext,
  deps: DiagnosticDeps
): Promise<ReportSection> {
  const statuses = await probeContainerManagers(deps);

  return {
    id: "container-managers",
    title: "Container manager details",
    blocks: statuses.flatMap(renderContainerManager),
  };
}
