// pattern: Functional Core
import { describe, expect, it } from "vitest";

import {
  createTestDeps,
  FakeProcessRunner,
} from "../test-utils/fake-runner.js";

import {
  collectContainerManagerSection,
  probeContainerManagers,
} from "./container-manager-probe.js";

import type { ReportContext } from "./types.js";

const context: ReportContext = {
  runtime: { path: "/usr/bin/cc-runtime" },
  problemLimit: 50,
  generatedAt: new Date("2026-10-18T10:00:00.000Z"),
};

describe("probeContainerManagers", () => {
  it("should run every docker sub-probe even when one fails", async () => {
    const runner = new FakeProcessRunner({
      installed: { docker: "/usr/bin/docker" },
      commands: {
        "docker version": {
          exitCode: 1,
          output:
            "Cannot connect to the Docker daemon at unix:///var/run/docker.sock.",
        },
        "docker info": { stdout: "Runtimes: cc-runtime runc" },
        "systemctl show docker": { stdout: "ActiveState=active" },
      },
    });

    const [docker, kubernetes] = await probeContainerManagers(
      createTestDeps(runner)
    );

    expect(runner.calls).toEqual([
      "docker version",
      "docker info",
      "systemctl show docker",
    ]);
    expect(docker?.available).toBe(true);
    expect(docker?.probes.map(probe => probe.failed)).toEqual([
      true,
      false,
      false,
    ]);
    expect(kubernetes).toMatchObject({
      tool: "kubectl",
      available: false,
      probes: [],
      nested: [],
    });
  });

  it("should not look for crio without kubectl", async () => {
    const runner = new FakeProcessRunner({
      installed: { crio: "/usr/bin/crio" },
    });

    await probeContainerManagers(createTestDeps(runner));

    expect(runner.lookups).toEqual(["docker", "kubectl"]);
    expect(runner.calls).toEqual([]);
  });

  it("should probe crio when kubectl and crio are both installed", async () => {
    const runner = new FakeProcessRunner({
      installed: { kubectl: "/usr/bin/kubectl", crio: "/usr/bin/crio" },
      commands: {
        "kubectl version": { stdout: "Client Version: v1.30.0" },
        "kubectl config view": { stdout: "apiVersion: v1" },
        "systemctl show kubelet": { stdout: "ActiveState=active" },
        "crio --version": { stdout: "crio version 1.30.0" },
        "systemctl show crio": { stdout: "ActiveState=active" },
      },
    });

    await probeContainerManagers(createTestDeps(runner));

    expect(runner.lookups).toEqual(["docker", "kubectl", "crio"]);
    expect(runner.calls).toEqual([
      "kubectl version",
      "kubectl config view",
      "systemctl show kubelet",
      "crio --version",
      "systemctl show crio",
    ]);
  });
});

describe("collectContainerManagerSection", () => {
  it("should state absent tools instead of dropping their sections", async () => {
    const section = await collectContainerManagerSection(
      context,
      createTestDeps(new FakeProcessRunner())
    );

    expect(section).toEqual({
      id: "container-managers",
      title: "Container manager details",
      blocks: [
        { kind: "subheading", title: "Docker" },
        { kind: "text", text: "No `docker`" },
        { kind: "subheading", title: "Kubernetes" },
        { kind: "text", text: "No `kubectl`" },
      ],
    });
  });

  it("should quote sub-probe output including errors", async () => {
    const runner = new FakeProcessRunner({
      installed: { kubectl: "/usr/bin/kubectl" },
      commands: {
        "kubectl version": { stdout: "Client Version: v1.30.0" },
        "kubectl config view": { stdout: "apiVersion: v1" },
        "systemctl show kubelet": {
          exitCode: 1,
          output: "Failed to connect to bus: No such file or directory",
        },
      },
    });

    const section = await collectContainerManagerSection(
      context,
      createTestDeps(runner)
    );

    expect(section.blocks).toEqual([
      { kind: "subheading", title: "Docker" },
      { kind: "text", text: "No `docker`" },
      { kind: "subheading", title: "Kubernetes" },
      {
        kind: "command",
        commandLine: "kubectl version",
        output: "Client Version: v1.30.0",
      },
      {
        kind: "command",
        commandLine: "kubectl config view",
        output: "apiVersion: v1",
      },
      {
        kind: "command",
        commandLine: "systemctl show kubelet",
        output: "Failed to connect to bus: No such file or directory",
      },
      { kind: "text", text: "No `crio`" },
    ]);
  });
});
