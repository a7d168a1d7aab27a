import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";

import type { EcsMgrConfig } from "../config/config.js";
import { MissingDependencyError, TransportError } from "../errors.js";
import { createTestRuntime, FakeControlPlane, type TestRuntime } from "../testing/fakes.js";
import { runCli } from "./program.js";

const USAGE_LINE =
  "Usage: ecs-mgr -r|--region <region> -c|--cluster <cluster> [-s|--service <service>] [-d|--debug] -e|--execute <subcommand> [-h|--help]";

const SVC = "arn:aws:ecs:us-east-1:123456789012:service/my-cluster";

function firstLine(text: string | undefined): string | undefined {
  return text?.split("\n")[0];
}

describe("runCli", () => {
  let runtime: TestRuntime;
  let controlPlane: FakeControlPlane;
  let createControlPlane: Mock<(config: EcsMgrConfig) => Promise<FakeControlPlane>>;

  const run = (argv: string[]) =>
    runCli(argv, { runtime, createControlPlane, checkDependencies: async () => undefined });

  beforeEach(() => {
    runtime = createTestRuntime();
    controlPlane = new FakeControlPlane({ serviceArns: [`${SVC}/svcB`, `${SVC}/svcA`] });
    createControlPlane = vi.fn(async (_config: EcsMgrConfig) => controlPlane);
  });

  describe("argument parsing", () => {
    it("prints usage and exits 1 with no arguments", async () => {
      expect(await run([])).toBe(1);
      expect(firstLine(runtime.err[0])).toBe(USAGE_LINE);
      expect(runtime.out).toEqual([]);
    });

    it("prints usage and exits 0 for --help", async () => {
      expect(await run(["--help"])).toBe(0);
      expect(firstLine(runtime.out[0])).toBe(USAGE_LINE);
      expect(runtime.out.join("\n")).toContain(
        "  list_all_task_arns  list all task definitions for all services in a cluster",
      );
      expect(runtime.err).toEqual([]);
    });

    it.each([
      [["-c", "my-cluster", "-e", "stop_all", "-h"]],
      [["-h", "-c"]],
      [["--help", "-e"]],
      [["--bogus", "-h"]],
      [["extra", "-h"]],
      [["-c", "my-cluster", "-h", "-s"]],
      [["-e", "restart", "--help", "--bogus"]],
    ])("honors help regardless of the other arguments: %j", async (argv) => {
      expect(await run(argv)).toBe(0);
      expect(firstLine(runtime.out[0])).toBe(USAGE_LINE);
      expect(runtime.err).toEqual([]);
      expect(createControlPlane).not.toHaveBeenCalled();
    });

    it("treats -h after a value flag as that flag's value", async () => {
      expect(await run(["-c", "-h", "-e", "list_services"])).toBe(0);
      expect(createControlPlane).toHaveBeenCalledTimes(1);
      expect(createControlPlane.mock.calls[0][0].cluster).toBe("-h");
      expect(runtime.out).toEqual(["svcA", "svcB"]);
    });

    it("rejects unknown flags with usage and exit 1", async () => {
      expect(await run(["-c", "my-cluster", "--bogus"])).toBe(1);
      expect(runtime.err[0]).toBe("error: unknown option '--bogus'");
      expect(firstLine(runtime.err[1])).toBe(USAGE_LINE);
    });

    it("rejects stray positional arguments", async () => {
      expect(await run(["-c", "my-cluster", "-e", "list_services", "extra"])).toBe(1);
      expect(firstLine(runtime.err[1])).toBe(USAGE_LINE);
      expect(createControlPlane).not.toHaveBeenCalled();
    });

    it("rejects a value flag without its value", async () => {
      expect(await run(["-c"])).toBe(1);
      expect(runtime.err[0]).toBe("error: option '-c, --cluster <cluster>' argument missing");
    });
  });

  describe("validation", () => {
    it("exits 1 with usage when the cluster is missing", async () => {
      expect(await run(["-e", "list_services"])).toBe(1);
      expect(runtime.err[0]).toBe("[ERROR] missing required argument(s): -c|--cluster");
      expect(firstLine(runtime.err[1])).toBe(USAGE_LINE);
    });

    it("exits 1 with usage when the operation is missing", async () => {
      expect(await run(["-r", "us-west-2", "-c", "my-cluster"])).toBe(1);
      expect(runtime.err[0]).toBe("[ERROR] missing required argument(s): -e|--execute");
    });

    it.each(["list_tasks", "list_task_arns", "list_all_task_arns", "start", "stop"])(
      "exits 99 when %s has no service",
      async (operation) => {
        expect(await run(["-c", "my-cluster", "-e", operation])).toBe(99);
        expect(runtime.err[0]).toBe("[ERROR] no service specified as arg. need one of -s|--service <service>");
        expect(firstLine(runtime.err[1])).toBe(USAGE_LINE);
        expect(createControlPlane).not.toHaveBeenCalled();
      },
    );

    it("exits 99 for an unrecognized subcommand", async () => {
      expect(await run(["-c", "my-cluster", "-s", "svcA", "-e", "restart"])).toBe(99);
      expect(runtime.err[0]).toBe("[ERROR] invalid subcommand specified");
      expect(firstLine(runtime.err[1])).toBe(USAGE_LINE);
    });

    it("coerces an unsupported region to us-east-1", async () => {
      await run(["-r", "eu-west-1", "-c", "my-cluster", "-e", "list_services"]);
      expect(createControlPlane).toHaveBeenCalledTimes(1);
      expect(createControlPlane.mock.calls[0][0].region).toBe("us-east-1");
    });

    it("keeps a supported region", async () => {
      await run(["--region", "sa-east-1", "--cluster", "my-cluster", "--execute", "list_services"]);
      expect(createControlPlane.mock.calls[0][0].region).toBe("sa-east-1");
    });
  });

  describe("dispatch", () => {
    it("lists services as sorted short names", async () => {
      expect(await run(["-c", "my-cluster", "-e", "list_services"])).toBe(0);
      expect(runtime.out).toEqual(["svcA", "svcB"]);
      expect(runtime.err).toEqual([]);
    });

    it("echoes the resolved configuration in debug mode", async () => {
      expect(await run(["-d", "-c", "my-cluster", "-e", "list_services"])).toBe(0);
      expect(runtime.out).toEqual([
        "[DEBUG] Arguments:",
        "region  : us-east-1",
        "cluster : my-cluster",
        "service : ",
        "execute : list_services",
        "[DEBUG] listing services for cluster: my-cluster",
        "svcA",
        "svcB",
      ]);
    });

    it("keeps debug lines free of color codes when colors are on", async () => {
      runtime = createTestRuntime({ colors: true });
      expect(await run(["-d", "-c", "my-cluster", "-e", "list_services"])).toBe(0);
      expect(runtime.out.slice(0, 2)).toEqual(["[DEBUG] Arguments:", "region  : us-east-1"]);
      expect(runtime.out[5]).toBe("[DEBUG] listing services for cluster: my-cluster");
    });

    it("colors error lines when colors are on", async () => {
      runtime = createTestRuntime({ colors: true });
      expect(await run(["-c", "my-cluster", "-e", "restart"])).toBe(99);
      expect(runtime.err[0]).toBe("\x1b[31m[ERROR] invalid subcommand specified\x1b[0m");
    });

    it("starts a single service", async () => {
      expect(await run(["-c", "my-cluster", "-s", "svcA", "-e", "start"])).toBe(0);
      expect(controlPlane.calls).toEqual([
        { method: "setDesiredCount", cluster: "my-cluster", service: "svcA", count: 1 },
      ]);
    });

    it("stops every service in the cluster", async () => {
      expect(await run(["-c", "my-cluster", "-e", "stop_all"])).toBe(0);
      expect([...controlPlane.desiredCounts.entries()]).toEqual([
        ["svcA", 0],
        ["svcB", 0],
      ]);
    });

    it("reports transport failures with exit 1", async () => {
      controlPlane = new FakeControlPlane({
        failures: {
          listServiceNames: new TransportError(
            "ListServices",
            Object.assign(new Error("Cluster not found."), { name: "ClusterNotFoundException" }),
          ),
        },
      });

      expect(await run(["-c", "nope", "-e", "list_services"])).toBe(1);
      expect(runtime.err).toEqual(["[ERROR] ListServices failed: [ClusterNotFoundException] Cluster not found."]);
      expect(runtime.out).toEqual([]);
    });
  });

  describe("dependencies", () => {
    it("fails before parsing when a dependency is missing", async () => {
      const code = await runCli([], {
        runtime,
        createControlPlane,
        checkDependencies: async () => {
          throw new MissingDependencyError("@aws-sdk/client-ecs");
        },
      });

      expect(code).toBe(1);
      expect(runtime.err).toEqual(["[ERROR] Module not found and required: @aws-sdk/client-ecs"]);
    });
  });
});
