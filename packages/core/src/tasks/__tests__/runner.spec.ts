import { describe, it, expect, beforeAll } from "vitest";
import type { BranchesConfig, CommandSpec, TaskDefinition, TasksConfig } from "@monoweave/contracts";
import { MemoryFileSystem, ScriptedExecutor, setLogLevel } from "@monoweave/adapters";
import { buildGraph } from "../../graph/__tests__/fixtures";
import type { PackageFixture } from "../../graph/__tests__/fixtures";
import { ConditionChecker } from "../conditions";
import { createExecutionContext } from "../context";
import { TaskRunner } from "../runner";

const branches: BranchesConfig = { main: ["main"], feature: ["feature/*"], release: [], hotfix: [] };

const config: TasksConfig = {
  concurrency: 2,
  commandTimeoutMs: 1000,
  gracePeriodMs: 10,
  maxStdoutBytes: 1024,
  maxStderrBytes: 1024,
  continueOnError: false,
  failFast: false,
};

const chain: Record<string, PackageFixture> = {
  core: {},
  utils: { dependencies: { core: "^1.0.0" } },
  app: { dependencies: { utils: "^1.0.0" } },
  docs: {},
};

const make = (target: string): CommandSpec => ({ program: "make", args: [target] });

function task(overrides: Partial<TaskDefinition> = {}): TaskDefinition {
  return { name: "build", commands: [make("build")], conditions: [], affects: "self", ...overrides };
}

function setup(fixtures: Record<string, PackageFixture> = chain, tasks: Partial<TasksConfig> = {}, fs?: MemoryFileSystem) {
  const executor = new ScriptedExecutor();
  const checker = new ConditionChecker({ branches, root: "/repo" });
  const runner = new TaskRunner(buildGraph(fixtures), executor, { ...config, ...tasks }, checker, fs);
  const ctx = createExecutionContext(undefined, { environment: {}, currentBranch: "main" });
  return { executor, runner, ctx };
}

const inPackage = (name: string) => (spec: CommandSpec) => spec.cwd === `/repo/packages/${name}`;

describe("TaskRunner", () => {
  beforeAll(() => {
    setLogLevel("silent");
  });

  it("should select packages by the affects selector", () => {
    const { runner } = setup();

    expect(runner.selectPackages(task(), ["utils", "ghost"])).toEqual(["utils"]);
    expect(runner.selectPackages(task({ affects: "dependents" }), ["utils"])).toEqual(["utils", "app"]);
    expect(runner.selectPackages(task({ affects: "all" }), [])).toEqual(["core", "utils", "app", "docs"]);
  });

  it("should run dependencies before their dependents", async () => {
    const { executor, runner, ctx } = setup();

    const result = await runner.run(task({ affects: "dependents" }), ["core"], ctx);

    expect(result.status).toEqual({ state: "success" });
    expect(result.affectedPackages).toEqual(["core", "utils", "app"]);
    expect(executor.calls.map((c) => c.spec.cwd)).toEqual(["/repo/packages/core", "/repo/packages/utils", "/repo/packages/app"]);
    expect(result.outputs[0]).toEqual({
      package: "core",
      command: "make build",
      cwd: "/repo/packages/core",
      exitCode: 0,
      stdout: "",
      stderr: "",
      durationMs: 0,
      env: {},
      timedOut: false,
      truncated: false,
    });
    expect(result.stats).toMatchObject({ commandsExecuted: 3, commandsSucceeded: 3, commandsFailed: 0, packagesProcessed: 3 });
    expect(result.cancelled).toBe(false);
  });

  it("should skip the task when its conditions do not hold", async () => {
    const { executor, runner } = setup();
    const ctx = createExecutionContext(undefined, { environment: {}, currentBranch: "feature/x" });

    const result = await runner.run(
      task({ conditions: [{ type: "on-branch", condition: { kind: "is-main" } }] }),
      ["core"],
      ctx,
    );

    expect(result.status).toEqual({ state: "skipped", reason: "conditions-false" });
    expect(executor.calls).toEqual([]);
  });

  it("should skip dependents of a failed package", async () => {
    const { executor, runner, ctx } = setup();
    executor.on(inPackage("utils"), { exitCode: 2, stderr: "boom" });

    const result = await runner.run(task({ affects: "dependents" }), ["core"], ctx);

    expect(result.status).toEqual({ state: "failed", reason: "exit(2)" });
    expect(result.errors).toEqual(['utils: "make build" exited with 2']);
    expect(result.logs).toEqual(["app: skipped, dependency utils did not succeed"]);
    expect(executor.calls.map((c) => c.spec.cwd)).toEqual(["/repo/packages/core", "/repo/packages/utils"]);
    expect(result.outputs[1]).toMatchObject({ package: "utils", exitCode: 2, stderr: "boom" });
  });

  it("should keep going past failures with continueOnError", async () => {
    const { executor, runner, ctx } = setup();
    executor.on(inPackage("utils"), { exitCode: 2 });

    const result = await runner.run(task({ affects: "dependents", continueOnError: true }), ["core"], ctx);

    expect(result.status).toEqual({ state: "failed", reason: "exit(2)" });
    expect(executor.calls).toHaveLength(3);
    expect(result.logs).toEqual([]);
  });

  it("should stop a package's commands at the first failure", async () => {
    const { executor, runner, ctx } = setup();
    executor.on("make lint", { exitCode: 1 });

    const result = await runner.run(task({ commands: [make("lint"), make("test")] }), ["core"], ctx);

    expect(executor.commandLines()).toEqual(["make lint"]);
    expect(result.stats).toMatchObject({ commandsExecuted: 1, commandsSucceeded: 0, commandsFailed: 1 });
  });

  it("should report timeouts and pass the task timeout down", async () => {
    const { executor, runner, ctx } = setup();
    executor.on("make build", { timedOut: true });

    const result = await runner.run(task({ timeoutMs: 250 }), ["core"], ctx);

    expect(result.status).toEqual({ state: "timed-out" });
    expect(result.errors).toEqual(['core: "make build" timed out']);
    expect(executor.calls[0]?.options).toMatchObject({ timeoutMs: 250, gracePeriodMs: 10, maxStdoutBytes: 1024 });
    expect(result.outputs[0]).toMatchObject({ exitCode: null, timedOut: true });
  });

  it("should report commands that cannot start", async () => {
    const { executor, runner, ctx } = setup();
    executor.on("make build", { spawnError: "ENOENT" });

    const result = await runner.run(task(), ["core"], ctx);

    expect(result.status).toEqual({ state: "failed", reason: "spawn-error" });
    expect(result.errors).toEqual(["core: Failed to spawn make: ENOENT"]);
    expect(result.outputs).toEqual([]);
  });

  it("should resolve command directories against the package", async () => {
    const { executor, runner, ctx } = setup();

    await runner.run(
      task({ commands: [{ program: "make", args: ["docs"], cwd: "site", env: { LANG: "C" } }, { ...make("x"), cwd: "/tmp" }] }),
      ["docs"],
      ctx,
    );

    expect(executor.calls.map((c) => c.spec.cwd)).toEqual(["/repo/packages/docs/site", "/tmp"]);
    expect(executor.calls[0]?.spec.env).toEqual({ LANG: "C" });
  });

  it("should cancel everything when the signal is already aborted", async () => {
    const { executor, runner, ctx } = setup();
    const controller = new AbortController();
    controller.abort();

    const result = await runner.run(task({ affects: "all" }), [], ctx, { signal: controller.signal });

    expect(result.status).toEqual({ state: "skipped", reason: "cancelled" });
    expect(result.cancelled).toBe(true);
    expect(executor.calls).toEqual([]);
  });

  it("should stop starting packages after a failure with failFast", async () => {
    const { executor, runner, ctx } = setup({ a: {}, b: {}, c: {} }, { concurrency: 1, failFast: true });
    executor.on(inPackage("a"), { exitCode: 1 });

    const result = await runner.run(task({ affects: "all" }), [], ctx);

    expect(result.status).toEqual({ state: "failed", reason: "exit(1)" });
    expect(executor.calls).toHaveLength(1);
    expect(result.cancelled).toBe(false);
  });

  it("should not run more packages at once than configured", async () => {
    const { executor, runner, ctx } = setup({ a: {}, b: {}, c: {}, d: {} });
    executor.on(/^make/, { delayMs: 20 });

    const result = await runner.run(task({ affects: "all" }), [], ctx);

    expect(result.status).toEqual({ state: "success" });
    expect(executor.calls).toHaveLength(4);
    expect(executor.peakConcurrency).toBe(2);
  });

  it("should fail on a dependency cycle without running anything", async () => {
    const { executor, runner, ctx } = setup({ a: { dependencies: { b: "*" } }, b: { dependencies: { a: "*" } } });

    const result = await runner.run(task({ affects: "all" }), [], ctx);

    expect(result.status).toEqual({ state: "failed", reason: "dependency-cycle" });
    expect(result.errors).toEqual(["Cannot order packages: a -> b"]);
    expect(executor.calls).toEqual([]);
  });

  it("should fail when a condition cannot be evaluated", async () => {
    const { runner, ctx } = setup();

    const result = await runner.run(
      task({ conditions: [{ type: "environment", condition: { kind: "custom", checker: "vpn" } }] }),
      ["core"],
      ctx,
    );

    expect(result.status).toEqual({ state: "failed", reason: "condition-error" });
    expect(result.errors).toEqual(['No environment checker named "vpn"']);
  });

  it("should note unknown packages", async () => {
    const { runner, ctx } = setup();

    const result = await runner.run(task(), ["core", "ghost"], ctx);

    expect(result.logs).toEqual(["ignoring unknown package ghost"]);
    expect(result.affectedPackages).toEqual(["core"]);
  });

  it("should collect artifacts of successful packages", async () => {
    const fs = MemoryFileSystem.fromTree("/repo/packages/core", {
      "dist/index.js": "abc",
      "dist/index.d.ts": "export {};\n",
      "node_modules/dep/dist/x.js": "x",
    });
    const { runner, ctx } = setup(chain, {}, fs);

    const result = await runner.run(task({ artifacts: [{ pattern: "dist/*.js", kind: "bundle" }] }), ["core"], ctx);

    expect(result.artifacts).toEqual([
      {
        name: "index.js",
        path: "/repo/packages/core/dist/index.js",
        kind: "bundle",
        sizeBytes: 3,
        package: "core",
        metadata: { pattern: "dist/*.js" },
      },
    ]);
  });
});
