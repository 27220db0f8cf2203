import { describe, it, expect, beforeAll } from "vitest";
import { ConditionError } from "@monoweave/contracts";
import type { BranchesConfig, ExecutionContext, PackageChange, TaskCondition } from "@monoweave/contracts";
import { MemoryFileSystem, ScriptedExecutor, setLogLevel } from "@monoweave/adapters";
import { ConditionChecker, changeLevel } from "../conditions";
import { createExecutionContext } from "../context";

const branches: BranchesConfig = {
  main: ["main", "master"],
  feature: ["feature/*", "feat/*"],
  release: ["release/*"],
  hotfix: ["hotfix/*"],
};

function context(overrides: Partial<ExecutionContext> = {}): ExecutionContext {
  return createExecutionContext(undefined, { environment: {}, ...overrides });
}

function checker(executor?: ScriptedExecutor, fs?: MemoryFileSystem) {
  return new ConditionChecker({ branches, root: "/repo", executor, fs, platform: "linux" });
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

const onBranch = (condition: Extract<TaskCondition, { type: "on-branch" }>["condition"]): TaskCondition => ({
  type: "on-branch",
  condition,
});

describe("ConditionChecker", () => {
  beforeAll(() => {
    setLogLevel("silent");
  });

  describe("branches", () => {
    it("should not treat a feature branch as main", () => {
      expect(checker().checkSync([onBranch({ kind: "is-main" })], context({ currentBranch: "feature/x" }))).toBe(false);
      expect(checker().checkSync([onBranch({ kind: "is-main" })], context({ currentBranch: "master" }))).toBe(true);
    });

    it("should match the configured branch families", () => {
      const check = (condition: Parameters<typeof onBranch>[0], branch: string) =>
        checker().checkSync([onBranch(condition)], context({ currentBranch: branch }));

      expect(check({ kind: "is-feature" }, "feat/login")).toBe(true);
      expect(check({ kind: "is-release" }, "release/2.0")).toBe(true);
      expect(check({ kind: "is-hotfix" }, "hotfix/urgent")).toBe(true);
      expect(check({ kind: "is-hotfix" }, "feature/hotfix")).toBe(false);
      expect(check({ kind: "equals", branch: "develop" }, "develop")).toBe(true);
      expect(check({ kind: "matches", pattern: "release/*" }, "release/1.2")).toBe(true);
      expect(check({ kind: "matches", pattern: "release/*" }, "release/1.2/rc")).toBe(false);
      expect(check({ kind: "one-of", branches: ["main", "develop"] }, "develop")).toBe(true);
      expect(check({ kind: "none-of", branches: ["main"] }, "develop")).toBe(true);
    });

    it("should only let none-of hold without a branch", () => {
      const detached = context();

      expect(checker().checkSync([onBranch({ kind: "is-main" })], detached)).toBe(false);
      expect(checker().checkSync([onBranch({ kind: "equals", branch: "main" })], detached)).toBe(false);
      expect(checker().checkSync([onBranch({ kind: "none-of", branches: ["main"] })], detached)).toBe(true);
    });
  });

  describe("changes", () => {
    it("should check changed packages against both affected sets", () => {
      const ctx = context({
        affectedPackages: { directlyAffected: new Set(["a"]), dependentsAffected: new Set(["b"]), totalAffectedCount: 2 },
      });

      expect(checker().checkSync([{ type: "packages-changed", packages: ["b"] }], ctx)).toBe(true);
      expect(checker().checkSync([{ type: "packages-changed", packages: ["c"] }], ctx)).toBe(false);
      expect(checker().checkSync([{ type: "packages-changed", packages: [] }], ctx)).toBe(true);
    });

    it("should match every file pattern kind", () => {
      const check = checker();
      const file = "packages/app/src/deep/index.ts";

      expect(check.matchesFilePattern(file, { kind: "exact", pattern: file, exclude: false })).toBe(true);
      expect(check.matchesFilePattern(file, { kind: "prefix", pattern: "packages/app/", exclude: false })).toBe(true);
      expect(check.matchesFilePattern(file, { kind: "suffix", pattern: ".ts", exclude: false })).toBe(true);
      expect(check.matchesFilePattern(file, { kind: "glob", pattern: "packages/*/src/**/*.ts", exclude: false })).toBe(true);
      expect(check.matchesFilePattern(file, { kind: "glob", pattern: "packages/*.ts", exclude: false })).toBe(false);
      expect(check.matchesFilePattern("docs/guide.md", { kind: "regex", pattern: "^docs/.*\\.md$", exclude: false })).toBe(true);
      expect(check.matchesFilePattern("([", { kind: "regex", pattern: "([", exclude: false })).toBe(true);
      expect(check.matchesFilePattern("README.md", { kind: "suffix", pattern: ".md", exclude: true })).toBe(false);
    });

    it("should hold for files-changed when any file passes an excluding pattern", () => {
      const condition: TaskCondition = { type: "files-changed", patterns: [{ kind: "suffix", pattern: ".md", exclude: true }] };

      expect(checker().checkSync([condition], context({ changedFiles: ["README.md"] }))).toBe(false);
      expect(checker().checkSync([condition], context({ changedFiles: ["README.md", "src/a.ts"] }))).toBe(true);
    });
  });

  describe("dependencies-changed", () => {
    const packageChanges: PackageChange[] = [
      {
        packageName: "web",
        changedPaths: ["packages/web/package.json"],
        reasons: ["files"],
        hints: [
          { name: "react", section: "dependencies", kind: "upgraded", from: "^18.2.0", to: "^18.3.0" },
          { name: "@types/node", section: "devDependencies", kind: "added", to: "^20.0.0" },
        ],
      },
    ];
    const check = (filter?: Extract<TaskCondition, { type: "dependencies-changed" }>["filter"]) =>
      checker().checkSync([{ type: "dependencies-changed", filter }], context({ packageChanges }));

    it("should apply include and exclude globs with the version threshold", () => {
      expect(check()).toBe(true);
      expect(check({ include: ["react"], versionChange: "major" })).toBe(false);
      expect(check({ include: ["react"], versionChange: "minor-or-major" })).toBe(true);
      expect(check({ include: ["@types/*"], versionChange: "major" })).toBe(true);
      expect(check({ exclude: ["react", "@types/*"] })).toBe(false);
      expect(check({ include: ["vue"] })).toBe(false);
    });

    it("should be false without package changes", () => {
      expect(checker().checkSync([{ type: "dependencies-changed" }], context())).toBe(false);
    });

    it("should classify range moves by their lowest version", () => {
      expect(changeLevel({ name: "x", section: "dependencies", kind: "upgraded", from: "^1.0.0", to: "^1.0.1" })).toBe("patch");
      expect(changeLevel({ name: "x", section: "dependencies", kind: "upgraded", from: "^1.2.0", to: "~1.3.0" })).toBe("minor");
      expect(changeLevel({ name: "x", section: "dependencies", kind: "upgraded", from: "^1.0.0", to: "2.0.0" })).toBe("major");
      expect(changeLevel({ name: "x", section: "dependencies", kind: "removed", from: "^1.0.0" })).toBe("major");
      expect(changeLevel({ name: "x", section: "dependencies", kind: "changed", from: "workspace:*", to: "^1.0.0" })).toBe(
        "unknown",
      );
    });
  });

  describe("environment", () => {
    const env = (condition: Extract<TaskCondition, { type: "environment" }>["condition"]): TaskCondition => ({
      type: "environment",
      condition,
    });

    it("should read variables from the context", () => {
      const ctx = context({ environment: { CI: "true", DEPLOY_TARGET: "prod-eu" } });

      expect(checker().checkSync([env({ kind: "variable-exists", name: "CI" })], ctx)).toBe(true);
      expect(checker().checkSync([env({ kind: "variable-exists", name: "HOME" })], ctx)).toBe(false);
      expect(checker().checkSync([env({ kind: "variable-equals", name: "CI", value: "true" })], ctx)).toBe(true);
      expect(checker().checkSync([env({ kind: "variable-matches", name: "DEPLOY_TARGET", pattern: "prod-*" })], ctx)).toBe(true);
    });

    it("should compare normalized environment names", () => {
      expect(checker().checkSync([env({ kind: "is", environment: "production" })], context({ environment: { NODE_ENV: "prod" } }))).toBe(
        true,
      );
      expect(
        checker().checkSync(
          [env({ kind: "one-of", environments: ["stage", "dev"] })],
          context({ environment: { ENVIRONMENT: "Staging" } }),
        ),
      ).toBe(true);
      expect(checker().checkSync([env({ kind: "not", condition: { kind: "is", environment: "development" } })], context())).toBe(
        false,
      );
    });

    it("should use a registered checker before probing for a script", async () => {
      const check = checker().registerEnvironmentChecker("region", (ctx) => ctx.environment.REGION === "eu");

      await expect(check.checkAsync([env({ kind: "custom", checker: "region" })], context({ environment: { REGION: "eu" } }))).resolves.toBe(
        true,
      );
      await expect(check.checkAsync([env({ kind: "custom", checker: "region" })], context())).resolves.toBe(false);
    });

    it("should run a checker script from the workspace", async () => {
      const executor = new ScriptedExecutor().on("sh /repo/scripts/checkers/vpn.sh", { exitCode: 0 });
      const fs = MemoryFileSystem.fromTree("/repo", { "scripts/checkers/vpn.sh": "exit 0\n" });

      await expect(checker(executor, fs).checkAsync([env({ kind: "custom", checker: "vpn" })], context())).resolves.toBe(true);
      expect(executor.commandLines()).toEqual(["sh /repo/scripts/checkers/vpn.sh"]);
    });

    it("should fail for an unknown checker", async () => {
      const error = await rejection(checker().checkAsync([env({ kind: "custom", checker: "vpn" })], context()));

      expect(error).toBeInstanceOf(ConditionError);
      expect(error).toMatchObject({ code: "ERR_CONDITION_CHECKER_MISSING", message: 'No environment checker named "vpn"' });
    });
  });

  describe("composition", () => {
    it("should combine all, any and not", () => {
      const ctx = context({ currentBranch: "main", changedFiles: ["src/a.ts"] });
      const onMain = onBranch({ kind: "is-main" });
      const docs: TaskCondition = { type: "files-changed", patterns: [{ kind: "prefix", pattern: "docs/", exclude: false }] };

      expect(checker().checkSync([{ type: "all", conditions: [onMain, docs] }], ctx)).toBe(false);
      expect(checker().checkSync([{ type: "any", conditions: [onMain, docs] }], ctx)).toBe(true);
      expect(checker().checkSync([{ type: "not", condition: docs }], ctx)).toBe(true);
      expect(checker().checkSync([], ctx)).toBe(true);
    });

    it("should evaluate a double negation like the condition itself", async () => {
      const conditions: TaskCondition[] = [
        onBranch({ kind: "is-main" }),
        onBranch({ kind: "is-feature" }),
        { type: "files-changed", patterns: [{ kind: "suffix", pattern: ".ts", exclude: false }] },
        { type: "packages-changed", packages: ["web"] },
      ];
      const contexts = [
        context({ currentBranch: "main", changedFiles: ["src/a.ts"] }),
        context({ currentBranch: "feature/login", changedFiles: ["README.md"] }),
        context({ currentBranch: undefined, changedFiles: [] }),
      ];

      for (const condition of conditions) {
        const twice: TaskCondition = { type: "not", condition: { type: "not", condition } };
        for (const ctx of contexts) {
          expect(checker().checkSync([twice], ctx)).toBe(checker().checkSync([condition], ctx));
          await expect(checker().checkAsync([twice], ctx)).resolves.toBe(checker().checkSync([condition], ctx));
        }
      }
    });

    it("should refuse async conditions in checkSync", () => {
      const nested: TaskCondition = {
        type: "all",
        conditions: [{ type: "not", condition: { type: "environment", condition: { kind: "custom", checker: "vpn" } } }],
      };
      let caught: unknown;
      try {
        checker().checkSync([nested], context());
      } catch (error) {
        caught = error;
      }

      expect(checker().hasAsync([nested])).toBe(true);
      expect(caught).toBeInstanceOf(ConditionError);
      expect(caught).toMatchObject({ code: "ERR_CONDITION_ASYNC" });
    });
  });

  describe("custom scripts", () => {
    it("should pass on exit code 0 and run in the workspace root", async () => {
      const executor = new ScriptedExecutor().on("sh -c test -f package.json", { exitCode: 1 });
      const check = checker(executor);
      const script: TaskCondition = { type: "custom-script", script: "test -f package.json" };

      await expect(check.checkAsync([script], context())).resolves.toBe(false);
      executor.on("sh -c test -f package.json", { exitCode: 0 });
      await expect(check.checkAsync([script], context({ workingDirectory: "/repo/packages/app" }))).resolves.toBe(true);
      expect(executor.calls.map((c) => c.spec.cwd)).toEqual(["/repo", "/repo/packages/app"]);
    });

    it("should compare trimmed output when an expected output is given", async () => {
      const executor = new ScriptedExecutor().on("sh -c echo $MODE", { stdout: "release\n", exitCode: 3 });

      await expect(
        checker(executor).checkAsync([{ type: "custom-script", script: "echo $MODE", expectedOutput: "release" }], context()),
      ).resolves.toBe(true);
    });

    it("should go through cmd on windows", async () => {
      const executor = new ScriptedExecutor();
      const check = new ConditionChecker({ branches, root: "C:\\repo", executor, platform: "win32" });

      await check.checkAsync([{ type: "custom-script", script: "dir" }], context());

      expect(executor.commandLines()).toEqual(["cmd /C dir"]);
    });

    it("should count a script that cannot start as false", async () => {
      const executor = new ScriptedExecutor().on("sh -c ./gate", { spawnError: "ENOENT" });

      await expect(checker(executor).checkAsync([{ type: "custom-script", script: "./gate" }], context())).resolves.toBe(false);
    });

    it("should need an executor", async () => {
      const error = await rejection(checker().checkAsync([{ type: "custom-script", script: "true" }], context()));

      expect(error).toBeInstanceOf(ConditionError);
    });
  });
});
