import { describe, it, expect } from "vitest";
import { detectEnvironment, normalizeEnvironment } from "../environment";
import { createExecutionContext } from "../context";

describe("environment names", () => {
  it("should map aliases and keep unknown names lowercased", () => {
    expect(normalizeEnvironment("PROD")).toBe("production");
    expect(normalizeEnvironment(" stage ")).toBe("staging");
    expect(normalizeEnvironment("int")).toBe("integration");
    expect(normalizeEnvironment("dev")).toBe("development");
    expect(normalizeEnvironment("Preview")).toBe("preview");
  });

  it("should prefer NODE_ENV over ENVIRONMENT", () => {
    expect(detectEnvironment({ NODE_ENV: "production", ENVIRONMENT: "staging" })).toBe("production");
    expect(detectEnvironment({ NODE_ENV: "", ENVIRONMENT: "staging" })).toBe("staging");
    expect(detectEnvironment({})).toBe("development");
  });
});

describe("createExecutionContext", () => {
  it("should take files and packages from an analysis and let overrides win", () => {
    const ctx = createExecutionContext(
      {
        base: "main",
        head: "HEAD",
        changedFiles: [{ path: "packages/core/a.ts", kind: "modified" }],
        packageChanges: [],
        affectedPackages: { directlyAffected: new Set(["core"]), dependentsAffected: new Set(), totalAffectedCount: 1 },
        rootDependenciesChanged: false,
        unownedFiles: [],
      },
      { currentBranch: "main", environment: { CI: "1" } },
    );

    expect(ctx.changedFiles).toEqual(["packages/core/a.ts"]);
    expect(ctx.affectedPackages.directlyAffected).toEqual(new Set(["core"]));
    expect(ctx.packageChanges).toEqual([]);
    expect(ctx.currentBranch).toBe("main");
    expect(ctx.environment).toEqual({ CI: "1" });
  });
});
