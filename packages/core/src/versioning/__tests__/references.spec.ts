import { describe, it, expect } from "vitest";
import { Bump } from "@monoweave/contracts";
import { computeReference } from "../references";
import { groupMembership } from "../groups";
import { applyOf, createChangeSet, previewOf } from "../changeset";

describe("computeReference", () => {
  it("should leave bare workspace aliases and other protocols alone", () => {
    expect(computeReference("workspace:*", "2.0.0")).toBeUndefined();
    expect(computeReference("workspace:^", "2.0.0")).toBeUndefined();
    expect(computeReference("workspace:~", "2.0.0")).toBeUndefined();
    expect(computeReference("file:../core", "2.0.0")).toBeUndefined();
    expect(computeReference("npm:core@^1.0.0", "2.0.0")).toBeUndefined();
    expect(computeReference("acme/core#main", "2.0.0")).toBeUndefined();
  });

  it("should keep the operator of workspace ranges", () => {
    expect(computeReference("workspace:^1.0.0", "2.0.0")).toEqual({ toRef: "workspace:^2.0.0", kind: "workspace-protocol" });
    expect(computeReference("workspace:~1.0.0", "1.0.1")).toEqual({ toRef: "workspace:~1.0.1", kind: "workspace-protocol" });
    expect(computeReference("workspace:1.0.0", "1.1.0")).toEqual({ toRef: "workspace:1.1.0", kind: "workspace-protocol" });
  });

  it("should keep caret and tilde ranges and pin everything else", () => {
    expect(computeReference("^1.0.0", "2.0.0")).toEqual({ toRef: "^2.0.0", kind: "keep-range" });
    expect(computeReference(" ~1.0.0 ", "1.0.1")).toEqual({ toRef: "~1.0.1", kind: "keep-range" });
    expect(computeReference("1.0.0", "1.0.1")).toEqual({ toRef: "1.0.1", kind: "fixed-version" });
    expect(computeReference(">=1.0.0", "1.0.1")).toEqual({ toRef: "1.0.1", kind: "fixed-version" });
  });
});

describe("groupMembership", () => {
  it("should keep the first matching group and skip individual packages", () => {
    const membership = groupMembership(["@ui/button", "@ui/theme", "@core/a", "tool"], {
      groups: { ui: "@ui/*", everything: ["@ui/*", "@core/*"] },
      individualPackages: ["@ui/theme"],
    });

    expect(membership.groups).toEqual(
      new Map([
        ["ui", ["@ui/button"]],
        ["everything", ["@core/a"]],
      ]),
    );
    expect(membership.groupOf.get("@ui/theme")).toBeUndefined();
    expect(membership.groupOf.get("tool")).toBeUndefined();
    expect(membership.warnings).toEqual(["Package '@ui/button' matches groups 'ui' and 'everything'; keeping 'ui'"]);
  });
});

describe("change sets", () => {
  it("should accept records or maps and switch modes without mutating", () => {
    const fromRecord = createChangeSet({ core: Bump.minor }, "feature release");
    const fromMap = createChangeSet(new Map([["core", Bump.minor]]));

    expect(fromRecord).toEqual({ targetPackages: new Map([["core", Bump.minor]]), description: "feature release", executionMode: "preview" });
    expect(fromMap.targetPackages).toEqual(fromRecord.targetPackages);

    const applied = applyOf(fromRecord);
    expect(applied.executionMode).toBe("apply");
    expect(fromRecord.executionMode).toBe("preview");
    expect(previewOf(applied).executionMode).toBe("preview");
  });
});
