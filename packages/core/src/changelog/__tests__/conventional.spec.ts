import { describe, it, expect } from "vitest";
import type { ConventionalCommit } from "@monoweave/contracts";
import { groupCommits, isFeature, parseCommit, parseConventionalCommit } from "../conventional";

const c = (type: string, description: string, scope?: string): ConventionalCommit => ({
  type,
  scope,
  description,
  breaking: false,
  hash: description,
});

describe("parseConventionalCommit", () => {
  it("should read type, scope, bang, body and breaking footer", () => {
    const parsed = parseConventionalCommit(
      "feat(api)!: drop v1 routes\n\nRoutes moved to v2.\n\nBREAKING CHANGE: v1 clients must upgrade",
      { hash: "abc123" },
    );

    expect(parsed).toEqual({
      hash: "abc123",
      type: "feat",
      scope: "api",
      description: "drop v1 routes",
      body: "Routes moved to v2.\n\nBREAKING CHANGE: v1 clients must upgrade",
      breaking: true,
      breakingDescription: "v1 clients must upgrade",
    });
  });

  it("should lowercase the type and accept a footer without a bang", () => {
    const parsed = parseConventionalCommit("FIX: handle empty input\n\nBREAKING-CHANGE: returns null now");

    expect(parsed.type).toBe("fix");
    expect(parsed.breaking).toBe(true);
    expect(parsed.breakingDescription).toBe("returns null now");
  });

  it("should read a feature type as feat", () => {
    const parsed = parseConventionalCommit("Feature(ui): dark mode");

    expect(parsed.type).toBe("feat");
    expect(isFeature(parsed)).toBe(true);
    expect(groupCommits([parsed, c("fix", "b")], "type").map((g) => [g.title, g.commits.map((x) => x.description)])).toEqual([
      ["Features", ["dark mode"]],
      ["Bug Fixes", ["b"]],
    ]);
  });

  it("should turn free-form messages into chores", () => {
    expect(parseConventionalCommit("  Update readme  ")).toEqual({
      hash: "",
      type: "chore",
      description: "Update readme",
      breaking: false,
    });
  });

  it("should carry commit metadata", () => {
    const parsed = parseCommit({
      hash: "f00d",
      message: "feature: wizard",
      authorName: "Dev",
      authorEmail: "dev@example.com",
      authorDate: "2026-02-03T04:05:06Z",
    });

    expect(parsed).toMatchObject({ hash: "f00d", authorName: "Dev", date: "2026-02-03T04:05:06Z" });
    expect(isFeature(parsed)).toBe(true);
  });
});

describe("groupCommits", () => {
  const commits = [c("fix", "b"), c("wip", "c", "ui"), c("feat", "a", "api"), c("docs", "d")];

  it("should group by type in a fixed order with unknown types last", () => {
    expect(groupCommits(commits, "type").map((g) => [g.title, g.commits.map((x) => x.description)])).toEqual([
      ["Features", ["a"]],
      ["Bug Fixes", ["b"]],
      ["Documentation", ["d"]],
      ["Other Changes", ["c"]],
    ]);
  });

  it("should let titles be overridden", () => {
    expect(groupCommits(commits, "type", { feat: "New" })[0]?.title).toBe("New");
  });

  it("should group by sorted scope with unscoped commits last", () => {
    expect(groupCommits(commits, "scope").map((g) => [g.title, g.commits.map((x) => x.description)])).toEqual([
      ["api", ["a"]],
      ["ui", ["c"]],
      ["Other Changes", ["b", "d"]],
    ]);
  });

  it("should keep one flat group without grouping", () => {
    expect(groupCommits(commits, "none")).toEqual([{ title: "Changes", commits }]);
    expect(groupCommits([], "none")).toEqual([]);
  });
});
