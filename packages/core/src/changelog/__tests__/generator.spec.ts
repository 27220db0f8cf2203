import { describe, it, expect } from "vitest";
import type { ChangelogInput } from "@monoweave/contracts";
import { CHANGELOG_FOOTER, CHANGELOG_HEADER, ChangelogGenerator, stripMarkdown } from "../generator";

const input: ChangelogInput = {
  packageName: "core",
  version: "1.1.0",
  date: "2026-03-01",
  previousVersion: "1.0.0",
  commits: [
    { type: "feat", scope: "api", description: "add parser", breaking: false, hash: "a1b2c3d4e5f6" },
    { type: "fix", description: "crash on empty input", breaking: false, hash: "0011223344" },
    { type: "feat", description: "drop node 18", breaking: true, hash: "ffeeddccbbaa" },
  ],
};

describe("ChangelogGenerator", () => {
  it("should render a linked markdown section with breaking changes first", () => {
    const generator = new ChangelogGenerator({
      grouping: "type",
      includeBreakingChanges: true,
      repositoryUrl: "https://git.example.com/acme/mono/",
      typeTitles: {},
    });

    expect(generator.renderSection(input)).toBe(
      "## [1.1.0] - 2026-03-01\n\n" +
        "[Compare changes](https://git.example.com/acme/mono/compare/v1.0.0...v1.1.0)\n\n" +
        "### BREAKING CHANGES\n\n" +
        "- ⚠️ drop node 18 ([ffeeddcc](https://git.example.com/acme/mono/commit/ffeeddccbbaa))\n\n" +
        "### Features\n\n" +
        "- **api**: add parser ([a1b2c3d4](https://git.example.com/acme/mono/commit/a1b2c3d4e5f6))\n\n" +
        "### Bug Fixes\n\n" +
        "- crash on empty input ([00112233](https://git.example.com/acme/mono/commit/0011223344))\n\n",
    );
  });

  it("should keep breaking commits in their groups when not listed separately", () => {
    const generator = new ChangelogGenerator({ grouping: "type", includeBreakingChanges: false, typeTitles: {} });

    expect(generator.renderSection(input)).toBe(
      "## [1.1.0] - 2026-03-01\n\n" +
        "### Features\n\n" +
        "- **api**: add parser (a1b2c3d4)\n" +
        "- ⚠️ drop node 18 (ffeeddcc)\n\n" +
        "### Bug Fixes\n\n" +
        "- crash on empty input (00112233)\n\n",
    );
  });

  it("should wrap the markdown document in header and footer", () => {
    const generator = new ChangelogGenerator({ grouping: "none", includeBreakingChanges: true, typeTitles: {} });

    const doc = generator.render({ ...input, commits: [] }, "markdown");

    expect(doc).toBe(CHANGELOG_HEADER + "## [1.1.0] - 2026-03-01\n\n" + CHANGELOG_FOOTER);
  });

  it("should render plain text", () => {
    const generator = new ChangelogGenerator({ grouping: "type", includeBreakingChanges: true, typeTitles: {} });

    expect(generator.render(input, "text")).toBe(
      "Changelog\n\n" +
        "All notable changes to this project will be documented in this file.\n\n" +
        "The format is based on Keep a Changelog,\n" +
        "and this project adheres to Semantic Versioning.\n\n" +
        "1.1.0 - 2026-03-01\n\n" +
        "- api: add parser (a1b2c3d4)\n" +
        "- crash on empty input (00112233)\n" +
        "- [BREAKING] drop node 18 (ffeeddcc)\n" +
        CHANGELOG_FOOTER,
    );
  });

  it("should render json with metadata and indexes", () => {
    const generator = new ChangelogGenerator({
      grouping: "type",
      includeBreakingChanges: true,
      repositoryUrl: "https://git.example.com/acme/mono",
      typeTitles: {},
    });

    const doc: unknown = JSON.parse(generator.render(input, "json"));

    expect(doc).toMatchObject({
      metadata: {
        package: "core",
        version: "1.1.0",
        previous_version: "1.0.0",
        compare_url: "https://git.example.com/acme/mono/compare/v1.0.0...v1.1.0",
      },
      commits: {
        total: 3,
        breaking_changes: 1,
        by_type: {
          feat: [{ description: "add parser" }, { description: "drop node 18" }],
          fix: [{ description: "crash on empty input" }],
        },
        by_scope: { api: [{ hash: "a1b2c3d4e5f6" }] },
      },
    });
  });
});

describe("stripMarkdown", () => {
  it("should drop headings, links and emphasis", () => {
    expect(stripMarkdown("## Title\n**bold** `code` [site](https://example.com)")).toBe("Title\nbold code site");
  });
});
