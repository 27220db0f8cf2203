import type { ChangelogConfig, ChangelogFormat, ChangelogInput, ConventionalCommit } from "@monoweave/contracts";
import { groupCommits } from "./conventional";

export const CHANGELOG_HEADER =
  "# Changelog\n\n" +
  "All notable changes to this project will be documented in this file.\n\n" +
  "The format is based on [Keep a Changelog](https://keepachangelog.com/en/1.0.0/),\n" +
  "and this project adheres to [Semantic Versioning](https://semver.org/spec/v2.0.0.html).\n\n";

export const CHANGELOG_FOOTER = "\n---\n\nGenerated by monoweave\n";

const shortHash = (hash: string) => hash.slice(0, 8);

export function stripMarkdown(text: string): string {
  return text
    .replace(/^#+ /gm, "")
    .replace(/\[([^\]]*)\]\([^)]*\)/g, "$1")
    .replace(/\*\*/g, "")
    .replace(/[*`]/g, "");
}

export type ChangelogRenderOptions = Pick<ChangelogConfig, "grouping" | "includeBreakingChanges" | "repositoryUrl" | "typeTitles">;

export class ChangelogGenerator {
  constructor(private readonly options: ChangelogRenderOptions) {}

  compareUrl(input: ChangelogInput): string | undefined {
    const repo = this.options.repositoryUrl?.replace(/\/+$/, "");
    if (!repo || !input.previousVersion) { return undefined; }
    return `${repo}/compare/v${input.previousVersion}...v${input.version}`;
  }

  render(input: ChangelogInput, format: ChangelogFormat): string {
    switch (format) {
      case "markdown":
        return CHANGELOG_HEADER + this.renderSection(input) + CHANGELOG_FOOTER;
      case "text":
        return this.renderText(input);
      case "json":
        return this.renderJson(input);
    }
  }

  /** The markdown block of one version, without preamble and footer. */
  renderSection(input: ChangelogInput): string {
    let out = `## [${input.version}] - ${input.date}\n\n`;
    const compare = this.compareUrl(input);
    if (compare) {
      out += `[Compare changes](${compare})\n\n`;
    }

    const breaking = input.commits.filter((c) => c.breaking);
    const showBreaking = this.options.includeBreakingChanges && breaking.length > 0;
    if (showBreaking) {
      out += "### BREAKING CHANGES\n\n";
      out += breaking.map((c) => this.bullet(c)).join("");
      out += "\n";
    }

    const rest = this.options.includeBreakingChanges ? input.commits.filter((c) => !c.breaking) : input.commits;
    for (const group of groupCommits(rest, this.options.grouping, this.options.typeTitles)) {
      out += `### ${group.title}\n\n`;
      out += group.commits.map((c) => this.bullet(c)).join("");
      out += "\n";
    }
    return out;
  }

  private bullet(commit: ConventionalCommit): string {
    const scope = commit.scope ? `**${commit.scope}**: ` : "";
    const marker = commit.breaking ? "⚠️ " : "";
    const repo = this.options.repositoryUrl?.replace(/\/+$/, "");
    const link = repo ? `[${shortHash(commit.hash)}](${repo}/commit/${commit.hash})` : shortHash(commit.hash);
    return `- ${marker}${scope}${commit.description} (${link})\n`;
  }

  private renderText(input: ChangelogInput): string {
    let out = stripMarkdown(CHANGELOG_HEADER) + `${input.version} - ${input.date}\n\n`;
    for (const commit of input.commits) {
      const scope = commit.scope ? `${commit.scope}: ` : "";
      const marker = commit.breaking ? "[BREAKING] " : "";
      out += `- ${marker}${scope}${commit.description} (${shortHash(commit.hash)})\n`;
    }
    return out + stripMarkdown(CHANGELOG_FOOTER);
  }

  private renderJson(input: ChangelogInput): string {
    const byType: Record<string, ConventionalCommit[]> = {};
    const byScope: Record<string, ConventionalCommit[]> = {};
    for (const commit of input.commits) {
      (byType[commit.type] ??= []).push(commit);
      if (commit.scope) {
        (byScope[commit.scope] ??= []).push(commit);
      }
    }

    const metadata = {
      package: input.packageName,
      version: input.version,
      date: input.date,
      previous_version: input.previousVersion,
      repository_url: this.options.repositoryUrl,
      compare_url: this.compareUrl(input),
    };

    return JSON.stringify(
      {
        metadata,
        commits: {
          total: input.commits.length,
          breaking_changes: input.commits.filter((c) => c.breaking).length,
          by_type: byType,
          by_scope: byScope,
          all: input.commits,
        },
      },
      null,
      2,
    );
  }
}
