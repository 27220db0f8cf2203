import type { Commit, CommitGrouping, CommitGroup, ConventionalCommit } from "@monoweave/contracts";

const HEADER = /^(\w[\w-]*)(?:\(([^()]*)\))?(!)?:\s*(.+)$/;
const BREAKING_FOOTER = /^BREAKING[ -]CHANGE:\s*([\s\S]*)$/m;

export const TYPE_ORDER = ["feat", "fix", "perf", "refactor", "revert", "docs", "style", "test", "build", "ci", "chore"];

export const DEFAULT_TYPE_TITLES: Record<string, string> = {
  feat: "Features",
  fix: "Bug Fixes",
  perf: "Performance Improvements",
  refactor: "Code Refactoring",
  revert: "Reverts",
  docs: "Documentation",
  style: "Styles",
  test: "Tests",
  build: "Build System",
  ci: "Continuous Integration",
  chore: "Chores",
};

export const OTHER_CHANGES = "Other Changes";

const TYPE_ALIASES: Record<string, string> = { feature: "feat" };

export interface CommitMeta {
  hash?: string;
  authorName?: string;
  date?: string;
}

/**
 * `type(scope)!: description`, optional body, `BREAKING CHANGE:` footer.
 * Anything else becomes a chore whose description is the whole message.
 */
export function parseConventionalCommit(message: string, meta: CommitMeta = {}): ConventionalCommit {
  const trimmed = message.trim();
  const [headerLine = "", ...restLines] = trimmed.split("\n");
  const body = restLines.join("\n").trim() || undefined;
  const base = { hash: meta.hash ?? "", authorName: meta.authorName, date: meta.date };

  const match = HEADER.exec(headerLine.trim());
  if (!match) {
    return { ...base, type: "chore", description: trimmed, breaking: false };
  }

  const [, type = "chore", scope, bang, description = ""] = match;
  const footer = body ? BREAKING_FOOTER.exec(body) : null;
  const lowered = type.toLowerCase();

  return {
    ...base,
    type: TYPE_ALIASES[lowered] ?? lowered,
    scope: scope?.trim() || undefined,
    description: description.trim(),
    body,
    breaking: bang === "!" || footer !== null,
    breakingDescription: footer?.[1]?.trim() || undefined,
  };
}

export function parseCommit(commit: Commit): ConventionalCommit {
  return parseConventionalCommit(commit.message, {
    hash: commit.hash,
    authorName: commit.authorName,
    date: commit.authorDate,
  });
}

export function isFeature(commit: ConventionalCommit): boolean {
  return commit.type === "feat";
}

/**
 * Groups in render order. By type: known types in TYPE_ORDER, then
 * unknown types together under "Other Changes". By scope: scopes sorted,
 * then unscoped commits under "Other Changes".
 */
export function groupCommits(
  commits: readonly ConventionalCommit[],
  grouping: CommitGrouping,
  titles: Record<string, string> = {},
): CommitGroup[] {
  if (grouping === "none") {
    return commits.length > 0 ? [{ title: "Changes", commits: [...commits] }] : [];
  }

  if (grouping === "scope") {
    const byScope = new Map<string, ConventionalCommit[]>();
    const unscoped: ConventionalCommit[] = [];
    for (const commit of commits) {
      if (commit.scope) {
        byScope.set(commit.scope, [...(byScope.get(commit.scope) ?? []), commit]);
      } else {
        unscoped.push(commit);
      }
    }
    const groups = [...byScope.keys()].sort().map((scope) => ({ title: scope, commits: byScope.get(scope) ?? [] }));
    return unscoped.length > 0 ? [...groups, { title: OTHER_CHANGES, commits: unscoped }] : groups;
  }

  const groups: CommitGroup[] = [];
  for (const type of TYPE_ORDER) {
    const matching = commits.filter((c) => c.type === type);
    if (matching.length > 0) {
      groups.push({ title: titles[type] ?? DEFAULT_TYPE_TITLES[type] ?? type, commits: matching });
    }
  }
  const other = commits.filter((c) => !TYPE_ORDER.includes(c.type));
  if (other.length > 0) {
    groups.push({ title: OTHER_CHANGES, commits: other });
  }
  return groups;
}
