import { posix } from "node:path";
import type { Commit, VersionSuggestion } from "@monoweave/contracts";
import { isFeature, parseConventionalCommit } from "../changelog/conventional";

/** Entry points, lib/, type declarations and the manifest. Paths are package-relative. */
export function isPublicApiFile(path: string): boolean {
  const base = posix.basename(path);
  return (
    path === "package.json" ||
    path.startsWith("lib/") ||
    base.startsWith("index.") ||
    base.startsWith("types.") ||
    base.endsWith(".d.ts")
  );
}

export function isBreakingMessage(message: string): boolean {
  return message.includes("BREAKING CHANGE") || parseConventionalCommit(message).breaking;
}

/**
 * Breaking wins. Public-API files mean major unless a feat commit exists,
 * then minor. Otherwise feat means minor and any change at all means patch.
 */
export function suggestVersionBump(commits: readonly Pick<Commit, "message">[], files: readonly string[]): VersionSuggestion {
  if (commits.some((c) => isBreakingMessage(c.message))) { return "major"; }

  const hasFeature = commits.some((c) => isFeature(parseConventionalCommit(c.message)));
  if (files.some(isPublicApiFile)) {
    return hasFeature ? "minor" : "major";
  }
  if (hasFeature) { return "minor"; }
  return files.length > 0 || commits.length > 0 ? "patch" : "none";
}
