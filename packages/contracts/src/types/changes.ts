import type { DependencySection } from "./workspace";

export type ChangeKind = "added" | "modified" | "deleted" | "renamed";

export interface ChangedFile {
  /** POSIX path relative to the repository root. */
  path: string;
  kind: ChangeKind;
  /** Set for renames. */
  previousPath?: string;
}

export interface Commit {
  hash: string;
  message: string;
  authorName: string;
  authorEmail: string;
  /** ISO 8601 */
  authorDate: string;
  /** Paths touched by the commit, when the repository reports them. */
  files?: string[];
}

export type DependencyHintKind = "added" | "removed" | "upgraded" | "downgraded" | "changed";

export interface DependencyHint {
  name: string;
  section: DependencySection;
  kind: DependencyHintKind;
  from?: string;
  to?: string;
}

export type VersionSuggestion = "major" | "minor" | "patch" | "none";

export type ChangeReason = "files" | "root-dependencies";

export interface PackageChange {
  packageName: string;
  changedPaths: string[];
  hints: DependencyHint[];
  suggestedVersionBump?: Exclude<VersionSuggestion, "none">;
  reasons: ChangeReason[];
}

export interface AffectedPackages {
  directlyAffected: Set<string>;
  dependentsAffected: Set<string>;
  totalAffectedCount: number;
}

export interface ChangeAnalysis {
  base: string;
  head?: string;
  changedFiles: ChangedFile[];
  packageChanges: PackageChange[];
  affectedPackages: AffectedPackages;
  rootDependenciesChanged: boolean;
  /** Changed files that belong to no package. */
  unownedFiles: string[];
}
