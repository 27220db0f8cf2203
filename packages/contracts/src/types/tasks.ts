import type { AffectedPackages, PackageChange } from "./changes";

export interface CommandSpec {
  program: string;
  args: string[];
  /** Relative to the package directory unless absolute. */
  cwd?: string;
  env?: Record<string, string>;
}

export type PackageSelector = "self" | "dependents" | "all";

export type FilePatternKind = "exact" | "prefix" | "suffix" | "glob" | "regex";

export interface FilePattern {
  kind: FilePatternKind;
  pattern: string;
  exclude: boolean;
}

export type VersionChangeLevel = "any" | "patch-or-higher" | "minor-or-major" | "major";

export interface DependencyChangeFilter {
  /** Globs over dependency names; empty or missing means every dependency. */
  include?: string[];
  exclude?: string[];
  versionChange?: VersionChangeLevel;
}

export type BranchCondition =
  | { kind: "equals"; branch: string }
  | { kind: "matches"; pattern: string }
  | { kind: "one-of"; branches: string[] }
  | { kind: "none-of"; branches: string[] }
  | { kind: "is-main" }
  | { kind: "is-feature" }
  | { kind: "is-release" }
  | { kind: "is-hotfix" };

/** Known names, or the raw lowercased value for anything else. */
export type EnvironmentName = "development" | "staging" | "integration" | "production" | (string & {});

export type EnvironmentCondition =
  | { kind: "variable-exists"; name: string }
  | { kind: "variable-equals"; name: string; value: string }
  | { kind: "variable-matches"; name: string; pattern: string }
  | { kind: "is"; environment: EnvironmentName }
  | { kind: "one-of"; environments: EnvironmentName[] }
  | { kind: "not"; condition: EnvironmentCondition }
  | { kind: "custom"; checker: string };

export type TaskCondition =
  | { type: "packages-changed"; packages: string[] }
  | { type: "files-changed"; patterns: FilePattern[] }
  | { type: "dependencies-changed"; filter?: DependencyChangeFilter }
  | { type: "on-branch"; condition: BranchCondition }
  | { type: "environment"; condition: EnvironmentCondition }
  | { type: "all"; conditions: TaskCondition[] }
  | { type: "any"; conditions: TaskCondition[] }
  | { type: "not"; condition: TaskCondition }
  | { type: "custom-script"; script: string; expectedOutput?: string };

export interface ArtifactPattern {
  /** Glob relative to the package directory. */
  pattern: string;
  kind?: string;
}

export interface TaskDefinition {
  name: string;
  description?: string;
  commands: CommandSpec[];
  conditions: TaskCondition[];
  affects: PackageSelector;
  timeoutMs?: number;
  continueOnError?: boolean;
  artifacts?: ArtifactPattern[];
}

export interface ExecutionContext {
  changedFiles: string[];
  affectedPackages: AffectedPackages;
  currentBranch?: string;
  environment: Record<string, string>;
  workingDirectory?: string;
  /** Dependency hints per package; read by dependencies-changed conditions. */
  packageChanges?: PackageChange[];
}
