import type { DependencySection } from "./workspace";

export type BumpStrategy =
  | { kind: "major" }
  | { kind: "minor" }
  | { kind: "patch" }
  | { kind: "snapshot"; identifier: string }
  | { kind: "cascade" };

export type BumpStrategyKind = BumpStrategy["kind"];

export const Bump = {
  major: { kind: "major" },
  minor: { kind: "minor" },
  patch: { kind: "patch" },
  cascade: { kind: "cascade" },
  snapshot: (identifier: string): BumpStrategy => ({ kind: "snapshot", identifier }),
} as const satisfies Record<string, BumpStrategy | ((identifier: string) => BumpStrategy)>;

export type ExecutionMode = "preview" | "apply";

export interface ChangeSet {
  targetPackages: ReadonlyMap<string, BumpStrategy>;
  description: string;
  executionMode: ExecutionMode;
}

export type ReferenceUpdateKind = "workspace-protocol" | "keep-range" | "fixed-version";

export interface ReferenceUpdate {
  /** Package whose manifest holds the reference. */
  package: string;
  dependency: string;
  section: DependencySection;
  fromRef: string;
  toRef: string;
  kind: ReferenceUpdateKind;
}

export interface CascadeAnalysis {
  primary: Map<string, BumpStrategy>;
  cascade: Map<string, BumpStrategy>;
  currentVersions: Map<string, string>;
  newVersions: Map<string, string>;
  referenceUpdates: ReferenceUpdate[];
  affectedPackages: string[];
  warnings: string[];
  errors: string[];
}

export interface VersionBumpReport {
  mode: ExecutionMode;
  primaryBumps: Map<string, string>;
  cascadeBumps: Map<string, string>;
  referenceUpdates: ReferenceUpdate[];
  affectedPackages: string[];
  warnings: string[];
  errors: string[];
  cancelled: boolean;
}
