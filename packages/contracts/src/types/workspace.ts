import type { ManifestPerson, ManifestRepository, WorkspacesDeclaration } from "../schema/manifest.schema";

export type MonorepoKind =
  | "lerna"
  | "yarn-workspaces"
  | "pnpm-workspaces"
  | "nx"
  | "turborepo"
  | "rush"
  | "custom";

export const DEPENDENCY_SECTIONS = [
  "dependencies",
  "devDependencies",
  "peerDependencies",
  "optionalDependencies",
] as const;

export type DependencySection = (typeof DEPENDENCY_SECTIONS)[number];

/** Sections that create workspace edges. optionalDependencies never do. */
export const WORKSPACE_EDGE_SECTIONS: readonly DependencySection[] = [
  "dependencies",
  "devDependencies",
  "peerDependencies",
];

export type DependencyMap = Record<string, string>;

export interface PackageManifest {
  name: string;
  version: string;
  description?: string;
  license?: string;
  main?: string;
  private?: boolean;
  author?: ManifestPerson;
  repository?: ManifestRepository;
  dependencies: DependencyMap;
  devDependencies: DependencyMap;
  peerDependencies: DependencyMap;
  optionalDependencies: DependencyMap;
  scripts: Record<string, string>;
  workspaces?: WorkspacesDeclaration;
  /** Every key not listed above, kept verbatim. */
  extra: Record<string, unknown>;
}

export interface WorkspacePackage {
  manifest: PackageManifest;
  /** Directory that holds the manifest. */
  absolutePath: string;
  /** POSIX path from the workspace root; "." for a root package. */
  relativePath: string;
  manifestPath: string;
  workspaceDependencies: Set<string>;
  dependents: Set<string>;
}

export interface GraphDiagnostics {
  warnings: string[];
  cycles: string[][];
  timedOut: boolean;
  cancelled: boolean;
}
