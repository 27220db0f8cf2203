import type { ChangedFile, Commit } from "@monoweave/contracts";

/** Version-control capability. Revisions are anything git accepts. */
export interface Repository {
  /** undefined on a detached HEAD. */
  currentBranch(): Promise<string | undefined>;
  /** Newest first. since is exclusive, until inclusive (default HEAD). */
  commitsSince(since?: string, until?: string): Promise<Commit[]>;
  changedFiles(base: string, head?: string): Promise<ChangedFile[]>;
  /** Content of path at ref, or undefined when it did not exist there. */
  readFileAt(ref: string, path: string): Promise<string | undefined>;
}
