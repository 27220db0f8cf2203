import type { ChangedFile, Commit } from "@monoweave/contracts";
import type { Repository } from "./types";

export interface MemoryRepositoryInit {
  branch?: string;
  /** Oldest first. */
  commits?: Commit[];
}

/** In-memory Repository for tests. */
export class MemoryRepository implements Repository {
  branch: string | undefined;
  private readonly commits: Commit[];
  private readonly diffs = new Map<string, ChangedFile[]>();
  private readonly blobs = new Map<string, string>();

  constructor(init: MemoryRepositoryInit = {}) {
    this.branch = init.branch ?? "main";
    this.commits = [...(init.commits ?? [])];
  }

  addCommit(commit: Commit): this {
    this.commits.push(commit);
    return this;
  }

  setChangedFiles(base: string, files: ChangedFile[], head = "HEAD"): this {
    this.diffs.set(`${base}..${head}`, files);
    return this;
  }

  setFileAt(ref: string, path: string, content: string): this {
    this.blobs.set(`${ref}:${path}`, content);
    return this;
  }

  async currentBranch(): Promise<string | undefined> {
    return this.branch;
  }

  async commitsSince(since?: string, until?: string): Promise<Commit[]> {
    const start = since === undefined ? 0 : this.indexOf(since) + 1;
    const end = until === undefined || until === "HEAD" ? this.commits.length : this.indexOf(until) + 1;
    return this.commits.slice(start, end).reverse();
  }

  async changedFiles(base: string, head?: string): Promise<ChangedFile[]> {
    const explicit = this.diffs.get(`${base}..${head ?? "HEAD"}`);
    if (explicit) { return explicit; }

    const seen = new Map<string, ChangedFile>();
    for (const commit of await this.commitsSince(base, head)) {
      for (const path of commit.files ?? []) {
        if (!seen.has(path)) { seen.set(path, { path, kind: "modified" }); }
      }
    }
    return [...seen.values()].sort((a, b) => a.path.localeCompare(b.path));
  }

  async readFileAt(ref: string, path: string): Promise<string | undefined> {
    return this.blobs.get(`${ref}:${path}`);
  }

  private indexOf(ref: string) {
    return this.commits.findIndex((c) => c.hash === ref || c.hash.startsWith(ref));
  }
}
