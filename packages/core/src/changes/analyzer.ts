import { join } from "node:path";
import { IoError } from "@monoweave/contracts";
import type { ChangeAnalysis, ChangedFile, Commit, PackageChange } from "@monoweave/contracts";
import type { FileSystem, Repository } from "@monoweave/adapters";
import { createLogger } from "@monoweave/adapters";
import type { WorkspaceGraph } from "../graph/graph";
import { diffDependencies, readDependencySections } from "../manifest/diff";
import { isWithin, manifestPathOf, relativeTo } from "../utils/paths";
import { suggestVersionBump } from "./significance";

const log = createLogger("changes");

export class ChangeAnalyzer {
  constructor(
    private readonly graph: WorkspaceGraph,
    private readonly repository: Repository,
    private readonly fs: FileSystem,
  ) {}

  /** Content of a repository file at head, or in the working tree when head is omitted. */
  private async readAt(path: string, head?: string): Promise<string | undefined> {
    if (head) { return this.repository.readFileAt(head, path); }
    const abs = join(this.graph.root, path);
    if (!(await this.fs.exists(abs))) { return undefined; }
    return this.fs.readFile(abs);
  }

  private async manifestHints(path: string, base: string, head?: string) {
    const [before, after] = await Promise.all([this.repository.readFileAt(base, path), this.readAt(path, head)]);
    return diffDependencies(readDependencySections(before), readDependencySections(after));
  }

  async detectChangesSince(base: string, head?: string): Promise<ChangeAnalysis> {
    let changedFiles: ChangedFile[];
    try {
      changedFiles = await this.repository.changedFiles(base, head);
    } catch (error) {
      throw error instanceof IoError ? error : new IoError("git", this.graph.root, error);
    }

    const changes = new Map<string, PackageChange>();
    const unownedFiles: string[] = [];
    const record = (name: string) => {
      let change = changes.get(name);
      if (!change) {
        change = { packageName: name, changedPaths: [], hints: [], reasons: [] };
        changes.set(name, change);
      }
      return change;
    };

    for (const file of changedFiles) {
      const paths = file.previousPath ? [file.path, file.previousPath] : [file.path];
      let owned = false;
      for (const path of paths) {
        const pkg = this.graph.packageForPath(path);
        if (!pkg) { continue; }
        owned = true;
        const change = record(pkg.manifest.name);
        if (!change.changedPaths.includes(path)) { change.changedPaths.push(path); }
        if (!change.reasons.includes("files")) { change.reasons.push("files"); }
        if (path === manifestPathOf(pkg.relativePath)) {
          change.hints.push(...(await this.manifestHints(path, base, head)));
        }
      }
      if (!owned) { unownedFiles.push(file.path); }
    }

    let rootDependenciesChanged = false;
    if (unownedFiles.includes("package.json")) {
      const hints = await this.manifestHints("package.json", base, head);
      rootDependenciesChanged = hints.length > 0;
      if (rootDependenciesChanged) {
        log.info("root dependencies changed; every package is affected", { hints: hints.length });
        for (const name of this.graph.names()) {
          const change = record(name);
          change.reasons.push("root-dependencies");
        }
      }
    }

    const commits = await this.repository.commitsSince(base, head);
    for (const change of changes.values()) {
      const pkg = this.graph.get(change.packageName);
      if (!pkg) { continue; }
      const touching = commitsTouching(commits, pkg.relativePath);
      const files = change.changedPaths.map((p) => relativeTo(pkg.relativePath, p));
      const suggestion = suggestVersionBump(touching, files);
      if (suggestion !== "none") { change.suggestedVersionBump = suggestion; }
    }

    // graph order keeps the result deterministic
    const packageChanges = this.graph.names().flatMap((name) => {
      const change = changes.get(name);
      return change ? [change] : [];
    });
    const directlyAffected = new Set(packageChanges.map((c) => c.packageName));
    const dependentsAffected = this.graph.dependentsOfAll(directlyAffected);
    for (const name of directlyAffected) {
      dependentsAffected.delete(name);
    }

    return {
      base,
      head,
      changedFiles,
      packageChanges,
      affectedPackages: {
        directlyAffected,
        dependentsAffected,
        totalAffectedCount: directlyAffected.size + dependentsAffected.size,
      },
      rootDependenciesChanged,
      unownedFiles,
    };
  }
}

export function commitsTouching(commits: readonly Commit[], relativeDir: string): Commit[] {
  return commits.filter((c) => (c.files ?? []).some((file) => isWithin(relativeDir, file)));
}
