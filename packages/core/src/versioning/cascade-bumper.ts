import PQueue from "p-queue";
import { Bump, WORKSPACE_EDGE_SECTIONS, isMonoweaveError, toErrorMessage } from "@monoweave/contracts";
import type {
  BumpStrategy,
  CascadeAnalysis,
  ChangeSet,
  ReferenceUpdate,
  VersionBumpReport,
  VersioningConfig,
} from "@monoweave/contracts";
import type { FileSystem } from "@monoweave/adapters";
import { createLogger } from "@monoweave/adapters";
import type { WorkspaceGraph } from "../graph/graph";
import { ManifestEditor } from "../manifest/editor";
import { applyStrategy, compareStrategies, describeStrategy, highestStrategy, isValidSnapshotId } from "./semver";
import { SnapshotHistory } from "./snapshot";
import { computeReference } from "./references";
import { groupMembership } from "./groups";

const log = createLogger("versioning");

export interface CascadeBumperOptions {
  config: VersioningConfig;
  fs: FileSystem;
  history?: SnapshotHistory;
  ioConcurrency?: number;
  /** Called after Apply wrote its manifests. */
  onApplied?: () => void;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

/**
 * Plans version bumps for a change set under the configured strategy and,
 * in apply mode, writes them. Preview and apply share analyze(); only the
 * final write differs.
 */
export class CascadeBumper {
  readonly history: SnapshotHistory;

  constructor(
    private readonly graph: WorkspaceGraph,
    private readonly options: CascadeBumperOptions,
  ) {
    this.history = options.history ?? new SnapshotHistory();
    for (const pkg of graph.packages) {
      this.history.record(pkg.manifest.version);
    }
  }

  private get config() {
    return this.options.config;
  }

  private isIndependent(name: string) {
    return this.config.independentPackages.includes(name);
  }

  analyze(changeSet: ChangeSet, claimSnapshots = false): CascadeAnalysis {
    const errors: string[] = [];
    const primary = new Map<string, BumpStrategy>();

    for (const [name, strategy] of changeSet.targetPackages) {
      if (!this.graph.has(name)) {
        errors.push(`Unknown package '${name}'`);
        continue;
      }
      if (strategy.kind === "snapshot" && !isValidSnapshotId(strategy.identifier)) {
        errors.push(`Invalid snapshot identifier '${strategy.identifier}' for '${name}'`);
        continue;
      }
      primary.set(name, strategy);
    }

    const cascade = this.cascadeFor(primary);

    // preview claims into a scratch copy
    const history = claimSnapshots ? this.history : this.history.clone();
    const currentVersions = new Map<string, string>();
    const newVersions = new Map<string, string>();
    for (const [name, strategy] of [...primary, ...cascade]) {
      const current = this.graph.get(name)?.manifest.version ?? "";
      try {
        newVersions.set(name, applyStrategy(strategy, current, history));
        currentVersions.set(name, current);
      } catch (error) {
        errors.push(`${name}: ${toErrorMessage(error)}`);
        primary.delete(name);
        cascade.delete(name);
      }
    }

    const referenceUpdates = this.referenceUpdates(newVersions);
    const affectedPackages = this.affected(newVersions);
    const warnings = this.warnings(primary, cascade);

    return { primary, cascade, currentVersions, newVersions, referenceUpdates, affectedPackages, warnings, errors };
  }

  private cascadeFor(primary: Map<string, BumpStrategy>): Map<string, BumpStrategy> {
    switch (this.config.strategy) {
      case "individual":
        return this.individual(primary, [...primary.keys()]);
      case "unified":
        return this.unified(primary);
      case "mixed":
        return this.mixed(primary);
    }
  }

  /** Direct dependents of each source get patch, or major when syncOnMajorBump applies. */
  private individual(primary: Map<string, BumpStrategy>, sources: string[]): Map<string, BumpStrategy> {
    const cascade = new Map<string, BumpStrategy>();
    for (const source of sources) {
      const strategy = primary.get(source);
      const pkg = this.graph.get(source);
      if (!strategy || !pkg) { continue; }
      for (const dependent of pkg.dependents) {
        if (primary.has(dependent)) { continue; }
        const next: BumpStrategy =
          this.config.syncOnMajorBump && strategy.kind === "major" && !this.isIndependent(dependent) ? Bump.major : Bump.patch;
        const existing = cascade.get(dependent);
        if (!existing || compareStrategies(next, existing) > 0) {
          cascade.set(dependent, next);
        }
      }
    }
    return cascade;
  }

  /** Every non-independent package moves by the most severe primary strategy. */
  private unified(primary: Map<string, BumpStrategy>): Map<string, BumpStrategy> {
    const cascade = new Map<string, BumpStrategy>();
    const top = highestStrategy(primary.values());
    if (!top) { return cascade; }
    const unified = top.kind === "cascade" ? Bump.patch : top;

    for (const name of this.graph.names()) {
      if (this.isIndependent(name)) { continue; }
      if (primary.has(name)) {
        primary.set(name, unified);
      } else {
        cascade.set(name, unified);
      }
    }
    return cascade;
  }

  /**
   * Unified inside each group holding a primary: every other member moves by
   * the group's strategy, independent members included. Ungrouped primaries
   * cascade individually, but never into a member of such a group.
   */
  private mixed(primary: Map<string, BumpStrategy>): Map<string, BumpStrategy> {
    const { groups, groupOf, warnings } = groupMembership(this.graph.names(), this.config);
    for (const warning of warnings) { log.warn(warning); }

    const cascade = new Map<string, BumpStrategy>();
    const locked = new Set<string>();
    for (const members of groups.values()) {
      const inGroup = members.filter((m) => primary.has(m));
      const top = highestStrategy(inGroup.flatMap((m) => primary.get(m) ?? []));
      if (!top) { continue; }
      const groupStrategy = top.kind === "cascade" ? Bump.patch : top;
      for (const member of members) {
        locked.add(member);
        if (primary.has(member)) {
          primary.set(member, groupStrategy);
        } else {
          cascade.set(member, groupStrategy);
        }
      }
    }

    const ungrouped = [...primary.keys()].filter((name) => !groupOf.has(name));
    for (const [name, strategy] of this.individual(primary, ungrouped)) {
      if (locked.has(name)) { continue; }
      const existing = cascade.get(name);
      if (!existing || compareStrategies(strategy, existing) > 0) {
        cascade.set(name, strategy);
      }
    }
    return cascade;
  }

  private referenceUpdates(newVersions: Map<string, string>): ReferenceUpdate[] {
    const updates: ReferenceUpdate[] = [];
    for (const pkg of this.graph.packages) {
      for (const section of WORKSPACE_EDGE_SECTIONS) {
        for (const [dependency, fromRef] of Object.entries(pkg.manifest[section])) {
          const version = newVersions.get(dependency);
          if (version === undefined) { continue; }
          const rewrite = computeReference(fromRef, version);
          if (!rewrite || rewrite.toRef === fromRef) { continue; }
          updates.push({ package: pkg.manifest.name, dependency, section, fromRef, toRef: rewrite.toRef, kind: rewrite.kind });
        }
      }
    }
    return updates;
  }

  private affected(newVersions: Map<string, string>): string[] {
    return this.graph.names().filter((name) => {
      if (newVersions.has(name)) { return false; }
      const pkg = this.graph.get(name);
      return pkg !== undefined && [...pkg.workspaceDependencies].some((dep) => newVersions.has(dep));
    });
  }

  private warnings(primary: Map<string, BumpStrategy>, cascade: Map<string, BumpStrategy>): string[] {
    const warnings: string[] = [];
    if (this.config.strategy === "unified" && [...primary.values()].some((s) => s.kind === "major")) {
      warnings.push("Major version bump in Unified strategy will affect all packages");
    }
    const total = primary.size + cascade.size;
    if (total > this.config.largeCascadeThreshold) {
      warnings.push(`Large cascade impact: ${total} packages will be affected`);
    }
    for (const name of primary.keys()) {
      const dependents = this.graph.get(name)?.dependents.size ?? 0;
      if (dependents > this.config.manyDependentsThreshold) {
        warnings.push(`Package '${name}' has ${dependents} dependents - consider impact`);
      }
    }
    return warnings;
  }

  async execute(changeSet: ChangeSet, options: ExecuteOptions = {}): Promise<VersionBumpReport> {
    const apply = changeSet.executionMode === "apply";
    const analysis = this.analyze(changeSet, apply);
    const report: VersionBumpReport = {
      mode: changeSet.executionMode,
      primaryBumps: new Map([...analysis.primary.keys()].flatMap((n) => versionEntry(analysis.newVersions, n))),
      cascadeBumps: new Map([...analysis.cascade.keys()].flatMap((n) => versionEntry(analysis.newVersions, n))),
      referenceUpdates: analysis.referenceUpdates,
      affectedPackages: analysis.affectedPackages,
      warnings: analysis.warnings,
      errors: analysis.errors,
      cancelled: false,
    };

    log.info(`${apply ? "applying" : "previewing"} version bumps`, {
      description: changeSet.description,
      strategy: this.config.strategy,
      primary: [...analysis.primary].map(([n, s]) => `${n}:${describeStrategy(s)}`),
      cascade: analysis.cascade.size,
    });

    if (!apply) { return report; }

    const written = await this.write(analysis, report, options.signal);
    log.info("version bumps applied", { manifests: written, errors: report.errors.length, cancelled: report.cancelled });
    this.options.onApplied?.();
    return report;
  }

  /** One read-modify-write per manifest, parallel across manifests. */
  private async write(analysis: CascadeAnalysis, report: VersionBumpReport, signal?: AbortSignal): Promise<number> {
    const edits = new Map<string, { version?: string; refs: ReferenceUpdate[] }>();
    const editFor = (name: string) => {
      const path = this.graph.get(name)?.manifestPath;
      if (!path) { return undefined; }
      let edit = edits.get(path);
      if (!edit) {
        edit = { refs: [] };
        edits.set(path, edit);
      }
      return edit;
    };

    for (const [name, version] of analysis.newVersions) {
      const edit = editFor(name);
      if (edit) { edit.version = version; }
    }
    for (const update of analysis.referenceUpdates) {
      editFor(update.package)?.refs.push(update);
    }

    const queue = new PQueue({ concurrency: this.options.ioConcurrency ?? 8 });
    let written = 0;

    await Promise.all(
      [...edits].map(([path, edit]) =>
        queue.add(async () => {
          if (signal?.aborted) {
            report.cancelled = true;
            return;
          }
          try {
            const editor = await ManifestEditor.load(this.options.fs, path);
            if (edit.version !== undefined) { editor.setVersion(edit.version); }
            for (const ref of edit.refs) {
              editor.updateDependency(ref.section, ref.dependency, ref.toRef);
            }
            if (await editor.save(this.options.fs)) { written += 1; }
          } catch (error) {
            const message = isMonoweaveError(error) ? error.message : toErrorMessage(error);
            report.errors.push(`${path}: ${message}`);
            log.error("failed to write manifest", { path, error: message });
          }
        }),
      ),
    );
    return written;
  }
}

function versionEntry(versions: Map<string, string>, name: string): Array<[string, string]> {
  const version = versions.get(name);
  return version === undefined ? [] : [[name, version]];
}
