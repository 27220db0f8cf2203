import { randomUUID } from "node:crypto";
import { Bump, ChangesetError } from "@monoweave/contracts";
import type {
  BranchesConfig,
  BumpStrategy,
  ChangeSet,
  Changeset,
  ChangesetCoverage,
  ChangesetFilter,
  ChangesetSpec,
  ChangesetValidation,
  ChangesetsConfig,
  ExecutionMode,
} from "@monoweave/contracts";
import { createLogger } from "@monoweave/adapters";
import type { WorkspaceGraph } from "../graph/graph";
import { matchAny } from "../utils/glob";
import { createChangeSet } from "../versioning/changeset";
import { highestStrategy } from "../versioning/semver";
import type { ChangesetStore } from "./store";

const log = createLogger("changesets");

export interface ChangesetManagerOptions {
  config: ChangesetsConfig;
  branches: BranchesConfig;
  now?: () => Date;
  newId?: () => string;
}

export interface CreateChangesetOptions {
  branch?: string;
  author?: string;
}

/** Records intended bumps per package and branch, and turns pending ones into a change set. */
export class ChangesetManager {
  constructor(
    private readonly store: ChangesetStore,
    private readonly graph: WorkspaceGraph,
    private readonly options: ChangesetManagerOptions,
  ) {}

  build(spec: ChangesetSpec, options: CreateChangesetOptions = {}): Changeset {
    const now = this.options.now?.() ?? new Date();
    return {
      id: this.options.newId?.() ?? randomUUID(),
      package: spec.package,
      bump: spec.bump,
      description: spec.description.trim(),
      branch: options.branch ?? "",
      environments: spec.environments ?? [],
      author: spec.author ?? options.author ?? "",
      createdAt: now.toISOString(),
      status: "pending",
    };
  }

  /** Validates and stores a new pending changeset; an invalid one is not stored. */
  async create(spec: ChangesetSpec, options: CreateChangesetOptions = {}): Promise<{ changeset: Changeset; validation: ChangesetValidation }> {
    const changeset = this.build(spec, options);
    const validation = await this.validate(changeset);
    await this.record(changeset, validation);
    return { changeset, validation };
  }

  async record(changeset: Changeset, validation: ChangesetValidation): Promise<void> {
    if (!validation.isValid) {
      throw new ChangesetError(`Changeset validation failed: ${validation.errors.join(", ")}`, {
        context: { package: changeset.package, errors: validation.errors },
      });
    }
    await this.store.save(changeset);
    log.info("created changeset", { id: changeset.id, package: changeset.package, bump: changeset.bump });
  }

  async validate(changeset: Changeset): Promise<ChangesetValidation> {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (changeset.package === "") {
      errors.push("Package name cannot be empty");
    } else if (!this.graph.has(changeset.package)) {
      errors.push(`Package '${changeset.package}' not found in workspace`);
    }

    if (changeset.description === "") {
      errors.push("Description cannot be empty");
    } else if (changeset.description.length < 10) {
      warnings.push("Description is very short - consider providing more detail");
    }

    if (changeset.environments.length === 0) {
      warnings.push("No deployment environments specified");
    }
    for (const env of changeset.environments) {
      if (!this.options.config.environments.includes(env)) {
        warnings.push(`Environment '${env}' is not configured`);
      }
    }

    if (changeset.branch === "") {
      errors.push("Branch name cannot be empty");
    } else {
      const { main, feature, release, hotfix } = this.options.branches;
      const patterns = [...main, ...feature, ...release, ...hotfix];
      if (!matchAny(changeset.branch, patterns)) {
        warnings.push(`Branch '${changeset.branch}' does not follow the configured naming (${patterns.join(", ")})`);
      }
    }

    if (changeset.author === "") {
      errors.push("Author cannot be empty");
    } else if (!changeset.author.includes("@")) {
      warnings.push("Author should be an email address");
    }

    if (changeset.package !== "") {
      const pending = await this.store.list({ package: changeset.package, status: "pending" });
      const conflicts = pending.filter((other) => other.id !== changeset.id && other.branch !== changeset.branch);
      if (conflicts.length > 0) {
        warnings.push(`Found ${conflicts.length} pending changeset(s) for '${changeset.package}' from other branches`);
      }
    }

    return { isValid: errors.length === 0, errors, warnings };
  }

  list(filter: ChangesetFilter = {}): Promise<Changeset[]> {
    return this.store.list(filter);
  }

  remove(id: string): Promise<boolean> {
    return this.store.remove(id);
  }

  pendingFor(branch: string): Promise<Changeset[]> {
    return this.store.list({ branch, status: "pending" });
  }

  /** Splits the packages into those with and without a pending changeset on the branch. */
  async coverage(packages: readonly string[], branch: string | undefined): Promise<ChangesetCoverage> {
    const pending = branch === undefined ? [] : await this.pendingFor(branch);
    const named = new Set(pending.map((c) => c.package));
    return {
      branch,
      covered: packages.filter((p) => named.has(p)),
      uncovered: packages.filter((p) => !named.has(p)),
    };
  }

  /** The most severe bump per package. */
  toChangeSet(changesets: readonly Changeset[], executionMode: ExecutionMode = "preview"): ChangeSet {
    const perPackage = new Map<string, BumpStrategy[]>();
    for (const changeset of changesets) {
      const list = perPackage.get(changeset.package) ?? [];
      list.push(Bump[changeset.bump]);
      perPackage.set(changeset.package, list);
    }
    const targets = new Map<string, BumpStrategy>();
    for (const [name, strategies] of perPackage) {
      const top = highestStrategy(strategies);
      if (top) { targets.set(name, top); }
    }
    const description = changesets.map((c) => c.description).join("\n");
    return createChangeSet(targets, description, executionMode);
  }

  async markApplied(changesets: readonly Changeset[]): Promise<Changeset[]> {
    const appliedAt = (this.options.now?.() ?? new Date()).toISOString();
    const applied: Changeset[] = [];
    for (const changeset of changesets) {
      const next: Changeset = { ...changeset, status: "applied", appliedAt };
      await this.store.save(next);
      applied.push(next);
    }
    return applied;
  }
}
