import { randomUUID } from "node:crypto";
import { resolve } from "node:path";
import { EventPriority, GraphError, OrchestratorError, isMonoweaveError } from "@monoweave/contracts";
import type {
  ChangeAnalysis,
  ChangeSet,
  Changeset,
  ChangesetCoverage,
  ChangesetFilter,
  ChangesetSpec,
  ChangesetValidation,
  ErrorComponent,
  ExecutionContext,
  HookExecutionResult,
  HookType,
  MonoweaveConfig,
  MonoweaveConfigInput,
  TaskDefinition,
  TaskExecutionResult,
  VersionBumpReport,
} from "@monoweave/contracts";
import { GitRepository, NodeFileSystem, ProcessCommandExecutor, createLogger } from "@monoweave/adapters";
import type { CommandExecutor, FileSystem, Repository } from "@monoweave/adapters";
import { ChangelogManager } from "../changelog/manager";
import { ChangeAnalyzer } from "../changes/analyzer";
import { ChangesetManager } from "../changesets/manager";
import { ChangesetStore } from "../changesets/store";
import { CONFIG_FILE, configSource, loadConfig } from "../config/load-config";
import { WorkspaceDiscoverer } from "../discovery/discovery";
import { EventBus } from "../events/bus";
import { createEvent } from "../events/factory";
import type { EventInit } from "../events/factory";
import type { WorkspaceGraph } from "../graph/graph";
import { HookManager } from "../hooks/manager";
import { ConditionChecker } from "../tasks/conditions";
import { createExecutionContext } from "../tasks/context";
import { TaskRegistry } from "../tasks/registry";
import { TaskRunner } from "../tasks/runner";
import { matchAny } from "../utils/glob";
import { CascadeBumper } from "../versioning/cascade-bumper";
import { applyOf } from "../versioning/changeset";
import { SnapshotHistory } from "../versioning/snapshot";

const log = createLogger("monorepo");

const SOURCE = "monoweave";

export interface MonorepoOptions {
  root: string;
  fs?: FileSystem;
  repository?: Repository;
  executor?: CommandExecutor;
  /** Applied on top of monoweave.config.json / package.json "monoweave". */
  config?: MonoweaveConfigInput;
  bus?: EventBus;
  /** Pins the environment seen by task conditions; process.env otherwise. */
  environment?: Record<string, string>;
}

export interface SignalOptions {
  signal?: AbortSignal;
}

export interface RunTaskOptions extends SignalOptions {
  /** Revision to diff against; without it the task sees no changes. */
  base?: string;
  head?: string;
  context?: Partial<ExecutionContext>;
}

export interface ChangelogOptions {
  since?: string;
  until?: string;
  previousVersion?: string;
  date?: string;
}

export interface DevelopmentWorkflowResult {
  analysis: ChangeAnalysis;
  results: TaskExecutionResult[];
  success: boolean;
}

export interface ReleaseWorkflowOptions extends SignalOptions {
  since?: string;
  date?: string;
}

export interface CreateChangesetResult {
  changeset: Changeset;
  validation: ChangesetValidation;
}

export interface ApplyChangesetsResult {
  /** The changesets now marked applied; empty when the bump failed or nothing was pending. */
  changesets: Changeset[];
  report?: VersionBumpReport;
}

export interface RunHookOptions extends SignalOptions {
  /** Defaults to HEAD, which compares the working tree against the last commit. */
  base?: string;
  head?: string;
  /** Branch whose pending changesets a post-merge hook applies. */
  branch?: string;
}

export interface IntegrationWorkflowResult {
  analysis: ChangeAnalysis;
  coverage: ChangesetCoverage;
  results: TaskExecutionResult[];
  dependencyIssues: string[];
  success: boolean;
}

export interface ReleaseWorkflowResult {
  report: VersionBumpReport;
  changelogs: Map<string, string>;
  success: boolean;
}

/** Loads configuration and wires a Monorepo over the given (or default) capabilities. */
export async function createMonorepo(options: MonorepoOptions): Promise<Monorepo> {
  const root = resolve(options.root);
  const fs = options.fs ?? new NodeFileSystem();
  let config: MonoweaveConfig;
  try {
    config = await loadConfig(fs, root, options.config);
  } catch (error) {
    throw wrap("config", error);
  }
  return new Monorepo({ ...options, root, fs }, config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFailure(result: TaskExecutionResult): boolean {
  return result.status.state === "failed" || result.status.state === "timed-out";
}

function wrap(component: ErrorComponent, error: unknown): OrchestratorError {
  if (error instanceof OrchestratorError) { return error; }
  return new OrchestratorError(isMonoweaveError(error) ? error.component : component, error);
}

/**
 * Facade over discovery, change analysis, versioning, tasks and changelogs.
 * Every step reports on `bus`; nothing is delivered until the bus is
 * processed or started.
 */
export class Monorepo {
  readonly root: string;
  readonly fs: FileSystem;
  readonly repository: Repository;
  readonly executor: CommandExecutor;
  readonly bus: EventBus;
  readonly tasks = new TaskRegistry();
  readonly checker: ConditionChecker;
  readonly discoverer: WorkspaceDiscoverer;
  readonly changelog: ChangelogManager;
  readonly changesetStore: ChangesetStore;
  readonly hooks: HookManager;
  private readonly history = new SnapshotHistory();

  constructor(
    private readonly options: MonorepoOptions & { fs: FileSystem },
    readonly config: MonoweaveConfig,
  ) {
    this.root = resolve(options.root);
    this.fs = options.fs;
    this.executor = options.executor ?? new ProcessCommandExecutor();
    this.repository = options.repository ?? new GitRepository(this.root, { executor: this.executor });
    this.bus = options.bus ?? new EventBus(config.events);
    this.discoverer = new WorkspaceDiscoverer(this.fs, { config: config.discovery });
    this.changelog = new ChangelogManager(this.fs, this.repository, config.changelog);
    this.changesetStore = new ChangesetStore(this.fs, this.root, config.changesets.directory);
    this.hooks = new HookManager(config.hooks);
    this.checker = new ConditionChecker({
      branches: config.branches,
      root: this.root,
      executor: this.executor,
      fs: this.fs,
      executeOptions: {
        timeoutMs: config.tasks.commandTimeoutMs,
        gracePeriodMs: config.tasks.gracePeriodMs,
        maxStdoutBytes: config.tasks.maxStdoutBytes,
        maxStderrBytes: config.tasks.maxStderrBytes,
      },
    });
  }

  private emit(init: EventInit, priority: EventPriority = EventPriority.Normal) {
    this.bus.emit(createEvent(init, { source: SOURCE, priority }));
  }

  private async guard<T>(component: ErrorComponent, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      throw wrap(component, error);
    }
  }

  async discover(options: { refresh?: boolean } & SignalOptions = {}): Promise<WorkspaceGraph> {
    const graph = await this.guard("discovery", () => this.discoverer.discover(this.root, options));
    this.emit({ type: "package", kind: "discovery-completed", packages: graph.names(), patterns: [...graph.patterns] });
    return graph;
  }

  async analyzeChanges(base: string, head?: string): Promise<ChangeAnalysis> {
    const graph = await this.discover();
    const analysis = await this.guard("changes", () => new ChangeAnalyzer(graph, this.repository, this.fs).detectChangesSince(base, head));
    const { directlyAffected, dependentsAffected } = analysis.affectedPackages;
    this.emit({
      type: "filesystem",
      kind: "files-changed",
      changedFiles: analysis.changedFiles.map((f) => f.path),
      affectedPackages: [...directlyAffected, ...dependentsAffected],
    });
    return analysis;
  }

  bumpVersions(changeSet: ChangeSet, options: SignalOptions = {}): Promise<VersionBumpReport> {
    return this.bump(changeSet, options, [randomUUID()]);
  }

  private async bump(changeSet: ChangeSet, options: SignalOptions, changesetIds: string[]): Promise<VersionBumpReport> {
    const graph = await this.discover();
    const bumper = new CascadeBumper(graph, {
      config: this.config.versioning,
      fs: this.fs,
      history: this.history,
      ioConcurrency: this.config.discovery.ioConcurrency,
      onApplied: () => this.discoverer.invalidate(this.root),
    });
    const report = await this.guard("version", () => bumper.execute(changeSet, options));

    if (report.mode === "preview") {
      const changesetId = changesetIds.join(",");
      this.emit({ type: "changeset", kind: "validated", changesetId, isValid: report.errors.length === 0, errors: report.errors });
      return report;
    }

    for (const [name, newVersion] of [...report.primaryBumps, ...report.cascadeBumps]) {
      const oldVersion = graph.get(name)?.manifest.version ?? "";
      this.emit({ type: "package", kind: "updated", packageName: name, oldVersion, newVersion });
    }
    this.emit(
      {
        type: "changeset",
        kind: "applied",
        changesets: changesetIds,
        packages: [...report.primaryBumps.keys(), ...report.cascadeBumps.keys()],
      },
      report.errors.length > 0 ? EventPriority.High : EventPriority.Normal,
    );
    return report;
  }

  private async contextFor(analysis?: ChangeAnalysis, overrides: Partial<ExecutionContext> = {}): Promise<ExecutionContext> {
    const currentBranch = await this.guard("io", () => this.repository.currentBranch());
    return createExecutionContext(analysis, { currentBranch, environment: this.options.environment, ...overrides });
  }

  private runner(graph: WorkspaceGraph): TaskRunner {
    return new TaskRunner(graph, this.executor, this.config.tasks, this.checker, this.fs);
  }

  async runTask(task: TaskDefinition, options: RunTaskOptions = {}): Promise<TaskExecutionResult> {
    const graph = await this.discover();
    const analysis = options.base === undefined ? undefined : await this.analyzeChanges(options.base, options.head);
    const context = await this.contextFor(analysis, options.context);
    const { directlyAffected, dependentsAffected } = context.affectedPackages;
    return this.execute(graph, task, [...directlyAffected, ...dependentsAffected], context, options.signal);
  }

  private async execute(
    graph: WorkspaceGraph,
    task: TaskDefinition,
    affected: string[],
    context: ExecutionContext,
    signal?: AbortSignal,
  ): Promise<TaskExecutionResult> {
    this.emit({ type: "task", kind: "started", taskName: task.name, packages: affected });
    const result = await this.guard("task", () => this.runner(graph).run(task, affected, context, { signal }));
    if (isFailure(result)) {
      const error = result.errors[0] ?? (result.status.state === "failed" ? result.status.reason : "timed out");
      this.emit({ type: "task", kind: "failed", taskName: task.name, error }, EventPriority.High);
    } else {
      this.emit({ type: "task", kind: "completed", result });
    }
    return result;
  }

  async generateChangelog(packageName: string, version: string, options: ChangelogOptions = {}): Promise<string> {
    const graph = await this.discover();
    return this.guard("changelog", () => {
      const pkg = graph.get(packageName);
      if (!pkg) {
        throw new GraphError(`Unknown package "${packageName}"`, { code: "ERR_GRAPH_UNKNOWN_PACKAGE", context: { package: packageName } });
      }
      return this.changelog.generateForPackage(pkg, { version, ...options });
    });
  }

  /** Analyze changes, then run every registered task against them. */
  async developmentWorkflow(base: string, options: SignalOptions & { head?: string } = {}): Promise<DevelopmentWorkflowResult> {
    const workflowType = "development";
    const graph = await this.discover();
    const analysis = await this.analyzeChanges(base, options.head);
    const { directlyAffected, dependentsAffected } = analysis.affectedPackages;
    const affected = [...directlyAffected, ...dependentsAffected];
    this.emit({ type: "workflow", kind: "started", workflowType, targetPackages: affected });
    this.emit({ type: "workflow", kind: "stage-completed", workflowType, stage: "analyze", success: true });

    const context = await this.contextFor(analysis);
    const results: TaskExecutionResult[] = [];
    for (const task of this.tasks.list()) {
      if (options.signal?.aborted) { break; }
      results.push(await this.execute(graph, task, affected, context, options.signal));
    }
    const failed = results.filter(isFailure).map((r) => r.taskName);
    const success = failed.length === 0 && options.signal?.aborted !== true;
    this.emit({ type: "workflow", kind: "stage-completed", workflowType, stage: "tasks", success: failed.length === 0 });
    this.emit({
      type: "workflow",
      kind: "completed",
      workflowType,
      success,
      results: { tasks: results.length, failed },
    });
    log.info("development workflow finished", { base, tasks: results.length, failed });
    return { analysis, results, success };
  }

  /** Apply a change set, then prepend a changelog section for every bumped package. */
  async releaseWorkflow(changeSet: ChangeSet, options: ReleaseWorkflowOptions = {}): Promise<ReleaseWorkflowResult> {
    const workflowType = "release";
    const before = await this.discover();
    this.emit({ type: "workflow", kind: "started", workflowType, targetPackages: [...changeSet.targetPackages.keys()] });

    const report = await this.bumpVersions(applyOf(changeSet), options);
    const bumped = report.errors.length === 0 && !report.cancelled;
    this.emit({ type: "workflow", kind: "stage-completed", workflowType, stage: "version", success: bumped });

    const changelogs = new Map<string, string>();
    if (!report.cancelled) {
      for (const [name, version] of [...report.primaryBumps, ...report.cascadeBumps]) {
        const pkg = before.get(name);
        if (!pkg) { continue; }
        const written = await this.guard("changelog", () =>
          this.changelog.updateForPackage(pkg, {
            version,
            previousVersion: pkg.manifest.version,
            since: options.since,
            date: options.date,
          }),
        );
        changelogs.set(name, written);
      }
    }
    this.emit({ type: "workflow", kind: "stage-completed", workflowType, stage: "changelog", success: !report.cancelled });

    const success = bumped;
    this.emit({
      type: "workflow",
      kind: "completed",
      workflowType,
      success,
      results: {
        bumped: [...report.primaryBumps.keys(), ...report.cascadeBumps.keys()],
        errors: report.errors,
        changelogs: [...changelogs.keys()],
      },
    });
    return { report, changelogs, success };
  }

  private changesetsFor(graph: WorkspaceGraph): ChangesetManager {
    return new ChangesetManager(this.changesetStore, graph, { config: this.config.changesets, branches: this.config.branches });
  }

  /** Records a pending changeset on the current branch. */
  async createChangeset(spec: ChangesetSpec): Promise<CreateChangesetResult> {
    const graph = await this.discover();
    const manager = this.changesetsFor(graph);
    const branch = await this.guard("io", () => this.repository.currentBranch());
    const env = this.options.environment ?? process.env;
    const author = spec.author ?? env.MONOWEAVE_AUTHOR ?? env.GIT_AUTHOR_EMAIL;
    const changeset = manager.build(spec, { branch, author });

    const validation = await this.guard("changeset", () => manager.validate(changeset));
    this.emit(
      { type: "changeset", kind: "validated", changesetId: changeset.id, isValid: validation.isValid, errors: validation.errors },
      validation.isValid ? EventPriority.Normal : EventPriority.High,
    );
    await this.guard("changeset", () => manager.record(changeset, validation));
    this.emit({ type: "changeset", kind: "created", changesetId: changeset.id, packages: [changeset.package], description: changeset.description });
    return { changeset, validation };
  }

  listChangesets(filter: ChangesetFilter = {}): Promise<Changeset[]> {
    return this.guard("changeset", () => this.changesetStore.list(filter));
  }

  /** Bumps every package with a pending changeset on the branch, then marks those changesets applied. */
  async applyChangesets(branch: string, options: SignalOptions = {}): Promise<ApplyChangesetsResult> {
    const graph = await this.discover();
    const manager = this.changesetsFor(graph);
    const pending = await this.guard("changeset", () => manager.pendingFor(branch));
    if (pending.length === 0) {
      log.debug("no pending changesets", { branch });
      return { changesets: [] };
    }

    const report = await this.bump(manager.toChangeSet(pending, "apply"), options, pending.map((c) => c.id));
    if (report.cancelled || report.errors.length > 0) {
      return { changesets: [], report };
    }
    const changesets = await this.guard("changeset", () => manager.markApplied(pending));
    log.info("applied changesets", { branch, count: changesets.length });
    return { changesets, report };
  }

  private async requestChangesets(manager: ChangesetManager, packages: string[], branch: string | undefined): Promise<ChangesetCoverage> {
    const coverage = await this.guard("changeset", () => manager.coverage(packages, branch));
    if (coverage.uncovered.length > 0) {
      this.emit(
        {
          type: "changeset",
          kind: "creation-requested",
          packages: coverage.uncovered,
          reason: `No pending changeset on ${branch ?? "a detached HEAD"}`,
        },
        EventPriority.High,
      );
    }
    return coverage;
  }

  /**
   * Runs a git hook: changeset coverage before a commit, pending changesets
   * after a merge, then the hook's tasks over the affected packages.
   */
  async runHook(type: HookType, options: RunHookOptions = {}): Promise<HookExecutionResult> {
    const reason = this.hooks.skipReason(type);
    if (reason !== undefined) {
      log.debug("hook skipped", { hookType: type, reason });
      return { hookType: type, status: "skipped", reason, affectedPackages: [], requiredActions: [], taskResults: [], appliedChangesets: [] };
    }

    const graph = await this.discover();
    const analysis = await this.analyzeChanges(options.base ?? "HEAD", options.head);
    const { directlyAffected, dependentsAffected } = analysis.affectedPackages;
    const affected = [...directlyAffected, ...dependentsAffected];
    this.emit({ type: "hook", kind: "started", hookType: type, affectedPackages: affected }, EventPriority.High);

    const requiredActions: string[] = [];
    const appliedChangesets: string[] = [];
    const context = await this.contextFor(analysis);
    const branch = context.currentBranch;

    if (type === "pre-commit" && this.config.changesets.required && !(branch !== undefined && matchAny(branch, this.config.branches.main))) {
      const coverage = await this.requestChangesets(this.changesetsFor(graph), [...directlyAffected], branch);
      if (coverage.uncovered.length > 0) {
        requiredActions.push(`Create a changeset for ${coverage.uncovered.join(", ")}`);
      }
    }

    if (type === "post-merge" && options.branch !== undefined) {
      const applied = await this.applyChangesets(options.branch, options);
      appliedChangesets.push(...applied.changesets.map((c) => c.id));
      for (const error of applied.report?.errors ?? []) {
        requiredActions.push(`Resolve version bump error: ${error}`);
      }
    }

    const taskResults: TaskExecutionResult[] = [];
    if (affected.length > 0) {
      const { tasks, missing } = this.hooks.tasksFor(type, this.tasks);
      if (missing.length > 0) {
        log.warn("hook names unregistered tasks", { hookType: type, missing });
      }
      for (const task of tasks) {
        if (options.signal?.aborted) { break; }
        const result = await this.execute(graph, task, affected, context, options.signal);
        taskResults.push(result);
        if (isFailure(result)) {
          requiredActions.push(`Fix failing task: ${task.name}`);
        }
      }
    }

    const success = requiredActions.length === 0;
    if (!success) {
      this.emit({ type: "hook", kind: "validation-failed", hookType: type, requiredActions }, EventPriority.High);
    }
    this.emit({ type: "hook", kind: "completed", hookType: type, success, message: `${type}: ${success ? "passed" : "failed"}` });
    return {
      hookType: type,
      status: success ? "success" : "failed",
      affectedPackages: affected,
      requiredActions,
      taskResults,
      appliedChangesets,
    };
  }

  /** Analyze, check changeset coverage, run every registered task, then validate the dependency graph. */
  async integrationWorkflow(base: string, options: SignalOptions & { head?: string } = {}): Promise<IntegrationWorkflowResult> {
    const workflowType = "integration";
    const graph = await this.discover();
    const analysis = await this.analyzeChanges(base, options.head);
    const { directlyAffected, dependentsAffected } = analysis.affectedPackages;
    const affected = [...directlyAffected, ...dependentsAffected];
    this.emit({ type: "workflow", kind: "started", workflowType, targetPackages: affected });
    this.emit({ type: "workflow", kind: "stage-completed", workflowType, stage: "analyze", success: true });

    const context = await this.contextFor(analysis);
    const manager = this.changesetsFor(graph);
    const coverage = this.config.changesets.required
      ? await this.requestChangesets(manager, [...directlyAffected], context.currentBranch)
      : await this.guard("changeset", () => manager.coverage([...directlyAffected], context.currentBranch));
    const covered = !this.config.changesets.required || coverage.uncovered.length === 0;
    this.emit({ type: "workflow", kind: "stage-completed", workflowType, stage: "changesets", success: covered });

    const results: TaskExecutionResult[] = [];
    for (const task of this.tasks.list()) {
      if (options.signal?.aborted) { break; }
      results.push(await this.execute(graph, task, affected, context, options.signal));
    }
    const failed = results.filter(isFailure).map((r) => r.taskName);
    this.emit({ type: "workflow", kind: "stage-completed", workflowType, stage: "tasks", success: failed.length === 0 });

    const dependencyIssues = [...graph.validate(), ...graph.diagnostics.cycles.map((cycle) => `Dependency cycle: ${[...cycle, cycle[0]].join(" -> ")}`)];
    this.emit({ type: "workflow", kind: "stage-completed", workflowType, stage: "dependencies", success: dependencyIssues.length === 0 });

    const success = covered && failed.length === 0 && dependencyIssues.length === 0 && options.signal?.aborted !== true;
    this.emit({
      type: "workflow",
      kind: "completed",
      workflowType,
      success,
      results: { tasks: results.length, failed, uncovered: coverage.uncovered, dependencyIssues },
    });
    log.info("integration workflow finished", { base, tasks: results.length, failed, dependencyIssues: dependencyIssues.length });
    return { analysis, coverage, results, dependencyIssues, success };
  }

  /**
   * Re-reads configuration. The returned Monorepo shares this one's
   * capabilities, bus and registered tasks.
   */
  async reloadConfig(): Promise<Monorepo> {
    let config: MonoweaveConfig;
    let source: string | undefined;
    try {
      source = await configSource(this.fs, this.root);
      config = await loadConfig(this.fs, this.root, this.options.config);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.emit({ type: "config", kind: "validation-failed", errors: [message] }, EventPriority.High);
      throw wrap("config", error);
    }

    this.emit({ type: "config", kind: "reloaded", configPath: source ?? resolve(this.root, CONFIG_FILE) });
    const previous = new Map<string, unknown>(Object.entries(this.config));
    for (const [section, value] of Object.entries(config)) {
      if (JSON.stringify(previous.get(section)) === JSON.stringify(value)) { continue; }
      this.emit({ type: "config", kind: "updated", section, changes: isRecord(value) ? value : { value } });
    }

    const next = new Monorepo({ ...this.options, repository: this.repository, executor: this.executor, bus: this.bus }, config);
    for (const task of this.tasks.list()) {
      next.tasks.register(task);
    }
    return next;
  }

  /** Stops background event delivery, flushing what is queued. */
  async close(): Promise<void> {
    await this.bus.stop();
  }
}
