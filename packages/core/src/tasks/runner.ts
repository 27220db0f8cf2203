import { join, isAbsolute, posix } from "node:path";
import PQueue from "p-queue";
import { isMonoweaveError, toErrorMessage } from "@monoweave/contracts";
import type {
  CommandOutput,
  ExecutionContext,
  TaskArtifact,
  TaskDefinition,
  TaskExecutionResult,
  TaskStats,
  TaskStatus,
  TasksConfig,
} from "@monoweave/contracts";
import type { CommandExecutor, FileSystem } from "@monoweave/adapters";
import { commandLineOf, createLogger } from "@monoweave/adapters";
import type { WorkspaceGraph } from "../graph/graph";
import { linkSignals } from "../utils/abort";
import type { ConditionChecker } from "./conditions";

const log = createLogger("tasks");

export interface RunOptions {
  signal?: AbortSignal;
}

type PackageOutcome =
  | { state: "success" }
  | { state: "failed"; reason: string }
  | { state: "timed-out" }
  | { state: "cancelled" }
  | { state: "skipped"; reason: string };

interface RunState {
  task: TaskDefinition;
  outputs: CommandOutput[];
  stats: TaskStats;
  errors: string[];
  logs: string[];
  artifacts: TaskArtifact[];
  failures: string[];
  timedOut: boolean;
  /** Stops packages that have not started yet. */
  halt: () => void;
}

function emptyStats(): TaskStats {
  return {
    commandsExecuted: 0,
    commandsSucceeded: 0,
    commandsFailed: 0,
    packagesProcessed: 0,
    stdoutBytes: 0,
    stderrBytes: 0,
  };
}

/**
 * Runs a task's commands across the selected packages. Packages start once
 * their selected workspace dependencies are done; commands inside a package
 * run one after another.
 */
export class TaskRunner {
  constructor(
    private readonly graph: WorkspaceGraph,
    private readonly executor: CommandExecutor,
    private readonly config: TasksConfig,
    private readonly checker: ConditionChecker,
    private readonly fs?: FileSystem,
  ) {}

  /** Packages the task's affects selector picks from the affected list. */
  selectPackages(task: TaskDefinition, affected: Iterable<string>): string[] {
    const known = [...affected].filter((name) => this.graph.has(name));
    switch (task.affects) {
      case "self":
        return known;
      case "dependents":
        return [...new Set([...known, ...this.graph.dependentsOfAll(known)])];
      case "all":
        return this.graph.names();
    }
  }

  async run(
    task: TaskDefinition,
    affected: Iterable<string>,
    context: ExecutionContext,
    options: RunOptions = {},
  ): Promise<TaskExecutionResult> {
    const started = new Date();
    const cpuStart = process.cpuUsage();
    const failFast = new AbortController();
    const state: RunState = {
      task,
      outputs: [],
      stats: emptyStats(),
      errors: [],
      logs: [],
      artifacts: [],
      failures: [],
      timedOut: false,
      halt: () => failFast.abort(),
    };
    const finish = (status: TaskStatus, packages: string[], cancelled = false): TaskExecutionResult => {
      const ended = new Date();
      const cpu = process.cpuUsage(cpuStart);
      return {
        taskName: task.name,
        status,
        startedAt: started.toISOString(),
        endedAt: ended.toISOString(),
        durationMs: ended.getTime() - started.getTime(),
        outputs: state.outputs,
        stats: { ...state.stats, cpuTimeMs: (cpu.user + cpu.system) / 1000 },
        affectedPackages: packages,
        errors: state.errors,
        logs: state.logs,
        artifacts: state.artifacts,
        cancelled,
      };
    };

    const requested = [...affected];
    for (const name of requested) {
      if (!this.graph.has(name)) { state.logs.push(`ignoring unknown package ${name}`); }
    }
    const selected = this.selectPackages(task, requested);

    let applicable: boolean;
    try {
      applicable = this.checker.hasAsync(task.conditions)
        ? await this.checker.checkAsync(task.conditions, context)
        : this.checker.checkSync(task.conditions, context);
    } catch (error) {
      if (!isMonoweaveError(error)) { throw error; }
      state.errors.push(error.message);
      return finish({ state: "failed", reason: "condition-error" }, selected);
    }
    if (!applicable) {
      log.info("task skipped", { task: task.name, reason: "conditions-false" });
      return finish({ state: "skipped", reason: "conditions-false" }, selected);
    }

    let order: string[];
    try {
      order = this.graph.topologicalOrder(selected);
    } catch (error) {
      if (!isMonoweaveError(error)) { throw error; }
      state.errors.push(error.message);
      return finish({ state: "failed", reason: "dependency-cycle" }, selected);
    }

    log.info("task started", { task: task.name, packages: order.length });

    const linked = linkSignals(options.signal, failFast.signal);
    const queue = new PQueue({ concurrency: this.config.concurrency });
    const limit = this.config.concurrency * 2;
    const selectedSet = new Set(order);
    const done = new Map<string, Promise<PackageOutcome>>();

    try {
      for (const name of order) {
        const deps = [...(this.graph.get(name)?.workspaceDependencies ?? [])].filter((d) => selectedSet.has(d));
        const waitFor = deps.flatMap((d) => done.get(d) ?? []);
        done.set(
          name,
          Promise.all(waitFor).then(async (outcomes): Promise<PackageOutcome> => {
            if (linked.signal.aborted) { return { state: "cancelled" }; }
            const blocked = outcomes.findIndex((o) => o.state !== "success");
            if (blocked >= 0 && !this.continueOnError(task)) {
              const reason = `dependency ${deps[blocked]} did not succeed`;
              state.logs.push(`${name}: skipped, ${reason}`);
              return { state: "skipped", reason };
            }
            await queue.onSizeLessThan(limit);
            return queue.add(() => this.runPackage(name, state, linked.signal), { throwOnTimeout: true });
          }),
        );
      }
      await Promise.all(done.values());
    } finally {
      linked.dispose();
    }

    const cancelled = options.signal?.aborted === true;
    const status: TaskStatus =
      cancelled && state.failures.length === 0 && !state.timedOut
        ? { state: "skipped", reason: "cancelled" }
        : state.timedOut
          ? { state: "timed-out" }
          : state.failures.length > 0
            ? { state: "failed", reason: state.failures[0] }
            : { state: "success" };

    const result = finish(status, order, cancelled);
    const level = status.state === "success" ? "info" : "warn";
    log[level]("task finished", { task: task.name, status, ms: result.durationMs, commands: result.stats.commandsExecuted });
    return result;
  }

  private continueOnError(task: TaskDefinition) {
    return task.continueOnError ?? this.config.continueOnError;
  }

  private async runPackage(name: string, state: RunState, signal: AbortSignal): Promise<PackageOutcome> {
    const pkg = this.graph.get(name);
    if (!pkg) { return { state: "skipped", reason: "unknown package" }; }
    if (signal.aborted) { return { state: "cancelled" }; }

    const { task } = state;
    state.stats.packagesProcessed += 1;
    let outcome: PackageOutcome = { state: "success" };

    for (const command of task.commands) {
      if (signal.aborted) {
        outcome = { state: "cancelled" };
        break;
      }
      const cwd = command.cwd ? (isAbsolute(command.cwd) ? command.cwd : join(pkg.absolutePath, command.cwd)) : pkg.absolutePath;
      const commandLine = commandLineOf(command);
      log.debug("running command", { package: name, command: commandLine, cwd });

      let failure: PackageOutcome | undefined;
      try {
        const result = await this.executor.execute(
          { ...command, cwd },
          {
            timeoutMs: task.timeoutMs ?? this.config.commandTimeoutMs,
            gracePeriodMs: this.config.gracePeriodMs,
            maxStdoutBytes: this.config.maxStdoutBytes,
            maxStderrBytes: this.config.maxStderrBytes,
            signal,
          },
        );

        if (result.cancelled) {
          outcome = { state: "cancelled" };
          break;
        }

        state.stats.commandsExecuted += 1;
        state.stats.stdoutBytes += result.stdoutBytes;
        state.stats.stderrBytes += result.stderrBytes;
        state.outputs.push({
          package: name,
          command: commandLine,
          cwd,
          exitCode: result.exitCode,
          stdout: result.stdout,
          stderr: result.stderr,
          durationMs: result.durationMs,
          env: command.env ?? {},
          timedOut: result.timedOut,
          truncated: result.truncated,
        });

        if (result.timedOut) {
          state.timedOut = true;
          state.errors.push(`${name}: "${commandLine}" timed out`);
          failure = { state: "timed-out" };
        } else if (result.exitCode !== 0) {
          const reason = `exit(${result.exitCode ?? "null"})`;
          state.failures.push(reason);
          state.errors.push(`${name}: "${commandLine}" exited with ${result.exitCode ?? "a signal"}`);
          failure = { state: "failed", reason };
        } else {
          state.stats.commandsSucceeded += 1;
        }
      } catch (error) {
        if (!isMonoweaveError(error)) { throw error; }
        state.stats.commandsExecuted += 1;
        state.failures.push("spawn-error");
        state.errors.push(`${name}: ${error.message}`);
        failure = { state: "failed", reason: "spawn-error" };
      }

      if (failure) {
        state.stats.commandsFailed += 1;
        if (this.config.failFast) { state.halt(); }
        if (outcome.state === "success") { outcome = failure; }
        if (!this.continueOnError(task)) { break; }
      }
    }

    state.stats.peakMemoryBytes = Math.max(state.stats.peakMemoryBytes ?? 0, process.memoryUsage().rss);

    if (outcome.state === "success" && task.artifacts?.length) {
      await this.collectArtifacts(name, pkg.absolutePath, state);
    }
    return outcome;
  }

  private async collectArtifacts(name: string, dir: string, state: RunState) {
    const fs = this.fs;
    if (!fs) { return; }
    for (const artifact of state.task.artifacts ?? []) {
      try {
        for (const rel of await fs.walk(dir, { pattern: artifact.pattern, ignore: ["node_modules"] })) {
          const path = join(dir, rel);
          const { size } = await fs.stat(path);
          state.artifacts.push({
            name: posix.basename(rel),
            path,
            kind: artifact.kind ?? "file",
            sizeBytes: size,
            package: name,
            metadata: { pattern: artifact.pattern },
          });
        }
      } catch (error) {
        state.logs.push(`${name}: artifact collection failed for ${artifact.pattern}: ${toErrorMessage(error)}`);
      }
    }
  }
}
