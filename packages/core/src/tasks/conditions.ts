import { join } from "node:path";
import semver from "semver";
import { ConditionError, isMonoweaveError, toErrorMessage } from "@monoweave/contracts";
import type {
  BranchCondition,
  BranchesConfig,
  DependencyChangeFilter,
  DependencyHint,
  EnvironmentCondition,
  ExecutionContext,
  FilePattern,
  TaskCondition,
  VersionChangeLevel,
} from "@monoweave/contracts";
import type { CommandExecutor, ExecuteOptions, FileSystem } from "@monoweave/adapters";
import { createLogger } from "@monoweave/adapters";
import { matchAny, matchGlob } from "../utils/glob";
import { detectEnvironment, normalizeEnvironment } from "./environment";

const log = createLogger("conditions");

export type EnvironmentChecker = (context: ExecutionContext) => boolean | Promise<boolean>;

export interface ConditionCheckerOptions {
  branches: BranchesConfig;
  /** Workspace root; custom scripts run here unless the context names a working directory. */
  root: string;
  executor?: CommandExecutor;
  executeOptions?: ExecuteOptions;
  fs?: FileSystem;
  platform?: NodeJS.Platform;
}

/** Directory searched for `<name>.sh` when an environment checker is not registered. */
export const CHECKERS_DIR = join("scripts", "checkers");

const DEFAULT_EXECUTE: ExecuteOptions = {
  timeoutMs: 60_000,
  gracePeriodMs: 5000,
  maxStdoutBytes: 1024 * 1024,
  maxStderrBytes: 1024 * 1024,
};

type ChangeLevel = "major" | "minor" | "patch" | "unknown";

const LEVEL_RANK: Record<ChangeLevel, number> = { unknown: 0, patch: 1, minor: 2, major: 3 };
const THRESHOLD_RANK: Record<VersionChangeLevel, number> = {
  any: 0,
  "patch-or-higher": 1,
  "minor-or-major": 2,
  major: 3,
};

/** How far a dependency hint moves its range; additions and removals count as major. */
export function changeLevel(hint: DependencyHint): ChangeLevel {
  if (hint.kind === "added" || hint.kind === "removed") { return "major"; }
  const from = hint.from === undefined ? null : safeMinVersion(hint.from);
  const to = hint.to === undefined ? null : safeMinVersion(hint.to);
  if (!from || !to) { return "unknown"; }
  switch (semver.diff(from, to)) {
    case "major":
    case "premajor":
      return "major";
    case "minor":
    case "preminor":
      return "minor";
    case "patch":
    case "prepatch":
    case "prerelease":
      return "patch";
    default:
      return "unknown";
  }
}

function safeMinVersion(range: string) {
  try {
    return semver.minVersion(range, { loose: true });
  } catch {
    return null;
  }
}

/**
 * Evaluates task conditions against an execution context. Everything except
 * custom scripts and custom environment checkers is pure and can go through
 * checkSync; those two need checkAsync.
 */
export class ConditionChecker {
  private readonly envCheckers = new Map<string, EnvironmentChecker>();

  constructor(private readonly options: ConditionCheckerOptions) {}

  registerEnvironmentChecker(name: string, checker: EnvironmentChecker): this {
    this.envCheckers.set(name, checker);
    return this;
  }

  hasAsync(conditions: readonly TaskCondition[]): boolean {
    return conditions.some((c) => isAsync(c));
  }

  /** Throws ConditionError when any condition needs checkAsync. */
  checkSync(conditions: readonly TaskCondition[], context: ExecutionContext): boolean {
    if (this.hasAsync(conditions)) {
      throw new ConditionError("Conditions contain a custom script or custom environment checker", {
        code: "ERR_CONDITION_ASYNC",
      });
    }
    return conditions.every((c) => this.evaluateSync(c, context));
  }

  async checkAsync(conditions: readonly TaskCondition[], context: ExecutionContext): Promise<boolean> {
    for (const condition of conditions) {
      if (!(await this.evaluate(condition, context))) { return false; }
    }
    return true;
  }

  private evaluateSync(condition: TaskCondition, context: ExecutionContext): boolean {
    switch (condition.type) {
      case "all":
        return condition.conditions.every((c) => this.evaluateSync(c, context));
      case "any":
        return condition.conditions.some((c) => this.evaluateSync(c, context));
      case "not":
        return !this.evaluateSync(condition.condition, context);
      case "custom-script":
        throw new ConditionError("custom-script needs checkAsync", { code: "ERR_CONDITION_ASYNC" });
      case "environment":
        return this.environmentSync(condition.condition, context);
      default:
        return this.leaf(condition, context);
    }
  }

  private async evaluate(condition: TaskCondition, context: ExecutionContext): Promise<boolean> {
    switch (condition.type) {
      case "all":
        for (const c of condition.conditions) {
          if (!(await this.evaluate(c, context))) { return false; }
        }
        return true;
      case "any":
        for (const c of condition.conditions) {
          if (await this.evaluate(c, context)) { return true; }
        }
        return false;
      case "not":
        return !(await this.evaluate(condition.condition, context));
      case "custom-script":
        return this.runScript(condition.script, condition.expectedOutput, context);
      case "environment":
        return this.environmentAsync(condition.condition, context);
      default:
        return this.leaf(condition, context);
    }
  }

  private leaf(
    condition: Extract<TaskCondition, { type: "packages-changed" | "files-changed" | "dependencies-changed" | "on-branch" }>,
    context: ExecutionContext,
  ): boolean {
    switch (condition.type) {
      case "packages-changed": {
        if (condition.packages.length === 0) { return true; }
        const { directlyAffected, dependentsAffected } = context.affectedPackages;
        return condition.packages.some((p) => directlyAffected.has(p) || dependentsAffected.has(p));
      }
      case "files-changed":
        if (condition.patterns.length === 0) { return true; }
        return condition.patterns.some((pattern) => context.changedFiles.some((file) => this.matchesFilePattern(file, pattern)));
      case "dependencies-changed":
        return dependenciesChanged(context, condition.filter);
      case "on-branch":
        return this.branchMatches(condition.condition, context.currentBranch);
    }
  }

  /** Match of one file against one pattern; exclude inverts the result. */
  matchesFilePattern(file: string, pattern: FilePattern): boolean {
    const matched = patternMatches(file, pattern);
    return pattern.exclude ? !matched : matched;
  }

  private branchMatches(condition: BranchCondition, branch: string | undefined): boolean {
    if (branch === undefined) {
      // detached HEAD or no repository: only none-of can hold
      return condition.kind === "none-of";
    }
    const { main, feature, release, hotfix } = this.options.branches;
    switch (condition.kind) {
      case "equals":
        return branch === condition.branch;
      case "matches":
        return matchGlob(branch, condition.pattern);
      case "one-of":
        return condition.branches.includes(branch);
      case "none-of":
        return !condition.branches.includes(branch);
      case "is-main":
        return matchAny(branch, main);
      case "is-feature":
        return matchAny(branch, feature);
      case "is-release":
        return matchAny(branch, release);
      case "is-hotfix":
        return matchAny(branch, hotfix);
    }
  }

  private environmentSync(condition: EnvironmentCondition, context: ExecutionContext): boolean {
    const env = context.environment;
    switch (condition.kind) {
      case "variable-exists":
        return env[condition.name] !== undefined;
      case "variable-equals":
        return env[condition.name] === condition.value;
      case "variable-matches": {
        const value = env[condition.name];
        return value !== undefined && matchGlob(value, condition.pattern);
      }
      case "is":
        return detectEnvironment(env) === normalizeEnvironment(condition.environment);
      case "one-of": {
        const current = detectEnvironment(env);
        return condition.environments.some((e) => normalizeEnvironment(e) === current);
      }
      case "not":
        return !this.environmentSync(condition.condition, context);
      case "custom":
        throw new ConditionError(`Environment checker "${condition.checker}" needs checkAsync`, { code: "ERR_CONDITION_ASYNC" });
    }
  }

  private async environmentAsync(condition: EnvironmentCondition, context: ExecutionContext): Promise<boolean> {
    if (condition.kind === "not") {
      return !(await this.environmentAsync(condition.condition, context));
    }
    if (condition.kind !== "custom") {
      return this.environmentSync(condition, context);
    }

    const registered = this.envCheckers.get(condition.checker);
    if (registered) {
      return registered(context);
    }

    const script = join(this.options.root, CHECKERS_DIR, `${condition.checker}.sh`);
    if (this.options.fs && (await this.options.fs.exists(script))) {
      return this.spawn({ program: "sh", args: [script] }, undefined, context);
    }

    throw new ConditionError(`No environment checker named "${condition.checker}"`, {
      code: "ERR_CONDITION_CHECKER_MISSING",
      context: { checker: condition.checker, script },
    });
  }

  private runScript(script: string, expectedOutput: string | undefined, context: ExecutionContext): Promise<boolean> {
    const platform = this.options.platform ?? process.platform;
    const spec = platform === "win32" ? { program: "cmd", args: ["/C", script] } : { program: "sh", args: ["-c", script] };
    return this.spawn(spec, expectedOutput, context);
  }

  private async spawn(
    command: { program: string; args: string[] },
    expectedOutput: string | undefined,
    context: ExecutionContext,
  ): Promise<boolean> {
    const executor = this.options.executor;
    if (!executor) {
      throw new ConditionError("Script conditions need a command executor", { code: "ERR_CONDITION_ASYNC" });
    }
    const cwd = context.workingDirectory ?? this.options.root;
    try {
      const result = await executor.execute({ ...command, cwd }, this.options.executeOptions ?? DEFAULT_EXECUTE);
      if (expectedOutput !== undefined) {
        return result.stdout.trim() === expectedOutput.trim();
      }
      return result.exitCode === 0;
    } catch (error) {
      if (!isMonoweaveError(error)) { throw error; }
      log.warn("condition script could not start", { command: [command.program, ...command.args].join(" "), error: toErrorMessage(error) });
      return false;
    }
  }
}

function isAsync(condition: TaskCondition): boolean {
  switch (condition.type) {
    case "custom-script":
      return true;
    case "environment":
      return containsCustom(condition.condition);
    case "all":
    case "any":
      return condition.conditions.some(isAsync);
    case "not":
      return isAsync(condition.condition);
    default:
      return false;
  }
}

function containsCustom(condition: EnvironmentCondition): boolean {
  if (condition.kind === "custom") { return true; }
  return condition.kind === "not" && containsCustom(condition.condition);
}

function patternMatches(file: string, { kind, pattern }: FilePattern): boolean {
  switch (kind) {
    case "exact":
      return file === pattern;
    case "prefix":
      return file.startsWith(pattern);
    case "suffix":
      return file.endsWith(pattern);
    case "glob":
      return matchGlob(file, pattern);
    case "regex":
      return regexMatch(file, pattern);
  }
}

function regexMatch(file: string, pattern: string): boolean {
  let re: RegExp;
  try {
    re = new RegExp(pattern);
  } catch (error) {
    log.warn("invalid regex file pattern; comparing literally", { pattern, error: toErrorMessage(error) });
    return file === pattern;
  }
  return re.test(file);
}

function dependenciesChanged(context: ExecutionContext, filter: DependencyChangeFilter | undefined): boolean {
  const hints = (context.packageChanges ?? []).flatMap((change) => change.hints);
  const include = filter?.include ?? [];
  const exclude = filter?.exclude ?? [];
  const threshold = THRESHOLD_RANK[filter?.versionChange ?? "any"];

  return hints.some((hint) => {
    if (include.length > 0 && !matchAny(hint.name, include)) { return false; }
    if (exclude.length > 0 && matchAny(hint.name, exclude)) { return false; }
    return LEVEL_RANK[changeLevel(hint)] >= threshold;
  });
}
