/**
 * @module @monoweave/contracts/errors
 * Error taxonomy shared by every monoweave component.
 *
 * Each component throws its own subclass; the orchestrator wraps whatever
 * escapes a component in {@link OrchestratorError} with the component name.
 */

export type ErrorComponent =
  | "config"
  | "manifest"
  | "discovery"
  | "graph"
  | "changes"
  | "version"
  | "condition"
  | "task"
  | "events"
  | "changelog"
  | "changeset"
  | "io"
  | "orchestrator";

export type ErrorCode =
  | "ERR_CONFIG_INVALID"
  | "ERR_CONFIG_WORKSPACE_DECLARATION"
  | "ERR_MANIFEST_PARSE"
  | "ERR_MANIFEST_SCHEMA"
  | "ERR_MANIFEST_NAME"
  | "ERR_MANIFEST_VERSION"
  | "ERR_GRAPH_CYCLE"
  | "ERR_GRAPH_UNKNOWN_PACKAGE"
  | "ERR_VERSION_INVALID"
  | "ERR_VERSION_UNKNOWN_PACKAGE"
  | "ERR_VERSION_STRATEGY"
  | "ERR_CONDITION_ASYNC"
  | "ERR_CONDITION_CHECKER_MISSING"
  | "ERR_TASK_INVALID"
  | "ERR_TASK_SPAWN"
  | "ERR_TASK_TIMEOUT"
  | "ERR_TASK_EXIT"
  | "ERR_IO_READ"
  | "ERR_IO_WRITE"
  | "ERR_GIT"
  | "ERR_EVENT_INVALID"
  | "ERR_CHANGESET_INVALID"
  | "ERR_CHANGESET_STORAGE"
  | "ERR_CANCELLED"
  | "ERR_ORCHESTRATOR";

const ERROR_HINTS: Partial<Record<ErrorCode, string>> = {
  ERR_CONFIG_INVALID: "Check monoweave.config.json or the \"monoweave\" key of the root package.json",
  ERR_CONFIG_WORKSPACE_DECLARATION: "Workspaces must be a list of globs or { \"packages\": [...] }",
  ERR_MANIFEST_PARSE: "Fix the JSON syntax of the manifest",
  ERR_MANIFEST_NAME: "Package names are lowercase, URL-safe, at most 214 characters, optionally @scope/name",
  ERR_MANIFEST_VERSION: "The version field must be a valid semver string such as 1.0.0",
  ERR_GRAPH_CYCLE: "Break the cycle or order only an acyclic subset; run findCycles() for details",
  ERR_VERSION_INVALID: "Fix the version in the package manifest before bumping",
  ERR_VERSION_UNKNOWN_PACKAGE: "Only packages discovered in the workspace can be bumped",
  ERR_CONDITION_ASYNC: "Use checkAsync() for conditions that run scripts or custom checkers",
  ERR_CONDITION_CHECKER_MISSING: "Register the checker with registerEnvironmentChecker() before evaluating",
  ERR_TASK_INVALID: "A task needs a name and at least one command",
  ERR_TASK_SPAWN: "Check that the program exists and is executable in the package directory",
  ERR_TASK_TIMEOUT: "Raise tasks.commandTimeoutMs or the task's own timeoutMs",
  ERR_CHANGESET_INVALID: "A changeset names a discovered package, a description, a branch and an author",
  ERR_CHANGESET_STORAGE: "Check the files under changesets.directory; each must be a changeset JSON document",
  ERR_GIT: "Make sure the directory is a git repository and the revisions exist",
};

export interface MonoweaveErrorOptions {
  cause?: unknown;
  context?: Record<string, unknown>;
  hint?: string;
}

export class MonoweaveError extends Error {
  readonly code: ErrorCode;
  readonly component: ErrorComponent;
  readonly hint?: string;
  readonly context: Record<string, unknown>;

  constructor(component: ErrorComponent, code: ErrorCode, message: string, options: MonoweaveErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "MonoweaveError";
    this.component = component;
    this.code = code;
    this.hint = options.hint ?? ERROR_HINTS[code];
    this.context = options.context ?? {};
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      component: this.component,
      message: this.message,
      hint: this.hint,
      context: this.context,
      cause: this.cause === undefined ? undefined : toErrorMessage(this.cause),
    };
  }
}

/** Malformed or conflicting configuration / workspace declaration. */
export class ConfigError extends MonoweaveError {
  constructor(message: string, options: MonoweaveErrorOptions & { code?: ErrorCode } = {}) {
    super("config", options.code ?? "ERR_CONFIG_INVALID", message, options);
    this.name = "ConfigError";
  }
}

export class ManifestError extends MonoweaveError {
  readonly path?: string;

  constructor(message: string, options: MonoweaveErrorOptions & { code?: ErrorCode; path?: string } = {}) {
    super("manifest", options.code ?? "ERR_MANIFEST_SCHEMA", message, {
      ...options,
      context: { ...options.context, path: options.path },
    });
    this.name = "ManifestError";
    this.path = options.path;
  }
}

export class GraphError extends MonoweaveError {
  readonly cycles: string[][];

  constructor(message: string, options: MonoweaveErrorOptions & { code?: ErrorCode; cycles?: string[][] } = {}) {
    super("graph", options.code ?? "ERR_GRAPH_CYCLE", message, {
      ...options,
      context: { ...options.context, cycles: options.cycles },
    });
    this.name = "GraphError";
    this.cycles = options.cycles ?? [];
  }
}

export class VersionError extends MonoweaveError {
  readonly packageName?: string;

  constructor(message: string, options: MonoweaveErrorOptions & { code?: ErrorCode; packageName?: string } = {}) {
    super("version", options.code ?? "ERR_VERSION_INVALID", message, {
      ...options,
      context: { ...options.context, package: options.packageName },
    });
    this.name = "VersionError";
    this.packageName = options.packageName;
  }
}

export class ConditionError extends MonoweaveError {
  constructor(message: string, options: MonoweaveErrorOptions & { code?: ErrorCode } = {}) {
    super("condition", options.code ?? "ERR_CONDITION_ASYNC", message, options);
    this.name = "ConditionError";
  }
}

export class ChangesetError extends MonoweaveError {
  constructor(message: string, options: MonoweaveErrorOptions & { code?: ErrorCode } = {}) {
    super("changeset", options.code ?? "ERR_CHANGESET_INVALID", message, options);
    this.name = "ChangesetError";
  }
}

export class TaskError extends MonoweaveError {
  constructor(message: string, options: MonoweaveErrorOptions & { code?: ErrorCode } = {}) {
    super("task", options.code ?? "ERR_TASK_SPAWN", message, options);
    this.name = "TaskError";
  }
}

export type IoOperation = "read" | "write" | "remove" | "walk" | "stat" | "git";

/** Filesystem or git failure; carries the path and the underlying error kind. */
export class IoError extends MonoweaveError {
  readonly path: string;
  readonly operation: IoOperation;
  readonly kind?: string;

  constructor(operation: IoOperation, path: string, cause: unknown) {
    const kind = errnoCode(cause);
    super(
      "io",
      operation === "git" ? "ERR_GIT" : operation === "write" || operation === "remove" ? "ERR_IO_WRITE" : "ERR_IO_READ",
      `${operation} failed for ${path}${kind ? ` (${kind})` : ""}: ${toErrorMessage(cause)}`,
      { cause, context: { path, operation, kind } },
    );
    this.name = "IoError";
    this.path = path;
    this.operation = operation;
    this.kind = kind;
  }
}

export class CancelledError extends MonoweaveError {
  constructor(component: ErrorComponent, message = "Operation cancelled") {
    super(component, "ERR_CANCELLED", message);
    this.name = "CancelledError";
  }
}

export class OrchestratorError extends MonoweaveError {
  readonly underlying: unknown;
  readonly failedComponent: ErrorComponent;

  constructor(component: ErrorComponent, underlying: unknown) {
    super("orchestrator", "ERR_ORCHESTRATOR", `${component}: ${toErrorMessage(underlying)}`, {
      cause: underlying,
      hint: isMonoweaveError(underlying) ? underlying.hint : undefined,
      context: { component },
    });
    this.name = "OrchestratorError";
    this.failedComponent = component;
    this.underlying = underlying;
  }
}

export function isMonoweaveError(error: unknown): error is MonoweaveError {
  return error instanceof MonoweaveError;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : JSON.stringify(error);
}

function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}
