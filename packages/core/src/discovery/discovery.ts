import { join, posix, resolve } from "node:path";
import PQueue from "p-queue";
import { isMonoweaveError, toErrorMessage } from "@monoweave/contracts";
import type { DiscoveryConfig, WorkspacePackage } from "@monoweave/contracts";
import type { FileSystem } from "@monoweave/adapters";
import { createLogger } from "@monoweave/adapters";
import { WorkspaceGraph } from "../graph/graph";
import { parseManifest } from "../manifest/parser";
import { linkSignals, whenAborted } from "../utils/abort";
import { matchGlob } from "../utils/glob";
import { COMMON_PATTERNS, detectLayout } from "./detect";
import type { WorkspaceLayout } from "./detect";

const log = createLogger("discovery");

/** Never searched for packages. */
export const ALWAYS_IGNORED = ["node_modules", ".git", "dist", "build", ".next", "coverage"];

export interface DiscoverOptions {
  /** Skip the cache and rediscover. */
  refresh?: boolean;
  signal?: AbortSignal;
}

export interface CachedPackage {
  package: WorkspacePackage;
  ageMs: number;
  stale: boolean;
}

interface CacheEntry<T> {
  value: T;
  at: number;
}

export interface DiscovererOptions {
  config: DiscoveryConfig;
  now?: () => number;
}

/** Splits "!dir" patterns from the rest. */
export function splitPatterns(patterns: readonly string[]) {
  const include: string[] = [];
  const exclude: string[] = [];
  for (const raw of patterns) {
    const pattern = raw.replace(/^\.\//, "").replace(/\/+$/, "");
    if (pattern.startsWith("!")) {
      exclude.push(pattern.slice(1).replace(/^\.\//, ""));
    } else {
      include.push(pattern);
    }
  }
  return { include, exclude };
}

function matchesDir(dir: string, pattern: string) {
  return dir === pattern || matchGlob(dir, pattern);
}

export class WorkspaceDiscoverer {
  private readonly graphs = new Map<string, CacheEntry<WorkspaceGraph>>();
  private readonly packages = new Map<string, CacheEntry<WorkspacePackage>>();
  private readonly inflight = new Map<string, Promise<WorkspaceGraph>>();
  private readonly now: () => number;

  constructor(
    private readonly fs: FileSystem,
    private readonly options: DiscovererOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  private get config() {
    return this.options.config;
  }

  async discover(rootDir: string, options: DiscoverOptions = {}): Promise<WorkspaceGraph> {
    const root = resolve(rootDir);

    if (!options.refresh) {
      const cached = this.graphs.get(root);
      if (cached && this.now() - cached.at <= this.config.cacheTtlMs) {
        log.debug("cache hit", { root, ageMs: this.now() - cached.at });
        return cached.value;
      }
      const pending = this.inflight.get(root);
      if (pending) { return pending; }
    }

    const run = this.scan(root, options.signal).finally(() => {
      if (this.inflight.get(root) === run) { this.inflight.delete(root); }
    });
    this.inflight.set(root, run);
    return run;
  }

  cachedPackage(name: string): CachedPackage | undefined {
    const entry = this.packages.get(name);
    if (!entry) { return undefined; }
    const ageMs = this.now() - entry.at;
    return { package: entry.value, ageMs, stale: ageMs > this.config.cacheTtlMs };
  }

  /** Drops cached graphs (one root or all) and their packages. */
  invalidate(rootDir?: string): void {
    if (rootDir === undefined) {
      this.graphs.clear();
      this.packages.clear();
      return;
    }
    const root = resolve(rootDir);
    const graph = this.graphs.get(root)?.value;
    this.graphs.delete(root);
    for (const name of graph?.names() ?? []) {
      this.packages.delete(name);
    }
  }

  private async scan(root: string, signal?: AbortSignal): Promise<WorkspaceGraph> {
    const started = this.now();
    const layout = await detectLayout(this.fs, root);
    const warnings = [...layout.warnings];
    log.debug("layout", { root, kind: layout.kind, patterns: layout.patterns });

    const ignore = [...ALWAYS_IGNORED, ...this.config.ignore];
    const manifestDirs = (await this.fs.walk(root, { pattern: "**/package.json", ignore }))
      .map((file) => posix.dirname(file))
      .filter((dir) => dir !== ".");

    const dirs = selectDirectories(layout, manifestDirs);
    const useRoot = layout.kind === "custom" && dirs.length < 2 && (await this.fs.exists(join(root, "package.json")));
    const targets = useRoot ? ["."] : dirs;

    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const linked = linkSignals(signal, timeout);
    const queue = new PQueue({ concurrency: this.config.ioConcurrency });
    const found = new Map<string, WorkspacePackage>();
    let closed = false;

    for (const dir of targets) {
      queue
        .add(async () => {
          if (linked.signal.aborted) { return; }
          const pkg = await this.readPackage(root, dir, warnings);
          if (!pkg || closed) { return; }
          found.set(dir, pkg);
        })
        .catch((error: unknown) => {
          warnings.push(`${dir}: ${toErrorMessage(error)}`);
        });
    }

    try {
      await Promise.race([queue.onIdle(), whenAborted(linked.signal)]);
    } finally {
      closed = true;
      queue.clear();
      linked.dispose();
    }

    const timedOut = timeout.aborted;
    const cancelled = !timedOut && linked.signal.aborted;
    if (timedOut) {
      warnings.push(`Discovery timed out after ${this.config.timeoutMs}ms; the graph is partial`);
    }

    const ordered: WorkspacePackage[] = [];
    const seen = new Set<string>();
    for (const dir of targets) {
      const pkg = found.get(dir);
      if (!pkg) { continue; }
      const name = pkg.manifest.name;
      if (seen.has(name)) {
        warnings.push(`Duplicate package name "${name}" at ${dir}; keeping the first`);
        continue;
      }
      seen.add(name);
      ordered.push(pkg);
    }

    const graph = new WorkspaceGraph(layout.kind, root, ordered, { warnings, timedOut, cancelled }, layout.patterns ?? []);
    for (const warning of graph.diagnostics.warnings) {
      log.warn(warning);
    }

    if (!timedOut && !cancelled) {
      const at = this.now();
      this.graphs.set(root, { value: graph, at });
      for (const pkg of ordered) {
        this.packages.set(pkg.manifest.name, { value: pkg, at });
      }
    }
    log.info("discovered workspace", { root, kind: graph.kind, packages: graph.size, ms: this.now() - started });
    return graph;
  }

  private async readPackage(root: string, dir: string, warnings: string[]): Promise<WorkspacePackage | undefined> {
    const absolutePath = dir === "." ? root : join(root, dir);
    const manifestPath = join(absolutePath, "package.json");
    try {
      const { manifest, warnings: manifestWarnings } = parseManifest(await this.fs.readFile(manifestPath), manifestPath);
      warnings.push(...manifestWarnings);
      return {
        manifest,
        absolutePath,
        relativePath: dir,
        manifestPath,
        workspaceDependencies: new Set(),
        dependents: new Set(),
      };
    } catch (error) {
      if (!isMonoweaveError(error)) { throw error; }
      warnings.push(`Skipping ${dir}: ${error.message}`);
      return undefined;
    }
  }
}

/** Package directories the layout selects among those that hold a manifest. */
export function selectDirectories(layout: WorkspaceLayout, manifestDirs: readonly string[]): string[] {
  const sorted = [...manifestDirs].sort();

  if (layout.patterns === null) {
    const common = sorted.filter((dir) => COMMON_PATTERNS.some((p) => matchesDir(dir, p)));
    return common.length > 0 ? common : sorted;
  }

  const { include, exclude } = splitPatterns(layout.patterns);
  return sorted.filter(
    (dir) => include.some((p) => matchesDir(dir, p)) && !exclude.some((p) => matchesDir(dir, p) || dir.startsWith(p + "/")),
  );
}
