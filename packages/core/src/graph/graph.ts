import { GraphError, WORKSPACE_EDGE_SECTIONS } from "@monoweave/contracts";
import type { GraphDiagnostics, MonorepoKind, WorkspacePackage } from "@monoweave/contracts";
import { dependencyNames } from "../manifest/parser";
import { isWithin } from "../utils/paths";

export interface TraversalOptions {
  transitive?: boolean;
}

function emptyDiagnostics(): GraphDiagnostics {
  return { warnings: [], cycles: [], timedOut: false, cancelled: false };
}

/**
 * Packages of one workspace and the edges between them. Edges point from
 * consumer to provider (workspaceDependencies); dependents holds the reverse.
 * Cycles are stored as they are; only ordering queries reject them.
 */
export class WorkspaceGraph {
  readonly packages: readonly WorkspacePackage[];
  readonly nameToIndex: ReadonlyMap<string, number>;
  readonly diagnostics: GraphDiagnostics;

  constructor(
    readonly kind: MonorepoKind,
    readonly root: string,
    packages: WorkspacePackage[],
    diagnostics: Partial<GraphDiagnostics> = {},
    /** Workspace globs the packages were discovered through. */
    readonly patterns: readonly string[] = [],
  ) {
    const index = new Map<string, number>();
    packages.forEach((pkg, i) => index.set(pkg.manifest.name, i));
    this.packages = packages;
    this.nameToIndex = index;
    this.diagnostics = { ...emptyDiagnostics(), ...diagnostics };

    for (const pkg of packages) {
      pkg.workspaceDependencies = new Set(
        [...dependencyNames(pkg.manifest, WORKSPACE_EDGE_SECTIONS)].filter((dep) => index.has(dep)),
      );
      pkg.dependents = new Set();
    }
    for (const pkg of packages) {
      for (const dep of pkg.workspaceDependencies) {
        this.get(dep)?.dependents.add(pkg.manifest.name);
      }
    }

    this.diagnostics.cycles = this.findCycles();
    for (const cycle of this.diagnostics.cycles) {
      this.diagnostics.warnings.push(`Dependency cycle: ${[...cycle, cycle[0]].join(" -> ")}`);
    }
  }

  get size(): number {
    return this.packages.length;
  }

  names(): string[] {
    return this.packages.map((p) => p.manifest.name);
  }

  has(name: string): boolean {
    return this.nameToIndex.has(name);
  }

  get(name: string): WorkspacePackage | undefined {
    const i = this.nameToIndex.get(name);
    return i === undefined ? undefined : this.packages[i];
  }

  private require(name: string): WorkspacePackage {
    const pkg = this.get(name);
    if (!pkg) {
      throw new GraphError(`Unknown package "${name}"`, { code: "ERR_GRAPH_UNKNOWN_PACKAGE", context: { package: name } });
    }
    return pkg;
  }

  dependentsOf(name: string, options: TraversalOptions = {}): Set<string> {
    const pkg = this.require(name);
    return options.transitive ? this.closure([name], (p) => p.dependents) : new Set(pkg.dependents);
  }

  dependenciesOf(name: string, options: TraversalOptions = {}): Set<string> {
    const pkg = this.require(name);
    return options.transitive ? this.closure([name], (p) => p.workspaceDependencies) : new Set(pkg.workspaceDependencies);
  }

  /** Every package reachable from starts over the reverse edges, starts excluded. */
  dependentsOfAll(starts: Iterable<string>): Set<string> {
    return this.closure([...starts].filter((n) => this.has(n)), (p) => p.dependents);
  }

  private closure(starts: string[], next: (pkg: WorkspacePackage) => Set<string>): Set<string> {
    const seen = new Set<string>();
    const queue = [...starts];
    const origin = new Set(starts);
    while (queue.length > 0) {
      const current = queue.shift();
      const pkg = current === undefined ? undefined : this.get(current);
      if (!pkg) { continue; }
      for (const n of next(pkg)) {
        if (!seen.has(n)) {
          seen.add(n);
          queue.push(n);
        }
      }
    }
    for (const n of origin) {
      // a start reached again only through a cycle is still a start
      seen.delete(n);
    }
    return seen;
  }

  /**
   * Kahn's algorithm: dependencies before dependents, ties broken by
   * insertion order. Throws GraphError when the subset contains a cycle.
   */
  topologicalOrder(subset?: Iterable<string>): string[] {
    const selected = subset ? new Set([...subset].filter((n) => this.has(n))) : new Set(this.names());
    const inDegree = new Map<string, number>();
    for (const name of selected) {
      const deps = [...this.require(name).workspaceDependencies].filter((d) => selected.has(d));
      inDegree.set(name, deps.length);
    }

    const indexOf = (n: string) => this.nameToIndex.get(n) ?? 0;
    const ready = [...selected].filter((n) => inDegree.get(n) === 0).sort((a, b) => indexOf(a) - indexOf(b));
    const order: string[] = [];

    while (ready.length > 0) {
      const current = ready.shift();
      if (current === undefined) { break; }
      order.push(current);
      for (const dependent of this.require(current).dependents) {
        if (!selected.has(dependent)) { continue; }
        const left = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, left);
        if (left === 0) {
          const at = ready.findIndex((r) => indexOf(r) > indexOf(dependent));
          ready.splice(at < 0 ? ready.length : at, 0, dependent);
        }
      }
    }

    if (order.length < selected.size) {
      const cycles = this.findCycles().filter((c) => c.some((n) => selected.has(n)));
      throw new GraphError(`Cannot order packages: ${cycles.map((c) => c.join(" -> ")).join("; ") || "cycle detected"}`, {
        code: "ERR_GRAPH_CYCLE",
        cycles,
      });
    }
    return order;
  }

  /**
   * Tarjan's strongly connected components; self-loops count as cycles.
   * Walks with an explicit frame stack, so chain depth is not bounded by the call stack.
   */
  findCycles(): string[][] {
    let counter = 0;
    const index = new Map<string, number>();
    const low = new Map<string, number>();
    const onStack = new Set<string>();
    const stack: string[] = [];
    const frames: Array<{ name: string; deps: Iterator<string> }> = [];
    const cycles: string[][] = [];
    const lowOf = (name: string) => low.get(name) ?? 0;

    const open = (name: string) => {
      index.set(name, counter);
      low.set(name, counter);
      counter += 1;
      stack.push(name);
      onStack.add(name);
      frames.push({ name, deps: this.require(name).workspaceDependencies.values() });
    };

    const close = (name: string) => {
      if (low.get(name) !== index.get(name)) { return; }
      const component: string[] = [];
      let member: string | undefined;
      do {
        member = stack.pop();
        if (member === undefined) { break; }
        onStack.delete(member);
        component.push(member);
      } while (member !== name);

      const selfLoop = component.length === 1 && this.require(name).workspaceDependencies.has(name);
      if (component.length > 1 || selfLoop) {
        cycles.push(component.sort((a, b) => (this.nameToIndex.get(a) ?? 0) - (this.nameToIndex.get(b) ?? 0)));
      }
    };

    for (const root of this.names()) {
      if (index.has(root)) { continue; }
      open(root);
      let frame = frames.at(-1);
      while (frame) {
        const next = frame.deps.next();
        if (!next.done) {
          const dep = next.value;
          if (!index.has(dep)) {
            open(dep);
          } else if (onStack.has(dep)) {
            low.set(frame.name, Math.min(lowOf(frame.name), index.get(dep) ?? 0));
          }
        } else {
          frames.pop();
          close(frame.name);
          const parent = frames.at(-1);
          if (parent) { low.set(parent.name, Math.min(lowOf(parent.name), lowOf(frame.name))); }
        }
        frame = frames.at(-1);
      }
    }
    return cycles.sort((a, b) => (this.nameToIndex.get(a[0] ?? "") ?? 0) - (this.nameToIndex.get(b[0] ?? "") ?? 0));
  }

  /** Innermost package whose directory contains relPath. */
  packageForPath(relPath: string): WorkspacePackage | undefined {
    let best: WorkspacePackage | undefined;
    for (const pkg of this.packages) {
      if (!isWithin(pkg.relativePath, relPath)) { continue; }
      if (!best || depth(pkg.relativePath) > depth(best.relativePath)) {
        best = pkg;
      }
    }
    return best;
  }

  /** Invariant violations; empty when the graph is consistent. */
  validate(): string[] {
    const problems: string[] = [];
    for (const pkg of this.packages) {
      const name = pkg.manifest.name;
      for (const dep of pkg.workspaceDependencies) {
        const target = this.get(dep);
        if (!target) {
          problems.push(`${name} depends on "${dep}" which is not in the workspace index`);
        } else if (!target.dependents.has(name)) {
          problems.push(`${dep} is missing reverse edge from ${name}`);
        }
      }
      for (const dependent of pkg.dependents) {
        if (!this.get(dependent)?.workspaceDependencies.has(name)) {
          problems.push(`${name} lists dependent ${dependent} without a matching dependency`);
        }
      }
    }
    return problems;
  }
}

function depth(relativePath: string) {
  return relativePath === "." ? 0 : relativePath.split("/").length;
}
