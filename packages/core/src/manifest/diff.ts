import semver from "semver";
import { DEPENDENCY_SECTIONS, dependencyMapSchema } from "@monoweave/contracts";
import type { DependencyHint, DependencyHintKind, DependencyMap, DependencySection } from "@monoweave/contracts";

export type DependencySections = Record<DependencySection, DependencyMap>;

export function emptySections(): DependencySections {
  return { dependencies: {}, devDependencies: {}, peerDependencies: {}, optionalDependencies: {} };
}

/**
 * Reads only the dependency maps of a package.json text. Lenient: a
 * missing, unparsable or partially valid document yields empty maps.
 */
export function readDependencySections(text: string | undefined): DependencySections {
  const sections = emptySections();
  if (text === undefined) { return sections; }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return sections;
  }
  if (typeof json !== "object" || json === null) { return sections; }
  for (const section of DEPENDENCY_SECTIONS) {
    const value: unknown = Reflect.get(json, section);
    const parsed = dependencyMapSchema.safeParse(value);
    if (parsed.success) { sections[section] = parsed.data; }
  }
  return sections;
}

function lowerBound(spec: string): string | undefined {
  if (semver.validRange(spec) === null) { return undefined; }
  try {
    return semver.minVersion(spec)?.version;
  } catch {
    return undefined;
  }
}

export function classifyChange(from: string, to: string): DependencyHintKind {
  const a = lowerBound(from);
  const b = lowerBound(to);
  if (a === undefined || b === undefined) { return "changed"; }
  const cmp = semver.compare(a, b);
  if (cmp < 0) { return "upgraded"; }
  if (cmp > 0) { return "downgraded"; }
  return "changed";
}

/** One hint per dependency key that differs between base and head. */
export function diffDependencies(base: DependencySections, head: DependencySections): DependencyHint[] {
  const hints: DependencyHint[] = [];
  for (const section of DEPENDENCY_SECTIONS) {
    const before = base[section];
    const after = head[section];
    for (const [name, from] of Object.entries(before)) {
      const to = after[name];
      if (to === undefined) {
        hints.push({ name, section, kind: "removed", from });
      } else if (to !== from) {
        hints.push({ name, section, kind: classifyChange(from, to), from, to });
      }
    }
    for (const [name, to] of Object.entries(after)) {
      if (before[name] === undefined) {
        hints.push({ name, section, kind: "added", to });
      }
    }
  }
  return hints;
}
