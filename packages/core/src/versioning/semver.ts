import semver from "semver";
import { VersionError } from "@monoweave/contracts";
import type { BumpStrategy, BumpStrategyKind } from "@monoweave/contracts";
import type { SnapshotHistory } from "./snapshot";

const SNAPSHOT_ID = /^[0-9A-Za-z-]+$/;

function parse(version: string, packageName?: string) {
  const parsed = semver.parse(version);
  if (!parsed) {
    throw new VersionError(`Invalid semver "${version}"${packageName ? ` for ${packageName}` : ""}`, {
      code: "ERR_VERSION_INVALID",
      packageName,
    });
  }
  return parsed;
}

/** M.m.p with prerelease and build metadata dropped. */
export function coreVersion(version: string): string {
  const v = parse(version);
  return `${v.major}.${v.minor}.${v.patch}`;
}

// semver.inc("1.0.0-rc.1", "major") yields 1.0.0, hence the manual arithmetic
export function bumpMajor(version: string): string {
  const v = parse(version);
  return `${v.major + 1}.0.0`;
}

export function bumpMinor(version: string): string {
  const v = parse(version);
  return `${v.major}.${v.minor + 1}.0`;
}

export function bumpPatch(version: string): string {
  const v = parse(version);
  return `${v.major}.${v.minor}.${v.patch + 1}`;
}

export function isValidSnapshotId(identifier: string): boolean {
  return SNAPSHOT_ID.test(identifier);
}

/**
 * M.m.p-{id}.{N}: N is the next number not yet taken for that base in the
 * history. claim=false only looks.
 */
export function bumpSnapshot(version: string, identifier: string, history: SnapshotHistory, claim = true): string {
  if (!isValidSnapshotId(identifier)) {
    throw new VersionError(`Invalid snapshot identifier "${identifier}"`, { code: "ERR_VERSION_STRATEGY" });
  }
  const base = `${coreVersion(version)}-${identifier}`;
  const n = claim ? history.claim(base) : history.peek(base);
  return `${base}.${n}`;
}

export function applyStrategy(
  strategy: BumpStrategy,
  version: string,
  history: SnapshotHistory,
  claim = true,
): string {
  switch (strategy.kind) {
    case "major":
      return bumpMajor(version);
    case "minor":
      return bumpMinor(version);
    case "patch":
    case "cascade":
      return bumpPatch(version);
    case "snapshot":
      return bumpSnapshot(version, strategy.identifier, history, claim);
  }
}

const RANK: Record<BumpStrategyKind, number> = {
  major: 4,
  minor: 3,
  patch: 2,
  snapshot: 1,
  cascade: 0,
};

export function strategyRank(strategy: BumpStrategy): number {
  return RANK[strategy.kind];
}

/** Positive when a is more severe than b. */
export function compareStrategies(a: BumpStrategy, b: BumpStrategy): number {
  return strategyRank(a) - strategyRank(b);
}

export function highestStrategy(strategies: Iterable<BumpStrategy>): BumpStrategy | undefined {
  let best: BumpStrategy | undefined;
  for (const s of strategies) {
    if (!best || compareStrategies(s, best) > 0) { best = s; }
  }
  return best;
}

export function describeStrategy(strategy: BumpStrategy): string {
  return strategy.kind === "snapshot" ? `snapshot(${strategy.identifier})` : strategy.kind;
}
