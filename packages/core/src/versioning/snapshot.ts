import semver from "semver";

/** Snapshot numbers already used, per "M.m.p-id" base. */
export class SnapshotHistory {
  private readonly taken = new Map<string, number>();

  /** Highest N used so far for base, or -1. */
  last(base: string): number {
    return this.taken.get(base) ?? -1;
  }

  peek(base: string): number {
    return this.last(base) + 1;
  }

  claim(base: string): number {
    const next = this.peek(base);
    this.taken.set(base, next);
    return next;
  }

  clone(): SnapshotHistory {
    const copy = new SnapshotHistory();
    for (const [base, n] of this.taken) { copy.taken.set(base, n); }
    return copy;
  }

  /** Records a version such as 1.2.3-alpha.4 as used. Other versions are ignored. */
  record(version: string): void {
    const parsed = semver.parse(version);
    if (!parsed || parsed.prerelease.length !== 2) { return; }
    const [id, n] = parsed.prerelease;
    if (typeof id !== "string" || typeof n !== "number") { return; }
    const base = `${parsed.major}.${parsed.minor}.${parsed.patch}-${id}`;
    if (n > this.last(base)) { this.taken.set(base, n); }
  }
}
