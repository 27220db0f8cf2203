import type { ReferenceUpdateKind } from "@monoweave/contracts";

export interface ReferenceRewrite {
  toRef: string;
  kind: ReferenceUpdateKind;
}

const WORKSPACE = "workspace:";

/**
 * The dependency reference that points at version, derived from the current
 * one. undefined means the reference is left alone: the bare workspace
 * aliases ("workspace:*", "workspace:^", "workspace:~") follow the package by
 * themselves, and other protocols (file:, link:, npm:, git URLs) do not name
 * a registry version.
 */
export function computeReference(fromRef: string, version: string): ReferenceRewrite | undefined {
  const ref = fromRef.trim();

  if (ref.startsWith(WORKSPACE)) {
    const range = ref.slice(WORKSPACE.length);
    if (range === "*" || range === "^" || range === "~") { return undefined; }
    const operator = range.startsWith("^") || range.startsWith("~") ? range[0] : "";
    return { toRef: `${WORKSPACE}${operator}${version}`, kind: "workspace-protocol" };
  }

  if (ref.includes(":") || ref.includes("/")) { return undefined; }

  if (ref.startsWith("^") || ref.startsWith("~")) {
    return { toRef: `${ref[0]}${version}`, kind: "keep-range" };
  }

  return { toRef: version, kind: "fixed-version" };
}
