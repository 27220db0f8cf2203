import type { BumpStrategy, ChangeSet, ExecutionMode } from "@monoweave/contracts";

type Targets = ReadonlyMap<string, BumpStrategy> | Record<string, BumpStrategy>;

function isMap(targets: Targets): targets is ReadonlyMap<string, BumpStrategy> {
  return targets instanceof Map;
}

export function createChangeSet(targets: Targets, description = "", executionMode: ExecutionMode = "preview"): ChangeSet {
  const targetPackages = isMap(targets) ? new Map(targets) : new Map(Object.entries(targets));
  return { targetPackages, description, executionMode };
}

export function previewOf(changeSet: ChangeSet): ChangeSet {
  return { ...changeSet, executionMode: "preview" };
}

export function applyOf(changeSet: ChangeSet): ChangeSet {
  return { ...changeSet, executionMode: "apply" };
}
