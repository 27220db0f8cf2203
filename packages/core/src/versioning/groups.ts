import type { VersioningConfig } from "@monoweave/contracts";
import { matchGlob } from "../utils/glob";

export interface GroupMembership {
  /** Group name -> member package names, in the order given. */
  groups: Map<string, string[]>;
  groupOf: Map<string, string>;
  warnings: string[];
}

/**
 * Partitions package names into the configured Mixed-strategy groups.
 * individualPackages never join a group; a package matching several groups
 * stays in the first one declared.
 */
export function groupMembership(
  names: readonly string[],
  config: Pick<VersioningConfig, "groups" | "individualPackages">,
): GroupMembership {
  const groups = new Map<string, string[]>();
  const groupOf = new Map<string, string>();
  const warnings: string[] = [];
  const individual = new Set(config.individualPackages);

  for (const [group, raw] of Object.entries(config.groups)) {
    const patterns = Array.isArray(raw) ? raw : [raw];
    const members: string[] = [];
    for (const name of names) {
      if (individual.has(name) || !patterns.some((p) => matchGlob(name, p))) { continue; }
      const owner = groupOf.get(name);
      if (owner !== undefined) {
        warnings.push(`Package '${name}' matches groups '${owner}' and '${group}'; keeping '${owner}'`);
        continue;
      }
      groupOf.set(name, group);
      members.push(name);
    }
    groups.set(group, members);
  }

  return { groups, groupOf, warnings };
}
