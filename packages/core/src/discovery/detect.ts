import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { ConfigError, lernaConfigSchema, nxConfigSchema, pnpmWorkspaceSchema, rushConfigSchema } from "@monoweave/contracts";
import type { MonorepoKind } from "@monoweave/contracts";
import type { FileSystem } from "@monoweave/adapters";
import { parseWorkspaceDeclaration } from "../manifest/parser";
import type { ZodTypeAny, output } from "zod";

export const COMMON_PATTERNS = ["packages/*", "apps/*", "libs/*", "modules/*", "tools/*"];

export interface WorkspaceLayout {
  kind: MonorepoKind;
  /** Globs of package directories; null means scan the whole tree. */
  patterns: string[] | null;
  /** File the patterns came from. */
  source?: string;
  warnings: string[];
}

async function readStructured<S extends ZodTypeAny>(
  fs: FileSystem,
  root: string,
  file: string,
  schema: S,
): Promise<output<S>> {
  const path = join(root, file);
  const text = await fs.readFile(path);
  let value: unknown;
  try {
    value = file.endsWith(".yaml") ? parseYaml(text) : JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Cannot parse ${file}`, { code: "ERR_CONFIG_WORKSPACE_DECLARATION", cause: error, context: { path } });
  }
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Malformed workspace declaration in ${file}`, {
      code: "ERR_CONFIG_WORKSPACE_DECLARATION",
      context: { path, issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
    });
  }
  return parsed.data;
}

/** The "workspaces" value of the root package.json, if it declares one. */
async function rootWorkspaces(fs: FileSystem, root: string): Promise<string[] | undefined> {
  const path = join(root, "package.json");
  if (!(await fs.exists(path))) { return undefined; }
  let json: unknown;
  try {
    json = JSON.parse(await fs.readFile(path));
  } catch (error) {
    throw new ConfigError("Cannot parse the root package.json", { cause: error, context: { path } });
  }
  if (typeof json !== "object" || json === null || Array.isArray(json)) { return undefined; }
  const declared: unknown = Reflect.get(json, "workspaces");
  if (declared === undefined || declared === null) { return undefined; }
  return parseWorkspaceDeclaration(declared, "package.json");
}

async function pnpmPackages(fs: FileSystem, root: string): Promise<string[] | undefined> {
  if (!(await fs.exists(join(root, "pnpm-workspace.yaml")))) { return undefined; }
  return (await readStructured(fs, root, "pnpm-workspace.yaml", pnpmWorkspaceSchema)).packages;
}

async function nxPatterns(fs: FileSystem, root: string): Promise<{ patterns: string[] | undefined; source?: string }> {
  for (const file of ["nx.json", "workspace.json", "angular.json"]) {
    if (!(await fs.exists(join(root, file)))) { continue; }
    const config = await readStructured(fs, root, file, nxConfigSchema);
    if (!config.projects) { continue; }
    const dirs = Object.values(config.projects)
      .map((project) => (typeof project === "string" ? project : project.root))
      .filter((dir): dir is string => typeof dir === "string" && dir.length > 0);
    if (dirs.length > 0) { return { patterns: dirs, source: file }; }
  }
  return { patterns: undefined };
}

/**
 * Probes the root for each monorepo convention in order; the first match
 * decides the kind and where its packages live.
 */
export async function detectLayout(fs: FileSystem, root: string): Promise<WorkspaceLayout> {
  const warnings: string[] = [];
  const has = (file: string) => fs.exists(join(root, file));

  if (await has("lerna.json")) {
    const lerna = await readStructured(fs, root, "lerna.json", lernaConfigSchema);
    if (lerna.useWorkspaces) {
      const delegated = await rootWorkspaces(fs, root);
      if (delegated) { return { kind: "lerna", patterns: delegated, source: "package.json", warnings }; }
      warnings.push("lerna.json sets useWorkspaces but package.json declares no workspaces");
    }
    return { kind: "lerna", patterns: lerna.packages ?? ["packages/*"], source: "lerna.json", warnings };
  }

  const workspaces = await rootWorkspaces(fs, root);
  if (workspaces) {
    return { kind: "yarn-workspaces", patterns: workspaces, source: "package.json", warnings };
  }

  const pnpm = await pnpmPackages(fs, root);
  if (pnpm) {
    return { kind: "pnpm-workspaces", patterns: pnpm, source: "pnpm-workspace.yaml", warnings };
  }

  if (await has("nx.json")) {
    const nx = await nxPatterns(fs, root);
    if (nx.patterns) { return { kind: "nx", patterns: nx.patterns, source: nx.source, warnings }; }
    return { kind: "nx", patterns: COMMON_PATTERNS, warnings };
  }

  if (await has("turbo.json")) {
    warnings.push("turbo.json found without a workspaces or pnpm-workspace.yaml declaration; using common patterns");
    return { kind: "turborepo", patterns: COMMON_PATTERNS, warnings };
  }

  if (await has("rush.json")) {
    const rush = await readStructured(fs, root, "rush.json", rushConfigSchema);
    return { kind: "rush", patterns: rush.projects.map((p) => p.projectFolder), source: "rush.json", warnings };
  }

  return { kind: "custom", patterns: null, warnings };
}
