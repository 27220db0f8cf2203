import semver from "semver";
import {
  ConfigError,
  DEPENDENCY_SECTIONS,
  ManifestError,
  rawManifestSchema,
  workspacesDeclarationSchema,
} from "@monoweave/contracts";
import type { DependencySection, PackageManifest, WorkspacesDeclaration } from "@monoweave/contracts";

const NAME_PART = /^[a-z0-9][-a-z0-9._~]*$/i;
const MAX_NAME_LENGTH = 214;

const KNOWN_FIELDS = new Set<string>([
  "name",
  "version",
  "description",
  "license",
  "main",
  "private",
  "author",
  "repository",
  "scripts",
  "workspaces",
  ...DEPENDENCY_SECTIONS,
]);

/** Returns a problem description, or undefined when the name is valid. */
export function validatePackageName(name: string): string | undefined {
  if (name.length === 0) { return "name is empty"; }
  if (name.length > MAX_NAME_LENGTH) { return `name is longer than ${MAX_NAME_LENGTH} characters`; }

  if (name.startsWith("@")) {
    const slash = name.indexOf("/");
    if (slash < 0) { return "scoped name must look like @scope/name"; }
    const scope = name.slice(1, slash);
    const rest = name.slice(slash + 1);
    if (!NAME_PART.test(scope)) { return `invalid scope "${scope}"`; }
    if (!NAME_PART.test(rest)) { return `invalid name "${rest}"`; }
    return undefined;
  }

  return NAME_PART.test(name) ? undefined : `invalid name "${name}"`;
}

export interface ParsedManifest {
  manifest: PackageManifest;
  warnings: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseManifest(text: string, path?: string): ParsedManifest {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ManifestError(`Cannot parse ${path ?? "manifest"}: ${error instanceof Error ? error.message : String(error)}`, {
      code: "ERR_MANIFEST_PARSE",
      cause: error,
      path,
    });
  }
  return normalizeManifest(json, path);
}

/** Turns an already-parsed package.json value into a PackageManifest. */
export function normalizeManifest(json: unknown, path?: string): ParsedManifest {
  if (!isRecord(json)) {
    throw new ManifestError(`${path ?? "manifest"} is not a JSON object`, { code: "ERR_MANIFEST_PARSE", path });
  }

  const name = json.name;
  if (typeof name !== "string") {
    throw new ManifestError(`${path ?? "manifest"} has no "name"`, { code: "ERR_MANIFEST_NAME", path });
  }
  const nameProblem = validatePackageName(name);
  if (nameProblem) {
    throw new ManifestError(`Invalid package name in ${path ?? "manifest"}: ${nameProblem}`, {
      code: "ERR_MANIFEST_NAME",
      path,
    });
  }

  const version = json.version;
  if (typeof version !== "string" || semver.valid(version) === null) {
    throw new ManifestError(`Package ${name} has an invalid version ${JSON.stringify(version)}`, {
      code: "ERR_MANIFEST_VERSION",
      path,
      context: { package: name },
    });
  }

  const parsed = rawManifestSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ManifestError(`Package ${name} does not match the manifest schema: ${issues.join("; ")}`, {
      code: "ERR_MANIFEST_SCHEMA",
      path,
      context: { issues },
    });
  }
  const raw = parsed.data;

  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(json)) {
    if (!KNOWN_FIELDS.has(key)) { extra[key] = value; }
  }

  const manifest: PackageManifest = {
    name,
    version,
    description: raw.description,
    license: raw.license,
    main: raw.main,
    private: raw.private,
    author: raw.author,
    repository: raw.repository,
    dependencies: { ...raw.dependencies },
    devDependencies: { ...raw.devDependencies },
    peerDependencies: { ...raw.peerDependencies },
    optionalDependencies: { ...raw.optionalDependencies },
    scripts: { ...raw.scripts },
    workspaces: raw.workspaces ?? undefined,
    extra,
  };

  return { manifest, warnings: duplicateDependencyWarnings(manifest) };
}

function duplicateDependencyWarnings(manifest: PackageManifest): string[] {
  const seen = new Map<string, DependencySection[]>();
  for (const section of DEPENDENCY_SECTIONS) {
    for (const dep of Object.keys(manifest[section])) {
      seen.set(dep, [...(seen.get(dep) ?? []), section]);
    }
  }
  const warnings: string[] = [];
  for (const [dep, sections] of seen) {
    if (sections.length > 1) {
      warnings.push(`${manifest.name}: dependency "${dep}" appears in ${sections.join(", ")}`);
    }
  }
  return warnings;
}

/** Accepts a list of globs or { packages: [...] }. */
export function parseWorkspaceDeclaration(value: unknown, source = "workspaces"): string[] {
  const parsed = workspacesDeclarationSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`Malformed workspace declaration in ${source}`, {
      code: "ERR_CONFIG_WORKSPACE_DECLARATION",
      context: { source, issues: parsed.error.issues.map((i) => i.message) },
    });
  }
  return workspacePatterns(parsed.data);
}

export function workspacePatterns(declaration: WorkspacesDeclaration): string[] {
  return Array.isArray(declaration) ? declaration : declaration.packages;
}

export function dependencyNames(manifest: PackageManifest, sections: readonly DependencySection[]): Set<string> {
  const names = new Set<string>();
  for (const section of sections) {
    for (const dep of Object.keys(manifest[section])) {
      names.add(dep);
    }
  }
  return names;
}
