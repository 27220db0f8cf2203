import type { DependencyMap, WorkspacePackage } from "@monoweave/contracts";
import { WorkspaceGraph } from "../graph";

export interface PackageFixture {
  version?: string;
  dir?: string;
  dependencies?: DependencyMap;
  devDependencies?: DependencyMap;
  peerDependencies?: DependencyMap;
  optionalDependencies?: DependencyMap;
}

function dirOf(name: string) {
  return `packages/${name.replace(/^@[^/]+\//, "")}`;
}

export function workspacePackage(name: string, fixture: PackageFixture = {}, root = "/repo"): WorkspacePackage {
  const relativePath = fixture.dir ?? dirOf(name);
  const absolutePath = relativePath === "." ? root : `${root}/${relativePath}`;
  return {
    manifest: {
      name,
      version: fixture.version ?? "1.0.0",
      dependencies: { ...fixture.dependencies },
      devDependencies: { ...fixture.devDependencies },
      peerDependencies: { ...fixture.peerDependencies },
      optionalDependencies: { ...fixture.optionalDependencies },
      scripts: {},
      extra: {},
    },
    absolutePath,
    relativePath,
    manifestPath: `${absolutePath}/package.json`,
    workspaceDependencies: new Set(),
    dependents: new Set(),
  };
}

/** Graph over the fixtures in declaration order. */
export function buildGraph(fixtures: Record<string, PackageFixture>, root = "/repo"): WorkspaceGraph {
  const packages = Object.entries(fixtures).map(([name, fixture]) => workspacePackage(name, fixture, root));
  return new WorkspaceGraph("yarn-workspaces", root, packages, {}, ["packages/*"]);
}

/** Manifests of the fixtures as a MemoryFileSystem tree. */
export function manifestTree(fixtures: Record<string, PackageFixture>): Record<string, object> {
  const tree: Record<string, object> = {
    "package.json": { name: "workspace-root", version: "0.0.0", private: true, workspaces: ["packages/*"] },
  };
  for (const [name, fixture] of Object.entries(fixtures)) {
    const { dir, version, ...sections } = fixture;
    tree[`${dir ?? dirOf(name)}/package.json`] = { name, version: version ?? "1.0.0", ...sections };
  }
  return tree;
}
