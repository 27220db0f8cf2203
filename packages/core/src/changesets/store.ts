import { join } from "node:path";
import { ChangesetError, changesetSchema, isMonoweaveError } from "@monoweave/contracts";
import type { Changeset, ChangesetFilter } from "@monoweave/contracts";
import type { FileSystem } from "@monoweave/adapters";
import { createLogger } from "@monoweave/adapters";

const log = createLogger("changesets");

/** `<created ms>-<branch with / as ->-<first 8 of id>.json` */
export function changesetFileName(changeset: Changeset): string {
  const created = Date.parse(changeset.createdAt);
  const branch = changeset.branch.replace(/[/\\]/g, "-") || "detached";
  return `${created}-${branch}-${changeset.id.slice(0, 8)}.json`;
}

export function matchesChangesetFilter(changeset: Changeset, filter: ChangesetFilter): boolean {
  if (filter.package !== undefined && changeset.package !== filter.package) { return false; }
  if (filter.status !== undefined && changeset.status !== filter.status) { return false; }
  if (filter.branch !== undefined && changeset.branch !== filter.branch) { return false; }
  if (filter.author !== undefined && changeset.author !== filter.author) { return false; }
  if (filter.environment !== undefined && !changeset.environments.includes(filter.environment)) { return false; }
  return true;
}

/**
 * Changesets as JSON files in one directory of the workspace. A changeset
 * keeps its file for its whole life; status changes rewrite it in place.
 */
export class ChangesetStore {
  readonly directory: string;

  constructor(
    private readonly fs: FileSystem,
    root: string,
    directory: string,
  ) {
    this.directory = join(root, directory);
  }

  async save(changeset: Changeset): Promise<string> {
    const path = join(this.directory, changesetFileName(changeset));
    await this.fs.writeFile(path, JSON.stringify(changeset, null, 2) + "\n");
    log.debug("saved changeset", { id: changeset.id, path });
    return path;
  }

  async load(id: string): Promise<Changeset | undefined> {
    const found = await this.find(id);
    return found?.changeset;
  }

  /** Newest first. */
  async list(filter: ChangesetFilter = {}): Promise<Changeset[]> {
    const entries = await this.entries();
    return entries
      .map((entry) => entry.changeset)
      .filter((changeset) => matchesChangesetFilter(changeset, filter))
      .sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt) || a.id.localeCompare(b.id));
  }

  async remove(id: string): Promise<boolean> {
    const found = await this.find(id);
    if (!found) { return false; }
    await this.fs.remove(found.path);
    log.debug("removed changeset", { id, path: found.path });
    return true;
  }

  private async find(id: string): Promise<{ path: string; changeset: Changeset } | undefined> {
    const short = id.slice(0, 8);
    const entries = await this.entries((file) => file.includes(short));
    return entries.find((entry) => entry.changeset.id === id);
  }

  private async entries(accept: (file: string) => boolean = () => true): Promise<Array<{ path: string; changeset: Changeset }>> {
    if (!(await this.fs.exists(this.directory))) { return []; }
    const files = await this.fs.walk(this.directory, { pattern: "*.json" });
    const out: Array<{ path: string; changeset: Changeset }> = [];
    for (const file of files.filter(accept)) {
      const path = join(this.directory, file);
      out.push({ path, changeset: await this.read(path) });
    }
    return out;
  }

  private async read(path: string): Promise<Changeset> {
    let json: unknown;
    try {
      json = JSON.parse(await this.fs.readFile(path));
    } catch (error) {
      if (isMonoweaveError(error)) { throw error; }
      throw new ChangesetError(`${path} is not valid JSON`, { code: "ERR_CHANGESET_STORAGE", cause: error, context: { path } });
    }
    const parsed = changesetSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
      throw new ChangesetError(`${path} is not a changeset: ${issues.join("; ")}`, {
        code: "ERR_CHANGESET_STORAGE",
        context: { path, issues },
      });
    }
    return parsed.data;
  }
}
