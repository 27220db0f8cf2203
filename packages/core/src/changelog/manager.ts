import { join } from "node:path";
import { IoError } from "@monoweave/contracts";
import type { ChangelogConfig, ConventionalCommit } from "@monoweave/contracts";
import type { FileSystem, Repository } from "@monoweave/adapters";
import { createLogger } from "@monoweave/adapters";
import type { WorkspacePackage } from "@monoweave/contracts";
import { isWithin } from "../utils/paths";
import { CHANGELOG_FOOTER, CHANGELOG_HEADER, ChangelogGenerator } from "./generator";
import { parseCommit } from "./conventional";

const log = createLogger("changelog");

/**
 * Inserts a rendered version section into an existing changelog: before the
 * first "## " heading, after whatever preamble precedes it.
 */
export function mergeChangelog(existing: string | undefined, section: string): string {
  if (existing === undefined || existing.trim() === "") {
    return CHANGELOG_HEADER + section + CHANGELOG_FOOTER;
  }

  const lines = existing.split("\n");
  const at = lines.findIndex((line) => line.startsWith("## "));
  const block = section.endsWith("\n") ? section : section + "\n";

  if (at < 0) {
    const preamble = existing.endsWith("\n") ? existing : existing + "\n";
    return preamble + (preamble.endsWith("\n\n") ? "" : "\n") + block;
  }

  const before = lines.slice(0, at).join("\n");
  const after = lines.slice(at).join("\n");
  return (before ? before + "\n" : "") + block + after;
}

export interface GenerateForPackageOptions {
  version: string;
  since?: string;
  until?: string;
  previousVersion?: string;
  date?: string;
}

export class ChangelogManager {
  private readonly generator: ChangelogGenerator;

  constructor(
    private readonly fs: FileSystem,
    private readonly repository: Repository,
    private readonly config: ChangelogConfig,
  ) {
    this.generator = new ChangelogGenerator(config);
  }

  changelogPath(pkg: WorkspacePackage): string {
    return join(pkg.absolutePath, this.config.fileName);
  }

  /** Conventional commits whose files lie under the package directory. */
  async commitsForPackage(pkg: WorkspacePackage, since?: string, until?: string): Promise<ConventionalCommit[]> {
    const commits = await this.repository.commitsSince(since, until);
    return commits
      .filter((c) => (c.files ?? []).some((file) => isWithin(pkg.relativePath, file)))
      .map(parseCommit);
  }

  async generateForPackage(pkg: WorkspacePackage, options: GenerateForPackageOptions): Promise<string> {
    const commits = await this.commitsForPackage(pkg, options.since, options.until);
    return this.generator.render(
      {
        packageName: pkg.manifest.name,
        version: options.version,
        date: options.date ?? new Date().toISOString().slice(0, 10),
        previousVersion: options.previousVersion,
        commits,
      },
      this.config.format,
    );
  }

  /** Merges a markdown version section into the file at path and writes it. */
  async update(path: string, section: string): Promise<string> {
    let existing: string | undefined;
    if (await this.fs.exists(path)) {
      existing = await this.fs.readFile(path);
    }
    const merged = mergeChangelog(existing, section);
    try {
      await this.fs.writeFile(path, merged);
    } catch (error) {
      throw error instanceof IoError ? error : new IoError("write", path, error);
    }
    log.debug("changelog updated", { path });
    return merged;
  }

  /**
   * Renders the package's release since a revision into its changelog file.
   * Markdown sections are merged into the existing history.
   */
  async updateForPackage(pkg: WorkspacePackage, options: GenerateForPackageOptions): Promise<string> {
    if (this.config.format !== "markdown") {
      // text and json hold a single release, so the file is replaced
      const path = this.changelogPath(pkg);
      const rendered = await this.generateForPackage(pkg, options);
      try {
        await this.fs.writeFile(path, rendered);
      } catch (error) {
        throw error instanceof IoError ? error : new IoError("write", path, error);
      }
      log.debug("changelog written", { path, format: this.config.format });
      return rendered;
    }

    const commits = await this.commitsForPackage(pkg, options.since, options.until);
    const section = this.generator.renderSection({
      packageName: pkg.manifest.name,
      version: options.version,
      date: options.date ?? new Date().toISOString().slice(0, 10),
      previousVersion: options.previousVersion,
      commits,
    });
    return this.update(this.changelogPath(pkg), section);
  }
}
