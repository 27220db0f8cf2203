import { posix } from "node:path";
import { minimatch } from "minimatch";
import { IoError } from "@monoweave/contracts";
import type { FileStat, FileSystem, WalkOptions } from "./types";

function errno(code: string, message: string) {
  return Object.assign(new Error(message), { code });
}

/** In-memory FileSystem for tests. Directories exist implicitly. */
export class MemoryFileSystem implements FileSystem {
  private readonly files = new Map<string, string>();
  private readonly failing = new Set<string>();
  readonly writes: string[] = [];

  constructor(files: Record<string, string> = {}) {
    for (const [path, content] of Object.entries(files)) {
      this.files.set(posix.resolve(path), content);
    }
  }

  /** Files under root, given as relative path -> content (objects become pretty JSON). */
  static fromTree(root: string, tree: Record<string, string | object>): MemoryFileSystem {
    const fs = new MemoryFileSystem();
    for (const [rel, content] of Object.entries(tree)) {
      fs.files.set(
        posix.resolve(root, rel),
        typeof content === "string" ? content : JSON.stringify(content, null, 2) + "\n",
      );
    }
    return fs;
  }

  /** Makes reads and writes of path fail with EACCES. */
  failOn(path: string) {
    this.failing.add(posix.resolve(path));
  }

  snapshot(): Record<string, string> {
    return Object.fromEntries([...this.files.entries()].sort(([a], [b]) => a.localeCompare(b)));
  }

  async readFile(path: string): Promise<string> {
    const key = posix.resolve(path);
    if (this.failing.has(key)) {
      throw new IoError("read", key, errno("EACCES", "permission denied"));
    }
    const content = this.files.get(key);
    if (content === undefined) {
      throw new IoError("read", key, errno("ENOENT", "no such file or directory"));
    }
    return content;
  }

  async writeFile(path: string, content: string): Promise<void> {
    const key = posix.resolve(path);
    if (this.failing.has(key)) {
      throw new IoError("write", key, errno("EACCES", "permission denied"));
    }
    this.files.set(key, content);
    this.writes.push(key);
  }

  async remove(path: string): Promise<void> {
    const key = posix.resolve(path);
    if (this.failing.has(key)) {
      throw new IoError("remove", key, errno("EACCES", "permission denied"));
    }
    this.files.delete(key);
  }

  async exists(path: string): Promise<boolean> {
    const key = posix.resolve(path);
    return this.files.has(key) || this.isDirectory(key);
  }

  async walk(root: string, options: WalkOptions = {}): Promise<string[]> {
    const base = posix.resolve(root);
    const ignore = new Set(options.ignore ?? []);
    const out: string[] = [];
    const prefix = base === "/" ? "/" : base + "/";
    for (const key of this.files.keys()) {
      if (!key.startsWith(prefix)) { continue; }
      const rel = key.slice(prefix.length);
      const dirs = rel.split("/").slice(0, -1);
      if (dirs.some((d) => ignore.has(d))) { continue; }
      if (options.pattern && !minimatch(rel, options.pattern, { dot: true })) { continue; }
      out.push(rel);
    }
    return out.sort();
  }

  async stat(path: string): Promise<FileStat> {
    const key = posix.resolve(path);
    const content = this.files.get(key);
    if (content !== undefined) {
      return { size: Buffer.byteLength(content, "utf8"), isDirectory: false };
    }
    if (this.isDirectory(key)) {
      return { size: 0, isDirectory: true };
    }
    throw new IoError("stat", key, errno("ENOENT", "no such file or directory"));
  }

  private isDirectory(key: string) {
    const prefix = key.endsWith("/") ? key : key + "/";
    for (const file of this.files.keys()) {
      if (file.startsWith(prefix)) { return true; }
    }
    return false;
  }
}
