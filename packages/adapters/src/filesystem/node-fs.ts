import { promises as fsp } from "node:fs";
import { dirname } from "node:path";
import { randomBytes } from "node:crypto";
import { glob } from "glob";
import { IoError } from "@monoweave/contracts";
import { createLogger } from "../logging/logger";
import type { FileStat, FileSystem, WalkOptions } from "./types";

const log = createLogger("fs");

export class NodeFileSystem implements FileSystem {
  async readFile(path: string): Promise<string> {
    try {
      return await fsp.readFile(path, "utf8");
    } catch (error) {
      throw new IoError("read", path, error);
    }
  }

  /** Writes through a sibling temp file and a rename. */
  async writeFile(path: string, content: string): Promise<void> {
    const tmp = `${path}.${randomBytes(4).toString("hex")}.tmp`;
    try {
      await fsp.mkdir(dirname(path), { recursive: true });
      await fsp.writeFile(tmp, content, "utf8");
      if (process.platform === "win32") {
        await fsp.rm(path, { force: true });
      }
      await fsp.rename(tmp, path);
    } catch (error) {
      await fsp.rm(tmp, { force: true }).catch((cleanupError: unknown) => {
        log.debug("could not remove temp file", { tmp, error: String(cleanupError) });
      });
      throw new IoError("write", path, error);
    }
  }

  async remove(path: string): Promise<void> {
    try {
      await fsp.rm(path, { force: true });
    } catch (error) {
      throw new IoError("remove", path, error);
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fsp.access(path);
      return true;
    } catch {
      return false;
    }
  }

  async walk(root: string, options: WalkOptions = {}): Promise<string[]> {
    const ignore = (options.ignore ?? []).flatMap((dir) => [`**/${dir}/**`, `${dir}/**`]);
    try {
      const files = await glob(options.pattern ?? "**/*", {
        cwd: root,
        nodir: true,
        dot: true,
        posix: true,
        ignore,
      });
      return files.sort();
    } catch (error) {
      throw new IoError("walk", root, error);
    }
  }

  async stat(path: string): Promise<FileStat> {
    try {
      const st = await fsp.stat(path);
      return { size: st.size, isDirectory: st.isDirectory() };
    } catch (error) {
      throw new IoError("stat", path, error);
    }
  }
}
