import { posix } from "node:path";

/** Relative POSIX path of a file inside a package directory ("." is the root). */
export function relativeTo(dir: string, file: string): string {
  if (dir === "." || dir === "") { return file; }
  return file.startsWith(dir + "/") ? file.slice(dir.length + 1) : file;
}

export function isWithin(dir: string, file: string): boolean {
  return dir === "." || dir === "" || file === dir || file.startsWith(dir + "/");
}

export function manifestPathOf(relativeDir: string): string {
  return relativeDir === "." ? "package.json" : posix.join(relativeDir, "package.json");
}
