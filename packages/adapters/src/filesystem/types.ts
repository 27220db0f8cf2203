export interface WalkOptions {
  /** Directory names skipped at any depth. */
  ignore?: readonly string[];
  /** Glob the relative path must match; defaults to every file. */
  pattern?: string;
}

export interface FileStat {
  size: number;
  isDirectory: boolean;
}

/**
 * Filesystem capability. Paths are absolute; walk() returns POSIX paths
 * relative to its root. Failures surface as IoError.
 */
export interface FileSystem {
  readFile(path: string): Promise<string>;
  writeFile(path: string, content: string): Promise<void>;
  /** Deletes a file; a missing file is not an error. */
  remove(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  walk(root: string, options?: WalkOptions): Promise<string[]>;
  stat(path: string): Promise<FileStat>;
}
