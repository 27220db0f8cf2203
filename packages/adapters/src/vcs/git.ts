import { IoError } from "@monoweave/contracts";
import type { ChangedFile, ChangeKind, Commit } from "@monoweave/contracts";
import { ProcessCommandExecutor } from "../process/executor";
import type { CommandExecutor, ExecutionResult } from "../process/executor";
import { createLogger } from "../logging/logger";
import type { Repository } from "./types";

const log = createLogger("git");

const RECORD = "\x1e";
const FIELD = "\x1f";

export interface GitRepositoryOptions {
  executor?: CommandExecutor;
  timeoutMs?: number;
}

export class GitRepository implements Repository {
  private readonly executor: CommandExecutor;
  private readonly timeoutMs: number;

  constructor(
    private readonly root: string,
    options: GitRepositoryOptions = {},
  ) {
    this.executor = options.executor ?? new ProcessCommandExecutor();
    this.timeoutMs = options.timeoutMs ?? 60_000;
  }

  /** Runs git in the repository root; a non-zero exit rejects unless allowFail. */
  private async git(args: string[], allowFail = false): Promise<ExecutionResult> {
    let result: ExecutionResult;
    try {
      result = await this.executor.execute(
        { program: "git", args, cwd: this.root },
        { timeoutMs: this.timeoutMs, gracePeriodMs: 1000, maxStdoutBytes: 64 * 1024 * 1024, maxStderrBytes: 64 * 1024 },
      );
    } catch (error) {
      throw new IoError("git", this.root, error);
    }
    if (result.timedOut) {
      throw new IoError("git", this.root, new Error(`git ${args[0] ?? ""} timed out after ${this.timeoutMs}ms`));
    }
    if (result.exitCode !== 0 && !allowFail) {
      const detail = result.stderr.trim() || `exit code ${result.exitCode ?? "none"}`;
      throw new IoError("git", this.root, new Error(`git ${args.join(" ")}: ${detail}`));
    }
    return result;
  }

  async currentBranch(): Promise<string | undefined> {
    const { stdout } = await this.git(["rev-parse", "--abbrev-ref", "HEAD"]);
    const branch = stdout.trim();
    return branch === "HEAD" || branch === "" ? undefined : branch;
  }

  async commitsSince(since?: string, until?: string): Promise<Commit[]> {
    const head = until ?? "HEAD";
    const range = since ? `${since}..${head}` : head;
    const { stdout } = await this.git([
      "log",
      `--format=${RECORD}%H${FIELD}%an${FIELD}%ae${FIELD}%aI${FIELD}%B${FIELD}`,
      "--name-only",
      range,
    ]);
    const commits = parseLog(stdout);
    log.debug("commits", { range, count: commits.length });
    return commits;
  }

  async changedFiles(base: string, head?: string): Promise<ChangedFile[]> {
    const args = ["diff", "--name-status", "-M", base];
    if (head) { args.push(head); }
    const { stdout } = await this.git(args);
    return parseNameStatus(stdout);
  }

  async readFileAt(ref: string, path: string): Promise<string | undefined> {
    const { exitCode, stdout } = await this.git(["show", `${ref}:${path}`], true);
    return exitCode === 0 ? stdout : undefined;
  }
}

export function parseLog(output: string): Commit[] {
  return output
    .split(RECORD)
    .filter((record) => record.trim().length > 0)
    .map((record) => {
      const [hash = "", authorName = "", authorEmail = "", authorDate = "", message = "", rest = ""] = record.split(FIELD);
      const files = rest
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
      return { hash: hash.trim(), authorName, authorEmail, authorDate, message: message.trim(), files };
    });
}

const STATUS_KINDS: Record<string, ChangeKind> = {
  A: "added",
  M: "modified",
  D: "deleted",
  R: "renamed",
  C: "added",
  T: "modified",
};

export function parseNameStatus(output: string): ChangedFile[] {
  const files: ChangedFile[] = [];
  for (const line of output.split("\n")) {
    if (!line.trim()) { continue; }
    const [status = "", first = "", second] = line.split("\t");
    const kind = STATUS_KINDS[status.charAt(0)] ?? "modified";
    if ((status.startsWith("R") || status.startsWith("C")) && second !== undefined) {
      files.push(kind === "renamed" ? { path: second, kind, previousPath: first } : { path: second, kind });
    } else {
      files.push({ path: first, kind });
    }
  }
  return files;
}
