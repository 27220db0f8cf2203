import { spawn } from "node:child_process";
import { TaskError } from "@monoweave/contracts";
import type { CommandSpec } from "@monoweave/contracts";
import { createLogger } from "../logging/logger";

const log = createLogger("exec");

export interface ExecuteOptions {
  timeoutMs: number;
  /** Time between SIGTERM and SIGKILL. */
  gracePeriodMs: number;
  maxStdoutBytes: number;
  maxStderrBytes: number;
  signal?: AbortSignal;
}

export interface ExecutionResult {
  /** null when the process was killed by a signal. */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  cancelled: boolean;
  /** Bytes produced, including any that were cut off. */
  stdoutBytes: number;
  stderrBytes: number;
  truncated: boolean;
}

/** Subprocess capability. Rejects with TaskError(ERR_TASK_SPAWN) when the program cannot start. */
export interface CommandExecutor {
  execute(spec: CommandSpec, options: ExecuteOptions): Promise<ExecutionResult>;
}

export function truncationMarker(dropped: number) {
  return `\n... [truncated ${dropped} bytes]`;
}

/** Collects a stream up to a byte cap and counts everything past it. */
class BoundedBuffer {
  private chunks: Buffer[] = [];
  private kept = 0;
  total = 0;

  constructor(private readonly cap: number) {}

  push(chunk: Buffer) {
    this.total += chunk.length;
    const room = this.cap - this.kept;
    if (room <= 0) { return; }
    const slice = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.chunks.push(slice);
    this.kept += slice.length;
  }

  get truncated() {
    return this.total > this.kept;
  }

  toString() {
    const text = Buffer.concat(this.chunks).toString("utf8");
    return this.truncated ? text + truncationMarker(this.total - this.kept) : text;
  }
}

export function cancelledResult(): ExecutionResult {
  return {
    exitCode: null,
    signal: null,
    stdout: "",
    stderr: "",
    durationMs: 0,
    timedOut: false,
    cancelled: true,
    stdoutBytes: 0,
    stderrBytes: 0,
    truncated: false,
  };
}

export class ProcessCommandExecutor implements CommandExecutor {
  execute(spec: CommandSpec, options: ExecuteOptions): Promise<ExecutionResult> {
    if (options.signal?.aborted) {
      return Promise.resolve(cancelledResult());
    }

    const started = performance.now();
    const commandLine = [spec.program, ...spec.args].join(" ");
    log.debug("spawn", { command: commandLine, cwd: spec.cwd });

    return new Promise((resolve, reject) => {
      const child = spawn(spec.program, spec.args, {
        cwd: spec.cwd,
        env: { ...process.env, ...spec.env },
        shell: false,
        stdio: ["ignore", "pipe", "pipe"],
      });

      const stdout = new BoundedBuffer(options.maxStdoutBytes);
      const stderr = new BoundedBuffer(options.maxStderrBytes);
      child.stdout.on("data", (c: Buffer) => stdout.push(c));
      child.stderr.on("data", (c: Buffer) => stderr.push(c));

      let timedOut = false;
      let cancelled = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const terminate = () => {
        if (child.exitCode !== null || child.signalCode !== null) { return; }
        child.kill("SIGTERM");
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            log.warn("process ignored SIGTERM, sending SIGKILL", { command: commandLine, pid: child.pid });
            child.kill("SIGKILL");
          }
        }, options.gracePeriodMs);
      };

      const timeoutTimer = setTimeout(() => {
        timedOut = true;
        log.warn("command timed out", { command: commandLine, timeoutMs: options.timeoutMs });
        terminate();
      }, options.timeoutMs);

      const onAbort = () => {
        cancelled = true;
        terminate();
      };
      options.signal?.addEventListener("abort", onAbort, { once: true });

      const cleanup = () => {
        settled = true;
        clearTimeout(timeoutTimer);
        if (killTimer) { clearTimeout(killTimer); }
        options.signal?.removeEventListener("abort", onAbort);
      };

      child.on("error", (err) => {
        if (settled) { return; }
        cleanup();
        reject(
          new TaskError(`Failed to spawn ${spec.program}: ${err.message}`, {
            code: "ERR_TASK_SPAWN",
            cause: err,
            context: { command: commandLine, cwd: spec.cwd },
          }),
        );
      });

      child.on("close", (code, signal) => {
        if (settled) { return; }
        cleanup();
        const durationMs = performance.now() - started;
        log.debug("exit", { command: commandLine, code, signal, durationMs });
        resolve({
          exitCode: code,
          signal,
          stdout: stdout.toString(),
          stderr: stderr.toString(),
          durationMs,
          timedOut,
          cancelled,
          stdoutBytes: stdout.total,
          stderrBytes: stderr.total,
          truncated: stdout.truncated || stderr.truncated,
        });
      });
    });
  }
}
