import { TaskError } from "@monoweave/contracts";
import type { CommandSpec } from "@monoweave/contracts";
import { cancelledResult, truncationMarker } from "./executor";
import type { CommandExecutor, ExecuteOptions, ExecutionResult } from "./executor";

export type CommandMatcher = string | RegExp | ((spec: CommandSpec) => boolean);

export interface ScriptedResponse {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
  /** Simulated run time; an abort signal cuts it short. */
  delayMs?: number;
  timedOut?: boolean;
  /** Reject as a spawn failure. */
  spawnError?: string;
}

type Responder = ScriptedResponse | ((spec: CommandSpec) => ScriptedResponse);

export interface ScriptedCall {
  spec: CommandSpec;
  options: ExecuteOptions;
  commandLine: string;
}

export function commandLineOf(spec: CommandSpec) {
  return [spec.program, ...spec.args].join(" ");
}

/**
 * In-process CommandExecutor for tests. Rules are checked newest first;
 * a command with no rule exits 0 with empty output.
 */
export class ScriptedExecutor implements CommandExecutor {
  readonly calls: ScriptedCall[] = [];
  private readonly rules: Array<{ matcher: CommandMatcher; responder: Responder }> = [];
  private running = 0;
  peakConcurrency = 0;

  on(matcher: CommandMatcher, responder: Responder): this {
    this.rules.unshift({ matcher, responder });
    return this;
  }

  commandLines(): string[] {
    return this.calls.map((c) => c.commandLine);
  }

  async execute(spec: CommandSpec, options: ExecuteOptions): Promise<ExecutionResult> {
    const commandLine = commandLineOf(spec);
    this.calls.push({ spec, options, commandLine });

    if (options.signal?.aborted) {
      return cancelledResult();
    }

    const rule = this.rules.find((r) => matches(r.matcher, spec, commandLine));
    const response = rule ? (typeof rule.responder === "function" ? rule.responder(spec) : rule.responder) : {};

    if (response.spawnError !== undefined) {
      throw new TaskError(`Failed to spawn ${spec.program}: ${response.spawnError}`, {
        code: "ERR_TASK_SPAWN",
        context: { command: commandLine },
      });
    }

    this.running += 1;
    this.peakConcurrency = Math.max(this.peakConcurrency, this.running);
    let cancelled = false;
    try {
      if (response.delayMs && response.delayMs > 0) {
        cancelled = await sleep(response.delayMs, options.signal);
      } else {
        await Promise.resolve();
      }
    } finally {
      this.running -= 1;
    }

    const stdout = cap(response.stdout ?? "", options.maxStdoutBytes);
    const stderr = cap(response.stderr ?? "", options.maxStderrBytes);
    const interrupted = cancelled || response.timedOut === true;

    return {
      exitCode: interrupted ? null : response.exitCode ?? 0,
      signal: interrupted ? "SIGTERM" : null,
      stdout: stdout.text,
      stderr: stderr.text,
      durationMs: response.delayMs ?? 0,
      timedOut: response.timedOut === true,
      cancelled,
      stdoutBytes: stdout.bytes,
      stderrBytes: stderr.bytes,
      truncated: stdout.truncated || stderr.truncated,
    };
  }
}

function matches(matcher: CommandMatcher, spec: CommandSpec, commandLine: string) {
  if (typeof matcher === "string") { return matcher === commandLine; }
  if (matcher instanceof RegExp) { return matcher.test(commandLine); }
  return matcher(spec);
}

function cap(text: string, max: number) {
  const buf = Buffer.from(text, "utf8");
  if (buf.length <= max) {
    return { text, bytes: buf.length, truncated: false };
  }
  return {
    text: buf.subarray(0, max).toString("utf8") + truncationMarker(buf.length - max),
    bytes: buf.length,
    truncated: true,
  };
}

/** Resolves true when aborted before the delay elapsed. */
function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(false);
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve(true);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
