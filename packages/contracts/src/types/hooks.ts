import type { HookType } from "../schema/config.schema";
import type { TaskExecutionResult } from "../schema/task-result.schema";

export type HookOutcome = "success" | "failed" | "skipped";

export interface HookExecutionResult {
  hookType: HookType;
  status: HookOutcome;
  /** Set when the hook was skipped. */
  reason?: string;
  affectedPackages: string[];
  /** What has to happen before the hook would pass. */
  requiredActions: string[];
  taskResults: TaskExecutionResult[];
  /** Ids of the changesets a post-merge hook applied. */
  appliedChangesets: string[];
}
