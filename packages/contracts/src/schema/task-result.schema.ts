import { z } from "zod";

export const taskStatusSchema = z.discriminatedUnion("state", [
  z.object({ state: z.literal("success") }),
  z.object({ state: z.literal("failed"), reason: z.string() }),
  z.object({ state: z.literal("skipped"), reason: z.string() }),
  z.object({ state: z.literal("timed-out") }),
]);

export const commandOutputSchema = z.object({
  package: z.string().optional(),
  command: z.string(),
  cwd: z.string(),
  exitCode: z.number().int().nullable(),
  stdout: z.string(),
  stderr: z.string(),
  durationMs: z.number().nonnegative(),
  env: z.record(z.string(), z.string()),
  timedOut: z.boolean(),
  truncated: z.boolean(),
});

export const taskStatsSchema = z.object({
  commandsExecuted: z.number().int().nonnegative(),
  commandsSucceeded: z.number().int().nonnegative(),
  commandsFailed: z.number().int().nonnegative(),
  packagesProcessed: z.number().int().nonnegative(),
  stdoutBytes: z.number().int().nonnegative(),
  stderrBytes: z.number().int().nonnegative(),
  peakMemoryBytes: z.number().int().nonnegative().optional(),
  cpuTimeMs: z.number().nonnegative().optional(),
});

export const taskArtifactSchema = z.object({
  name: z.string(),
  path: z.string(),
  kind: z.string(),
  sizeBytes: z.number().int().nonnegative(),
  package: z.string().optional(),
  metadata: z.record(z.string(), z.unknown()),
});

export const taskExecutionResultSchema = z.object({
  taskName: z.string(),
  status: taskStatusSchema,
  startedAt: z.string().datetime(),
  endedAt: z.string().datetime(),
  durationMs: z.number().nonnegative(),
  outputs: z.array(commandOutputSchema),
  stats: taskStatsSchema,
  affectedPackages: z.array(z.string()),
  errors: z.array(z.string()),
  logs: z.array(z.string()),
  artifacts: z.array(taskArtifactSchema),
  cancelled: z.boolean(),
});

export type TaskStatus = z.infer<typeof taskStatusSchema>;
export type CommandOutput = z.infer<typeof commandOutputSchema>;
export type TaskStats = z.infer<typeof taskStatsSchema>;
export type TaskArtifact = z.infer<typeof taskArtifactSchema>;
export type TaskExecutionResult = z.infer<typeof taskExecutionResultSchema>;
