import { z } from "zod";
import { taskExecutionResultSchema } from "./task-result.schema";

export const EventPriority = {
  Low: 0,
  Normal: 1,
  High: 2,
  Critical: 3,
} as const;

export type EventPriority = (typeof EventPriority)[keyof typeof EventPriority];

export const eventPrioritySchema = z.nativeEnum(EventPriority);

export const eventContextSchema = z.object({
  eventId: z.string().uuid(),
  timestamp: z.string().datetime(),
  source: z.string(),
  priority: eventPrioritySchema,
  metadata: z.record(z.string(), z.unknown()),
});

export type EventContext = z.infer<typeof eventContextSchema>;

const variant = <T extends string, K extends string, S extends z.ZodRawShape>(type: T, kind: K, shape: S) =>
  z.object({ type: z.literal(type), kind: z.literal(kind), context: eventContextSchema, ...shape });

const names = z.array(z.string());

export const configEventSchema = z.discriminatedUnion("kind", [
  variant("config", "updated", { section: z.string(), changes: z.record(z.string(), z.unknown()) }),
  variant("config", "reloaded", { configPath: z.string() }),
  variant("config", "validation-failed", { errors: names }),
]);

export const taskEventSchema = z.discriminatedUnion("kind", [
  variant("task", "started", { taskName: z.string(), packages: names }),
  variant("task", "completed", { result: taskExecutionResultSchema }),
  variant("task", "failed", { taskName: z.string(), error: z.string() }),
  variant("task", "validation-requested", { taskName: z.string(), packages: names }),
]);

export const changesetEventSchema = z.discriminatedUnion("kind", [
  variant("changeset", "created", { changesetId: z.string(), packages: names, description: z.string() }),
  variant("changeset", "creation-requested", { packages: names, reason: z.string() }),
  variant("changeset", "validated", { changesetId: z.string(), isValid: z.boolean(), errors: names }),
  variant("changeset", "applied", { changesets: names, packages: names }),
]);

export const hookEventSchema = z.discriminatedUnion("kind", [
  variant("hook", "started", { hookType: z.string(), affectedPackages: names }),
  variant("hook", "completed", { hookType: z.string(), success: z.boolean(), message: z.string().optional() }),
  variant("hook", "validation-failed", { hookType: z.string(), requiredActions: names }),
]);

export const packageEventSchema = z.discriminatedUnion("kind", [
  variant("package", "updated", { packageName: z.string(), oldVersion: z.string(), newVersion: z.string() }),
  variant("package", "dependencies-changed", {
    packageName: z.string(),
    added: names,
    removed: names,
    updated: names,
  }),
  variant("package", "published", { packageName: z.string(), version: z.string(), registry: z.string() }),
  variant("package", "discovery-completed", { packages: names, patterns: names }),
]);

export const filesystemEventSchema = z.discriminatedUnion("kind", [
  variant("filesystem", "files-changed", { changedFiles: names, affectedPackages: names }),
  variant("filesystem", "workspace-changed", { addedPackages: names, removedPackages: names }),
  variant("filesystem", "config-file-changed", { configPath: z.string() }),
]);

export const workflowEventSchema = z.discriminatedUnion("kind", [
  variant("workflow", "started", { workflowType: z.string(), targetPackages: names }),
  variant("workflow", "completed", {
    workflowType: z.string(),
    success: z.boolean(),
    results: z.record(z.string(), z.unknown()),
  }),
  variant("workflow", "stage-completed", { workflowType: z.string(), stage: z.string(), success: z.boolean() }),
]);

export const monorepoEventSchema = z.union([
  configEventSchema,
  taskEventSchema,
  changesetEventSchema,
  hookEventSchema,
  packageEventSchema,
  filesystemEventSchema,
  workflowEventSchema,
]);

export type MonorepoEvent = z.infer<typeof monorepoEventSchema>;
export type EventType = MonorepoEvent["type"];
export type EventOf<T extends EventType> = Extract<MonorepoEvent, { type: T }>;
export type EventKindOf<T extends EventType> = EventOf<T>["kind"];

export const EVENT_TYPES: readonly EventType[] = [
  "config",
  "task",
  "changeset",
  "hook",
  "package",
  "filesystem",
  "workflow",
];
