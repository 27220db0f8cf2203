import { availableParallelism } from "node:os";
import { z } from "zod";

const cores = () => Math.max(1, availableParallelism());

const MiB = 1024 * 1024;

export const versioningStrategySchema = z.enum(["individual", "unified", "mixed"]);

export const versioningConfigSchema = z
  .object({
    strategy: versioningStrategySchema.default("individual"),
    /** Individual strategy: a major primary bump propagates as major to non-independent dependents. */
    syncOnMajorBump: z.boolean().default(false),
    independentPackages: z.array(z.string()).default([]),
    /** Mixed strategy: group name -> package-name glob(s). */
    groups: z.record(z.string(), z.union([z.string(), z.array(z.string())])).default({}),
    individualPackages: z.array(z.string()).default([]),
    largeCascadeThreshold: z.number().int().nonnegative().default(10),
    manyDependentsThreshold: z.number().int().nonnegative().default(5),
  })
  .default({});

export const discoveryConfigSchema = z
  .object({
    ioConcurrency: z.number().int().positive().default(cores),
    timeoutMs: z.number().int().positive().default(2 * 60 * 1000),
    cacheTtlMs: z.number().int().nonnegative().default(5 * 60 * 1000),
    ignore: z.array(z.string()).default([]),
  })
  .default({});

export const tasksConfigSchema = z
  .object({
    concurrency: z.number().int().positive().default(cores),
    commandTimeoutMs: z.number().int().positive().default(10 * 60 * 1000),
    gracePeriodMs: z.number().int().nonnegative().default(5000),
    maxStdoutBytes: z.number().int().positive().default(MiB),
    maxStderrBytes: z.number().int().positive().default(MiB),
    continueOnError: z.boolean().default(false),
    /** Abort the remaining packages of a task batch after the first failure. */
    failFast: z.boolean().default(false),
  })
  .default({});

export const branchesConfigSchema = z
  .object({
    main: z.array(z.string()).default(["main", "master"]),
    feature: z.array(z.string()).default(["feature/*", "feat/*"]),
    release: z.array(z.string()).default(["release/*"]),
    hotfix: z.array(z.string()).default(["hotfix/*"]),
  })
  .default({});

export const eventsConfigSchema = z
  .object({
    queueCapacity: z.number().int().positive().default(10_000),
    broadcastBuffer: z.number().int().positive().default(256),
  })
  .default({});

export const changelogFormatSchema = z.enum(["markdown", "text", "json"]);
export const commitGroupingSchema = z.enum(["type", "scope", "none"]);

export const changelogConfigSchema = z
  .object({
    format: changelogFormatSchema.default("markdown"),
    grouping: commitGroupingSchema.default("type"),
    includeBreakingChanges: z.boolean().default(true),
    repositoryUrl: z.string().url().optional(),
    fileName: z.string().default("CHANGELOG.md"),
    typeTitles: z.record(z.string(), z.string()).default({}),
  })
  .default({});

export const changesetsConfigSchema = z
  .object({
    /** Relative to the workspace root. */
    directory: z.string().default(".changesets"),
    /** Commits touching a package need a pending changeset on the branch. */
    required: z.boolean().default(false),
    environments: z.array(z.string()).default(["development", "staging", "integration", "production"]),
  })
  .default({});

export const hookTypeSchema = z.enum(["pre-commit", "pre-push", "post-merge", "post-checkout", "post-commit"]);

export const hookDefinitionSchema = z.object({
  enabled: z.boolean().default(true),
  /** Names of registered tasks run against the affected packages. */
  tasks: z.array(z.string()).default([]),
  description: z.string().optional(),
});

const hook = (tasks: string[], description: string) => hookDefinitionSchema.default({ tasks, description });

export const hooksConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    "pre-commit": hook(["lint", "test"], "Lint and test affected packages"),
    "pre-push": hook(["build", "test"], "Build and test affected packages"),
    "post-merge": hook(["install"], "Apply pending changesets of the merged branch"),
    "post-checkout": hook(["install"], "Install dependencies after checkout"),
    "post-commit": hook([], "Nothing by default"),
  })
  .default({});

export const monoweaveConfigSchema = z
  .object({
    versioning: versioningConfigSchema,
    discovery: discoveryConfigSchema,
    tasks: tasksConfigSchema,
    branches: branchesConfigSchema,
    events: eventsConfigSchema,
    changelog: changelogConfigSchema,
    changesets: changesetsConfigSchema,
    hooks: hooksConfigSchema,
  })
  .strict();

export type MonoweaveConfig = z.infer<typeof monoweaveConfigSchema>;
export type MonoweaveConfigInput = z.input<typeof monoweaveConfigSchema>;
export type VersioningConfig = MonoweaveConfig["versioning"];
export type VersioningStrategy = z.infer<typeof versioningStrategySchema>;
export type DiscoveryConfig = MonoweaveConfig["discovery"];
export type TasksConfig = MonoweaveConfig["tasks"];
export type BranchesConfig = MonoweaveConfig["branches"];
export type EventsConfig = MonoweaveConfig["events"];
export type ChangelogConfig = MonoweaveConfig["changelog"];
export type ChangelogFormat = z.infer<typeof changelogFormatSchema>;
export type CommitGrouping = z.infer<typeof commitGroupingSchema>;
export type ChangesetsConfig = MonoweaveConfig["changesets"];
export type HooksConfig = MonoweaveConfig["hooks"];
export type HookType = z.infer<typeof hookTypeSchema>;
export type HookDefinition = z.infer<typeof hookDefinitionSchema>;
