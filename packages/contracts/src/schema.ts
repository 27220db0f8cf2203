export {
  rawManifestSchema,
  dependencyMapSchema,
  personSchema,
  repositorySchema,
  workspacesDeclarationSchema,
} from "./schema/manifest.schema";
export type { RawManifest, WorkspacesDeclaration, ManifestPerson, ManifestRepository } from "./schema/manifest.schema";

export { lernaConfigSchema, pnpmWorkspaceSchema, nxConfigSchema, rushConfigSchema } from "./schema/workspace-files.schema";
export type { LernaConfig, PnpmWorkspaceConfig, NxConfig, RushConfig } from "./schema/workspace-files.schema";

export {
  monoweaveConfigSchema,
  versioningConfigSchema,
  versioningStrategySchema,
  discoveryConfigSchema,
  tasksConfigSchema,
  branchesConfigSchema,
  eventsConfigSchema,
  changelogConfigSchema,
  changelogFormatSchema,
  commitGroupingSchema,
  changesetsConfigSchema,
  hooksConfigSchema,
  hookTypeSchema,
  hookDefinitionSchema,
} from "./schema/config.schema";
export type {
  MonoweaveConfig,
  MonoweaveConfigInput,
  VersioningConfig,
  VersioningStrategy,
  DiscoveryConfig,
  TasksConfig,
  BranchesConfig,
  EventsConfig,
  ChangelogConfig,
  ChangelogFormat,
  CommitGrouping,
  ChangesetsConfig,
  HooksConfig,
  HookType,
  HookDefinition,
} from "./schema/config.schema";

export { changesetSchema, changesetBumpSchema, changesetStatusSchema } from "./schema/changeset.schema";
export type { Changeset, ChangesetBump, ChangesetStatus } from "./schema/changeset.schema";

export {
  taskExecutionResultSchema,
  taskStatusSchema,
  commandOutputSchema,
  taskStatsSchema,
  taskArtifactSchema,
} from "./schema/task-result.schema";
export type { TaskExecutionResult, TaskStatus, CommandOutput, TaskStats, TaskArtifact } from "./schema/task-result.schema";

export {
  EventPriority,
  EVENT_TYPES,
  eventPrioritySchema,
  eventContextSchema,
  monorepoEventSchema,
  configEventSchema,
  taskEventSchema,
  changesetEventSchema,
  hookEventSchema,
  packageEventSchema,
  filesystemEventSchema,
  workflowEventSchema,
} from "./schema/events.schema";
export type { EventContext, MonorepoEvent, EventType, EventOf, EventKindOf } from "./schema/events.schema";
