// Facade
export {
  createMonorepo,
  Monorepo,
  type MonorepoOptions,
  type SignalOptions,
  type RunTaskOptions,
  type ChangelogOptions,
  type DevelopmentWorkflowResult,
  type ReleaseWorkflowOptions,
  type ReleaseWorkflowResult,
  type CreateChangesetResult,
  type ApplyChangesetsResult,
  type RunHookOptions,
  type IntegrationWorkflowResult,
} from "./api/monorepo";

// Configuration
export { loadConfig, resolveConfig, mergeConfigInput, configSource, CONFIG_FILE } from "./config/load-config";

// Manifests
export {
  parseManifest,
  normalizeManifest,
  validatePackageName,
  parseWorkspaceDeclaration,
  workspacePatterns,
  dependencyNames,
} from "./manifest/parser";
export { ManifestEditor, type ManifestModification } from "./manifest/editor";
export { diffDependencies, readDependencySections, classifyChange } from "./manifest/diff";

// Discovery and graph
export { detectLayout, COMMON_PATTERNS, type WorkspaceLayout } from "./discovery/detect";
export {
  WorkspaceDiscoverer,
  ALWAYS_IGNORED,
  selectDirectories,
  splitPatterns,
  type DiscoverOptions,
  type DiscovererOptions,
  type CachedPackage,
} from "./discovery/discovery";
export { WorkspaceGraph, type TraversalOptions } from "./graph/graph";

// Change analysis
export { ChangeAnalyzer, commitsTouching } from "./changes/analyzer";
export { suggestVersionBump, isPublicApiFile, isBreakingMessage } from "./changes/significance";

// Versioning
export { CascadeBumper, type CascadeBumperOptions, type ExecuteOptions as BumpExecuteOptions } from "./versioning/cascade-bumper";
export {
  bumpMajor,
  bumpMinor,
  bumpPatch,
  bumpSnapshot,
  applyStrategy,
  coreVersion,
  compareStrategies,
  highestStrategy,
  strategyRank,
  describeStrategy,
  isValidSnapshotId,
} from "./versioning/semver";
export { SnapshotHistory } from "./versioning/snapshot";
export { computeReference, type ReferenceRewrite } from "./versioning/references";
export { groupMembership, type GroupMembership } from "./versioning/groups";
export { createChangeSet, previewOf, applyOf } from "./versioning/changeset";

// Tasks
export { ConditionChecker, changeLevel, CHECKERS_DIR, type ConditionCheckerOptions, type EnvironmentChecker } from "./tasks/conditions";
export { detectEnvironment, normalizeEnvironment } from "./tasks/environment";
export { createExecutionContext, emptyAffected } from "./tasks/context";
export { TaskRunner, type RunOptions } from "./tasks/runner";
export { TaskRegistry } from "./tasks/registry";

// Events
export { EventBus, type EventHandler, type Subscription, type EventBusStats, type ProcessOptions } from "./events/bus";
export { EventFilters, matchesFilter, type EventFilter } from "./events/filters";
export { EventQueue } from "./events/priority-queue";
export { BroadcastReceiver } from "./events/broadcast";
export { createEvent, createEventContext, serializeEvent, parseEvent, type EventInit, type EventOptions } from "./events/factory";

// Changelog
export {
  parseConventionalCommit,
  parseCommit,
  groupCommits,
  isFeature,
  DEFAULT_TYPE_TITLES,
  OTHER_CHANGES,
} from "./changelog/conventional";
export { ChangelogGenerator, CHANGELOG_HEADER, CHANGELOG_FOOTER, stripMarkdown, type ChangelogRenderOptions } from "./changelog/generator";
export { ChangelogManager, mergeChangelog, type GenerateForPackageOptions } from "./changelog/manager";

// Changesets and hooks
export { ChangesetStore, changesetFileName, matchesChangesetFilter } from "./changesets/store";
export { ChangesetManager, type ChangesetManagerOptions, type CreateChangesetOptions } from "./changesets/manager";
export { HookManager, HOOK_TYPES } from "./hooks/manager";
