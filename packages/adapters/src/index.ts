export { logger, createLogger, setLogLevel, getLogLevel } from "./logging/logger";
export type { Logger, LogLevel } from "./logging/logger";

export { ProcessCommandExecutor, cancelledResult, truncationMarker } from "./process/executor";
export type { CommandExecutor, ExecuteOptions, ExecutionResult } from "./process/executor";
export { ScriptedExecutor, commandLineOf } from "./process/scripted-executor";
export type { CommandMatcher, ScriptedResponse, ScriptedCall } from "./process/scripted-executor";

export { NodeFileSystem } from "./filesystem/node-fs";
export { MemoryFileSystem } from "./filesystem/memory-fs";
export type { FileSystem, FileStat, WalkOptions } from "./filesystem/types";

export { GitRepository, parseLog, parseNameStatus } from "./vcs/git";
export type { GitRepositoryOptions } from "./vcs/git";
export { MemoryRepository } from "./vcs/memory-repository";
export type { MemoryRepositoryInit } from "./vcs/memory-repository";
export type { Repository } from "./vcs/types";
