/**
 * @module @monoweave/contracts
 * Shared schemas, types and errors.
 */

export * from "./schema";
export * from "./errors";
export * from "./types/workspace";
export * from "./types/changes";
export * from "./types/versioning";
export * from "./types/tasks";
export * from "./types/changelog";
export * from "./types/changesets";
export * from "./types/hooks";
