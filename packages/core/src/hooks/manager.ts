import { hookTypeSchema } from "@monoweave/contracts";
import type { HookDefinition, HookType, HooksConfig, TaskDefinition } from "@monoweave/contracts";
import type { TaskRegistry } from "../tasks/registry";

export const HOOK_TYPES: readonly HookType[] = hookTypeSchema.options;

/** Which registered tasks each git hook runs, and whether it runs at all. */
export class HookManager {
  private enabled: boolean;
  private readonly definitions = new Map<HookType, HookDefinition>();

  constructor(config: HooksConfig) {
    this.enabled = config.enabled;
    for (const type of HOOK_TYPES) {
      this.definitions.set(type, config[type]);
    }
  }

  isEnabled(type?: HookType): boolean {
    if (!this.enabled) { return false; }
    if (type === undefined) { return true; }
    return this.definitions.get(type)?.enabled ?? false;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  configure(type: HookType, definition: HookDefinition): void {
    this.definitions.set(type, definition);
  }

  /** A removed hook is disabled until configured again. */
  removeConfiguration(type: HookType): boolean {
    return this.definitions.delete(type);
  }

  definition(type: HookType): HookDefinition | undefined {
    return this.definitions.get(type);
  }

  configuredHooks(): HookType[] {
    return HOOK_TYPES.filter((type) => this.definitions.has(type));
  }

  skipReason(type: HookType): string | undefined {
    if (!this.enabled) { return "Hooks are disabled"; }
    if (!this.isEnabled(type)) { return "Hook is disabled"; }
    return undefined;
  }

  /** Resolves the hook's task names; names nobody registered come back in `missing`. */
  tasksFor(type: HookType, registry: TaskRegistry): { tasks: TaskDefinition[]; missing: string[] } {
    const tasks: TaskDefinition[] = [];
    const missing: string[] = [];
    for (const name of this.definitions.get(type)?.tasks ?? []) {
      const task = registry.get(name);
      if (task) {
        tasks.push(task);
      } else {
        missing.push(name);
      }
    }
    return { tasks, missing };
  }
}
