import { TaskError } from "@monoweave/contracts";
import type { ExecutionContext, TaskDefinition, TaskExecutionResult } from "@monoweave/contracts";
import type { RunOptions, TaskRunner } from "./runner";

/** Named task definitions, kept in registration order. */
export class TaskRegistry {
  private readonly tasks = new Map<string, TaskDefinition>();

  register(task: TaskDefinition): this {
    if (task.name.trim() === "") {
      throw new TaskError("Task name is empty", { code: "ERR_TASK_INVALID" });
    }
    if (task.commands.length === 0) {
      throw new TaskError(`Task "${task.name}" has no commands`, { code: "ERR_TASK_INVALID", context: { task: task.name } });
    }
    // re-registering replaces the definition but keeps its position
    this.tasks.set(task.name, task);
    return this;
  }

  get(name: string): TaskDefinition | undefined {
    return this.tasks.get(name);
  }

  list(): TaskDefinition[] {
    return [...this.tasks.values()];
  }

  remove(name: string): boolean {
    return this.tasks.delete(name);
  }

  get size(): number {
    return this.tasks.size;
  }

  /** Runs every task one after another; stops early only when the signal aborts. */
  async runAll(
    runner: TaskRunner,
    affected: readonly string[],
    context: ExecutionContext,
    options: RunOptions = {},
  ): Promise<TaskExecutionResult[]> {
    const results: TaskExecutionResult[] = [];
    for (const task of this.list()) {
      if (options.signal?.aborted) { break; }
      results.push(await runner.run(task, affected, context, options));
    }
    return results;
  }
}
