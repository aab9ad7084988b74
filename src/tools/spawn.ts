/**
 * Sub-agent tools: spawn, status and cancel.
 */

import { z } from "zod";
import { Tool } from "./base.js";
import type { ToolContext } from "../core/types/tool.js";
import type { SubagentTask } from "../core/types/subagent.js";
import type { ISubagentManager } from "../core/interfaces/subagent.js";
import { TaskNotFoundError } from "../core/errors.js";
import { parseSessionKey } from "../infrastructure/queue/events.js";

/**
 * One-line-per-field description of a task.
 */
export function describeTask(task: SubagentTask): string {
  const lines = [
    `Sub-agent ${task.id}${task.label ? ` [${task.label}]` : ""}:`,
    `  Task: ${task.task}`,
    `  Status: ${task.status}`,
  ];
  if (task.startedAtMs !== undefined) {
    lines.push(`  Started: ${new Date(task.startedAtMs).toISOString()}`);
  }
  if (task.completedAtMs !== undefined) {
    lines.push(`  Finished: ${new Date(task.completedAtMs).toISOString()}`);
  }
  if (task.result !== undefined) {
    lines.push(`  Result: ${task.result}`);
  }
  if (task.error !== undefined) {
    lines.push(`  Error: ${task.error}`);
  }
  return lines.join("\n");
}

const STARTED = /^Subagent started \(id: ([^,\s]+),/;

/**
 * Read the task id back out of a `spawn` result.
 */
export function spawnedTaskId(output: string): string | undefined {
  return STARTED.exec(output)?.[1];
}

/**
 * Tool to spawn a subagent for background task execution.
 *
 * Returns the task id at once; the subagent announces its result back
 * to the originating conversation when it finishes.
 */
export class SpawnTool extends Tool {
  readonly name = "spawn";
  readonly description =
    "Spawn a subagent to handle a task in the background. " +
    "Use this for complex or time-consuming tasks that can run independently. " +
    "Returns a task ID immediately; the subagent reports back when done.";
  readonly parameters = z.object({
    task: z.string().min(1).describe("The task for the subagent to complete"),
    label: z.string().optional().describe("Optional short label for the task (for display)"),
  });

  private manager: ISubagentManager;

  constructor(manager: ISubagentManager) {
    super();
    this.manager = manager;
  }

  async execute(params: { task: string; label?: string }, context: ToolContext): Promise<string> {
    const taskId = this.manager.spawn({
      task: params.task,
      label: params.label,
      origin: parseSessionKey(context.sessionKey),
    });
    const status = this.manager.getTask(taskId)?.status ?? "pending";
    return `Subagent started (id: ${taskId}, status: ${status}). I'll report back when it completes.`;
  }
}

/**
 * Tool to check on subagents.
 */
export class SubagentStatusTool extends Tool {
  readonly name = "subagent_status";
  readonly description =
    "Check the status of background subagents. Give a task ID for one task, or omit it to list all.";
  readonly parameters = z.object({
    task_id: z.string().optional().describe("Specific subagent task ID to check"),
  });

  private manager: ISubagentManager;

  constructor(manager: ISubagentManager) {
    super();
    this.manager = manager;
  }

  async execute(params: { task_id?: string }): Promise<string> {
    if (params.task_id !== undefined) {
      const task = this.manager.getTask(params.task_id);
      if (!task) {
        throw new TaskNotFoundError(params.task_id);
      }
      return describeTask(task);
    }

    const tasks = this.manager.listTasks();
    if (tasks.length === 0) {
      return "No subagent tasks.";
    }
    return tasks
      .map((task) => `- ${task.id}: ${task.label || task.task} (${task.status})`)
      .join("\n");
  }
}

/**
 * Tool to cancel a pending or running subagent.
 */
export class SubagentCancelTool extends Tool {
  readonly name = "subagent_cancel";
  readonly description =
    "Cancel a pending or running subagent. A running subagent stops at its next step.";
  readonly parameters = z.object({
    task_id: z.string().min(1).describe("Subagent task ID to cancel"),
  });

  private manager: ISubagentManager;

  constructor(manager: ISubagentManager) {
    super();
    this.manager = manager;
  }

  async execute(params: { task_id: string }): Promise<string> {
    const task = this.manager.cancel(params.task_id);
    return task.status === "cancelled"
      ? `Subagent ${task.id} cancelled.`
      : `Cancellation requested for subagent ${task.id}; it stops at its next step.`;
  }
}
