/**
 * Sub-agent manager interface, as seen by tools.
 */

import type { SpawnOptions, SubagentTask } from "../types/subagent.js";

export interface ISubagentManager {
  /**
   * Start a background task and return its id without waiting for it.
   */
  spawn(options: SpawnOptions): string;

  getTask(taskId: string): SubagentTask | undefined;

  listTasks(): SubagentTask[];

  /**
   * Request cancellation. Returns the task as it stands after the request.
   */
  cancel(taskId: string): SubagentTask;
}
