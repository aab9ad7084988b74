/**
 * Sub-agent task types.
 */

export type SubagentStatus = "pending" | "running" | "completed" | "failed" | "cancelled";

export const TERMINAL_STATUSES: ReadonlySet<SubagentStatus> = new Set([
  "completed",
  "failed",
  "cancelled",
]);

/**
 * Where a task came from, so its completion can be announced there.
 */
export interface TaskOrigin {
  channel: string;
  chatId: string;
}

/**
 * A background task owned by the sub-agent manager. Callers hold only its id.
 */
export interface SubagentTask {
  id: string;
  task: string;
  label?: string;
  status: SubagentStatus;
  result?: string;
  error?: string;
  origin: TaskOrigin;
  createdAtMs: number;
  startedAtMs?: number;
  completedAtMs?: number;
}

export interface SpawnOptions {
  task: string;
  label?: string;
  origin?: TaskOrigin;
}
