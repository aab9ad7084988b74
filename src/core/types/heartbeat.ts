/**
 * Heartbeat checklist types.
 */

/**
 * One task line of the heartbeat checklist.
 */
export interface ChecklistItem {
  /** Zero-based line index in the checklist file */
  line: number;
  text: string;
  done: boolean;
}

/**
 * Outcome of one heartbeat pass.
 */
export interface HeartbeatRunSummary {
  total: number;
  attempted: number;
  succeeded: number;
  failed: number;
}
