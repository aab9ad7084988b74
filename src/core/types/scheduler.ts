/**
 * Scheduler types for cron jobs.
 */

/**
 * When a job fires.
 */
export type Schedule =
  /** Once, at an absolute time */
  | { kind: "at"; atMs: number }
  /** Repeatedly, every whole number of seconds */
  | { kind: "every"; everyMs: number }
  /** On a five-field cron expression, optionally in a time zone */
  | { kind: "cron"; expr: string; tz?: string };

/**
 * Where a fired job's message goes.
 */
export interface JobDelivery {
  channel: string;
  /** Recipient (chat) identifier */
  to: string;
}

/**
 * Runtime state of a job.
 */
export interface JobState {
  nextRunAtMs?: number;
  lastRunAtMs?: number;
  lastStatus?: "ok" | "error";
  lastError?: string;
}

/**
 * A scheduled job.
 */
export interface ScheduledJob {
  id: string;
  name: string;
  message: string;
  enabled: boolean;
  schedule: Schedule;
  delivery: JobDelivery;
  state: JobState;
  createdAtMs: number;
  updatedAtMs: number;
}

/**
 * Persistent store for scheduled jobs.
 */
export interface JobStore {
  version: number;
  jobs: ScheduledJob[];
}

/**
 * Delivery callback for a fired job. `occurrenceMs` is the due time that fired.
 */
export type JobCallback = (job: ScheduledJob, occurrenceMs: number) => Promise<void>;
