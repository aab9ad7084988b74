/**
 * Scheduler interface.
 */

import type { Schedule, JobDelivery, ScheduledJob } from "../types/scheduler.js";

/**
 * Options for adding a job.
 */
export interface AddJobOptions {
  name: string;
  message: string;
  schedule: Schedule;
  delivery: JobDelivery;
  enabled?: boolean;
}

export interface SchedulerStatus {
  running: boolean;
  jobCount: number;
  nextWakeAt?: number;
}

/**
 * Cron scheduler and durable job store.
 */
export interface IScheduler {
  start(): Promise<void>;

  stop(): void;

  /**
   * Validate and persist a job. Returns once the job is on disk.
   */
  addJob(options: AddJobOptions): ScheduledJob;

  /**
   * Remove a job by ID. Throws `JobNotFoundError` for unknown IDs.
   */
  removeJob(jobId: string): true;

  /**
   * Enable or disable a job.
   */
  enableJob(jobId: string, enabled: boolean): ScheduledJob;

  /**
   * Deliver a job now.
   */
  runJob(jobId: string): Promise<void>;

  getJob(jobId: string): ScheduledJob | undefined;

  listJobs(includeDisabled?: boolean): ScheduledJob[];

  /**
   * Fire every due job once. Returns the number of jobs fired.
   */
  tick(): Promise<number>;

  status(): SchedulerStatus;
}
