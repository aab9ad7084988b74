/**
 * Cron scheduler backed by a durable JSON job store.
 */

import { existsSync, readFileSync, statSync } from "fs";
import { randomUUID } from "crypto";
import { z } from "zod";
import { CronExpressionParser } from "cron-parser";
import type {
  Schedule,
  ScheduledJob,
  JobStore,
  JobCallback,
} from "../core/types/scheduler.js";
import type {
  IScheduler,
  AddJobOptions,
  SchedulerStatus,
} from "../core/interfaces/scheduler.js";
import {
  InfrastructureError,
  JobConflictError,
  JobNotFoundError,
  ValidationError,
} from "../core/errors.js";
import { atomicWriteFileSync } from "../utils/paths.js";
import { systemClock, type Clock } from "../utils/clock.js";
import logger from "../utils/logger.js";

const log = logger.child({ component: "scheduler" });

/** Longest the timer sleeps before looking at the store again */
const DEFAULT_TICK_INTERVAL_MS = 10_000;

/** Largest timestamp a Date can hold */
export const MAX_TIME_MS = 8.64e15;

const ScheduleSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("at"), atMs: z.number() }),
  z.object({ kind: z.literal("every"), everyMs: z.number() }),
  z.object({ kind: z.literal("cron"), expr: z.string(), tz: z.string().optional() }),
]);

const JobSchema = z.object({
  id: z.string(),
  name: z.string(),
  message: z.string(),
  enabled: z.boolean().default(true),
  schedule: ScheduleSchema,
  delivery: z.object({ channel: z.string(), to: z.string() }),
  state: z
    .object({
      nextRunAtMs: z.number().optional(),
      lastRunAtMs: z.number().optional(),
      lastStatus: z.enum(["ok", "error"]).optional(),
      lastError: z.string().optional(),
    })
    .default({}),
  createdAtMs: z.number().default(0),
  updatedAtMs: z.number().default(0),
});

const StoreSchema = z.object({
  version: z.number().default(1),
  jobs: z.array(JobSchema).default([]),
});

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function cronNext(expr: string, afterMs: number, tz?: string): number {
  const interval = CronExpressionParser.parse(expr, {
    currentDate: new Date(afterMs),
    tz,
  });
  return interval.next().getTime();
}

/**
 * Next occurrence of a schedule strictly after `afterMs`, if any.
 */
export function computeNextRun(schedule: Schedule, afterMs: number): number | undefined {
  switch (schedule.kind) {
    case "at":
      return schedule.atMs > afterMs ? schedule.atMs : undefined;
    case "every": {
      const next = afterMs + schedule.everyMs;
      return schedule.everyMs > 0 && next <= MAX_TIME_MS ? next : undefined;
    }
    case "cron": {
      const next = cronNext(schedule.expr, afterMs, schedule.tz);
      return next > afterMs ? next : cronNext(schedule.expr, afterMs + 1000, schedule.tz);
    }
  }
}

/**
 * Reject schedules that could never fire correctly.
 */
export function validateSchedule(schedule: Schedule, nowMs: number): void {
  switch (schedule.kind) {
    case "at":
      if (!Number.isFinite(schedule.atMs) || Math.abs(schedule.atMs) > MAX_TIME_MS) {
        throw new ValidationError("Invalid timestamp", "at");
      }
      if (schedule.atMs <= nowMs) {
        throw new ValidationError(
          `Scheduled time is in the past: ${new Date(schedule.atMs).toISOString()}`,
          "at",
        );
      }
      return;

    case "every":
      if (
        !Number.isInteger(schedule.everyMs) ||
        schedule.everyMs <= 0 ||
        schedule.everyMs % 1000 !== 0
      ) {
        throw new ValidationError(
          "Interval must be a positive whole number of seconds",
          "every_seconds",
        );
      }
      if (nowMs + schedule.everyMs > MAX_TIME_MS) {
        throw new ValidationError("Interval is too long", "every_seconds");
      }
      return;

    case "cron": {
      const fields = schedule.expr.trim().split(/\s+/).filter(Boolean);
      if (fields.length !== 5) {
        throw new ValidationError(
          `Cron expression must have exactly 5 fields: '${schedule.expr}'`,
          "cron_expr",
        );
      }
      if (schedule.tz !== undefined) {
        try {
          new Intl.DateTimeFormat("en-US", { timeZone: schedule.tz });
        } catch {
          throw new ValidationError(`Unknown time zone: ${schedule.tz}`, "tz");
        }
      }
      try {
        cronNext(schedule.expr, nowMs, schedule.tz);
      } catch (error) {
        throw new ValidationError(
          `Invalid cron expression '${schedule.expr}': ${errorMessage(error)}`,
          "cron_expr",
        );
      }
      return;
    }
  }
}

export interface SchedulerOptions {
  storePath: string;
  /** Delivers a fired job */
  onJob?: JobCallback;
  clock?: Clock;
  tickIntervalMs?: number;
  /** Source of candidate job ids; a candidate already in the store is redrawn */
  generateId?: () => string;
}

/**
 * Cron scheduler and job store.
 *
 * Jobs handed out are copies; the store changes only through this API.
 * The store file is the source of truth: it is re-read whenever another
 * process (the CLI) changed it, every mutation is written atomically
 * before the caller sees it, and a fired occurrence is committed before
 * its delivery is attempted. A job that came due while the process was
 * down fires once on the first tick after start.
 */
export class Scheduler implements IScheduler {
  private storePath: string;
  private onJob: JobCallback | null;
  private clock: Clock;
  private tickIntervalMs: number;
  private generateId: () => string;
  private store: JobStore | null = null;
  private storeSignature: string | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(options: SchedulerOptions) {
    this.storePath = options.storePath;
    this.onJob = options.onJob || null;
    this.clock = options.clock ?? systemClock;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.generateId = options.generateId ?? (() => randomUUID().slice(0, 8));
  }

  private newJobId(store: JobStore): string {
    let id = this.generateId();
    while (store.jobs.some((j) => j.id === id)) {
      id = this.generateId();
    }
    return id;
  }

  private readSignature(): string | null {
    try {
      if (!existsSync(this.storePath)) {
        return null;
      }
      const stats = statSync(this.storePath);
      return `${stats.mtimeMs}:${stats.size}`;
    } catch (error) {
      throw new InfrastructureError(
        `Cannot stat job store ${this.storePath}: ${errorMessage(error)}`,
        undefined,
        { cause: error },
      );
    }
  }

  /**
   * Load jobs from disk, re-reading only when the file changed.
   */
  private loadStore(): JobStore {
    const signature = this.readSignature();
    if (this.store && signature === this.storeSignature) {
      return this.store;
    }

    if (signature === null) {
      this.store = { version: 1, jobs: [] };
      this.storeSignature = null;
      return this.store;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.storePath, "utf-8"));
    } catch (error) {
      throw new InfrastructureError(
        `Job store ${this.storePath} is corrupt: ${errorMessage(error)}`,
        undefined,
        { cause: error },
      );
    }

    const parsed = StoreSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InfrastructureError(
        `Job store ${this.storePath} is corrupt: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid"}`,
      );
    }

    const store: JobStore = parsed.data;
    this.store = store;
    this.storeSignature = signature;
    log.debug({ jobs: store.jobs.length }, "Job store loaded");
    return store;
  }

  /**
   * Save jobs to disk atomically.
   */
  private saveStore(store: JobStore): void {
    try {
      atomicWriteFileSync(this.storePath, JSON.stringify(store, null, 2));
    } catch (error) {
      throw new InfrastructureError(
        `Cannot write job store ${this.storePath}: ${errorMessage(error)}`,
        undefined,
        { cause: error },
      );
    }
    this.store = store;
    this.storeSignature = this.readSignature();
  }

  /**
   * Start the scheduler.
   */
  async start(): Promise<void> {
    const store = this.loadStore();

    // Only fill in missing next runs; persisted ones are due occurrences.
    const now = this.clock.now();
    let changed = false;
    for (const job of store.jobs) {
      if (job.enabled && job.state.nextRunAtMs === undefined) {
        job.state.nextRunAtMs = computeNextRun(job.schedule, now);
        changed = job.state.nextRunAtMs !== undefined || changed;
      }
    }
    if (changed) {
      this.saveStore(store);
    }

    this.running = true;
    this.armTimer();
    log.info({ jobs: store.jobs.length }, "Scheduler started");
  }

  /**
   * Stop the scheduler.
   */
  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /**
   * Get the earliest next run time across enabled jobs.
   */
  private getNextWakeMs(store: JobStore): number | undefined {
    let earliest: number | undefined;
    for (const job of store.jobs) {
      const next = job.state.nextRunAtMs;
      if (job.enabled && next !== undefined && (earliest === undefined || next < earliest)) {
        earliest = next;
      }
    }
    return earliest;
  }

  /**
   * Schedule the next timer tick.
   */
  private armTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (!this.running || !this.store) {
      return;
    }

    const nextWake = this.getNextWakeMs(this.store);
    const delayMs =
      nextWake === undefined
        ? this.tickIntervalMs
        : Math.min(Math.max(0, nextWake - this.clock.now()), this.tickIntervalMs);

    this.timer = setTimeout(() => {
      this.timer = null;
      this.onTimer().catch((error) => {
        log.error({ error }, "Scheduler timer failed");
      });
    }, delayMs);
  }

  private async onTimer(): Promise<void> {
    if (!this.running) {
      return;
    }
    try {
      await this.tick();
    } catch (error) {
      log.error({ error }, "Job store unavailable, stopping scheduler");
      this.stop();
      return;
    }
    this.armTimer();
  }

  /**
   * Fire every due job once.
   */
  async tick(): Promise<number> {
    const store = this.loadStore();
    const now = this.clock.now();
    const fired: Array<{ job: ScheduledJob; occurrenceMs: number }> = [];

    for (const job of [...store.jobs]) {
      const occurrenceMs = job.state.nextRunAtMs;
      if (!job.enabled || occurrenceMs === undefined || occurrenceMs > now) {
        continue;
      }

      job.state.lastRunAtMs = now;
      job.updatedAtMs = now;
      if (job.schedule.kind === "at") {
        store.jobs = store.jobs.filter((j) => j.id !== job.id);
      } else {
        job.state.nextRunAtMs = computeNextRun(job.schedule, Math.max(now, occurrenceMs));
      }
      fired.push({ job, occurrenceMs });
    }

    if (fired.length === 0) {
      return 0;
    }

    this.saveStore(store);

    for (const { job, occurrenceMs } of fired) {
      log.info({ jobId: job.id, name: job.name, occurrenceMs }, "Scheduler: firing job");
      await this.deliver(job, occurrenceMs);
    }

    return fired.length;
  }

  /**
   * Deliver one occurrence and record the outcome on the job.
   */
  private async deliver(job: ScheduledJob, occurrenceMs: number): Promise<void> {
    let lastError: string | undefined;
    try {
      if (this.onJob) {
        await this.onJob(structuredClone(job), occurrenceMs);
      }
    } catch (error) {
      lastError = errorMessage(error);
      log.error({ jobId: job.id, name: job.name, error }, "Scheduler: delivery failed");
    }

    const store = this.loadStore();
    const stored = store.jobs.find((j) => j.id === job.id);
    if (!stored) {
      return;
    }
    stored.state.lastStatus = lastError === undefined ? "ok" : "error";
    stored.state.lastError = lastError;
    this.saveStore(store);
  }

  // ========== Public API ==========

  /**
   * List jobs, soonest first.
   */
  listJobs(includeDisabled: boolean = true): ScheduledJob[] {
    const store = this.loadStore();
    return store.jobs
      .filter((j) => includeDisabled || j.enabled)
      .map((j) => structuredClone(j))
      .sort(
        (a, b) =>
          (a.state.nextRunAtMs ?? Infinity) - (b.state.nextRunAtMs ?? Infinity),
      );
  }

  getJob(jobId: string): ScheduledJob | undefined {
    const job = this.loadStore().jobs.find((j) => j.id === jobId);
    return job ? structuredClone(job) : undefined;
  }

  /**
   * Add a new job. The job is on disk when this returns.
   */
  addJob(options: AddJobOptions): ScheduledJob {
    const name = options.name.trim();
    if (!name) {
      throw new ValidationError("Job name must not be empty", "name");
    }
    if (!options.message.trim()) {
      throw new ValidationError("Job message must not be empty", "message");
    }

    const now = this.clock.now();
    validateSchedule(options.schedule, now);

    const store = this.loadStore();
    if (store.jobs.some((j) => j.name === name)) {
      throw new JobConflictError(name);
    }

    const enabled = options.enabled ?? true;
    const job: ScheduledJob = {
      id: this.newJobId(store),
      name,
      message: options.message,
      enabled,
      schedule: { ...options.schedule },
      delivery: { ...options.delivery },
      state: {
        nextRunAtMs: enabled ? computeNextRun(options.schedule, now) : undefined,
      },
      createdAtMs: now,
      updatedAtMs: now,
    };

    store.jobs.push(job);
    this.saveStore(store);
    this.armTimer();

    log.info({ jobId: job.id, name: job.name }, "Scheduler: added job");
    return structuredClone(job);
  }

  /**
   * Remove a job by ID.
   */
  removeJob(jobId: string): true {
    const store = this.loadStore();
    if (!store.jobs.some((j) => j.id === jobId)) {
      throw new JobNotFoundError(jobId);
    }

    store.jobs = store.jobs.filter((j) => j.id !== jobId);
    this.saveStore(store);
    this.armTimer();
    log.info({ jobId }, "Scheduler: removed job");
    return true;
  }

  /**
   * Enable or disable a job. A re-enabled one-time job keeps its time
   * and fires at once if that time has passed.
   */
  enableJob(jobId: string, enabled: boolean): ScheduledJob {
    const store = this.loadStore();
    const job = store.jobs.find((j) => j.id === jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }

    const now = this.clock.now();
    job.enabled = enabled;
    job.updatedAtMs = now;
    if (!enabled) {
      job.state.nextRunAtMs = undefined;
    } else if (job.state.nextRunAtMs === undefined) {
      job.state.nextRunAtMs =
        job.schedule.kind === "at" ? job.schedule.atMs : computeNextRun(job.schedule, now);
    }

    this.saveStore(store);
    this.armTimer();
    log.info({ jobId, enabled }, "Scheduler: job toggled");
    return structuredClone(job);
  }

  /**
   * Deliver a job now without consuming its schedule.
   */
  async runJob(jobId: string): Promise<void> {
    const store = this.loadStore();
    const job = store.jobs.find((j) => j.id === jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }

    const now = this.clock.now();
    job.state.lastRunAtMs = now;
    this.saveStore(store);
    await this.deliver(job, now);
  }

  /**
   * Get scheduler status.
   */
  status(): SchedulerStatus {
    const store = this.loadStore();
    return {
      running: this.running,
      jobCount: store.jobs.length,
      nextWakeAt: this.getNextWakeMs(store),
    };
  }
}
