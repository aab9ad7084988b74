/**
 * Cron tool for scheduling reminders and recurring tasks.
 */

import { z } from "zod";
import { Tool } from "./base.js";
import type { ToolContext } from "../core/types/tool.js";
import type { Schedule, ScheduledJob } from "../core/types/scheduler.js";
import type { IScheduler } from "../core/interfaces/scheduler.js";
import { ValidationError } from "../core/errors.js";
import { parseSessionKey } from "../infrastructure/queue/events.js";

const ACTIONS = ["add", "list", "remove", "enable", "disable"] as const;

type CronParams = {
  action: (typeof ACTIONS)[number];
  name?: string;
  message?: string;
  at?: string;
  cron_expr?: string;
  tz?: string;
  every_seconds?: number;
  job_id?: string;
  channel?: string;
  to?: string;
};

/**
 * ISO form of a timestamp; "-" when unset, "invalid (ms)" outside the Date range.
 */
export function formatTimestamp(ms: number | undefined): string {
  if (ms === undefined) {
    return "-";
  }
  const date = new Date(ms);
  return Number.isNaN(date.getTime()) ? `invalid (${ms})` : date.toISOString();
}

/**
 * Human-readable form of a schedule.
 */
export function describeSchedule(schedule: Schedule): string {
  switch (schedule.kind) {
    case "at":
      return `once at ${formatTimestamp(schedule.atMs)}`;
    case "every":
      return `every ${schedule.everyMs / 1000}s`;
    case "cron":
      return schedule.tz ? `cron "${schedule.expr}" (${schedule.tz})` : `cron "${schedule.expr}"`;
  }
}

function describeJob(job: ScheduledJob): string {
  return [
    `- ${job.name} (id: ${job.id}, ${job.enabled ? "enabled" : "disabled"})`,
    `  Schedule: ${describeSchedule(job.schedule)}`,
    `  Next run: ${formatTimestamp(job.state.nextRunAtMs)}`,
    `  Deliver to: ${job.delivery.channel}:${job.delivery.to}`,
  ].join("\n");
}

/**
 * Tool to manage scheduled jobs. Every action reaches the job store
 * before the tool returns.
 */
export class CronTool extends Tool {
  readonly name = "cron";
  readonly description =
    "Schedule reminders and recurring tasks. Actions: add, list, remove, enable, disable. " +
    "For add, give a name, a message and exactly one of at (ISO time), cron_expr (5 fields) " +
    "or every_seconds.";
  readonly parameters = z.object({
    action: z.enum(ACTIONS).describe("Action to perform"),
    name: z.string().optional().describe("Unique job name (for add)"),
    message: z.string().optional().describe("Message delivered when the job fires (for add)"),
    at: z.string().optional().describe("One-time ISO 8601 timestamp, e.g. 2026-03-01T09:00:00Z"),
    cron_expr: z.string().optional().describe("Cron expression like '0 9 * * *'"),
    tz: z.string().optional().describe("IANA time zone for cron_expr, e.g. Europe/Berlin"),
    every_seconds: z.coerce.number().int().optional().describe("Interval in seconds"),
    job_id: z.string().optional().describe("Job ID (for remove, enable, disable)"),
    channel: z.string().optional().describe("Delivery channel (defaults to the current one)"),
    to: z.string().optional().describe("Recipient chat ID (defaults to the current one)"),
  });

  private scheduler: IScheduler;

  constructor(scheduler: IScheduler) {
    super();
    this.scheduler = scheduler;
  }

  async execute(params: CronParams, context: ToolContext): Promise<string> {
    switch (params.action) {
      case "add":
        return this.addJob(params, context);
      case "list":
        return this.listJobs();
      case "remove": {
        const jobId = requireField(params.job_id, "job_id");
        this.scheduler.removeJob(jobId);
        return `Removed job ${jobId}`;
      }
      case "enable":
      case "disable": {
        const job = this.scheduler.enableJob(
          requireField(params.job_id, "job_id"),
          params.action === "enable",
        );
        return `Job '${job.name}' (id: ${job.id}) ${job.enabled ? "enabled" : "disabled"}`;
      }
    }
  }

  private addJob(params: CronParams, context: ToolContext): string {
    const name = requireField(params.name, "name");
    const message = requireField(params.message, "message");
    const origin = parseSessionKey(context.sessionKey);

    const job = this.scheduler.addJob({
      name,
      message,
      schedule: buildSchedule(params),
      delivery: {
        channel: params.channel || origin.channel,
        to: params.to || origin.chatId,
      },
    });

    return `Job created: '${job.name}' (id: ${job.id}), ${describeSchedule(job.schedule)}`;
  }

  private listJobs(): string {
    const jobs = this.scheduler.listJobs();
    if (jobs.length === 0) {
      return "No scheduled jobs.";
    }
    return jobs.map(describeJob).join("\n");
  }
}

function requireField(value: string | undefined, field: string): string {
  if (value === undefined || value.trim() === "") {
    throw new ValidationError(`${field} is required`, field);
  }
  return value;
}

/**
 * Turn the at / cron_expr / every_seconds arguments into a schedule.
 * Exactly one of them must be given.
 */
export function buildSchedule(params: {
  at?: string;
  cron_expr?: string;
  tz?: string;
  every_seconds?: number;
}): Schedule {
  const given = [params.at, params.cron_expr, params.every_seconds].filter(
    (value) => value !== undefined,
  ).length;
  if (given !== 1) {
    throw new ValidationError(
      "Provide exactly one of at, cron_expr or every_seconds",
      "schedule",
    );
  }

  if (params.at !== undefined) {
    const atMs = Date.parse(params.at);
    if (Number.isNaN(atMs)) {
      throw new ValidationError(`Invalid timestamp: ${params.at}`, "at");
    }
    return { kind: "at", atMs };
  }

  if (params.cron_expr !== undefined) {
    return params.tz
      ? { kind: "cron", expr: params.cron_expr, tz: params.tz }
      : { kind: "cron", expr: params.cron_expr };
  }

  return { kind: "every", everyMs: (params.every_seconds ?? 0) * 1000 };
}
