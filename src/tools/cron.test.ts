import { mkdtempSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { beforeEach, describe, expect, it } from "vitest";
import { Scheduler } from "../application/scheduler.js";
import { ToolDispatcher } from "../application/dispatcher.js";
import { ManualClock } from "../utils/clock.js";
import { ToolRegistry } from "./registry.js";
import { CronTool, buildSchedule, describeSchedule, formatTimestamp } from "./cron.js";

const T = Date.UTC(2026, 2, 1, 8, 0, 0);

describe("CronTool", () => {
  let scheduler: Scheduler;
  let dispatcher: ToolDispatcher;

  async function cron(args: Record<string, unknown>) {
    return dispatcher.dispatch({ id: "call", name: "cron", arguments: args }, { sessionKey: "telegram:chat-7" });
  }

  beforeEach(() => {
    scheduler = new Scheduler({
      storePath: join(mkdtempSync(join(tmpdir(), "cron-tool-")), "jobs.json"),
      clock: new ManualClock(T),
    });
    const registry = new ToolRegistry();
    registry.register(new CronTool(scheduler));
    dispatcher = new ToolDispatcher(registry);
  });

  it("adds a one-time job delivered to the current conversation", async () => {
    const result = await cron({
      action: "add",
      name: "ping",
      message: "ping",
      at: "2026-03-01T08:00:05Z",
    });

    const [job] = scheduler.listJobs();
    expect(result.output).toBe(
      `Job created: 'ping' (id: ${job.id}), once at 2026-03-01T08:00:05.000Z`,
    );
    expect(job.delivery).toEqual({ channel: "telegram", to: "chat-7" });
  });

  it("lists jobs with their schedule and recipient", async () => {
    await cron({ action: "add", name: "ping", message: "ping", at: "2026-03-01T08:00:05Z" });
    await cron({
      action: "add",
      name: "standup",
      message: "Standup time",
      cron_expr: "0 9 * * *",
      tz: "UTC",
      channel: "cli",
      to: "team",
    });
    const [ping, standup] = scheduler.listJobs();

    const result = await cron({ action: "list" });

    expect(result.output).toBe(
      [
        `- ping (id: ${ping.id}, enabled)`,
        "  Schedule: once at 2026-03-01T08:00:05.000Z",
        "  Next run: 2026-03-01T08:00:05.000Z",
        "  Deliver to: telegram:chat-7",
        `- standup (id: ${standup.id}, enabled)`,
        '  Schedule: cron "0 9 * * *" (UTC)',
        "  Next run: 2026-03-01T09:00:00.000Z",
        "  Deliver to: cli:team",
      ].join("\n"),
    );
  });

  it("reports an empty job list", async () => {
    expect((await cron({ action: "list" })).output).toBe("No scheduled jobs.");
  });

  it("accepts the interval as a string of seconds", async () => {
    const result = await cron({ action: "add", name: "poll", message: "check", every_seconds: "60" });

    expect(result.error).toBeUndefined();
    expect(scheduler.listJobs()[0].schedule).toEqual({ kind: "every", everyMs: 60_000 });
  });

  it("removes, disables and enables jobs", async () => {
    await cron({ action: "add", name: "poll", message: "check", every_seconds: 60 });
    const [job] = scheduler.listJobs();

    expect((await cron({ action: "disable", job_id: job.id })).output).toBe(
      `Job 'poll' (id: ${job.id}) disabled`,
    );
    expect((await cron({ action: "enable", job_id: job.id })).output).toBe(
      `Job 'poll' (id: ${job.id}) enabled`,
    );
    expect((await cron({ action: "remove", job_id: job.id })).output).toBe(`Removed job ${job.id}`);
    expect(scheduler.listJobs()).toEqual([]);
  });

  it("reports invalid requests as validation errors", async () => {
    expect((await cron({ action: "add", message: "x", every_seconds: 60 })).output).toBe(
      "Error [ValidationError] (name): name is required",
    );
    expect((await cron({ action: "add", name: "x", message: "x" })).output).toBe(
      "Error [ValidationError] (schedule): Provide exactly one of at, cron_expr or every_seconds",
    );
    expect(
      (await cron({ action: "add", name: "x", message: "x", at: "2026-03-01T07:00:00Z" })).output,
    ).toBe("Error [ValidationError] (at): Scheduled time is in the past: 2026-03-01T07:00:00.000Z");
    expect((await cron({ action: "add", name: "x", message: "x", at: "tomorrow" })).output).toBe(
      "Error [ValidationError] (at): Invalid timestamp: tomorrow",
    );
    expect((await cron({ action: "remove" })).output).toBe(
      "Error [ValidationError] (job_id): job_id is required",
    );
    expect(scheduler.listJobs()).toEqual([]);
  });

  it("refuses an interval that would run past the date range", async () => {
    expect(
      (await cron({ action: "add", name: "forever", message: "x", every_seconds: 9e15 })).output,
    ).toBe("Error [ValidationError] (every_seconds): Interval is too long");
    expect((await cron({ action: "list" })).output).toBe("No scheduled jobs.");
  });

  it("reports unknown jobs and duplicate names", async () => {
    await cron({ action: "add", name: "poll", message: "check", every_seconds: 60 });

    expect((await cron({ action: "remove", job_id: "nope" })).error).toEqual({
      kind: "JobNotFound",
      message: "Job not found: nope",
      field: "job_id",
    });
    expect((await cron({ action: "add", name: "poll", message: "again", every_seconds: 30 })).output).toBe(
      "Error [JobConflict] (name): A job named 'poll' already exists",
    );
  });
});

describe("formatTimestamp", () => {
  it("prints ISO time, a dash when unset and a marker outside the date range", () => {
    expect(formatTimestamp(T)).toBe("2026-03-01T08:00:00.000Z");
    expect(formatTimestamp(undefined)).toBe("-");
    expect(formatTimestamp(9e18)).toBe("invalid (9000000000000000000)");
  });
});

describe("buildSchedule", () => {
  it("keeps the time zone only for cron expressions", () => {
    expect(buildSchedule({ cron_expr: "*/5 * * * *" })).toEqual({ kind: "cron", expr: "*/5 * * * *" });
    expect(buildSchedule({ cron_expr: "0 9 * * 1", tz: "Europe/Berlin" })).toEqual({
      kind: "cron",
      expr: "0 9 * * 1",
      tz: "Europe/Berlin",
    });
  });

  it("rejects more than one schedule", () => {
    expect(() => buildSchedule({ at: "2026-03-01T09:00:00Z", every_seconds: 10 })).toThrow(
      "Provide exactly one of at, cron_expr or every_seconds",
    );
  });
});

describe("describeSchedule", () => {
  it("renders each schedule kind", () => {
    expect(describeSchedule({ kind: "at", atMs: T })).toBe("once at 2026-03-01T08:00:00.000Z");
    expect(describeSchedule({ kind: "every", everyMs: 90_000 })).toBe("every 90s");
    expect(describeSchedule({ kind: "cron", expr: "0 9 * * *" })).toBe('cron "0 9 * * *"');
  });
});
