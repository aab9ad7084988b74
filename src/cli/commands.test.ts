import { mkdirSync, mkdtempSync, readFileSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { Scheduler } from "../application/scheduler.js";
import { createProgram } from "./commands.js";

const FUTURE = "2099-01-01T00:00:00.000Z";

describe("CLI", () => {
  let home: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  async function run(...args: string[]): Promise<void> {
    await createProgram().parseAsync(args, { from: "user" });
  }

  function printed(): string[] {
    return log.mock.calls.map((call) => call.map(String).join(" "));
  }

  function jobs() {
    return new Scheduler({ storePath: join(home, "cron", "jobs.json") }).listJobs();
  }

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), "cli-"));
    vi.stubEnv("TENDRIL_HOME", home);
    log = vi.spyOn(console, "log").mockImplementation(() => {});
    error = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe("cron", () => {
    it("adds and lists a one-time job", async () => {
      await run("cron", "add", "-n", "ping", "-m", "ping", "--at", FUTURE, "--to", "me");
      const [job] = jobs();

      expect(printed()).toEqual([`Added job 'ping' (${job.id}), next run ${FUTURE}`]);

      log.mockClear();
      await run("cron", "list");
      expect(printed()).toEqual([
        `${job.id} | ping | once at ${FUTURE} | enabled | next ${FUTURE} | to cli:me`,
      ]);
    });

    it("hides disabled jobs unless asked", async () => {
      await run("cron", "add", "-n", "poll", "-m", "check", "--every", "60", "--to", "me");
      const [job] = jobs();

      log.mockClear();
      await run("cron", "enable", job.id, "--disable");
      expect(printed()).toEqual(["Job 'poll' disabled"]);

      log.mockClear();
      await run("cron", "list");
      expect(printed()).toEqual(["No scheduled jobs."]);

      log.mockClear();
      await run("cron", "list", "--all");
      expect(printed()).toEqual([`${job.id} | poll | every 60s | disabled | next - | to cli:me`]);
    });

    it("adds a cron job in a time zone on another channel", async () => {
      await run(
        "cron", "add", "-n", "standup", "-m", "Standup", "--cron", "0 9 * * 1-5",
        "--tz", "Europe/Berlin", "--to", "team", "--channel", "telegram",
      );

      expect(jobs()[0]).toMatchObject({
        schedule: { kind: "cron", expr: "0 9 * * 1-5", tz: "Europe/Berlin" },
        delivery: { channel: "telegram", to: "team" },
      });
    });

    it("removes a job", async () => {
      await run("cron", "add", "-n", "ping", "-m", "ping", "--at", FUTURE, "--to", "me");
      const [job] = jobs();

      log.mockClear();
      await run("cron", "remove", job.id);

      expect(printed()).toEqual([`Removed job ${job.id}`]);
      expect(jobs()).toEqual([]);
    });

    it("delivers a job on request by printing it", async () => {
      await run("cron", "add", "-n", "ping", "-m", "hello there", "--at", FUTURE, "--to", "me");
      const [job] = jobs();

      log.mockClear();
      await run("cron", "run", job.id);

      expect(printed()).toEqual(["[cli:me] hello there"]);
      expect(jobs()[0].state.lastStatus).toBe("ok");
    });

    it("reports errors with their kind, field and a failing exit code", async () => {
      await run("cron", "remove", "nope");

      expect(error).toHaveBeenCalledWith("Error [JobNotFound] (job_id): Job not found: nope");
      expect(process.exitCode).toBe(1);
    });

    it("rejects invalid schedules without touching the store", async () => {
      await run("cron", "add", "-n", "x", "-m", "x", "--every", "abc", "--to", "me");
      await run("cron", "add", "-n", "x", "-m", "x", "--at", FUTURE, "--tz", "UTC", "--to", "me");
      await run("cron", "add", "-n", "x", "-m", "x", "--at", "2000-01-01T00:00:00Z", "--to", "me");

      expect(error.mock.calls.map(([line]) => line)).toEqual([
        "Error [ValidationError] (every_seconds): Interval must be a number of seconds: abc",
        "Error [ValidationError] (tz): --tz only applies to --cron",
        "Error [ValidationError] (at): Scheduled time is in the past: 2000-01-01T00:00:00.000Z",
      ]);
      expect(jobs()).toEqual([]);
    });
  });

  it("sets up a workspace without overwriting existing files", async () => {
    const workspace = join(home, "workspace");
    mkdirSync(workspace, { recursive: true });
    writeFileSync(join(workspace, "SOUL.md"), "custom soul");
    writeFileSync(
      join(home, "config.json"),
      JSON.stringify({ agents: { defaults: { workspace } } }),
    );

    await run("onboard");

    expect(readFileSync(join(workspace, "SOUL.md"), "utf-8")).toBe("custom soul");
    expect(readFileSync(join(workspace, "HEARTBEAT.md"), "utf-8")).toContain("# Heartbeat");
    expect(readFileSync(join(workspace, "memory", "MEMORY.md"), "utf-8")).toContain(
      "# Long-term Memory",
    );
    expect(printed()).toContain("Created AGENTS.md");
    expect(printed()).not.toContain("Created SOUL.md");
  });

  it("prints every tool definition", async () => {
    await run("tools");

    const schemas: Array<{ function: { name: string } }> = JSON.parse(printed()[0]);
    expect(schemas.map((schema) => schema.function.name)).toEqual([
      "read_file",
      "write_file",
      "edit_file",
      "list_dir",
      "exec",
      "web_search",
      "web_fetch",
      "message",
      "spawn",
      "subagent_status",
      "subagent_cancel",
      "cron",
    ]);
  });

  it("reports the job count in status", async () => {
    await run("cron", "add", "-n", "ping", "-m", "ping", "--at", FUTURE, "--to", "me");
    log.mockClear();

    await run("status");

    expect(printed()).toContain("Jobs:      1");
  });
});
