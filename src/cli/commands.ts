/**
 * Command-line interface.
 */

import { existsSync } from "fs";
import { join } from "path";
import { Command } from "commander";
import { formatErrorDetail, toErrorDetail, ValidationError } from "../core/errors.js";
import type { Config } from "../core/types/config.js";
import type { ScheduledJob } from "../core/types/scheduler.js";
import {
  getConfigPath,
  getDataDir,
  getJobStorePath,
  loadConfig,
  saveConfig,
} from "../infrastructure/config/loader.js";
import { ConfigSchema, getApiKey, getWorkspacePath } from "../infrastructure/config/schema.js";
import { WorkspaceState } from "../infrastructure/storage/workspace-state.js";
import { ChannelManager } from "../infrastructure/channels/manager.js";
import { ConsoleChannel } from "../infrastructure/channels/console.js";
import { DEFAULT_SESSION_KEY } from "../infrastructure/queue/events.js";
import { Scheduler } from "../application/scheduler.js";
import { createRuntime } from "../application/runtime.js";
import { buildSchedule, describeSchedule, formatTimestamp } from "../tools/cron.js";
import { ensureDir } from "../utils/paths.js";
import logger from "../utils/logger.js";

export const VERSION = "0.1.0";

const WORKSPACE_TEMPLATES: Record<string, string> = {
  "AGENTS.md": `# Agent Instructions

You are a helpful assistant. Be concise and accurate.

- Explain what you are doing before you act
- Ask when a request is ambiguous
- Use the cron tool for reminders instead of remembering times yourself
`,
  "SOUL.md": `# Soul

Friendly, direct and curious.
`,
  "USER.md": `# User

Preferences and facts about the user go here.
`,
  "memory/MEMORY.md": `# Long-term Memory

Important facts to remember across conversations.
`,
  "HEARTBEAT.md": `# Heartbeat

Unchecked items are worked through periodically and checked off when done.
Write \`!tool_name {"arg": "value"}\` to call a tool directly; any other text
is handed to a background sub-agent.

`,
};

/**
 * Print a failure the way every command reports it and set a failing exit code.
 */
function reportError(error: unknown): void {
  const detail = toErrorDetail(error);
  console.error(formatErrorDetail(detail));
  process.exitCode = 1;
}

function action<A extends unknown[]>(fn: (...args: A) => Promise<void> | void) {
  return async (...args: A): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      logger.debug({ error }, "Command failed");
      reportError(error);
    }
  };
}

function openScheduler(): Scheduler {
  return new Scheduler({ storePath: getJobStorePath() });
}

export function formatJobLine(job: ScheduledJob): string {
  return [
    job.id,
    job.name,
    describeSchedule(job.schedule),
    job.enabled ? "enabled" : "disabled",
    `next ${formatTimestamp(job.state.nextRunAtMs)}`,
    `to ${job.delivery.channel}:${job.delivery.to}`,
  ].join(" | ");
}

function parseSeconds(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Interval must be a number of seconds: ${raw}`, "every_seconds");
  }
  return value;
}

async function onboard(): Promise<void> {
  const configPath = getConfigPath();
  let config: Config;
  if (existsSync(configPath)) {
    config = loadConfig(configPath);
    console.log(`Config already exists at ${configPath}`);
  } else {
    config = ConfigSchema.parse({});
    saveConfig(config, configPath);
    console.log(`Created config at ${configPath}`);
  }

  const workspace = new WorkspaceState(getWorkspacePath(config));
  ensureDir(workspace.root);
  for (const [path, content] of Object.entries(WORKSPACE_TEMPLATES)) {
    if (!(await workspace.exists(path))) {
      await workspace.write(path, content);
      console.log(`Created ${path}`);
    }
  }
  ensureDir(join(workspace.root, "skills"));
  ensureDir(join(getDataDir(), "cron"));

  console.log(`\nWorkspace ready at ${workspace.root}`);
  console.log(`Add an API key to ${configPath}, then run: tendril agent -m "Hello!"`);
}

async function gateway(): Promise<void> {
  const config = loadConfig();
  const runtime = createRuntime(config);
  const channels = new ChannelManager(runtime.bus);

  const shutdown = async () => {
    logger.info("Shutting down");
    runtime.heartbeat.stop();
    runtime.scheduler.stop();
    runtime.agent.stop();
    runtime.bus.stop();
    await channels.stopAll();
  };

  channels.register(
    new ConsoleChannel(runtime.bus, {
      onExit: () => {
        shutdown().catch((error) => logger.error({ error }, "Shutdown failed"));
      },
    }),
  );

  if (config.scheduler.enabled) {
    await runtime.scheduler.start();
  }
  if (config.heartbeat.enabled) {
    runtime.heartbeat.start();
  }

  process.once("SIGINT", () => {
    shutdown().catch((error) => logger.error({ error }, "Shutdown failed"));
  });

  logger.info(
    { workspace: runtime.workspace.root, channels: ["cli"], tools: runtime.tools.size },
    "Gateway started",
  );

  await channels.startAll();
  await Promise.all([runtime.agent.run(), runtime.bus.dispatchOutbound()]);
}

async function agent(options: { message: string; session: string }): Promise<void> {
  const runtime = createRuntime(loadConfig());
  const reply = await runtime.agent.processDirect(options.message, options.session);
  console.log(reply);
}

async function status(): Promise<void> {
  const configPath = getConfigPath();
  const config = loadConfig(configPath);
  const workspace = getWorkspacePath(config);
  const scheduler = openScheduler();

  console.log(`Config:    ${configPath} ${existsSync(configPath) ? "(found)" : "(missing, using defaults)"}`);
  console.log(`Workspace: ${workspace} ${existsSync(workspace) ? "(found)" : "(missing)"}`);
  console.log(`Model:     ${config.agents.defaults.model}`);
  console.log(`API key:   ${getApiKey(config) ? "set" : "not set"}`);
  console.log(`Jobs:      ${scheduler.status().jobCount}`);
  console.log(`Heartbeat: ${config.heartbeat.enabled ? `every ${config.heartbeat.intervalSeconds}s` : "disabled"}`);
}

function tools(): void {
  const runtime = createRuntime(loadConfig());
  console.log(JSON.stringify(runtime.tools.getSchemas(), null, 2));
}

/**
 * Build the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("tendril")
    .version(VERSION)
    .description("Orchestration runtime for an LLM agent");

  program.command("onboard").description("Create config and workspace").action(action(onboard));

  program
    .command("gateway")
    .description("Run the agent with the console channel, scheduler and heartbeat")
    .action(action(gateway));

  program
    .command("agent")
    .description("Send one message to the agent and print the reply")
    .requiredOption("-m, --message <message>", "Message to send")
    .option("-s, --session <key>", "Session key", DEFAULT_SESSION_KEY)
    .action(action(agent));

  program.command("status").description("Show configuration and job store status").action(action(status));

  program.command("tools").description("Print the tool definitions as JSON schemas").action(action(tools));

  const cron = program.command("cron").description("Manage scheduled jobs");

  cron
    .command("list")
    .description("List scheduled jobs")
    .option("-a, --all", "Include disabled jobs", false)
    .action(
      action((options: { all: boolean }) => {
        const jobs = openScheduler().listJobs(options.all);
        if (jobs.length === 0) {
          console.log("No scheduled jobs.");
          return;
        }
        for (const job of jobs) {
          console.log(formatJobLine(job));
        }
      }),
    );

  cron
    .command("add")
    .description("Add a scheduled job")
    .requiredOption("-n, --name <name>", "Unique job name")
    .requiredOption("-m, --message <message>", "Message to deliver")
    .option("--at <iso>", "Run once at an ISO 8601 time")
    .option("--cron <expr>", "Five-field cron expression")
    .option("--tz <zone>", "IANA time zone for --cron")
    .option("--every <seconds>", "Run every N seconds")
    .requiredOption("--to <recipient>", "Recipient chat id")
    .option("--channel <channel>", "Delivery channel", "cli")
    .action(
      action(
        (options: {
          name: string;
          message: string;
          at?: string;
          cron?: string;
          tz?: string;
          every?: string;
          to: string;
          channel: string;
        }) => {
          if (options.tz !== undefined && options.cron === undefined) {
            throw new ValidationError("--tz only applies to --cron", "tz");
          }
          const job = openScheduler().addJob({
            name: options.name,
            message: options.message,
            schedule: buildSchedule({
              at: options.at,
              cron_expr: options.cron,
              tz: options.tz,
              every_seconds: parseSeconds(options.every),
            }),
            delivery: { channel: options.channel, to: options.to },
          });
          console.log(`Added job '${job.name}' (${job.id}), next run ${formatTimestamp(job.state.nextRunAtMs)}`);
        },
      ),
    );

  cron
    .command("remove")
    .description("Remove a scheduled job")
    .argument("<jobId>", "Job ID")
    .action(
      action((jobId: string) => {
        openScheduler().removeJob(jobId);
        console.log(`Removed job ${jobId}`);
      }),
    );

  cron
    .command("enable")
    .description("Enable a job (or disable it with --disable)")
    .argument("<jobId>", "Job ID")
    .option("--disable", "Disable instead of enable", false)
    .action(
      action((jobId: string, options: { disable: boolean }) => {
        const job = openScheduler().enableJob(jobId, !options.disable);
        console.log(`Job '${job.name}' ${job.enabled ? "enabled" : "disabled"}`);
      }),
    );

  cron
    .command("run")
    .description("Deliver a job now, printing it to the console")
    .argument("<jobId>", "Job ID")
    .action(
      action(async (jobId: string) => {
        const scheduler = new Scheduler({
          storePath: getJobStorePath(),
          onJob: async (job) => {
            console.log(`[${job.delivery.channel}:${job.delivery.to}] ${job.message}`);
          },
        });
        await scheduler.runJob(jobId);
      }),
    );

  return program;
}
