/**
 * Wiring of the runtime's components from a config.
 */

import type { Config } from "../core/types/config.js";
import type { ILLMProvider } from "../core/interfaces/llm-provider.js";
import type { ScheduledJob } from "../core/types/scheduler.js";
import { MessageBus } from "../infrastructure/queue/message-bus.js";
import { createOutboundMessage } from "../infrastructure/queue/events.js";
import { WorkspaceState } from "../infrastructure/storage/workspace-state.js";
import { MemoryStore } from "../infrastructure/storage/memory-store.js";
import { AIProvider } from "../infrastructure/llm/ai-sdk-provider.js";
import { getJobStorePath } from "../infrastructure/config/loader.js";
import { getWorkspacePath } from "../infrastructure/config/schema.js";
import { ToolRegistry } from "../tools/registry.js";
import { ReadFileTool, WriteFileTool, EditFileTool, ListDirTool } from "../tools/fs.js";
import { ExecTool } from "../tools/exec.js";
import { WebSearchTool, WebFetchTool } from "../tools/web.js";
import { MessageTool } from "../tools/message.js";
import { SpawnTool, SubagentStatusTool, SubagentCancelTool } from "../tools/spawn.js";
import { CronTool } from "../tools/cron.js";
import { ToolDispatcher, type DispatcherOptions } from "./dispatcher.js";
import { Scheduler } from "./scheduler.js";
import { SubagentManager } from "./subagent.js";
import { HeartbeatRunner } from "./heartbeat.js";
import { ContextBuilder } from "./context-builder.js";
import { SkillsLoader } from "./skills-loader.js";
import { AgentLoop } from "./agent-loop.js";
import { systemClock, type Clock } from "../utils/clock.js";
import logger from "../utils/logger.js";

const log = logger.child({ component: "runtime" });

/**
 * Tools every executor gets: files, shell and web.
 */
export function createWorkerTools(workspace: WorkspaceState, config: Config): ToolRegistry {
  const tools = new ToolRegistry();
  tools.register(new ReadFileTool(workspace));
  tools.register(new WriteFileTool(workspace));
  tools.register(new EditFileTool(workspace));
  tools.register(new ListDirTool(workspace));
  tools.register(
    new ExecTool({ workspace, timeoutMs: config.tools.exec.timeoutSeconds * 1000 }),
  );
  tools.register(
    new WebSearchTool({
      apiKey: config.tools.web.search.apiKey,
      maxResults: config.tools.web.search.maxResults,
    }),
  );
  tools.register(new WebFetchTool());
  return tools;
}

export interface Runtime {
  config: Config;
  bus: MessageBus;
  workspace: WorkspaceState;
  memory: MemoryStore;
  provider: ILLMProvider;
  tools: ToolRegistry;
  dispatcher: ToolDispatcher;
  scheduler: Scheduler;
  subagents: SubagentManager;
  heartbeat: HeartbeatRunner;
  agent: AgentLoop;
}

export interface RuntimeOptions {
  /** Defaults to the ai SDK provider for the configured model */
  provider?: ILLMProvider;
  storePath?: string;
  clock?: Clock;
}

/**
 * Build every component over one workspace and one bus.
 *
 * Cron deliveries go out on the bus to the job's recipient and are
 * recorded in the history log.
 */
export function createRuntime(config: Config, options?: RuntimeOptions): Runtime {
  const clock = options?.clock ?? systemClock;
  const bus = new MessageBus();
  const workspace = new WorkspaceState(getWorkspacePath(config), {
    restrictToWorkspace: config.tools.restrictToWorkspace,
  });
  const memory = new MemoryStore(workspace, clock);
  const provider = options?.provider ?? new AIProvider({ config });
  const dispatcherOptions: DispatcherOptions = {
    timeoutMs: config.tools.timeoutSeconds * 1000,
    maxOutputChars: config.tools.maxOutputChars,
  };

  const scheduler = new Scheduler({
    storePath: options?.storePath ?? getJobStorePath(),
    clock,
    tickIntervalMs: config.scheduler.tickSeconds * 1000,
    onJob: async (job: ScheduledJob, occurrenceMs: number) => {
      await bus.publishOutbound(
        createOutboundMessage({
          channel: job.delivery.channel,
          chatId: job.delivery.to,
          content: job.message,
          metadata: { jobId: job.id, occurrenceMs },
        }),
      );
      await memory.appendHistory(
        `Cron '${job.name}' delivered to ${job.delivery.channel}:${job.delivery.to}: ${job.message}`,
      );
    },
  });

  const subagents = new SubagentManager({
    provider,
    bus,
    memory,
    workspacePath: workspace.root,
    createTools: () => createWorkerTools(workspace, config),
    model: config.agents.defaults.model,
    maxConcurrent: config.subagents.maxConcurrent,
    overflow: config.subagents.overflow,
    maxIterations: config.subagents.maxIterations,
    timeoutMs: config.subagents.timeoutSeconds * 1000,
    dispatcher: dispatcherOptions,
    clock,
  });

  const tools = createWorkerTools(workspace, config);
  tools.register(new MessageTool(bus));
  tools.register(new SpawnTool(subagents));
  tools.register(new SubagentStatusTool(subagents));
  tools.register(new SubagentCancelTool(subagents));
  tools.register(new CronTool(scheduler));
  const dispatcher = new ToolDispatcher(tools, dispatcherOptions);

  const heartbeat = new HeartbeatRunner({
    workspace,
    dispatcher,
    subagents,
    memory,
    file: config.heartbeat.file,
    intervalMs: config.heartbeat.intervalSeconds * 1000,
    clock,
  });

  const defaults = config.agents.defaults;
  const agent = new AgentLoop({
    bus,
    provider,
    dispatcher,
    context: new ContextBuilder({
      workspace,
      memory,
      skills: new SkillsLoader(workspace),
      clock,
    }),
    memory,
    subagents,
    model: defaults.model,
    maxIterations: defaults.maxToolIterations,
    maxTokens: defaults.maxTokens,
    temperature: defaults.temperature,
    clock,
  });

  log.debug({ workspace: workspace.root, tools: tools.toolNames }, "Runtime assembled");
  return { config, bus, workspace, memory, provider, tools, dispatcher, scheduler, subagents, heartbeat, agent };
}
