/**
 * Subagent manager for background task execution.
 */

import { randomUUID } from "crypto";
import type { CoreMessage } from "ai";
import type { ILLMProvider } from "../core/interfaces/llm-provider.js";
import type { IMessageBus } from "../core/interfaces/message-bus.js";
import type { IMemoryStore } from "../core/interfaces/storage.js";
import type { ISubagentManager } from "../core/interfaces/subagent.js";
import {
  TERMINAL_STATUSES,
  type SpawnOptions,
  type SubagentStatus,
  type SubagentTask,
} from "../core/types/subagent.js";
import {
  ExecutionError,
  ExecutionTimeoutError,
  ResourceExhaustedError,
  TaskNotFoundError,
  ValidationError,
} from "../core/errors.js";
import type { ToolRegistry } from "../tools/registry.js";
import { ToolDispatcher, type DispatcherOptions } from "./dispatcher.js";
import { runToolLoop } from "./agent-runner.js";
import { createInboundMessage, formatSessionKey } from "../infrastructure/queue/events.js";
import { systemClock, type Clock } from "../utils/clock.js";
import logger from "../utils/logger.js";

const log = logger.child({ component: "subagent" });

export interface SubagentManagerOptions {
  provider: ILLMProvider;
  bus: IMessageBus;
  /** Builds a fresh tool set per task (no message, spawn or cron tools) */
  createTools: () => ToolRegistry;
  /** Workspace root shown in the sub-agent prompt */
  workspacePath: string;
  memory?: IMemoryStore;
  model?: string;
  maxConcurrent?: number;
  overflow?: "queue" | "reject";
  maxIterations?: number;
  timeoutMs?: number;
  dispatcher?: DispatcherOptions;
  clock?: Clock;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function displayLabel(task: SubagentTask): string {
  return task.label || task.task.slice(0, 30) + (task.task.length > 30 ? "..." : "");
}

/**
 * Manages background subagent execution.
 *
 * Each task runs its own tool loop with its own registry and dispatcher;
 * only the workspace is shared with the rest of the runtime. At most
 * `maxConcurrent` tasks run at once, the rest wait in FIFO order or are
 * refused. On completion the result is announced to the origin session
 * as a "system" inbound message and kept until consumed.
 */
export class SubagentManager implements ISubagentManager {
  private provider: ILLMProvider;
  private bus: IMessageBus;
  private createTools: () => ToolRegistry;
  private workspacePath: string;
  private memory: IMemoryStore | undefined;
  private model: string | undefined;
  private maxConcurrent: number;
  private overflow: "queue" | "reject";
  private maxIterations: number;
  private timeoutMs: number;
  private dispatcherOptions: DispatcherOptions | undefined;
  private clock: Clock;

  private tasks: Map<string, SubagentTask> = new Map();
  private queue: string[] = [];
  private controllers: Map<string, AbortController> = new Map();
  private cancelRequested: Set<string> = new Set();
  private waiters: Map<string, Array<(task: SubagentTask) => void>> = new Map();

  constructor(options: SubagentManagerOptions) {
    this.provider = options.provider;
    this.bus = options.bus;
    this.createTools = options.createTools;
    this.workspacePath = options.workspacePath;
    this.memory = options.memory;
    this.model = options.model;
    this.maxConcurrent = options.maxConcurrent ?? 3;
    this.overflow = options.overflow ?? "queue";
    this.maxIterations = options.maxIterations ?? 15;
    this.timeoutMs = options.timeoutMs ?? 15 * 60 * 1000;
    this.dispatcherOptions = options.dispatcher;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Spawn a subagent to execute a task in the background.
   */
  spawn(options: SpawnOptions): string {
    if (!options.task.trim()) {
      throw new ValidationError("Task must not be empty", "task");
    }
    if (this.overflow === "reject" && this.controllers.size >= this.maxConcurrent) {
      throw new ResourceExhaustedError(
        `All ${this.maxConcurrent} sub-agent slots are busy`,
      );
    }

    const task: SubagentTask = {
      id: randomUUID().slice(0, 8),
      task: options.task,
      label: options.label,
      status: "pending",
      origin: options.origin ?? { channel: "cli", chatId: "direct" },
      createdAtMs: this.clock.now(),
    };
    this.tasks.set(task.id, task);
    this.queue.push(task.id);

    log.info({ taskId: task.id, label: displayLabel(task) }, "Spawned subagent");
    this.pump();
    return task.id;
  }

  getTask(taskId: string): SubagentTask | undefined {
    const task = this.tasks.get(taskId);
    return task ? { ...task } : undefined;
  }

  listTasks(): SubagentTask[] {
    return Array.from(this.tasks.values(), (task) => ({ ...task }));
  }

  /**
   * Return the number of currently running subagents.
   */
  getRunningCount(): number {
    return this.controllers.size;
  }

  /**
   * Cancel a task. Pending tasks end at once; running ones stop at their
   * next LLM or tool call.
   */
  cancel(taskId: string): SubagentTask {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    if (TERMINAL_STATUSES.has(task.status)) {
      throw new ValidationError(`Sub-agent task ${taskId} is already ${task.status}`, "task_id");
    }

    if (task.status === "pending") {
      this.queue = this.queue.filter((id) => id !== taskId);
      this.finish(task, "cancelled", { error: "Cancelled before start" });
      this.announce(task).catch((error) => {
        log.error({ taskId, error }, "Failed to announce cancelled subagent");
      });
    } else {
      this.cancelRequested.add(taskId);
      this.controllers.get(taskId)?.abort(new ExecutionError("Cancelled"));
      log.info({ taskId }, "Subagent cancellation requested");
    }

    return { ...task };
  }

  /**
   * Return a finished task and forget it. Undefined while it still runs.
   */
  consumeResult(taskId: string): SubagentTask | undefined {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    if (!TERMINAL_STATUSES.has(task.status)) {
      return undefined;
    }
    this.tasks.delete(taskId);
    return { ...task };
  }

  /**
   * Resolve once the task reaches a terminal status.
   */
  async waitFor(taskId: string): Promise<SubagentTask> {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    if (TERMINAL_STATUSES.has(task.status)) {
      return { ...task };
    }
    return new Promise((resolve) => {
      const list = this.waiters.get(taskId) ?? [];
      list.push(resolve);
      this.waiters.set(taskId, list);
    });
  }

  /**
   * Start queued tasks while slots are free.
   */
  private pump(): void {
    while (this.controllers.size < this.maxConcurrent && this.queue.length > 0) {
      const taskId = this.queue.shift();
      const task = taskId === undefined ? undefined : this.tasks.get(taskId);
      if (!task || task.status !== "pending") {
        continue;
      }

      const controller = new AbortController();
      this.controllers.set(task.id, controller);
      task.status = "running";
      task.startedAtMs = this.clock.now();

      this.runSubagent(task, controller).catch((error) => {
        log.error({ taskId: task.id, error }, "Subagent bookkeeping failed");
      });
    }
  }

  /**
   * Execute the subagent task and announce the result.
   */
  private async runSubagent(task: SubagentTask, controller: AbortController): Promise<void> {
    log.info({ taskId: task.id, label: displayLabel(task) }, "Subagent starting task");

    const timer = setTimeout(() => {
      controller.abort(new ExecutionTimeoutError(this.timeoutMs));
    }, this.timeoutMs);

    try {
      const dispatcher = new ToolDispatcher(this.createTools(), this.dispatcherOptions);
      const messages: CoreMessage[] = [
        { role: "system", content: this.buildSubagentPrompt(task.task) },
        { role: "user", content: task.task },
      ];

      const result = await runToolLoop({
        provider: this.provider,
        dispatcher,
        messages,
        sessionKey: formatSessionKey(task.origin.channel, task.origin.chatId),
        maxIterations: this.maxIterations,
        model: this.model,
        signal: controller.signal,
        logContext: { taskId: task.id },
      });

      this.finish(task, "completed", {
        result: result.content ?? "Task completed but no final response was generated.",
      });
    } catch (error) {
      if (this.cancelRequested.has(task.id)) {
        this.finish(task, "cancelled", { error: "Cancelled" });
      } else if (controller.signal.reason instanceof ExecutionTimeoutError) {
        this.finish(task, "failed", { error: controller.signal.reason.message });
      } else {
        this.finish(task, "failed", { error: errorMessage(error) });
      }
    } finally {
      clearTimeout(timer);
      this.controllers.delete(task.id);
      this.cancelRequested.delete(task.id);
    }

    this.pump();
    await this.announce(task);
  }

  private finish(
    task: SubagentTask,
    status: SubagentStatus,
    outcome: { result?: string; error?: string },
  ): void {
    task.status = status;
    task.completedAtMs = this.clock.now();
    task.result = outcome.result;
    task.error = outcome.error;

    if (status === "completed") {
      log.info({ taskId: task.id }, "Subagent completed successfully");
    } else {
      log.warn({ taskId: task.id, status, error: outcome.error }, "Subagent did not complete");
    }

    const waiters = this.waiters.get(task.id) ?? [];
    this.waiters.delete(task.id);
    for (const resolve of waiters) {
      resolve({ ...task });
    }
  }

  /**
   * Record the outcome in history and hand it to the main agent via the bus.
   */
  private async announce(task: SubagentTask): Promise<void> {
    const label = displayLabel(task);
    const outcome = task.status === "completed" ? task.result : task.error;

    if (this.memory) {
      try {
        await this.memory.appendHistory(`Sub-agent ${task.id} '${label}' ${task.status}: ${outcome ?? ""}`);
      } catch (error) {
        log.error({ taskId: task.id, error }, "Failed to record subagent history");
      }
    }

    const statusText =
      task.status === "completed" ? "completed successfully" : task.status === "cancelled" ? "was cancelled" : "failed";

    const content = `[Subagent '${label}' ${statusText}]

Task: ${task.task}

Result:
${outcome ?? ""}

Summarize this naturally for the user. Keep it brief (1-2 sentences). Do not mention technical details like "subagent" or task IDs.`;

    await this.bus.publishInbound(
      createInboundMessage({
        channel: "system",
        senderId: "subagent",
        chatId: formatSessionKey(task.origin.channel, task.origin.chatId),
        content,
        metadata: { taskId: task.id, status: task.status },
      }),
    );
    log.debug({ taskId: task.id, origin: task.origin }, "Subagent announced result");
  }

  /**
   * Build a focused system prompt for the subagent.
   */
  private buildSubagentPrompt(task: string): string {
    return `# Subagent

You are a background worker handling one task for the main agent.

## Your Task
${task}

## Rules
1. Do only the assigned task
2. Your final reply is passed back to the main agent
3. Be concise but include what you found or changed

## Tools
You can read and write workspace files, run shell commands, search the web and fetch pages.
You cannot message users or start other background tasks.

## Workspace
${this.workspacePath}

Finish with a clear summary of your findings or actions.`;
  }
}
