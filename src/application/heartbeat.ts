/**
 * Heartbeat runner: works through the unchecked items of HEARTBEAT.md.
 */

import type { ChecklistItem, HeartbeatRunSummary } from "../core/types/heartbeat.js";
import type { ToolCallRequest, ToolResult } from "../core/types/tool.js";
import type { IMemoryStore, IWorkspaceState } from "../core/interfaces/storage.js";
import { ValidationError, toErrorDetail, formatErrorDetail } from "../core/errors.js";
import { DEFAULT_SESSION_KEY } from "../infrastructure/queue/events.js";
import type { ToolDispatcher } from "./dispatcher.js";
import type { SubagentManager } from "./subagent.js";
import { spawnedTaskId } from "../tools/spawn.js";
import { systemClock, type Clock } from "../utils/clock.js";
import logger from "../utils/logger.js";

const log = logger.child({ component: "heartbeat" });

const TASK_LINE = /^(\s*[-*]\s+)\[([ xX])\](\s+)(.*)$/;
const DIRECT_CALL = /^!([A-Za-z_][\w-]*)\s*(.*)$/;

/**
 * Parse markdown task lines (`- [ ] text`, `* [x] text`) in file order.
 */
export function parseChecklist(content: string): ChecklistItem[] {
  const items: ChecklistItem[] = [];
  content.split("\n").forEach((raw, line) => {
    const match = TASK_LINE.exec(raw.replace(/\r$/, ""));
    if (!match) {
      return;
    }
    const text = match[4].trim();
    if (text) {
      items.push({ line, text, done: match[2] !== " " });
    }
  });
  return items;
}

/**
 * Check off an item in checklist content. The item is looked up at its
 * recorded line first, then by text, so edits above it do not matter.
 * Content comes back unchanged when the item is gone or already checked.
 */
export function markItemDone(content: string, item: ChecklistItem): string {
  const lines = content.split("\n");
  const matches = (index: number) => {
    const match = TASK_LINE.exec(lines[index].replace(/\r$/, ""));
    return match !== null && match[2] === " " && match[4].trim() === item.text;
  };

  let index = item.line < lines.length && matches(item.line) ? item.line : -1;
  if (index === -1) {
    index = lines.findIndex((_, i) => matches(i));
  }
  if (index === -1) {
    return content;
  }

  lines[index] = lines[index].replace("[ ]", "[x]");
  return lines.join("\n");
}

/**
 * Turn a checklist item into a tool call. `!tool_name {json}` calls the
 * tool directly; anything else becomes a sub-agent task.
 */
export function resolveItem(item: ChecklistItem, id: string): ToolCallRequest {
  const direct = DIRECT_CALL.exec(item.text);
  if (!direct) {
    return { id, name: "spawn", arguments: { task: item.text } };
  }

  const [, name, rawArgs] = direct;
  if (!rawArgs.trim()) {
    return { id, name, arguments: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawArgs);
  } catch {
    throw new ValidationError(`Arguments for '${name}' are not valid JSON`, "arguments");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError(`Arguments for '${name}' must be a JSON object`, "arguments");
  }
  return { id, name, arguments: Object.fromEntries(Object.entries(parsed)) };
}

export interface HeartbeatRunnerOptions {
  workspace: IWorkspaceState;
  dispatcher: ToolDispatcher;
  /** Free-text items count as done only once their sub-agent completes */
  subagents: Pick<SubagentManager, "waitFor">;
  memory?: IMemoryStore;
  /** Checklist path relative to the workspace */
  file?: string;
  intervalMs?: number;
  /** Session the calls run in; sub-agents report back to it */
  sessionKey?: string;
  clock?: Clock;
}

/**
 * Periodic checklist executor.
 *
 * An item is checked off only after its call succeeded, so a failed item
 * is retried on the next run and a done item is never repeated. For a
 * sub-agent item that means the task completed; the run lasts until every
 * task it spawned has settled.
 */
export class HeartbeatRunner {
  private workspace: IWorkspaceState;
  private dispatcher: ToolDispatcher;
  private subagents: Pick<SubagentManager, "waitFor">;
  private memory: IMemoryStore | undefined;
  private file: string;
  private intervalMs: number;
  private sessionKey: string;
  private clock: Clock;
  private timer: ReturnType<typeof setInterval> | null = null;
  private current: Promise<HeartbeatRunSummary> | null = null;

  constructor(options: HeartbeatRunnerOptions) {
    this.workspace = options.workspace;
    this.dispatcher = options.dispatcher;
    this.subagents = options.subagents;
    this.memory = options.memory;
    this.file = options.file ?? "HEARTBEAT.md";
    this.intervalMs = options.intervalMs ?? 30 * 60 * 1000;
    this.sessionKey = options.sessionKey ?? DEFAULT_SESSION_KEY;
    this.clock = options.clock ?? systemClock;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.runOnce().catch((error) => {
        log.error({ error }, "Heartbeat run failed");
      });
    }, this.intervalMs);
    log.info({ intervalMs: this.intervalMs, file: this.file }, "Heartbeat started");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Run the checklist once. A call made while a run is in progress joins it.
   */
  runOnce(): Promise<HeartbeatRunSummary> {
    if (!this.current) {
      this.current = this.process().finally(() => {
        this.current = null;
      });
    }
    return this.current;
  }

  private async process(): Promise<HeartbeatRunSummary> {
    const items = parseChecklist(await this.workspace.read(this.file));
    const summary: HeartbeatRunSummary = {
      total: items.length,
      attempted: 0,
      succeeded: 0,
      failed: 0,
    };

    const startedAt = this.clock.now();
    const outcomes: Array<Promise<boolean>> = [];
    for (const item of items) {
      if (item.done) {
        continue;
      }
      summary.attempted++;
      const started = await this.startItem(item, `heartbeat-${startedAt}-${item.line}`);
      outcomes.push(started.settled);
    }

    for (const ok of await Promise.all(outcomes)) {
      if (ok) {
        summary.succeeded++;
      } else {
        summary.failed++;
      }
    }

    if (summary.attempted > 0) {
      log.info(summary, "Heartbeat run finished");
    } else {
      log.debug({ total: summary.total }, "Heartbeat: nothing to do");
    }
    return summary;
  }

  /**
   * Dispatch one item. A direct call is settled before this returns; a
   * spawned task settles when it reaches a terminal status.
   */
  private async startItem(item: ChecklistItem, id: string): Promise<{ settled: Promise<boolean> }> {
    let request: ToolCallRequest;
    let result: ToolResult;
    try {
      request = resolveItem(item, id);
      result = await this.dispatcher.dispatch(request, { sessionKey: this.sessionKey });
    } catch (error) {
      const ok = await this.fail(item, formatErrorDetail(toErrorDetail(error)), error);
      return { settled: Promise.resolve(ok) };
    }

    if (result.error) {
      const ok = await this.fail(item, result.output, result.error);
      return { settled: Promise.resolve(ok) };
    }
    const taskId = request.name === "spawn" ? spawnedTaskId(result.output) : undefined;
    if (taskId !== undefined) {
      return { settled: this.settleTask(item, taskId) };
    }
    const ok = await this.complete(item, result.output);
    return { settled: Promise.resolve(ok) };
  }

  private async settleTask(item: ChecklistItem, taskId: string): Promise<boolean> {
    try {
      const task = await this.subagents.waitFor(taskId);
      if (task.status !== "completed") {
        return this.fail(item, `Sub-agent ${task.status}: ${task.error ?? ""}`, task.error);
      }
      return this.complete(item, task.result ?? "");
    } catch (error) {
      return this.fail(item, formatErrorDetail(toErrorDetail(error)), error);
    }
  }

  private async complete(item: ChecklistItem, output: string): Promise<boolean> {
    await this.workspace.readModifyWrite(this.file, (content) => markItemDone(content, item));
    await this.record(`Heartbeat: ${item.text} -> ${output.slice(0, 200)}`);
    return true;
  }

  private async fail(item: ChecklistItem, output: string, error: unknown): Promise<boolean> {
    log.warn({ item: item.text, error }, "Heartbeat item failed");
    await this.record(`Heartbeat: ${item.text} -> ${output}`);
    return false;
  }

  private async record(entry: string): Promise<void> {
    if (!this.memory) {
      return;
    }
    try {
      await this.memory.appendHistory(entry);
    } catch (error) {
      log.error({ error }, "Failed to record heartbeat history");
    }
  }
}
