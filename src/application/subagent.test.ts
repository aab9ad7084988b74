import { mkdtempSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { z } from "zod";
import type { CoreMessage } from "ai";
import type { ChatOptions, ILLMProvider, LLMResponse } from "../core/interfaces/llm-provider.js";
import type { ToolCallRequest } from "../core/types/tool.js";
import { Tool } from "../tools/base.js";
import { ToolRegistry } from "../tools/registry.js";
import { MessageBus } from "../infrastructure/queue/message-bus.js";
import { WorkspaceState } from "../infrastructure/storage/workspace-state.js";
import { MemoryStore } from "../infrastructure/storage/memory-store.js";
import { ManualClock } from "../utils/clock.js";
import { SubagentManager, type SubagentManagerOptions } from "./subagent.js";

type Respond = (messages: CoreMessage[], options: ChatOptions) => Promise<LLMResponse>;

function reply(content: string | null, toolCalls: ToolCallRequest[] = []): LLMResponse {
  return {
    content,
    toolCalls,
    finishReason: toolCalls.length > 0 ? "tool-calls" : "stop",
    usage: { promptTokens: 0, completionTokens: 0 },
  };
}

/** Settles only when the request is aborted */
function untilAborted(options: ChatOptions): Promise<LLMResponse> {
  return new Promise((_, reject) => {
    options.signal?.addEventListener("abort", () => reject(options.signal?.reason), { once: true });
  });
}

class FakeProvider implements ILLMProvider {
  calls: CoreMessage[][] = [];

  constructor(private respond: Respond) {}

  async chat(
    messages: CoreMessage[],
    _tools?: unknown,
    _model?: string,
    options?: ChatOptions,
  ): Promise<LLMResponse> {
    this.calls.push([...messages]);
    return this.respond(messages, options ?? {});
  }

  getDefaultModel(): string {
    return "test-model";
  }
}

class EchoTool extends Tool {
  readonly name = "echo";
  readonly description = "Repeat text";
  readonly parameters = z.object({ text: z.string() });

  async execute(params: { text: string }): Promise<string> {
    return params.text;
  }
}

/** A promise resolved from outside, one per provider call */
function gate() {
  let release: (value: LLMResponse) => void = () => {};
  const promise = new Promise<LLMResponse>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

describe("SubagentManager", () => {
  let bus: MessageBus;
  let memory: MemoryStore;
  let createTools: Mock<() => ToolRegistry>;

  function manager(provider: ILLMProvider, options: Partial<SubagentManagerOptions> = {}) {
    return new SubagentManager({
      provider,
      bus,
      memory,
      createTools,
      workspacePath: "/tmp/workspace",
      ...options,
    });
  }

  beforeEach(() => {
    bus = new MessageBus();
    const workspace = new WorkspaceState(mkdtempSync(join(tmpdir(), "subagent-")));
    memory = new MemoryStore(workspace, new ManualClock(new Date(2026, 2, 1, 9, 5)));
    createTools = vi.fn(() => {
      const registry = new ToolRegistry();
      registry.register(new EchoTool());
      return registry;
    });
  });

  it("runs a task in the background and announces the result to its origin", async () => {
    const subagents = manager(new FakeProvider(async () => reply("There are 42 files.")));

    const id = subagents.spawn({
      task: "count the files",
      label: "count files",
      origin: { channel: "telegram", chatId: "chat-7" },
    });
    expect(subagents.getTask(id)?.status).toBe("running");

    const done = await subagents.waitFor(id);
    expect(done).toMatchObject({ status: "completed", result: "There are 42 files." });

    const announcement = await bus.consumeInboundWithTimeout(1000);
    expect(announcement).toMatchObject({
      channel: "system",
      senderId: "subagent",
      chatId: "telegram:chat-7",
      metadata: { taskId: id, status: "completed" },
    });
    expect(announcement?.content.split("\n\n").slice(0, 3)).toEqual([
      "[Subagent 'count files' completed successfully]",
      "Task: count the files",
      "Result:\nThere are 42 files.",
    ]);
    expect(await memory.readHistory()).toBe(
      `[2026-03-01 09:05] Sub-agent ${id} 'count files' completed: There are 42 files.\n\n`,
    );
  });

  it("gives each task its own tools and feeds tool results back", async () => {
    const provider = new FakeProvider(async (messages) =>
      messages.some((m) => m.role === "tool")
        ? reply("echoed")
        : reply(null, [{ id: "call-1", name: "echo", arguments: { text: "hello" } }]),
    );
    const subagents = manager(provider);

    const first = subagents.spawn({ task: "say hello" });
    const second = subagents.spawn({ task: "say hello again" });
    await subagents.waitFor(first);
    await subagents.waitFor(second);

    expect(createTools).toHaveBeenCalledTimes(2);
    expect(subagents.getTask(first)?.result).toBe("echoed");
    const lastCall = provider.calls[provider.calls.length - 1];
    expect(lastCall[lastCall.length - 1]).toEqual({
      role: "tool",
      content: [
        {
          type: "tool-result",
          toolCallId: "call-1",
          toolName: "echo",
          result: "hello",
          isError: false,
        },
      ],
    });
  });

  it("runs the task in a prompt of its own", async () => {
    const provider = new FakeProvider(async () => reply("ok"));
    const subagents = manager(provider);

    await subagents.waitFor(subagents.spawn({ task: "tidy notes" }));

    const [system, user] = provider.calls[0];
    expect(system.role).toBe("system");
    expect(system.content).toContain("## Your Task\ntidy notes");
    expect(system.content).toContain("## Workspace\n/tmp/workspace");
    expect(user).toEqual({ role: "user", content: "tidy notes" });
  });

  it("queues tasks beyond the concurrency limit in order", async () => {
    const gates = [gate(), gate()];
    let call = 0;
    const subagents = manager(
      new FakeProvider(() => gates[call++].promise),
      { maxConcurrent: 1 },
    );

    const a = subagents.spawn({ task: "first" });
    const b = subagents.spawn({ task: "second" });
    expect(subagents.getTask(a)?.status).toBe("running");
    expect(subagents.getTask(b)?.status).toBe("pending");
    expect(subagents.getRunningCount()).toBe(1);

    gates[0].release(reply("one"));
    await subagents.waitFor(a);
    expect(subagents.getTask(b)?.status).toBe("running");

    gates[1].release(reply("two"));
    expect(await subagents.waitFor(b)).toMatchObject({ status: "completed", result: "two" });
    expect(subagents.getRunningCount()).toBe(0);
  });

  it("refuses new tasks when every slot is busy under the reject policy", () => {
    const subagents = manager(new FakeProvider((_, options) => untilAborted(options)), {
      maxConcurrent: 1,
      overflow: "reject",
    });

    const running = subagents.spawn({ task: "first" });

    expect(() => subagents.spawn({ task: "second" })).toThrow(
      expect.objectContaining({
        kind: "ResourceExhausted",
        message: "All 1 sub-agent slots are busy",
      }),
    );
    expect(subagents.listTasks().map((t) => t.id)).toEqual([running]);
    subagents.cancel(running);
  });

  it("rejects an empty task", () => {
    const subagents = manager(new FakeProvider(async () => reply("ok")));

    expect(() => subagents.spawn({ task: "   " })).toThrow(
      expect.objectContaining({ kind: "ValidationError", field: "task" }),
    );
  });

  it("cancels a pending task without running it", async () => {
    const provider = new FakeProvider((_, options) => untilAborted(options));
    const subagents = manager(provider, { maxConcurrent: 1 });
    const a = subagents.spawn({ task: "first" });
    const b = subagents.spawn({ task: "second", label: "queued" });

    const cancelled = subagents.cancel(b);

    expect(cancelled).toMatchObject({ status: "cancelled", error: "Cancelled before start" });
    expect(provider.calls).toHaveLength(1);
    const announcement = await bus.consumeInboundWithTimeout(1000);
    expect(announcement?.content.startsWith("[Subagent 'queued' was cancelled]")).toBe(true);
    subagents.cancel(a);
  });

  it("stops a running task at its in-flight call", async () => {
    const subagents = manager(new FakeProvider((_, options) => untilAborted(options)));
    const id = subagents.spawn({ task: "long job" });

    expect(subagents.cancel(id).status).toBe("running");

    expect(await subagents.waitFor(id)).toMatchObject({ status: "cancelled", error: "Cancelled" });
    expect(() => subagents.cancel(id)).toThrow(
      expect.objectContaining({
        kind: "ValidationError",
        message: `Sub-agent task ${id} is already cancelled`,
      }),
    );
  });

  it("fails a task that runs past its time limit", async () => {
    const subagents = manager(new FakeProvider((_, options) => untilAborted(options)), {
      timeoutMs: 20,
    });

    const id = subagents.spawn({ task: "slow job" });

    expect(await subagents.waitFor(id)).toMatchObject({
      status: "failed",
      error: "Timed out after 0.02 seconds",
    });
  });

  it("fails a task whose model call throws", async () => {
    const subagents = manager(
      new FakeProvider(async () => {
        throw new Error("rate limited");
      }),
    );

    const id = subagents.spawn({ task: "anything" });

    expect(await subagents.waitFor(id)).toMatchObject({ status: "failed", error: "rate limited" });
    const announcement = await bus.consumeInboundWithTimeout(1000);
    expect(announcement?.content.startsWith("[Subagent 'anything' failed]")).toBe(true);
  });

  it("completes with a placeholder when the iteration limit is hit", async () => {
    const subagents = manager(
      new FakeProvider(async () =>
        reply(null, [{ id: "loop", name: "echo", arguments: { text: "again" } }]),
      ),
      { maxIterations: 2 },
    );

    const id = subagents.spawn({ task: "never ends" });

    expect(await subagents.waitFor(id)).toMatchObject({
      status: "completed",
      result: "Task completed but no final response was generated.",
    });
  });

  it("releases a finished result exactly once", async () => {
    const release = gate();
    const subagents = manager(new FakeProvider(() => release.promise));
    const id = subagents.spawn({ task: "report" });

    expect(subagents.consumeResult(id)).toBeUndefined();

    release.release(reply("all good"));
    await subagents.waitFor(id);
    expect(subagents.consumeResult(id)).toMatchObject({ status: "completed", result: "all good" });
    expect(() => subagents.consumeResult(id)).toThrow(
      expect.objectContaining({ kind: "TaskNotFound" }),
    );
  });

  it("labels unlabelled tasks with the start of the task text", async () => {
    const subagents = manager(new FakeProvider(async () => reply("ok")));

    await subagents.waitFor(
      subagents.spawn({ task: "summarize every document in the archive folder" }),
    );

    const announcement = await bus.consumeInboundWithTimeout(1000);
    expect(announcement?.content.split("\n")[0]).toBe(
      "[Subagent 'summarize every document in th...' completed successfully]",
    );
  });

  it("reports unknown task ids", () => {
    const subagents = manager(new FakeProvider(async () => reply("ok")));

    expect(() => subagents.cancel("nope")).toThrow(
      expect.objectContaining({ kind: "TaskNotFound", message: "Sub-agent task not found: nope" }),
    );
  });
});

describe("SubagentManager history", () => {
  it("keeps running when the history log cannot be written", async () => {
    const bus = new MessageBus();
    const memory = {
      readLongTerm: async () => "",
      writeLongTerm: async () => {},
      updateLongTerm: async () => "",
      appendHistory: async () => {
        throw new Error("disk full");
      },
      readHistory: async () => "",
      getMemoryContext: async () => "",
    };
    const subagents = new SubagentManager({
      provider: new FakeProvider(async () => reply("ok")),
      bus,
      memory,
      createTools: () => new ToolRegistry(),
      workspacePath: "/tmp/workspace",
    });

    await subagents.waitFor(subagents.spawn({ task: "job" }));

    expect(await bus.consumeInboundWithTimeout(1000)).toMatchObject({ channel: "system" });
  });
});
