import { mkdtempSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { Tool } from "../tools/base.js";
import { ToolRegistry } from "../tools/registry.js";
import type { CoreMessage } from "ai";
import type { ToolContext, ToolCallRequest } from "../core/types/tool.js";
import type { SubagentTask } from "../core/types/subagent.js";
import type { ILLMProvider, LLMResponse } from "../core/interfaces/llm-provider.js";
import { ExecutionError } from "../core/errors.js";
import { WorkspaceState } from "../infrastructure/storage/workspace-state.js";
import { MemoryStore, HISTORY_FILE } from "../infrastructure/storage/memory-store.js";
import { MessageBus } from "../infrastructure/queue/message-bus.js";
import { SpawnTool } from "../tools/spawn.js";
import { ManualClock } from "../utils/clock.js";
import { ToolDispatcher } from "./dispatcher.js";
import { SubagentManager } from "./subagent.js";
import { HeartbeatRunner, markItemDone, parseChecklist, resolveItem } from "./heartbeat.js";

type SpawnParams = { task: string; label?: string };

class FakeSpawnTool extends Tool {
  readonly name = "spawn";
  readonly description = "Record spawned tasks";
  readonly parameters = z.object({ task: z.string(), label: z.string().optional() });
  calls: Array<{ task: string; sessionKey: string }> = [];

  async execute(params: SpawnParams, context: ToolContext): Promise<string> {
    this.calls.push({ task: params.task, sessionKey: context.sessionKey });
    return `Subagent started (id: t${this.calls.length}, status: running).`;
  }
}

/** Settles spawned tasks at once; ids in `failing` end as failed */
class FakeSubagents {
  failing: Set<string> = new Set();

  async waitFor(taskId: string): Promise<SubagentTask> {
    const failed = this.failing.has(taskId);
    return {
      id: taskId,
      task: "water plants",
      status: failed ? "failed" : "completed",
      result: failed ? undefined : `finished ${taskId}`,
      error: failed ? "model down" : undefined,
      origin: { channel: "cli", chatId: "direct" },
      createdAtMs: 0,
    };
  }
}

class ScriptedProvider implements ILLMProvider {
  constructor(private respond: () => Promise<LLMResponse>) {}

  chat(_messages: CoreMessage[]): Promise<LLMResponse> {
    return this.respond();
  }

  getDefaultModel(): string {
    return "test-model";
  }
}

function reply(content: string, toolCalls: ToolCallRequest[] = []): LLMResponse {
  return { content, toolCalls, finishReason: "stop", usage: { promptTokens: 0, completionTokens: 0 } };
}

class NoteTool extends Tool {
  readonly name = "note";
  readonly description = "Record a note";
  readonly parameters = z.object({ text: z.string().default("(empty)") });
  notes: string[] = [];

  async execute(params: { text: string }): Promise<string> {
    this.notes.push(params.text);
    return `noted ${params.text}`;
  }
}

class FailTool extends Tool {
  readonly name = "fail";
  readonly description = "Always fails";
  readonly parameters = z.object({});
  calls = 0;

  async execute(): Promise<string> {
    this.calls++;
    throw new ExecutionError("boom");
  }
}

describe("parseChecklist", () => {
  it("reads task lines in file order and skips everything else", () => {
    const content = [
      "# Heartbeat",
      "",
      "- [ ] water plants",
      "* [x] done thing",
      "  - [X] nested done",
      "- [ ]    ",
      "plain line",
      '- [ ] !note {"text":"hi"}',
    ].join("\n");

    expect(parseChecklist(content)).toEqual([
      { line: 2, text: "water plants", done: false },
      { line: 3, text: "done thing", done: true },
      { line: 4, text: "nested done", done: true },
      { line: 7, text: '!note {"text":"hi"}', done: false },
    ]);
  });

  it("handles CRLF line endings", () => {
    expect(parseChecklist("- [ ] first\r\n- [x] second\r\n")).toEqual([
      { line: 0, text: "first", done: false },
      { line: 1, text: "second", done: true },
    ]);
  });
});

describe("markItemDone", () => {
  const item = { line: 1, text: "water plants", done: false };

  it("checks off the item at its line", () => {
    expect(markItemDone("# H\n- [ ] water plants\n- [ ] feed cat", item)).toBe(
      "# H\n- [x] water plants\n- [ ] feed cat",
    );
  });

  it("finds the item by text when lines moved", () => {
    expect(markItemDone("# H\n\n- [ ] feed cat\n- [ ] water plants", item)).toBe(
      "# H\n\n- [ ] feed cat\n- [x] water plants",
    );
  });

  it("leaves content alone when the item is gone or already checked", () => {
    expect(markItemDone("# H\n- [x] water plants", item)).toBe("# H\n- [x] water plants");
    expect(markItemDone("# H\n", item)).toBe("# H\n");
  });
});

describe("resolveItem", () => {
  it("hands free text to a sub-agent", () => {
    expect(resolveItem({ line: 0, text: "summarize the inbox", done: false }, "c1")).toEqual({
      id: "c1",
      name: "spawn",
      arguments: { task: "summarize the inbox" },
    });
  });

  it("calls a tool directly with JSON arguments", () => {
    expect(resolveItem({ line: 0, text: '!note {"text":"hi"}', done: false }, "c2")).toEqual({
      id: "c2",
      name: "note",
      arguments: { text: "hi" },
    });
    expect(resolveItem({ line: 0, text: "!note", done: false }, "c3")).toEqual({
      id: "c3",
      name: "note",
      arguments: {},
    });
  });

  it("rejects malformed arguments", () => {
    expect(() => resolveItem({ line: 0, text: "!note {oops", done: false }, "c4")).toThrow(
      expect.objectContaining({
        kind: "ValidationError",
        field: "arguments",
        message: "Arguments for 'note' are not valid JSON",
      }),
    );
    expect(() => resolveItem({ line: 0, text: "!note [1, 2]", done: false }, "c5")).toThrow(
      "Arguments for 'note' must be a JSON object",
    );
  });
});

describe("HeartbeatRunner", () => {
  let workspace: WorkspaceState;
  let memory: MemoryStore;
  let spawn: FakeSpawnTool;
  let subagents: FakeSubagents;
  let note: NoteTool;
  let fail: FailTool;
  let runner: HeartbeatRunner;

  function createRunner(intervalMs?: number): HeartbeatRunner {
    const registry = new ToolRegistry();
    registry.register(spawn);
    registry.register(note);
    registry.register(fail);
    return new HeartbeatRunner({
      workspace,
      dispatcher: new ToolDispatcher(registry),
      subagents,
      memory,
      intervalMs,
      clock: new ManualClock(new Date(2026, 2, 1, 9, 5)),
    });
  }

  beforeEach(() => {
    workspace = new WorkspaceState(mkdtempSync(join(tmpdir(), "heartbeat-")));
    memory = new MemoryStore(workspace, new ManualClock(new Date(2026, 2, 1, 9, 5)));
    spawn = new FakeSpawnTool();
    subagents = new FakeSubagents();
    note = new NoteTool();
    fail = new FailTool();
    runner = createRunner();
  });

  it("does nothing without a checklist", async () => {
    expect(await runner.runOnce()).toEqual({ total: 0, attempted: 0, succeeded: 0, failed: 0 });
  });

  it("runs unchecked items once and checks them off", async () => {
    await workspace.write(
      "HEARTBEAT.md",
      '# Heartbeat\n- [ ] water plants\n- [x] old chore\n- [ ] !note {"text":"hi"}\n',
    );

    expect(await runner.runOnce()).toEqual({ total: 3, attempted: 2, succeeded: 2, failed: 0 });
    expect(spawn.calls).toEqual([{ task: "water plants", sessionKey: "cli:direct" }]);
    expect(note.notes).toEqual(["hi"]);
    expect(await workspace.read("HEARTBEAT.md")).toBe(
      '# Heartbeat\n- [x] water plants\n- [x] old chore\n- [x] !note {"text":"hi"}\n',
    );

    expect(await runner.runOnce()).toEqual({ total: 3, attempted: 0, succeeded: 0, failed: 0 });
    expect(spawn.calls).toHaveLength(1);
    expect(note.notes).toHaveLength(1);
  });

  it("records each outcome in the history log", async () => {
    await workspace.write("HEARTBEAT.md", "- [ ] !note\n- [ ] !fail\n");

    await runner.runOnce();

    expect(await workspace.read(HISTORY_FILE)).toBe(
      "[2026-03-01 09:05] Heartbeat: !note -> noted (empty)\n\n" +
        "[2026-03-01 09:05] Heartbeat: !fail -> Error [ExecutionError]: boom\n\n",
    );
  });

  it("leaves failed items unchecked so the next run retries them", async () => {
    await workspace.write("HEARTBEAT.md", "- [ ] !fail\n");

    expect(await runner.runOnce()).toEqual({ total: 1, attempted: 1, succeeded: 0, failed: 1 });
    expect(await workspace.read("HEARTBEAT.md")).toBe("- [ ] !fail\n");

    await runner.runOnce();
    expect(fail.calls).toBe(2);
  });

  it("checks off a sub-agent item only once its task completes", async () => {
    await workspace.write("HEARTBEAT.md", "- [ ] water plants\n");
    subagents.failing.add("t1");

    expect(await runner.runOnce()).toEqual({ total: 1, attempted: 1, succeeded: 0, failed: 1 });
    expect(await workspace.read("HEARTBEAT.md")).toBe("- [ ] water plants\n");

    expect(await runner.runOnce()).toEqual({ total: 1, attempted: 1, succeeded: 1, failed: 0 });
    expect(spawn.calls).toHaveLength(2);
    expect(await workspace.read("HEARTBEAT.md")).toBe("- [x] water plants\n");
    expect(await workspace.read(HISTORY_FILE)).toBe(
      "[2026-03-01 09:05] Heartbeat: water plants -> Sub-agent failed: model down\n\n" +
        "[2026-03-01 09:05] Heartbeat: water plants -> finished t2\n\n",
    );
  });

  describe("with a real sub-agent manager", () => {
    function wired(provider: ILLMProvider): HeartbeatRunner {
      const manager = new SubagentManager({
        provider,
        bus: new MessageBus(),
        createTools: () => new ToolRegistry(),
        workspacePath: workspace.root,
      });
      const registry = new ToolRegistry();
      registry.register(new SpawnTool(manager));
      return new HeartbeatRunner({
        workspace,
        dispatcher: new ToolDispatcher(registry),
        subagents: manager,
      });
    }

    it("leaves the item unchecked when the sub-agent fails", async () => {
      await workspace.write("HEARTBEAT.md", "- [ ] water plants\n");
      const heartbeat = wired(
        new ScriptedProvider(async () => {
          throw new Error("model down");
        }),
      );

      expect(await heartbeat.runOnce()).toEqual({ total: 1, attempted: 1, succeeded: 0, failed: 1 });
      expect(await workspace.read("HEARTBEAT.md")).toBe("- [ ] water plants\n");
    });

    it("checks the item off when the sub-agent completes", async () => {
      await workspace.write("HEARTBEAT.md", "- [ ] water plants\n");
      const heartbeat = wired(new ScriptedProvider(async () => reply("Watered.")));

      expect(await heartbeat.runOnce()).toEqual({ total: 1, attempted: 1, succeeded: 1, failed: 0 });
      expect(await workspace.read("HEARTBEAT.md")).toBe("- [x] water plants\n");
    });
  });

  it("counts unknown tools and bad arguments as failures", async () => {
    await workspace.write("HEARTBEAT.md", "- [ ] !missing\n- [ ] !note {oops\n");

    expect(await runner.runOnce()).toEqual({ total: 2, attempted: 2, succeeded: 0, failed: 2 });
    expect(await workspace.read(HISTORY_FILE)).toBe(
      "[2026-03-01 09:05] Heartbeat: !missing -> Error [ValidationError] (name): Unknown tool 'missing'\n\n" +
        "[2026-03-01 09:05] Heartbeat: !note {oops -> Error [ValidationError] (arguments): Arguments for 'note' are not valid JSON\n\n",
    );
  });

  it("joins a run already in progress", async () => {
    await workspace.write("HEARTBEAT.md", "- [ ] water plants\n");

    const first = runner.runOnce();
    const second = runner.runOnce();

    expect(second).toBe(first);
    await first;
    expect(spawn.calls).toHaveLength(1);
  });

  it("keeps user edits made around the checked item", async () => {
    await workspace.write("HEARTBEAT.md", "- [ ] water plants\n");
    const item = parseChecklist(await workspace.read("HEARTBEAT.md"))[0];
    await workspace.write("HEARTBEAT.md", "# Added later\n- [ ] feed cat\n- [ ] water plants\n");

    await workspace.readModifyWrite("HEARTBEAT.md", (content) => markItemDone(content, item));

    expect(await workspace.read("HEARTBEAT.md")).toBe(
      "# Added later\n- [ ] feed cat\n- [x] water plants\n",
    );
  });

  it("runs on its interval until stopped", async () => {
    await workspace.write("HEARTBEAT.md", "- [ ] water plants\n");
    const periodic = createRunner(20);

    periodic.start();
    expect(periodic.isRunning).toBe(true);
    await vi.waitFor(async () => {
      expect(await workspace.read("HEARTBEAT.md")).toBe("- [x] water plants\n");
    });
    periodic.stop();

    expect(periodic.isRunning).toBe(false);
    expect(spawn.calls).toHaveLength(1);
  });
});
