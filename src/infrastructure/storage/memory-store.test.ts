import { mkdtempSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { beforeEach, describe, expect, it } from "vitest";
import { MemoryStore, HISTORY_FILE, MEMORY_FILE } from "./memory-store.js";
import { WorkspaceState } from "./workspace-state.js";
import { ManualClock } from "../../utils/clock.js";

describe("MemoryStore", () => {
  let workspace: WorkspaceState;
  let clock: ManualClock;
  let memory: MemoryStore;

  beforeEach(() => {
    workspace = new WorkspaceState(mkdtempSync(join(tmpdir(), "memory-store-")));
    clock = new ManualClock(new Date(2026, 2, 1, 9, 5));
    memory = new MemoryStore(workspace, clock);
  });

  it("returns empty context when there is no long-term memory", async () => {
    expect(await memory.getMemoryContext()).toBe("");
  });

  it("wraps long-term memory for prompts", async () => {
    await memory.writeLongTerm("  User likes tea.\n");

    expect(await workspace.read(MEMORY_FILE)).toBe("  User likes tea.\n");
    expect(await memory.getMemoryContext()).toBe("## Long-term Memory\nUser likes tea.");
  });

  it("applies concurrent updates to long-term memory in turn", async () => {
    await Promise.all([
      memory.updateLongTerm((current) => `${current}- a\n`),
      memory.updateLongTerm((current) => `${current}- b\n`),
    ]);

    expect(await memory.readLongTerm()).toBe("- a\n- b\n");
  });

  it("appends timestamped history entries", async () => {
    await memory.appendHistory("first event\n");
    clock.advance(60_000);
    await memory.appendHistory("second event");

    expect(await workspace.read(HISTORY_FILE)).toBe(
      "[2026-03-01 09:05] first event\n\n[2026-03-01 09:06] second event\n\n",
    );
    expect(await memory.readHistory()).toBe(await workspace.read(HISTORY_FILE));
  });
});
