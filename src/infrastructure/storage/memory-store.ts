/**
 * Memory storage implementation.
 */

import type { IMemoryStore, IWorkspaceState } from "../../core/interfaces/storage.js";
import { formatMinute } from "../../utils/paths.js";
import { systemClock, type Clock } from "../../utils/clock.js";

export const MEMORY_FILE = "memory/MEMORY.md";
export const HISTORY_FILE = "memory/HISTORY.md";

/**
 * Memory store for the agent.
 *
 * Long-term facts live in memory/MEMORY.md and are rewritten in place.
 * memory/HISTORY.md is an append-only log of what happened, one
 * "[YYYY-MM-DD HH:MM] ..." entry per event.
 */
export class MemoryStore implements IMemoryStore {
  private workspace: IWorkspaceState;
  private clock: Clock;

  constructor(workspace: IWorkspaceState, clock: Clock = systemClock) {
    this.workspace = workspace;
    this.clock = clock;
  }

  async readLongTerm(): Promise<string> {
    return this.workspace.read(MEMORY_FILE);
  }

  async writeLongTerm(content: string): Promise<void> {
    await this.workspace.write(MEMORY_FILE, content);
  }

  async updateLongTerm(fn: (current: string) => string): Promise<string> {
    return this.workspace.readModifyWrite(MEMORY_FILE, fn);
  }

  async appendHistory(entry: string): Promise<void> {
    const line = `[${formatMinute(this.clock.now())}] ${entry.trim()}\n\n`;
    await this.workspace.append(HISTORY_FILE, line);
  }

  async readHistory(): Promise<string> {
    return this.workspace.read(HISTORY_FILE);
  }

  async getMemoryContext(): Promise<string> {
    const longTerm = (await this.readLongTerm()).trim();
    return longTerm ? `## Long-term Memory\n${longTerm}` : "";
  }
}
