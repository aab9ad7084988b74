/**
 * Context builder for assembling agent prompts.
 */

import type { CoreMessage } from "ai";
import type { IMemoryStore, IWorkspaceState } from "../core/interfaces/storage.js";
import type { SessionMessage } from "../core/types/session.js";
import type { TaskOrigin } from "../core/types/subagent.js";
import { MEMORY_FILE, HISTORY_FILE } from "../infrastructure/storage/memory-store.js";
import type { SkillsLoader } from "./skills-loader.js";
import { systemClock, type Clock } from "../utils/clock.js";

export const BOOTSTRAP_FILES = ["AGENTS.md", "SOUL.md", "USER.md", "TOOLS.md", "IDENTITY.md"];

/**
 * Builds the context (system prompt + messages) for the agent.
 */
export class ContextBuilder {
  private workspace: IWorkspaceState;
  private memory: IMemoryStore;
  private skills: SkillsLoader;
  private clock: Clock;

  constructor(options: {
    workspace: IWorkspaceState;
    memory: IMemoryStore;
    skills: SkillsLoader;
    clock?: Clock;
  }) {
    this.workspace = options.workspace;
    this.memory = options.memory;
    this.skills = options.skills;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Build the system prompt from bootstrap files, memory, and skills.
   */
  async buildSystemPrompt(): Promise<string> {
    const parts: string[] = [this.getIdentity()];

    const bootstrap = await this.loadBootstrapFiles();
    if (bootstrap) {
      parts.push(bootstrap);
    }

    const memory = await this.memory.getMemoryContext();
    if (memory) {
      parts.push(`# Memory\n\n${memory}`);
    }

    // Always-on skills go in whole; the rest only as a summary
    const alwaysContent = await this.skills.loadSkillsForContext(
      await this.skills.getAlwaysSkills(),
    );
    if (alwaysContent) {
      parts.push(`# Active Skills\n\n${alwaysContent}`);
    }

    const skillsSummary = await this.skills.buildSkillsSummary();
    if (skillsSummary) {
      parts.push(`# Skills

The following skills extend your capabilities. To use a skill, read its SKILL.md file using the read_file tool.
Skills with available="false" need their requirements installed first.

${skillsSummary}`);
    }

    return parts.join("\n\n---\n\n");
  }

  /**
   * Get the core identity section.
   */
  private getIdentity(): string {
    const now = new Date(this.clock.now());
    const dateStr = now.toLocaleDateString("en-US", {
      weekday: "long",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
    });
    const timeStr = now.toLocaleTimeString("en-US", {
      hour: "2-digit",
      minute: "2-digit",
    });
    const root = this.workspace.root;

    return `# tendril

You are tendril, a helpful AI assistant. You have access to tools that allow you to:
- Read, write, and edit files
- Execute shell commands
- Search the web and fetch web pages
- Send messages to users on chat channels
- Schedule reminders and recurring jobs (cron tool)
- Spawn subagents for long-running background tasks

## Current Time
${dateStr} ${timeStr}

## Workspace
Your workspace is at: ${root}
- Long-term memory: ${root}/${MEMORY_FILE}
- Event history (append-only): ${root}/${HISTORY_FILE}
- Heartbeat checklist: ${root}/HEARTBEAT.md
- Custom skills: ${root}/skills/{skill-name}/SKILL.md

Reply to direct questions with plain text. Only use the 'message' tool to reach a specific chat channel.

Be helpful, accurate and concise. When remembering something, update ${root}/${MEMORY_FILE}`;
  }

  /**
   * Load all bootstrap files from workspace.
   */
  private async loadBootstrapFiles(): Promise<string> {
    const parts: string[] = [];

    for (const filename of BOOTSTRAP_FILES) {
      const content = await this.workspace.read(filename);
      if (content.trim()) {
        parts.push(`## ${filename}\n\n${content}`);
      }
    }

    return parts.join("\n\n");
  }

  /**
   * Build the complete message list for an LLM call. The session names
   * the default target of message, cron and spawn calls.
   */
  async buildMessages(
    history: SessionMessage[],
    currentMessage: string,
    session?: TaskOrigin,
  ): Promise<CoreMessage[]> {
    let systemPrompt = await this.buildSystemPrompt();
    if (session) {
      systemPrompt += `\n\n## Current Session\nChannel: ${session.channel}\nChat ID: ${session.chatId}`;
    }
    const messages: CoreMessage[] = [{ role: "system", content: systemPrompt }];

    for (const msg of history) {
      messages.push({ role: msg.role, content: msg.content });
    }

    messages.push({ role: "user", content: currentMessage });
    return messages;
  }
}
