/**
 * Agent loop: the main session's message processor.
 */

import type { ILLMProvider } from "../core/interfaces/llm-provider.js";
import type { IMessageBus } from "../core/interfaces/message-bus.js";
import type { IMemoryStore } from "../core/interfaces/storage.js";
import type { InboundMessage, OutboundMessage } from "../core/types/message.js";
import type { Session } from "../core/types/session.js";
import { TaskNotFoundError } from "../core/errors.js";
import {
  DEFAULT_SESSION_KEY,
  createOutboundMessage,
  formatSessionKey,
  getSessionKey,
  parseSessionKey,
} from "../infrastructure/queue/events.js";
import type { ContextBuilder } from "./context-builder.js";
import type { ToolDispatcher } from "./dispatcher.js";
import type { SubagentManager } from "./subagent.js";
import { runToolLoop } from "./agent-runner.js";
import { systemClock, type Clock } from "../utils/clock.js";
import logger from "../utils/logger.js";

const log = logger.child({ component: "agent" });

const NO_RESPONSE = "I've completed processing but have no response to give.";

export interface AgentLoopOptions {
  bus: IMessageBus;
  provider: ILLMProvider;
  dispatcher: ToolDispatcher;
  context: ContextBuilder;
  memory?: IMemoryStore;
  /** Finished sub-agent results are released through it */
  subagents?: Pick<SubagentManager, "consumeResult">;
  model?: string;
  maxIterations?: number;
  maxTokens?: number;
  temperature?: number;
  /** Session messages replayed into each prompt */
  historyLimit?: number;
  clock?: Clock;
}

function clip(text: string, max: number = 200): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}

/**
 * Processes inbound messages one at a time.
 *
 * Each turn builds the prompt, runs the tool loop (tool calls strictly in
 * order, each awaited) and publishes the reply. Sub-agent announcements
 * arrive on the "system" channel and are answered in their origin session.
 */
export class AgentLoop {
  private bus: IMessageBus;
  private provider: ILLMProvider;
  private dispatcher: ToolDispatcher;
  private context: ContextBuilder;
  private memory: IMemoryStore | undefined;
  private subagents: Pick<SubagentManager, "consumeResult"> | undefined;
  private model: string | undefined;
  private maxIterations: number;
  private maxTokens: number | undefined;
  private temperature: number | undefined;
  private historyLimit: number;
  private clock: Clock;
  private sessions: Map<string, Session> = new Map();
  private _running = false;

  constructor(options: AgentLoopOptions) {
    this.bus = options.bus;
    this.provider = options.provider;
    this.dispatcher = options.dispatcher;
    this.context = options.context;
    this.memory = options.memory;
    this.subagents = options.subagents;
    this.model = options.model;
    this.maxIterations = options.maxIterations ?? 20;
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature;
    this.historyLimit = options.historyLimit ?? 50;
    this.clock = options.clock ?? systemClock;
  }

  get isRunning(): boolean {
    return this._running;
  }

  /**
   * Consume inbound messages until stopped.
   */
  async run(): Promise<void> {
    this._running = true;
    log.info("Agent loop started");

    while (this._running) {
      const msg = await this.bus.consumeInboundWithTimeout(1000);
      if (!msg) continue;

      try {
        const response = await this.processMessage(msg);
        if (response) {
          await this.bus.publishOutbound(response);
        }
      } catch (error) {
        log.error({ error, channel: msg.channel, chatId: msg.chatId }, "Error processing message");
        const target = msg.channel === "system" ? parseSessionKey(msg.chatId) : msg;
        await this.bus.publishOutbound(
          createOutboundMessage({
            channel: target.channel,
            chatId: target.chatId,
            content: `Sorry, I encountered an error: ${error instanceof Error ? error.message : String(error)}`,
          }),
        );
      }
    }

    log.info("Agent loop stopped");
  }

  stop(): void {
    this._running = false;
  }

  /**
   * Handle one inbound message and return the reply to publish.
   */
  async processMessage(msg: InboundMessage): Promise<OutboundMessage | null> {
    if (msg.channel === "system") {
      return this.processSystemMessage(msg);
    }

    log.info({ channel: msg.channel, senderId: msg.senderId }, "Processing message");
    const reply = await this.runTurn(getSessionKey(msg), msg.content);
    return createOutboundMessage({ channel: msg.channel, chatId: msg.chatId, content: reply });
  }

  /**
   * Answer a sub-agent announcement in the session that spawned it.
   * `chatId` carries the origin session key.
   */
  private async processSystemMessage(msg: InboundMessage): Promise<OutboundMessage> {
    const origin = parseSessionKey(msg.chatId);
    const taskId = msg.metadata.taskId;

    if (typeof taskId === "string" && this.subagents) {
      try {
        this.subagents.consumeResult(taskId);
      } catch (error) {
        if (!(error instanceof TaskNotFoundError)) {
          throw error;
        }
        log.debug({ taskId }, "Sub-agent result already released");
      }
    }

    log.info({ senderId: msg.senderId, taskId }, "Processing system message");
    const reply = await this.runTurn(
      formatSessionKey(origin.channel, origin.chatId),
      `[System: ${msg.senderId}] ${msg.content}`,
    );
    return createOutboundMessage({ channel: origin.channel, chatId: origin.chatId, content: reply });
  }

  /**
   * Process a message directly (for CLI usage).
   */
  async processDirect(content: string, sessionKey: string = DEFAULT_SESSION_KEY): Promise<string> {
    return this.runTurn(sessionKey, content);
  }

  getSession(key: string): Session | undefined {
    return this.sessions.get(key);
  }

  private getOrCreateSession(key: string): Session {
    let session = this.sessions.get(key);
    if (!session) {
      const now = this.clock.now();
      session = { key, messages: [], createdAtMs: now, updatedAtMs: now };
      this.sessions.set(key, session);
    }
    return session;
  }

  private async runTurn(sessionKey: string, content: string): Promise<string> {
    const session = this.getOrCreateSession(sessionKey);
    const messages = await this.context.buildMessages(
      session.messages.slice(-this.historyLimit),
      content,
      parseSessionKey(sessionKey),
    );

    const result = await runToolLoop({
      provider: this.provider,
      dispatcher: this.dispatcher,
      messages,
      sessionKey,
      maxIterations: this.maxIterations,
      model: this.model,
      chatOptions: { maxTokens: this.maxTokens, temperature: this.temperature },
      logContext: { sessionKey },
    });
    const reply = result.content ?? NO_RESPONSE;

    const now = this.clock.now();
    session.messages.push(
      { role: "user", content, timestamp: now },
      { role: "assistant", content: reply, timestamp: now },
    );
    session.updatedAtMs = now;

    if (this.memory) {
      await this.memory.appendHistory(`[${sessionKey}] ${clip(content)} -> ${clip(reply)}`);
    }
    return reply;
  }
}
