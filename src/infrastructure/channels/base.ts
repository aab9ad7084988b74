/**
 * Base channel for chat surfaces.
 */

import type { OutboundMessage } from "../../core/types/message.js";
import type { IChannel } from "../../core/interfaces/channel.js";
import type { IMessageBus } from "../../core/interfaces/message-bus.js";
import { createInboundMessage } from "../queue/events.js";

export interface ChannelOptions {
  /** Sender ids allowed to talk to the agent; empty allows everyone */
  allowFrom?: string[];
}

/**
 * Abstract base class for chat channel implementations.
 *
 * A channel feeds what its users say to the bus and delivers the
 * outbound messages addressed to its name.
 */
export abstract class BaseChannel implements IChannel {
  abstract readonly name: string;

  protected bus: IMessageBus;
  protected allowFrom: string[];
  protected _running = false;

  constructor(bus: IMessageBus, options?: ChannelOptions) {
    this.bus = bus;
    this.allowFrom = options?.allowFrom ?? [];
  }

  abstract start(): Promise<void>;

  abstract stop(): Promise<void>;

  abstract send(msg: OutboundMessage): Promise<void>;

  /**
   * Check if a sender is allowed to use this agent. Composite ids
   * ("id|username") match on any part.
   */
  isAllowed(senderId: string): boolean {
    if (this.allowFrom.length === 0) {
      return true;
    }
    if (this.allowFrom.includes(senderId)) {
      return true;
    }
    return senderId
      .split("|")
      .some((part) => part !== "" && this.allowFrom.includes(part));
  }

  /**
   * Publish an incoming message, dropping senders not on the allow list.
   */
  protected async handleMessage(
    senderId: string,
    chatId: string,
    content: string,
    metadata?: Record<string, unknown>,
  ): Promise<boolean> {
    if (!this.isAllowed(senderId)) {
      return false;
    }

    await this.bus.publishInbound(
      createInboundMessage({
        channel: this.name,
        senderId,
        chatId,
        content,
        metadata: metadata || {},
      }),
    );
    return true;
  }

  get isRunning(): boolean {
    return this._running;
  }
}
