/**
 * Async message queue for decoupled channel-agent communication.
 */

import type { InboundMessage, OutboundMessage } from "../../core/types/message.js";
import type { IMessageBus, OutboundCallback } from "../../core/interfaces/message-bus.js";
import logger from "../../utils/logger.js";

const log = logger.child({ component: "bus" });

/**
 * Unbounded FIFO whose consumers wait for the next item.
 */
class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: ((value: T) => void)[] = [];

  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
  }

  pop(): Promise<T> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  popWithTimeout(timeoutMs: number): Promise<T | null> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }

    return new Promise((resolve) => {
      const waiter = (value: T) => {
        clearTimeout(timer);
        resolve(value);
      };

      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        resolve(null);
      }, timeoutMs);

      this.waiters.push(waiter);
    });
  }

  get size(): number {
    return this.items.length;
  }
}

/**
 * Message bus that decouples chat channels from the agent core.
 *
 * Channels and sub-agents push to the inbound queue; the agent loop, the
 * scheduler and tools push delivery actions to the outbound queue, which
 * `dispatchOutbound` fans out to the channel's subscribers.
 */
export class MessageBus implements IMessageBus {
  private inbound = new AsyncQueue<InboundMessage>();
  private outbound = new AsyncQueue<OutboundMessage>();
  private outboundSubscribers: Map<string, OutboundCallback[]> = new Map();
  private _running = false;

  async publishInbound(msg: InboundMessage): Promise<void> {
    this.inbound.push(msg);
  }

  async consumeInbound(): Promise<InboundMessage> {
    return this.inbound.pop();
  }

  async consumeInboundWithTimeout(timeoutMs: number): Promise<InboundMessage | null> {
    return this.inbound.popWithTimeout(timeoutMs);
  }

  async publishOutbound(msg: OutboundMessage): Promise<void> {
    this.outbound.push(msg);
  }

  async consumeOutbound(): Promise<OutboundMessage> {
    return this.outbound.pop();
  }

  async consumeOutboundWithTimeout(timeoutMs: number): Promise<OutboundMessage | null> {
    return this.outbound.popWithTimeout(timeoutMs);
  }

  subscribeOutbound(channel: string, callback: OutboundCallback): void {
    const subscribers = this.outboundSubscribers.get(channel) || [];
    subscribers.push(callback);
    this.outboundSubscribers.set(channel, subscribers);
  }

  unsubscribeOutbound(channel: string, callback: OutboundCallback): void {
    const subscribers = this.outboundSubscribers.get(channel) || [];
    this.outboundSubscribers.set(
      channel,
      subscribers.filter((cb) => cb !== callback),
    );
  }

  /**
   * Dispatch outbound messages to subscribed channels.
   * Run this as a background task.
   */
  async dispatchOutbound(): Promise<void> {
    this._running = true;

    while (this._running) {
      const msg = await this.consumeOutboundWithTimeout(1000);
      if (!msg) continue;

      const subscribers = this.outboundSubscribers.get(msg.channel) || [];
      if (subscribers.length === 0) {
        log.warn({ channel: msg.channel, chatId: msg.chatId }, "No channel subscribed for outbound message");
      }
      for (const callback of subscribers) {
        try {
          await callback(msg);
        } catch (error) {
          log.error({ error, channel: msg.channel }, "Error dispatching to channel");
        }
      }
    }
  }

  stop(): void {
    this._running = false;
  }

  get inboundSize(): number {
    return this.inbound.size;
  }

  get outboundSize(): number {
    return this.outbound.size;
  }
}
