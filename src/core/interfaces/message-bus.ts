/**
 * Message bus interface.
 */

import type { InboundMessage, OutboundMessage } from "../types/message.js";

/**
 * Callback for outbound message handling.
 */
export type OutboundCallback = (msg: OutboundMessage) => Promise<void>;

/**
 * Queues between channels, the agent loop and background executors.
 */
export interface IMessageBus {
  publishInbound(msg: InboundMessage): Promise<void>;

  /**
   * Consume the next inbound message (blocks until available).
   */
  consumeInbound(): Promise<InboundMessage>;

  /**
   * Consume the next inbound message, or null after `timeoutMs`.
   */
  consumeInboundWithTimeout(timeoutMs: number): Promise<InboundMessage | null>;

  /**
   * Publish a delivery action to channels.
   */
  publishOutbound(msg: OutboundMessage): Promise<void>;

  consumeOutbound(): Promise<OutboundMessage>;

  consumeOutboundWithTimeout(timeoutMs: number): Promise<OutboundMessage | null>;

  /**
   * Subscribe to outbound messages for a specific channel.
   */
  subscribeOutbound(channel: string, callback: OutboundCallback): void;

  /**
   * Drop a subscription added with {@link subscribeOutbound}.
   */
  unsubscribeOutbound(channel: string, callback: OutboundCallback): void;

  /**
   * Dispatch outbound messages to subscribed channels until stopped.
   */
  dispatchOutbound(): Promise<void>;

  stop(): void;

  readonly inboundSize: number;

  readonly outboundSize: number;
}
