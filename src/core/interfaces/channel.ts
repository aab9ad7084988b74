/**
 * Channel interface.
 */

import type { OutboundMessage } from "../types/message.js";

/**
 * A chat surface that delivers outbound messages and feeds inbound ones
 * to the bus.
 */
export interface IChannel {
  /** Channel name, matched against `OutboundMessage.channel` */
  readonly name: string;

  readonly isRunning: boolean;

  start(): Promise<void>;

  stop(): Promise<void>;

  /**
   * Deliver one message to its recipient.
   */
  send(msg: OutboundMessage): Promise<void>;

  /**
   * Check if a sender is allowed to talk to the agent.
   */
  isAllowed(senderId: string): boolean;
}
