/**
 * Messages carried by the bus between channels, the agent loop and
 * background executors.
 */

/**
 * Message received from a chat channel, or raised internally on the
 * "system" channel (sub-agent announcements).
 */
export interface InboundMessage {
  /** Channel identifier (cli, system, ...) */
  channel: string;
  senderId: string;
  /** Chat identifier; for system messages, the origin session key */
  chatId: string;
  content: string;
  timestamp: Date;
  metadata: Record<string, unknown>;
}

/**
 * A delivery action: a message to one recipient on one channel.
 */
export interface OutboundMessage {
  channel: string;
  /** Recipient (chat) identifier */
  chatId: string;
  content: string;
  metadata: Record<string, unknown>;
}
