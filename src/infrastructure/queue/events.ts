/**
 * Message factories and session keys.
 */

import type { InboundMessage, OutboundMessage } from "../../core/types/message.js";

/** Session used when a caller names none */
export const DEFAULT_SESSION_KEY = "cli:direct";

/**
 * Create an inbound message with defaults.
 */
export function createInboundMessage(
  partial: Partial<InboundMessage> & Pick<InboundMessage, "channel" | "senderId" | "chatId" | "content">,
): InboundMessage {
  return {
    timestamp: new Date(),
    metadata: {},
    ...partial,
  };
}

/**
 * Create an outbound message with defaults.
 */
export function createOutboundMessage(
  partial: Partial<OutboundMessage> & Pick<OutboundMessage, "channel" | "chatId" | "content">,
): OutboundMessage {
  return {
    metadata: {},
    ...partial,
  };
}

/**
 * Build a session key: `<channel>:<chat_id>`.
 */
export function formatSessionKey(channel: string, chatId: string): string {
  return `${channel}:${chatId}`;
}

/**
 * Split a session key on its first colon. A key without one is a chat id
 * on the "cli" channel.
 */
export function parseSessionKey(key: string): { channel: string; chatId: string } {
  const index = key.indexOf(":");
  if (index <= 0) {
    return { channel: "cli", chatId: key || "direct" };
  }
  return { channel: key.slice(0, index), chatId: key.slice(index + 1) };
}

/**
 * Get session key from inbound message.
 */
export function getSessionKey(msg: InboundMessage): string {
  return formatSessionKey(msg.channel, msg.chatId);
}
