/**
 * Message tool for sending text to a chat channel.
 */

import { z } from "zod";
import { Tool } from "./base.js";
import type { ToolContext } from "../core/types/tool.js";
import type { IMessageBus } from "../core/interfaces/message-bus.js";
import { createOutboundMessage, parseSessionKey } from "../infrastructure/queue/events.js";

/**
 * Tool to send a message to a user on a chat channel.
 *
 * The recipient defaults to the session the call belongs to.
 */
export class MessageTool extends Tool {
  readonly name = "message";
  readonly description =
    "Send a message to a user on a chat channel. Defaults to the current conversation.";
  readonly parameters = z.object({
    content: z.string().min(1).describe("The message text"),
    channel: z.string().optional().describe("Target channel (defaults to the current one)"),
    chat_id: z.string().optional().describe("Target chat/user ID (defaults to the current one)"),
  });

  private bus: IMessageBus;

  constructor(bus: IMessageBus) {
    super();
    this.bus = bus;
  }

  async execute(
    params: { content: string; channel?: string; chat_id?: string },
    context: ToolContext,
  ): Promise<string> {
    const origin = parseSessionKey(context.sessionKey);
    const channel = params.channel || origin.channel;
    const chatId = params.chat_id || origin.chatId;

    await this.bus.publishOutbound(
      createOutboundMessage({ channel, chatId, content: params.content }),
    );

    return `Message sent to ${channel}:${chatId}`;
  }
}
