/**
 * Channel manager: owns the channels and routes outbound messages to them.
 */

import type { IChannel } from "../../core/interfaces/channel.js";
import type { IMessageBus, OutboundCallback } from "../../core/interfaces/message-bus.js";
import logger from "../../utils/logger.js";

const log = logger.child({ component: "channels" });

export class ChannelManager {
  private bus: IMessageBus;
  private channels: Map<string, IChannel> = new Map();
  private subscriptions: Map<string, OutboundCallback> = new Map();

  constructor(bus: IMessageBus) {
    this.bus = bus;
  }

  register(channel: IChannel): void {
    if (this.channels.has(channel.name)) {
      throw new Error(`Channel "${channel.name}" is already registered`);
    }
    this.channels.set(channel.name, channel);
  }

  getChannel(name: string): IChannel | undefined {
    return this.channels.get(name);
  }

  get enabledChannels(): string[] {
    return Array.from(this.channels.keys());
  }

  /**
   * Subscribe every channel to its outbound messages and start it.
   * A channel that fails to start is logged and left out.
   */
  async startAll(): Promise<void> {
    for (const channel of this.channels.values()) {
      const callback: OutboundCallback = (msg) => channel.send(msg);
      this.bus.subscribeOutbound(channel.name, callback);
      this.subscriptions.set(channel.name, callback);
    }

    const results = await Promise.allSettled(
      Array.from(this.channels.values(), (channel) => channel.start()),
    );
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        log.error({ channel: this.enabledChannels[index], error: result.reason }, "Channel failed to start");
      }
    });
  }

  async stopAll(): Promise<void> {
    for (const [name, callback] of this.subscriptions) {
      this.bus.unsubscribeOutbound(name, callback);
    }
    this.subscriptions.clear();

    const results = await Promise.allSettled(
      Array.from(this.channels.values(), (channel) => channel.stop()),
    );
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        log.error({ channel: this.enabledChannels[index], error: result.reason }, "Channel failed to stop");
      }
    });
  }

  getStatus(): Record<string, { running: boolean }> {
    const status: Record<string, { running: boolean }> = {};
    for (const [name, channel] of this.channels) {
      status[name] = { running: channel.isRunning };
    }
    return status;
  }
}
