/**
 * Console channel: talk to the agent from a terminal.
 */

import * as readline from "readline/promises";
import type { OutboundMessage } from "../../core/types/message.js";
import type { IMessageBus } from "../../core/interfaces/message-bus.js";
import { BaseChannel, type ChannelOptions } from "./base.js";
import logger from "../../utils/logger.js";

const log = logger.child({ component: "console" });

const EXIT_COMMANDS = new Set(["exit", "quit", "/quit", ":q"]);

export interface ConsoleChannelOptions extends ChannelOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Chat id of the local user */
  chatId?: string;
  /** Called when the user leaves */
  onExit?: () => void;
}

/**
 * Reads lines from stdin as messages from one local user and prints
 * what the agent sends back.
 */
export class ConsoleChannel extends BaseChannel {
  readonly name = "cli";

  private rl: readline.Interface | undefined;
  private input: NodeJS.ReadableStream;
  private output: NodeJS.WritableStream;
  private chatId: string;
  private onExit: (() => void) | undefined;

  constructor(bus: IMessageBus, options?: ConsoleChannelOptions) {
    super(bus, options);
    this.input = options?.input ?? process.stdin;
    this.output = options?.output ?? process.stdout;
    this.chatId = options?.chatId ?? "direct";
    this.onExit = options?.onExit;
  }

  async start(): Promise<void> {
    this._running = true;
    this.rl = readline.createInterface({ input: this.input, output: this.output });
    this.rl.on("close", () => {
      this._running = false;
      this.onExit?.();
    });
    this.promptLoop();
  }

  async stop(): Promise<void> {
    this._running = false;
    if (this.rl) {
      const rl = this.rl;
      this.rl = undefined;
      rl.close();
    }
  }

  async send(msg: OutboundMessage): Promise<void> {
    this.output.write(`\ntendril> ${msg.content}\n`);
  }

  private promptLoop(): void {
    if (!this._running || !this.rl) {
      return;
    }
    this.rl
      .question("you> ")
      .then(async (line) => {
        const text = line.trim();
        if (EXIT_COMMANDS.has(text)) {
          await this.stop();
          return;
        }
        if (text) {
          await this.handleMessage("local", this.chatId, text);
        }
        this.promptLoop();
      })
      .catch((error) => {
        this._running = false;
        log.debug({ error }, "Console input closed");
      });
  }
}
