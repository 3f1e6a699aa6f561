import chalk from "chalk";
import type { OutboundMessage } from "../bus/events.js";
import { BaseChannel } from "./base.js";

/** Prints deliveries to stdout instead of sending them anywhere. */
export class ConsoleChannel extends BaseChannel {
  readonly name = "console";

  async start(): Promise<void> {
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
  }

  async send(msg: OutboundMessage): Promise<void> {
    console.log(`${chalk.cyan(`→ ${msg.kind}:${msg.chatId}`)}\n${msg.content}\n`);
  }
}
