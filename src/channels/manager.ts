import type { ChannelsConfig } from "../config/schema.js";
import type { MessageBus } from "../bus/queue.js";
import { formatAddress, type MessageAddress } from "../bus/events.js";
import { DeliveryError, errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import type { BaseChannel } from "./base.js";
import { ConsoleChannel } from "./console.js";
import { DiscordChannel } from "./discord.js";
import { TelegramChannel } from "./telegram.js";

/** Delivery capability the executor and notifier depend on. */
export interface MessageSender {
  deliver(address: MessageAddress, content: string): Promise<void>;
}

export class ChannelManager implements MessageSender {
  readonly channels = new Map<string, BaseChannel>();
  private runs: Promise<void>[] = [];
  private dispatchLoop: Promise<void> | null = null;

  constructor(private readonly bus: MessageBus, private readonly log: Logger = createLogger("channels")) {}

  static fromConfig(config: ChannelsConfig, bus: MessageBus, log?: Logger): ChannelManager {
    const manager = new ChannelManager(bus, log);
    if (config.telegram.enabled) manager.add(new TelegramChannel(config.telegram, bus));
    if (config.discord.enabled) manager.add(new DiscordChannel(config.discord, bus));
    if (config.console.enabled) manager.add(new ConsoleChannel({}, bus));
    return manager;
  }

  add(channel: BaseChannel): void {
    this.channels.set(channel.name, channel);
  }

  async deliver(address: MessageAddress, content: string): Promise<void> {
    const channel = this.channels.get(address.channel);
    if (!channel) throw new DeliveryError(`channel '${address.channel}' is not enabled (target ${formatAddress(address)})`);
    await channel.send({ channel: address.channel, chatId: address.targetId, kind: address.kind, content });
  }

  /** Starts every channel's receive loop plus the reply dispatcher, without waiting on them. */
  startAll(): void {
    if (!this.channels.size || this.dispatchLoop) return;
    this.dispatchLoop = this.dispatchOutbound();
    this.runs = [...this.channels.values()].map((c) =>
      c.start().catch((err) => this.log.error(`${c.name} stopped with error: ${errorMessage(err)}`)),
    );
  }

  async stopAll(): Promise<void> {
    await Promise.all([...this.channels.values()].map((c) => c.stop().catch((err) => this.log.warn(`${c.name} stop failed: ${errorMessage(err)}`))));
    this.bus.outbound.close();
    await Promise.all([...this.runs, this.dispatchLoop]);
    this.runs = [];
    this.dispatchLoop = null;
  }

  private async dispatchOutbound(): Promise<void> {
    for (;;) {
      const msg = await this.bus.consumeOutbound();
      if (!msg) return;
      await this.deliver({ channel: msg.channel, kind: msg.kind, targetId: msg.chatId }, msg.content).catch((err) =>
        this.log.warn(`reply to ${msg.channel}:${msg.chatId} failed: ${errorMessage(err)}`),
      );
    }
  }

  get enabledChannels(): string[] {
    return [...this.channels.keys()];
  }

  getStatus(): Record<string, { running: boolean }> {
    return Object.fromEntries([...this.channels].map(([name, c]) => [name, { running: c.isRunning }]));
  }
}
