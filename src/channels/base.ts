import type { MessageBus } from "../bus/queue.js";
import type { MessageKind, OutboundMessage } from "../bus/events.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { preview } from "../utils/helpers.js";

export interface ChannelConfig {
  allowFrom?: string[];
}

export abstract class BaseChannel<TConfig extends ChannelConfig = ChannelConfig> {
  protected running = false;

  constructor(protected readonly config: TConfig, protected readonly bus: MessageBus, private logger?: Logger) {}

  protected get log(): Logger {
    if (!this.logger) this.logger = createLogger(this.name);
    return this.logger;
  }

  abstract readonly name: string;
  /** Runs until `stop()`; channels without an inbound side return immediately. */
  abstract start(): Promise<void>;
  abstract stop(): Promise<void>;
  /** Must throw when the platform does not accept the message. */
  abstract send(msg: OutboundMessage): Promise<void>;

  protected isAllowed(senderId: string): boolean {
    const allowFrom = this.config.allowFrom ?? [];
    if (!allowFrom.length) return true;
    if (allowFrom.includes(senderId)) return true;
    if (senderId.includes("|")) return senderId.split("|").some((p) => allowFrom.includes(p));
    return false;
  }

  protected async handleMessage(input: { senderId: string; chatId: string; kind: MessageKind; content: string; metadata?: Record<string, unknown> }): Promise<void> {
    if (!this.isAllowed(input.senderId)) {
      this.log.warn(`BLOCKED from=${input.senderId}`);
      return;
    }
    this.log.debug(`from=${input.senderId} chat=${input.chatId} "${preview(input.content)}"`);
    await this.bus.publishInbound({
      channel: this.name,
      senderId: input.senderId,
      chatId: input.chatId,
      kind: input.kind,
      content: input.content,
      timestamp: new Date(),
      metadata: input.metadata ?? {},
    });
  }

  get isRunning(): boolean {
    return this.running;
  }
}
