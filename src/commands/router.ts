import type { InboundMessage } from "../bus/events.js";
import { replyAddress } from "../bus/events.js";
import type { MessageBus } from "../bus/queue.js";
import { ADMIN_SENTINEL } from "../config/schema.js";
import type { TriggerScheduler } from "../cron/service.js";
import type { TriggerSnapshot } from "../cron/types.js";
import { errorMessage } from "../errors.js";
import { formatTime } from "../utils/helpers.js";
import { createLogger, type Logger } from "../utils/logger.js";

export const STATUS_COMMAND = "/triggers";
export const TEST_COMMAND = "/triggers_test";

export function formatTriggerLine(t: TriggerSnapshot): string {
  return `- ${t.channel}:${t.destinationId} (${t.cronExpression}) -> ${formatTime(t.nextRunAtMs)}`;
}

export function formatStatus(triggers: TriggerSnapshot[], intervalMs: number): string {
  const lines = [
    "Scheduled trigger status",
    "",
    `Triggers configured: ${triggers.length}`,
    `Check interval: ${intervalMs / 1000} s`,
    "",
    "Triggers:",
    triggers.length ? triggers.map(formatTriggerLine).join("\n") : "No triggers configured",
  ];
  return lines.join("\n");
}

/** `id|username` senders match the admin id on either part. The placeholder admin id matches nobody. */
export function isAdmin(senderId: string, adminUserId: string): boolean {
  if (adminUserId === ADMIN_SENTINEL) return false;
  return senderId === adminUserId || senderId.split("|").includes(adminUserId);
}

export interface CommandRouterOptions {
  bus: MessageBus;
  scheduler: Pick<TriggerScheduler, "list" | "runAll" | "intervalMs">;
  adminUserId: string;
  logger?: Logger;
}

/** Answers the status and test commands that arrive on any channel. */
export class CommandRouter {
  private readonly log: Logger;
  private loop: Promise<void> | null = null;

  constructor(private readonly options: CommandRouterOptions) {
    this.log = options.logger ?? createLogger("commands");
  }

  start(): void {
    if (!this.loop) this.loop = this.consume();
  }

  /** Resolves once the bus is closed and the queue drained. */
  async wait(): Promise<void> {
    await this.loop;
    this.loop = null;
  }

  private async consume(): Promise<void> {
    for (;;) {
      const msg = await this.options.bus.consumeInbound();
      if (!msg) return;
      try {
        await this.handle(msg);
      } catch (err) {
        this.log.error(`command from ${msg.channel}:${msg.senderId} failed: ${errorMessage(err)}`);
      }
    }
  }

  async handle(msg: InboundMessage): Promise<boolean> {
    const command = msg.content.trim().split(/\s+/, 1)[0].replace(/@\S+$/, "").toLowerCase();
    if (command === STATUS_COMMAND) {
      await this.reply(msg, formatStatus(this.options.scheduler.list(), this.options.scheduler.intervalMs));
      return true;
    }
    if (command === TEST_COMMAND) {
      if (!isAdmin(msg.senderId, this.options.adminUserId)) {
        await this.reply(msg, "Only the admin can run trigger tests");
        return true;
      }
      await this.reply(msg, "Testing all triggers...");
      const { success, total } = await this.options.scheduler.runAll();
      await this.reply(msg, `Trigger test complete\nSucceeded: ${success}/${total}`);
      return true;
    }
    return false;
  }

  private async reply(msg: InboundMessage, content: string): Promise<void> {
    const to = replyAddress(msg);
    await this.options.bus.publishOutbound({ channel: to.channel, chatId: to.targetId, kind: to.kind, content });
  }
}
