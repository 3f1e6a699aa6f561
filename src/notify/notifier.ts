import type { MessageSender } from "../channels/manager.js";
import { notificationsDelivered, type Config } from "../config/schema.js";
import { errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../utils/logger.js";

export type NotificationLevel = "success" | "error" | "info";

/** Where admin notices end up. Implementations may throw; the notifier logs and drops the failure. */
export interface NotificationRoute {
  readonly description: string;
  send(message: string, level: NotificationLevel): Promise<void>;
}

export class LogRoute implements NotificationRoute {
  readonly description = "log only";

  constructor(private readonly log: Logger) {}

  async send(message: string, level: NotificationLevel): Promise<void> {
    if (level === "error") this.log.warn(`Notice: ${message}`);
    else this.log.info(`Notice: ${message}`);
  }
}

export class DeliveryRoute implements NotificationRoute {
  constructor(private readonly sender: MessageSender, private readonly channel: string, private readonly adminUserId: string) {}

  get description(): string {
    return `direct message to ${this.adminUserId} on ${this.channel}`;
  }

  async send(message: string): Promise<void> {
    await this.sender.deliver({ channel: this.channel, kind: "direct_message", targetId: this.adminUserId }, message);
  }
}

export interface NotifierOptions {
  onSuccess: boolean;
  onFailure: boolean;
  route: NotificationRoute;
  logger?: Logger;
}

export class Notifier {
  private readonly log: Logger;

  constructor(private readonly options: NotifierOptions) {
    this.log = options.logger ?? createLogger("notify");
  }

  static fromConfig(config: Config, sender: MessageSender, logger: Logger = createLogger("notify")): Notifier {
    const route = notificationsDelivered(config) ? new DeliveryRoute(sender, config.adminChannel, config.adminUserId) : new LogRoute(logger);
    return new Notifier({
      onSuccess: config.notificationOnSuccess,
      onFailure: config.notificationOnFailure,
      route,
      logger,
    });
  }

  get route(): NotificationRoute {
    return this.options.route;
  }

  async notify(message: string, level: NotificationLevel = "info"): Promise<void> {
    try {
      await this.options.route.send(message, level);
    } catch (err) {
      this.log.error(`Failed to send notification (${this.options.route.description}): ${errorMessage(err)}`);
    }
  }

  async succeeded(target: string): Promise<void> {
    if (!this.options.onSuccess) return;
    await this.notify(`✅ Scheduled trigger succeeded: ${target}`, "success");
  }

  async failed(target: string, err: unknown): Promise<void> {
    if (!this.options.onFailure) return;
    await this.notify(`❌ Scheduled trigger failed: ${target}: ${errorMessage(err)}`, "error");
  }
}
