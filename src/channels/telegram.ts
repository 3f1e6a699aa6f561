import type { OutboundMessage } from "../bus/events.js";
import type { MessageBus } from "../bus/queue.js";
import type { TelegramConfig } from "../config/schema.js";
import { DeliveryError } from "../errors.js";
import { sleep, splitMessage } from "../utils/helpers.js";
import type { Logger } from "../utils/logger.js";
import { BaseChannel } from "./base.js";

type TelegramUpdate = {
  update_id: number;
  message?: {
    message_id: number;
    chat: { id: number | string; type?: string };
    from?: { id: number | string; username?: string; is_bot?: boolean };
    text?: string;
    caption?: string;
  };
};

type TelegramResult<T> = { ok: boolean; result: T; description?: string };

export class TelegramChannel extends BaseChannel<TelegramConfig> {
  readonly name = "telegram";
  private offset = 0;
  private poll: AbortController | null = null;

  constructor(config: TelegramConfig, bus: MessageBus, logger?: Logger) {
    super(config, bus, logger);
  }

  private api(path: string): string {
    return `https://api.telegram.org/bot${this.config.token}/${path}`;
  }

  async start(): Promise<void> {
    if (!this.config.token) {
      this.log.error("Telegram token not configured");
      return;
    }

    this.running = true;
    this.poll = new AbortController();
    const { signal } = this.poll;
    while (this.running) {
      try {
        const url = new URL(this.api("getUpdates"));
        url.searchParams.set("timeout", "25");
        url.searchParams.set("offset", String(this.offset));
        url.searchParams.set("allowed_updates", JSON.stringify(["message"]));

        const res = await fetch(url, { signal });
        if (!res.ok) {
          await sleep(1500, signal);
          continue;
        }

        const data = (await res.json()) as TelegramResult<TelegramUpdate[]>;
        if (!data.ok) continue;

        for (const update of data.result) {
          this.offset = update.update_id + 1;
          const msg = update.message;
          if (!msg || msg.from?.is_bot) continue;

          const senderBase = String(msg.from?.id ?? "unknown");
          const sender = msg.from?.username ? `${senderBase}|@${msg.from.username}` : senderBase;
          await this.handleMessage({
            senderId: sender,
            chatId: String(msg.chat.id),
            kind: msg.chat.type === "private" ? "direct_message" : "room_message",
            content: msg.text ?? msg.caption ?? "",
            metadata: { message_id: msg.message_id },
          });
        }
      } catch (err) {
        if (signal.aborted) break;
        this.log.warn(`getUpdates failed: ${String(err)}`);
        await sleep(1500, signal);
      }
    }
  }

  async stop(): Promise<void> {
    this.running = false;
    this.poll?.abort();
    this.poll = null;
  }

  /** Chat ids address groups and users alike, so `kind` does not change the request. */
  async send(msg: OutboundMessage): Promise<void> {
    if (!this.config.token) throw new DeliveryError("Telegram token not configured");
    for (const chunk of splitMessage(msg.content)) {
      const res = await fetch(this.api("sendMessage"), {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ chat_id: msg.chatId, text: chunk }),
      });
      if (!res.ok) {
        const data = (await res.json().catch(() => null)) as TelegramResult<unknown> | null;
        throw new DeliveryError(`Telegram sendMessage to ${msg.chatId} failed (${res.status}): ${data?.description ?? res.statusText}`);
      }
    }
  }
}
