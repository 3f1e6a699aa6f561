import WebSocket, { type RawData } from "ws";
import type { OutboundMessage } from "../bus/events.js";
import type { MessageBus } from "../bus/queue.js";
import type { DiscordConfig } from "../config/schema.js";
import { DeliveryError } from "../errors.js";
import { sleep, splitMessage } from "../utils/helpers.js";
import type { Logger } from "../utils/logger.js";
import { BaseChannel } from "./base.js";

const API = "https://discord.com/api/v10";

type DiscordGatewayPayload = {
  op: number;
  d: unknown;
  s: number | null;
  t: string | null;
};

type DiscordMessage = {
  id: string;
  channel_id: string;
  guild_id?: string;
  content?: string;
  author?: { id: string; username?: string; bot?: boolean };
};

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object";
}

export class DiscordChannel extends BaseChannel<DiscordConfig> {
  readonly name = "discord";
  private ws: WebSocket | null = null;
  private hb: NodeJS.Timeout | null = null;
  private seq: number | null = null;
  private readonly dmChannels = new Map<string, string>();
  private reconnect: AbortController | null = null;

  constructor(config: DiscordConfig, bus: MessageBus, logger?: Logger) {
    super(config, bus, logger);
  }

  async start(): Promise<void> {
    if (!this.config.token) {
      this.log.error("Discord token not configured");
      return;
    }

    this.running = true;
    this.reconnect = new AbortController();
    while (this.running) {
      await this.connectOnce();
      if (this.running) await sleep(2000, this.reconnect.signal);
    }
  }

  async stop(): Promise<void> {
    this.running = false;
    this.reconnect?.abort();
    this.stopHeartbeat();
    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }
  }

  async send(msg: OutboundMessage): Promise<void> {
    if (!this.config.token) throw new DeliveryError("Discord token not configured");
    const channelId = msg.kind === "direct_message" ? await this.openDm(msg.chatId) : msg.chatId;
    for (const chunk of splitMessage(msg.content, 2000)) {
      await this.rest(`/channels/${channelId}/messages`, { content: chunk });
    }
  }

  /** Direct messages go through a DM channel that has to be opened (or reused) per recipient. */
  private async openDm(userId: string): Promise<string> {
    const cached = this.dmChannels.get(userId);
    if (cached) return cached;
    const data = await this.rest("/users/@me/channels", { recipient_id: userId });
    const id = isObject(data) && typeof data.id === "string" ? data.id : null;
    if (!id) throw new DeliveryError(`Discord did not return a DM channel for user ${userId}`);
    this.dmChannels.set(userId, id);
    return id;
  }

  private async rest(path: string, body: Record<string, unknown>): Promise<unknown> {
    const res = await fetch(`${API}${path}`, {
      method: "POST",
      headers: {
        Authorization: `Bot ${this.config.token}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
    });
    if (!res.ok) throw new DeliveryError(`Discord POST ${path} failed (${res.status}): ${await res.text()}`);
    return res.json();
  }

  private connectOnce(): Promise<void> {
    return new Promise<void>((resolve) => {
      const ws = new WebSocket(this.config.gatewayUrl);
      this.ws = ws;

      ws.on("message", (raw: RawData) => {
        let payload: DiscordGatewayPayload;
        try {
          payload = JSON.parse(raw.toString()) as DiscordGatewayPayload;
        } catch {
          return;
        }

        if (payload.s != null) this.seq = payload.s;

        if (payload.op === 10) {
          const interval = isObject(payload.d) ? Number(payload.d.heartbeat_interval ?? 30000) : 30000;
          this.startHeartbeat(interval);
          this.sendPayload({
            op: 2,
            d: {
              token: this.config.token,
              intents: this.config.intents,
              properties: { os: process.platform, browser: "cronrelay", device: "cronrelay" },
            },
          });
          return;
        }

        if (payload.op === 7) {
          ws.close();
          return;
        }

        if (payload.t === "MESSAGE_CREATE" && isObject(payload.d)) {
          this.onMessageCreate(payload.d as DiscordMessage).catch((err) => this.log.error(`inbound message failed: ${String(err)}`));
        }
      });

      ws.on("close", () => {
        this.stopHeartbeat();
        resolve();
      });

      ws.on("error", (err) => {
        this.log.warn(`gateway error: ${err.message}`);
        this.stopHeartbeat();
        resolve();
      });
    });
  }

  private async onMessageCreate(m: DiscordMessage): Promise<void> {
    if (!m.author || m.author.bot) return;
    const content = String(m.content ?? "").trim();
    if (!content) return;
    const sender = `${m.author.id}${m.author.username ? `|${m.author.username}` : ""}`;
    await this.handleMessage({
      senderId: sender,
      chatId: m.guild_id ? String(m.channel_id) : m.author.id,
      kind: m.guild_id ? "room_message" : "direct_message",
      content,
      metadata: { message_id: m.id, guild_id: m.guild_id ?? null },
    });
  }

  private startHeartbeat(intervalMs: number): void {
    this.stopHeartbeat();
    this.hb = setInterval(() => {
      this.sendPayload({ op: 1, d: this.seq });
    }, intervalMs);
  }

  private stopHeartbeat(): void {
    if (this.hb) {
      clearInterval(this.hb);
      this.hb = null;
    }
  }

  private sendPayload(data: Record<string, unknown>): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) return;
    this.ws.send(JSON.stringify(data));
  }
}
