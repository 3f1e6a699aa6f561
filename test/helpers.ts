import { vi } from "vitest";
import type { MessageAddress } from "../src/bus/events.js";
import type { MessageSender } from "../src/channels/manager.js";
import { parseTriggerSpec } from "../src/cron/parser.js";
import type { TriggerCategory, TriggerState } from "../src/cron/types.js";
import type { LLMResponse, TextChatRequest, TextProvider } from "../src/providers/base.js";
import type { LogLevel, Logger } from "../src/utils/logger.js";

export class MemoryLogger implements Logger {
  readonly lines: Array<{ level: LogLevel; message: string }> = [];

  debug(message: string): void { this.lines.push({ level: "debug", message }); }
  info(message: string): void { this.lines.push({ level: "info", message }); }
  warn(message: string): void { this.lines.push({ level: "warn", message }); }
  error(message: string): void { this.lines.push({ level: "error", message }); }

  at(level: LogLevel): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.message);
  }
}

export function localMs(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): number {
  return new Date(year, month - 1, day, hour, minute, second).getTime();
}

export function makeState(raw: string, category: TriggerCategory = "room", now = localMs(2024, 1, 15, 10, 2, 30)): TriggerState {
  return parseTriggerSpec(raw, category, now);
}

export function reply(text: string | null, finishReason = "stop"): LLMResponse {
  return { completionText: text, finishReason, usage: {} };
}

export class FakeProvider implements TextProvider {
  readonly requests: TextChatRequest[] = [];

  constructor(readonly id: string, private readonly respond: (req: TextChatRequest) => Promise<LLMResponse>) {}

  getDefaultModel(): string {
    return "fake-model";
  }

  textChat(request: TextChatRequest): Promise<LLMResponse> {
    this.requests.push(request);
    return this.respond(request);
  }
}

export function fakeSender(impl?: (address: MessageAddress, content: string) => Promise<void>) {
  const deliver = vi.fn<(address: MessageAddress, content: string) => Promise<void>>(impl ?? (async () => undefined));
  const sender: MessageSender = { deliver };
  return { sender, deliver };
}
