import type { MessageAddress } from "../bus/events.js";
import { formatAddress } from "../bus/events.js";
import type { MessageSender } from "../channels/manager.js";
import { DEFAULT_SYSTEM_PROMPT } from "../config/schema.js";
import { ExecutionError, ResolutionError } from "../errors.js";
import type { Notifier } from "../notify/notifier.js";
import type { TextProvider } from "../providers/base.js";
import type { ProviderRegistry } from "../providers/registry.js";
import { createLogger, type Logger } from "../utils/logger.js";
import type { ExecutionOutcome, TriggerDefinition, TriggerState } from "./types.js";

export interface TriggerExecutorOptions {
  providers: Pick<ProviderRegistry, "get">;
  sender: MessageSender;
  notifier: Notifier;
  systemPrompt?: string;
  /** Upper bound for the provider call; delivery is not cut short. */
  timeoutMs?: number;
  logger?: Logger;
}

export function triggerAddress(d: TriggerDefinition): MessageAddress {
  return { channel: d.channel, kind: d.category === "room" ? "room_message" : "direct_message", targetId: d.destinationId };
}

export class TriggerExecutor {
  private readonly log: Logger;
  private readonly systemPrompt: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: TriggerExecutorOptions) {
    this.log = options.logger ?? createLogger("executor");
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.timeoutMs = options.timeoutMs ?? 120_000;
  }

  /** Never throws: every failure ends up as a log line, an outcome and possibly a notice. */
  async execute(state: TriggerState): Promise<ExecutionOutcome> {
    const d = state.definition;
    const target = `${d.channel}:${d.destinationId}`;
    try {
      const provider = this.options.providers.get(d.providerName);
      if (!provider) {
        this.log.warn(`Skipping trigger ${d.id}: ${new ResolutionError(d.providerName).message}`);
        return "skipped";
      }
      const delivered = await this.run(provider, d);
      if (!delivered) return "empty";
    } catch (err) {
      const error = new ExecutionError(d.id, { cause: err });
      this.log.error(`Trigger ${d.id} (${target}) failed: ${error.message}`);
      await this.options.notifier.failed(target, error);
      return "failed";
    }
    await this.options.notifier.succeeded(target);
    return "delivered";
  }

  private async run(provider: TextProvider, d: TriggerDefinition): Promise<boolean> {
    const response = await this.withTimeout((signal) =>
      provider.textChat({ prompt: d.prompt, contexts: [], systemPrompt: this.systemPrompt, signal }),
    );
    if (response.finishReason === "error") {
      throw new Error(response.completionText ?? `provider '${d.providerName}' returned an error`);
    }
    const text = response.completionText;
    if (!text || !text.trim()) {
      this.log.warn(`Provider '${d.providerName}' returned no content for trigger ${d.id}`);
      return false;
    }
    const address = triggerAddress(d);
    await this.options.sender.deliver(address, text);
    this.log.info(`Delivered reply from '${d.providerName}' to ${formatAddress(address)}`);
    return true;
  }

  private async withTimeout<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new Error(`timed out after ${this.timeoutMs} ms`);
        controller.abort(err);
        reject(err);
      }, this.timeoutMs);
    });
    try {
      return await Promise.race([fn(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
