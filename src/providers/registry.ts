import { PROVIDERS, getApiBase, requiresApiKey, type Config, type ProviderConfig } from "../config/schema.js";
import { errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import type { TextProvider } from "./base.js";
import { HttpProvider } from "./http-provider.js";
import { OpenAIProvider } from "./openai-provider.js";

/** Name → provider lookup. Names are matched as written in trigger strings. */
export class ProviderRegistry {
  private readonly providers = new Map<string, TextProvider>();

  register(name: string, provider: TextProvider): void {
    this.providers.set(name, provider);
  }

  get(name: string): TextProvider | null {
    return this.providers.get(name) ?? null;
  }

  names(): string[] {
    return [...this.providers.keys()];
  }
}

export function makeProvider(name: string, p: ProviderConfig): TextProvider {
  if (requiresApiKey(p) && !p.apiKey.trim()) {
    throw new Error(`No API key configured for provider '${name}' (${p.type}).`);
  }
  const common = { model: p.model, temperature: p.temperature, maxTokens: p.maxTokens, extraHeaders: p.extraHeaders };
  if (PROVIDERS[p.type].client === "sdk") {
    return new OpenAIProvider(name, { ...common, apiKey: p.apiKey, apiBase: getApiBase(p) });
  }
  return new HttpProvider(name, { ...common, apiKey: p.apiKey || null, apiBase: getApiBase(p), providerType: p.type });
}

/** Misconfigured entries are logged and left out; their triggers later resolve as "not found". */
export function makeProviderRegistry(config: Pick<Config, "providers">, logger: Logger = createLogger("providers")): ProviderRegistry {
  const registry = new ProviderRegistry();
  for (const [name, p] of Object.entries(config.providers)) {
    try {
      registry.register(name, makeProvider(name, p));
    } catch (err) {
      logger.error(errorMessage(err));
    }
  }
  return registry;
}
