import type { LLMResponse, TextChatRequest, TextProvider } from "./base.js";
import { buildMessages, errorResponse } from "./base.js";

export interface HttpProviderOptions {
  apiKey: string | null;
  apiBase: string;
  model: string;
  providerType: string;
  temperature: number;
  maxTokens: number;
  extraHeaders?: Record<string, string> | null;
}

type CompletionBody = {
  choices?: Array<{ message?: { content?: string | null }; finish_reason?: string | null }>;
  usage?: Record<string, number>;
  error?: { code?: string; message?: string };
};

/** OpenAI-compatible `/chat/completions` over plain fetch, for gateways the SDK client is not pointed at. */
export class HttpProvider implements TextProvider {
  constructor(readonly id: string, private readonly options: HttpProviderOptions) {}

  getDefaultModel(): string {
    return this.options.model;
  }

  resolveModel(model: string): string {
    if (!model.includes("/")) return model;
    const [prefix, rest] = model.split("/", 2);
    // Groq expects bare ids (llama-3.3-70b-versatile) apart from its own compound models.
    if (this.options.providerType === "groq" && prefix.toLowerCase() === "groq") {
      return rest === "compound" || rest === "compound-mini" ? model : rest;
    }
    return model;
  }

  async textChat(request: TextChatRequest): Promise<LLMResponse> {
    const body = {
      model: this.resolveModel(this.options.model),
      messages: buildMessages(request),
      max_tokens: Math.max(1, this.options.maxTokens),
      temperature: this.options.temperature,
    };
    const headers: Record<string, string> = { ...(this.options.extraHeaders ?? {}), "Content-Type": "application/json" };
    if (this.options.apiKey) headers.Authorization = `Bearer ${this.options.apiKey}`;

    try {
      const res = await fetch(`${this.options.apiBase.replace(/\/$/, "")}/chat/completions`, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: request.signal,
      });
      const json = (await res.json()) as CompletionBody;
      if (!res.ok) {
        const message = json.error?.message ?? JSON.stringify(json);
        if (json.error?.code === "model_not_found") return errorResponse(`${message}\nCheck the model id for provider '${this.id}'.`);
        return errorResponse(message);
      }
      const choice = json.choices?.[0];
      if (!choice?.message) return errorResponse(JSON.stringify(json));
      return {
        completionText: choice.message.content ?? null,
        finishReason: choice.finish_reason ?? "stop",
        usage: json.usage ?? {},
      };
    } catch (err) {
      return errorResponse(String(err));
    }
  }
}
