import OpenAI from "openai";
import type { LLMResponse, TextChatRequest, TextProvider } from "./base.js";
import { buildMessages, errorResponse } from "./base.js";

export interface OpenAIProviderOptions {
  apiKey: string;
  apiBase: string;
  model: string;
  temperature: number;
  maxTokens: number;
  extraHeaders?: Record<string, string> | null;
}

export class OpenAIProvider implements TextProvider {
  private client: OpenAI;

  constructor(readonly id: string, private readonly options: OpenAIProviderOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey || "no-key",
      baseURL: options.apiBase,
      defaultHeaders: options.extraHeaders ?? undefined,
    });
  }

  getDefaultModel(): string {
    return this.options.model;
  }

  async textChat(request: TextChatRequest): Promise<LLMResponse> {
    try {
      const res = await this.client.chat.completions.create(
        {
          model: this.options.model,
          messages: buildMessages(request),
          max_tokens: Math.max(1, this.options.maxTokens),
          temperature: this.options.temperature,
        },
        { signal: request.signal },
      );
      const choice = res.choices[0];
      if (!choice) return errorResponse("no choices in response");
      return {
        completionText: choice.message.content,
        finishReason: choice.finish_reason ?? "stop",
        usage: {
          prompt_tokens: res.usage?.prompt_tokens ?? 0,
          completion_tokens: res.usage?.completion_tokens ?? 0,
          total_tokens: res.usage?.total_tokens ?? 0,
        },
      };
    } catch (err) {
      return errorResponse(String(err));
    }
  }
}
