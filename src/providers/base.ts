export type ChatTurn =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string };

export interface TextChatRequest {
  prompt: string;
  contexts: ChatTurn[];
  systemPrompt: string;
  signal?: AbortSignal;
}

export interface LLMResponse {
  completionText: string | null;
  finishReason: string;
  usage: Record<string, number>;
}

export interface TextProvider {
  readonly id: string;
  textChat(request: TextChatRequest): Promise<LLMResponse>;
  getDefaultModel(): string;
}

export function buildMessages(request: TextChatRequest): ChatTurn[] {
  const messages: ChatTurn[] = [];
  if (request.systemPrompt) messages.push({ role: "system", content: request.systemPrompt });
  for (const turn of request.contexts) {
    messages.push(turn.content.length === 0 ? { ...turn, content: "(empty)" } : turn);
  }
  messages.push({ role: "user", content: request.prompt });
  return messages;
}

export function errorResponse(message: string): LLMResponse {
  return { completionText: `Error calling LLM: ${message}`, finishReason: "error", usage: {} };
}
