import { z } from "zod";

export const ADMIN_SENTINEL = "admin";
export const DEFAULT_SYSTEM_PROMPT = "You are a helpful AI assistant.";

export const PROVIDER_TYPES = ["openai", "custom", "openrouter", "deepseek", "groq", "moonshot", "dashscope", "zhipu", "siliconflow", "vllm"] as const;

export type ProviderType = (typeof PROVIDER_TYPES)[number];

/** `sdk` providers go through the openai client, the rest through plain fetch. */
export const PROVIDERS: Record<ProviderType, { client: "sdk" | "http"; isLocal: boolean; defaultApiBase: string }> = {
  openai: { client: "sdk", isLocal: false, defaultApiBase: "https://api.openai.com/v1" },
  custom: { client: "sdk", isLocal: true, defaultApiBase: "http://localhost:8000/v1" },
  openrouter: { client: "http", isLocal: false, defaultApiBase: "https://openrouter.ai/api/v1" },
  deepseek: { client: "http", isLocal: false, defaultApiBase: "https://api.deepseek.com/v1" },
  groq: { client: "http", isLocal: false, defaultApiBase: "https://api.groq.com/openai/v1" },
  moonshot: { client: "http", isLocal: false, defaultApiBase: "https://api.moonshot.ai/v1" },
  dashscope: { client: "http", isLocal: false, defaultApiBase: "https://dashscope.aliyuncs.com/compatible-mode/v1" },
  zhipu: { client: "http", isLocal: false, defaultApiBase: "https://open.bigmodel.cn/api/paas/v4" },
  siliconflow: { client: "http", isLocal: false, defaultApiBase: "https://api.siliconflow.cn/v1" },
  vllm: { client: "http", isLocal: true, defaultApiBase: "http://localhost:8000/v1" },
};

const ProviderConfigSchema = z.object({
  type: z.enum(PROVIDER_TYPES).default("openai"),
  model: z.string().min(1),
  apiKey: z.string().default(""),
  apiBase: z.string().url().nullable().default(null),
  extraHeaders: z.record(z.string()).nullable().default(null),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().default(2048),
});

const TelegramConfigSchema = z.object({
  enabled: z.boolean().default(false),
  token: z.string().default(""),
  allowFrom: z.array(z.string()).default([]),
});

const DiscordConfigSchema = z.object({
  enabled: z.boolean().default(false),
  token: z.string().default(""),
  allowFrom: z.array(z.string()).default([]),
  gatewayUrl: z.string().default("wss://gateway.discord.gg/?v=10&encoding=json"),
  intents: z.number().int().nonnegative().default(37377),
});

const ConsoleConfigSchema = z.object({
  enabled: z.boolean().default(false),
});

const ChannelsConfigSchema = z.object({
  telegram: TelegramConfigSchema.default({}),
  discord: DiscordConfigSchema.default({}),
  console: ConsoleConfigSchema.default({}),
});

export const ConfigSchema = z
  .object({
    schedulerCheckInterval: z.number().positive().default(30),
    executionTimeout: z.number().positive().default(120),
    platformGroupProviderMap: z.array(z.string()).default([]),
    platformFriendProviderMap: z.array(z.string()).default([]),
    adminUserId: z.string().min(1).default(ADMIN_SENTINEL),
    adminChannel: z.string().default(""),
    notificationOnFailure: z.boolean().default(true),
    notificationOnSuccess: z.boolean().default(false),
    systemPrompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
    providers: z.record(ProviderConfigSchema).default({}),
    channels: ChannelsConfigSchema.default({}),
  })
  .superRefine((data, ctx) => {
    if (data.adminChannel && !(data.adminChannel in data.channels)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown channel '${data.adminChannel}'`, path: ["adminChannel"] });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type ChannelsConfig = z.infer<typeof ChannelsConfigSchema>;
export type TelegramConfig = z.infer<typeof TelegramConfigSchema>;
export type DiscordConfig = z.infer<typeof DiscordConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

export function getApiBase(provider: ProviderConfig): string {
  return provider.apiBase ?? PROVIDERS[provider.type].defaultApiBase;
}

export function requiresApiKey(provider: ProviderConfig): boolean {
  return !PROVIDERS[provider.type].isLocal;
}

export function notificationsDelivered(config: Config): boolean {
  return config.adminUserId !== ADMIN_SENTINEL && config.adminChannel !== "";
}
