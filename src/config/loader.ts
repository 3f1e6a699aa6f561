import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../errors.js";
import { getDataPath } from "../utils/helpers.js";
import { ConfigSchema, type Config } from "./schema.js";

const LEGACY_KEYS: Record<string, string> = {
  scheduler_check_interval: "schedulerCheckInterval",
  platform_group_provider_map: "platformGroupProviderMap",
  platform_friend_provider_map: "platformFriendProviderMap",
  admin_user_id: "adminUserId",
  notification_on_failure: "notificationOnFailure",
  notification_on_success: "notificationOnSuccess",
};

export function getConfigPath(): string {
  const override = process.env.CRONRELAY_CONFIG?.trim();
  return override ? path.resolve(override) : path.join(getDataPath(), "config.json");
}

/** Older configs used snake_case keys; a camelCase key already present wins. */
export function migrateConfig(data: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...data };
  for (const [legacy, current] of Object.entries(LEGACY_KEYS)) {
    if (!(legacy in out)) continue;
    if (!(current in out)) out[current] = out[legacy];
    delete out[legacy];
  }
  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function parseConfig(data: unknown, source = "<inline>"): Config {
  const input = isRecord(data) ? migrateConfig(data) : data;
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(source, result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`));
  }
  return result.data;
}

export function loadConfig(configPath?: string): Config {
  const p = configPath ?? getConfigPath();
  if (!fs.existsSync(p)) return parseConfig({}, p);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(p, "utf8"));
  } catch (err) {
    throw new ConfigError(p, [`not valid JSON (${String(err)})`]);
  }
  return parseConfig(raw, p);
}

export function saveConfig(config: Config, configPath?: string): void {
  const p = configPath ?? getConfigPath();
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, JSON.stringify(config, null, 2), "utf8");
}
