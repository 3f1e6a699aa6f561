import { nanoid } from "nanoid";
import type { Config } from "../config/schema.js";
import { FormatError, ScheduleError, errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { CronExpression } from "./expression.js";
import type { RejectedTrigger, TriggerCategory, TriggerState } from "./types.js";

export const FIELD_SEPARATOR = "::";

export interface ParseOptions {
  now?: () => number;
  logger?: Logger;
}

export interface ParseResult {
  triggers: TriggerState[];
  rejected: RejectedTrigger[];
}

/**
 * Parses one `channel::target::provider::cron::prompt` string.
 * Everything after the fourth separator is the prompt, separators included.
 */
export function parseTriggerSpec(raw: string, category: TriggerCategory, now: number): TriggerState {
  const parts = raw.split(FIELD_SEPARATOR);
  if (parts.length < 5) throw new FormatError(raw);
  const [channel, destinationId, providerName, cronExpression] = parts.map((p) => p.trim());
  if (!channel || !destinationId || !providerName) {
    throw new FormatError(raw, `channel, target and provider must be non-empty in '${raw}'`);
  }
  const expression = CronExpression.parse(cronExpression);
  return {
    definition: {
      id: nanoid(8),
      category,
      channel,
      destinationId,
      providerName,
      cronExpression: expression.source,
      prompt: parts.slice(4).join(FIELD_SEPARATOR),
    },
    expression,
    nextRunAtMs: expression.next(now),
    lastRunAtMs: null,
  };
}

export function parseTriggerSpecs(raws: readonly string[], category: TriggerCategory, options: ParseOptions = {}): ParseResult {
  const log = options.logger ?? createLogger("scheduler");
  const now = options.now ?? Date.now;
  const result: ParseResult = { triggers: [], rejected: [] };
  for (const raw of raws) {
    try {
      const state = parseTriggerSpec(raw, category, now());
      result.triggers.push(state);
      const d = state.definition;
      log.info(`Added ${category} trigger ${d.id}: ${d.channel}:${d.destinationId}, cron: ${d.cronExpression}, next run: ${new Date(state.nextRunAtMs).toISOString()}`);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      result.rejected.push({ raw, category, error });
      if (err instanceof FormatError) log.warn(`Skipping malformed ${category} trigger: ${errorMessage(err)}`);
      else if (err instanceof ScheduleError) log.error(`Skipping ${category} trigger with ${errorMessage(err)}`);
      else log.error(`Failed to parse ${category} trigger '${raw}': ${errorMessage(err)}`);
    }
  }
  return result;
}

/** Rooms first, then direct recipients, each in config order. */
export function loadTriggers(config: Pick<Config, "platformGroupProviderMap" | "platformFriendProviderMap">, options: ParseOptions = {}): ParseResult {
  const rooms = parseTriggerSpecs(config.platformGroupProviderMap, "room", options);
  const direct = parseTriggerSpecs(config.platformFriendProviderMap, "direct", options);
  return {
    triggers: [...rooms.triggers, ...direct.triggers],
    rejected: [...rooms.rejected, ...direct.rejected],
  };
}
