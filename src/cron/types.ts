import type { CronExpression } from "./expression.js";

export type TriggerCategory = "room" | "direct";

export interface TriggerDefinition {
  readonly id: string;
  readonly category: TriggerCategory;
  readonly channel: string;
  readonly destinationId: string;
  readonly providerName: string;
  readonly cronExpression: string;
  readonly prompt: string;
}

export interface TriggerState {
  readonly definition: TriggerDefinition;
  readonly expression: CronExpression;
  nextRunAtMs: number;
  lastRunAtMs: number | null;
}

export interface RejectedTrigger {
  raw: string;
  category: TriggerCategory;
  error: Error;
}

export type ExecutionOutcome = "delivered" | "empty" | "skipped" | "failed";

export type SchedulerPhase = "idle" | "sleeping" | "scanning" | "terminated";

export interface TriggerSnapshot {
  id: string;
  category: TriggerCategory;
  channel: string;
  destinationId: string;
  providerName: string;
  cronExpression: string;
  nextRunAtMs: number;
  lastRunAtMs: number | null;
}
