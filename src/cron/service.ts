import { LoopError, errorMessage } from "../errors.js";
import { formatTime, sleep } from "../utils/helpers.js";
import { createLogger, type Logger } from "../utils/logger.js";
import type { TriggerExecutor } from "./executor.js";
import type { ExecutionOutcome, SchedulerPhase, TriggerSnapshot, TriggerState } from "./types.js";

export interface TriggerSchedulerOptions {
  triggers: TriggerState[];
  executor: Pick<TriggerExecutor, "execute">;
  /** Poll cadence; defaults to 30 s. */
  intervalMs?: number;
  now?: () => number;
  logger?: Logger;
}

export interface TestRunResult {
  success: number;
  total: number;
}

export function snapshotTrigger({ definition: d, nextRunAtMs, lastRunAtMs }: TriggerState): TriggerSnapshot {
  return {
    id: d.id,
    category: d.category,
    channel: d.channel,
    destinationId: d.destinationId,
    providerName: d.providerName,
    cronExpression: d.cronExpression,
    nextRunAtMs,
    lastRunAtMs,
  };
}

/**
 * Polls the trigger list on a fixed cadence and fires whatever is due.
 *
 * Scans, forced runs and the loop share one promise-chain lock, so trigger
 * state is only ever touched by one scan at a time. Executions inside a scan
 * run one after another, in config order.
 */
export class TriggerScheduler {
  private readonly triggers: TriggerState[];
  private readonly executor: Pick<TriggerExecutor, "execute">;
  private readonly now: () => number;
  private readonly log: Logger;
  readonly intervalMs: number;

  private phase: SchedulerPhase = "idle";
  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private lock: Promise<unknown> = Promise.resolve();

  constructor(options: TriggerSchedulerOptions) {
    this.triggers = options.triggers;
    this.executor = options.executor;
    this.intervalMs = options.intervalMs ?? 30_000;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger("scheduler");
  }

  get state(): SchedulerPhase {
    return this.phase;
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  async start(): Promise<void> {
    if (this.loop) return;
    this.phase = "idle";
    this.abort = new AbortController();
    this.loop = this.run(this.abort.signal);
  }

  /** Cancels the sleeping (or scanning) loop and resolves once it has exited. */
  async stop(): Promise<void> {
    if (!this.loop) return;
    this.abort?.abort();
    await this.loop;
    this.loop = null;
    this.abort = null;
  }

  /** One pass over the triggers at `now`; resolves to the number fired. */
  scan(now?: number): Promise<number> {
    return this.exclusive(() => this.scanEntries(now ?? this.now()));
  }

  /** Fires every trigger once, ignoring schedules and leaving next/last run untouched. */
  runAll(): Promise<TestRunResult> {
    return this.exclusive(async () => {
      let success = 0;
      for (const state of this.triggers) {
        if ((await this.executeIsolated(state)) === "delivered") success++;
      }
      return { success, total: this.triggers.length };
    });
  }

  list(): TriggerSnapshot[] {
    return this.triggers.map(snapshotTrigger);
  }

  get size(): number {
    return this.triggers.length;
  }

  private async run(signal: AbortSignal): Promise<void> {
    this.log.info(`Scheduler started with ${this.triggers.length} trigger(s), checking every ${this.intervalMs / 1000}s`);
    while (!signal.aborted) {
      this.phase = "sleeping";
      if (!(await sleep(this.intervalMs, signal))) break;
      this.phase = "scanning";
      try {
        await this.exclusive(() => this.scanEntries(this.now(), signal));
      } catch (err) {
        this.log.error(new LoopError(`scheduler cycle failed: ${errorMessage(err)}`, { cause: err }).message);
      }
    }
    this.phase = "terminated";
    this.log.info("Scheduler stopped");
  }

  private async scanEntries(now: number, signal?: AbortSignal): Promise<number> {
    let fired = 0;
    for (const state of this.triggers) {
      if (signal?.aborted) {
        this.log.info("Scan cancelled");
        break;
      }
      if (state.nextRunAtMs > now) continue;

      const d = state.definition;
      this.log.info(`Running trigger ${d.id}: ${d.channel}:${d.destinationId} (${d.cronExpression})`);
      await this.executeIsolated(state);
      // Recomputed from the scan instant whatever the outcome: at most one firing per due window.
      state.lastRunAtMs = now;
      state.nextRunAtMs = state.expression.next(now);
      fired++;
      this.log.info(`Trigger ${d.id} done, next run: ${formatTime(state.nextRunAtMs)}`);
    }
    return fired;
  }

  private async executeIsolated(state: TriggerState): Promise<ExecutionOutcome> {
    try {
      return await this.executor.execute(state);
    } catch (err) {
      this.log.error(`Trigger ${state.definition.id} raised: ${errorMessage(err)}`);
      return "failed";
    }
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.lock.then(fn);
    this.lock = next.catch(() => undefined);
    return next;
  }
}
