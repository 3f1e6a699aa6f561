import { afterEach, describe, expect, test, vi } from "vitest";
import { TriggerScheduler } from "../src/cron/service.js";
import type { ExecutionOutcome, TriggerState } from "../src/cron/types.js";
import { MemoryLogger, localMs, makeState } from "./helpers.js";

const LOADED = localMs(2024, 1, 15, 10, 2, 30);

function executorMock(impl: (state: TriggerState) => Promise<ExecutionOutcome> = async () => "delivered") {
  return { execute: vi.fn<(state: TriggerState) => Promise<ExecutionOutcome>>(impl) };
}

describe("trigger scheduler", () => {
  let scheduler: TriggerScheduler | undefined;

  afterEach(async () => {
    await scheduler?.stop();
    scheduler = undefined;
  });

  test("fires due triggers once and reschedules from the scan instant", async () => {
    const every5 = makeState("p1::g1::a::*/5 * * * *::x", "room", LOADED);
    const hourly = makeState("p1::g2::a::0 * * * *::y", "room", LOADED);
    const executor = executorMock();
    scheduler = new TriggerScheduler({ triggers: [every5, hourly], executor, logger: new MemoryLogger() });

    const late = localMs(2024, 1, 15, 10, 7);
    expect(await scheduler.scan(late)).toBe(1);
    expect(executor.execute).toHaveBeenCalledWith(every5);
    expect(every5.lastRunAtMs).toBe(late);
    expect(every5.nextRunAtMs).toBe(localMs(2024, 1, 15, 10, 10));
    expect(hourly.lastRunAtMs).toBeNull();
    expect(hourly.nextRunAtMs).toBe(localMs(2024, 1, 15, 11));

    expect(await scheduler.scan(late)).toBe(0);
    expect(executor.execute).toHaveBeenCalledTimes(1);
  });

  test("a long outage fires each trigger once, not once per missed window", async () => {
    const every5 = makeState("p1::g1::a::*/5 * * * *::x", "room", LOADED);
    const executor = executorMock();
    scheduler = new TriggerScheduler({ triggers: [every5], executor, logger: new MemoryLogger() });

    expect(await scheduler.scan(localMs(2024, 1, 15, 13, 0, 30))).toBe(1);
    expect(executor.execute).toHaveBeenCalledTimes(1);
    expect(every5.nextRunAtMs).toBe(localMs(2024, 1, 15, 13, 5));
  });

  test("failures and throws still advance the schedule and do not stop the scan", async () => {
    const a = makeState("p1::g1::a::*/5 * * * *::x", "room", LOADED);
    const b = makeState("p1::g2::a::*/5 * * * *::y", "room", LOADED);
    const c = makeState("p1::g3::a::*/5 * * * *::z", "room", LOADED);
    const logger = new MemoryLogger();
    const executor = executorMock(async (state) => {
      if (state === a) throw new Error("unexpected");
      return state === b ? "failed" : "delivered";
    });
    scheduler = new TriggerScheduler({ triggers: [a, b, c], executor, logger });

    const now = localMs(2024, 1, 15, 10, 5);
    expect(await scheduler.scan(now)).toBe(3);
    expect(executor.execute.mock.calls.map(([s]) => s.definition.destinationId)).toEqual(["g1", "g2", "g3"]);
    for (const s of [a, b, c]) {
      expect(s.lastRunAtMs).toBe(now);
      expect(s.nextRunAtMs).toBe(localMs(2024, 1, 15, 10, 10));
    }
    expect(logger.at("error")).toEqual([`Trigger ${a.definition.id} raised: unexpected`]);
  });

  test("runAll fires everything without touching the schedule", async () => {
    const a = makeState("p1::g1::a::*/5 * * * *::x", "room", LOADED);
    const b = makeState("p1::g2::a::0 9 * * *::y", "direct", LOADED);
    const c = makeState("p1::g3::missing::0 9 * * *::z", "room", LOADED);
    const executor = executorMock(async (state) => (state === c ? "skipped" : "delivered"));
    scheduler = new TriggerScheduler({ triggers: [a, b, c], executor, logger: new MemoryLogger() });

    expect(await scheduler.runAll()).toEqual({ success: 2, total: 3 });
    expect(a.nextRunAtMs).toBe(localMs(2024, 1, 15, 10, 5));
    expect(a.lastRunAtMs).toBeNull();
    expect(b.nextRunAtMs).toBe(localMs(2024, 1, 16, 9));
  });

  test("runAll on an empty scheduler", async () => {
    scheduler = new TriggerScheduler({ triggers: [], executor: executorMock(), logger: new MemoryLogger() });
    expect(await scheduler.runAll()).toEqual({ success: 0, total: 0 });
    expect(scheduler.size).toBe(0);
  });

  test("overlapping scans are serialized", async () => {
    const a = makeState("p1::g1::a::*/5 * * * *::x", "room", LOADED);
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const executor = executorMock(async () => {
      await gate;
      return "delivered";
    });
    scheduler = new TriggerScheduler({ triggers: [a], executor, logger: new MemoryLogger() });

    const now = localMs(2024, 1, 15, 10, 5);
    const first = scheduler.scan(now);
    const second = scheduler.scan(now);
    release();
    expect(await first).toBe(1);
    expect(await second).toBe(0);
    expect(executor.execute).toHaveBeenCalledTimes(1);
  });

  test("list reports the current schedule", () => {
    const a = makeState("p1::g1::a::*/5 * * * *::x", "room", LOADED);
    scheduler = new TriggerScheduler({ triggers: [a], executor: executorMock(), intervalMs: 5000, logger: new MemoryLogger() });
    expect(scheduler.intervalMs).toBe(5000);
    expect(scheduler.list()).toEqual([
      {
        id: a.definition.id,
        category: "room",
        channel: "p1",
        destinationId: "g1",
        providerName: "a",
        cronExpression: "*/5 * * * *",
        nextRunAtMs: localMs(2024, 1, 15, 10, 5),
        lastRunAtMs: null,
      },
    ]);
  });

  test("the loop scans on its interval using the injected clock", async () => {
    const a = makeState("p1::g1::a::*/5 * * * *::x", "room", LOADED);
    const executor = executorMock();
    const logger = new MemoryLogger();
    scheduler = new TriggerScheduler({ triggers: [a], executor, intervalMs: 5, now: () => localMs(2024, 1, 15, 10, 5), logger });

    await scheduler.start();
    expect(scheduler.isRunning).toBe(true);
    await vi.waitFor(() => expect(executor.execute).toHaveBeenCalledTimes(1));
    expect(a.nextRunAtMs).toBe(localMs(2024, 1, 15, 10, 10));

    await scheduler.stop();
    expect(scheduler.state).toBe("terminated");
    expect(scheduler.isRunning).toBe(false);
    expect(executor.execute).toHaveBeenCalledTimes(1);
    expect(logger.at("info")[0]).toBe("Scheduler started with 1 trigger(s), checking every 0.005s");
    expect(logger.at("info").at(-1)).toBe("Scheduler stopped");
  });

  test("stopping mid-scan leaves the remaining due triggers for later", async () => {
    const a = makeState("p1::g1::a::*/5 * * * *::x", "room", LOADED);
    const b = makeState("p1::g2::a::*/5 * * * *::y", "room", LOADED);
    const now = localMs(2024, 1, 15, 10, 5);
    const logger = new MemoryLogger();
    let stopping: Promise<void> | undefined;
    const executor = executorMock(async () => {
      stopping ??= scheduler?.stop();
      return "delivered";
    });
    scheduler = new TriggerScheduler({ triggers: [a, b], executor, intervalMs: 5, now: () => now, logger });

    await scheduler.start();
    await vi.waitFor(() => expect(stopping).toBeDefined());
    await stopping;

    expect(executor.execute).toHaveBeenCalledTimes(1);
    expect(executor.execute).toHaveBeenCalledWith(a);
    expect(a.lastRunAtMs).toBe(now);
    expect(b.lastRunAtMs).toBeNull();
    expect(b.nextRunAtMs).toBe(now);
    expect(scheduler.state).toBe("terminated");
    expect(logger.at("info")).toContain("Scan cancelled");
  });

  test("a failing cycle is logged and the loop keeps going", async () => {
    const a = makeState("p1::g1::a::*/5 * * * *::x", "room", LOADED);
    const executor = executorMock();
    const logger = new MemoryLogger();
    let reads = 0;
    const now = (): number => {
      reads++;
      if (reads === 1) throw new Error("clock");
      return localMs(2024, 1, 15, 10, 5);
    };
    scheduler = new TriggerScheduler({ triggers: [a], executor, intervalMs: 5, now, logger });

    await scheduler.start();
    await vi.waitFor(() => expect(executor.execute).toHaveBeenCalledTimes(1));
    await scheduler.stop();

    expect(logger.at("error")).toEqual(["scheduler cycle failed: clock"]);
    expect(a.lastRunAtMs).toBe(localMs(2024, 1, 15, 10, 5));
    expect(scheduler.state).toBe("terminated");
  });

  test("stop interrupts the sleep promptly", async () => {
    const executor = executorMock();
    scheduler = new TriggerScheduler({ triggers: [makeState("p1::g1::a::* * * * *::x")], executor, intervalMs: 60_000, logger: new MemoryLogger() });

    await scheduler.start();
    await scheduler.start();
    expect(scheduler.state).toBe("sleeping");
    await scheduler.stop();
    expect(scheduler.state).toBe("terminated");
    expect(executor.execute).not.toHaveBeenCalled();
  });
});
