import { describe, expect, test } from "vitest";
import { CronExpression } from "../src/cron/expression.js";
import { ScheduleError } from "../src/errors.js";
import { localMs } from "./helpers.js";

describe("cron expression", () => {
  test("steps land on the next multiple", () => {
    const expr = CronExpression.parse("*/5 * * * *");
    expect(expr.next(localMs(2024, 1, 15, 10, 2, 30))).toBe(localMs(2024, 1, 15, 10, 5));
  });

  test("a reference on a matching minute moves to the following match", () => {
    const expr = CronExpression.parse("*/5 * * * *");
    expect(expr.next(localMs(2024, 1, 15, 10, 5))).toBe(localMs(2024, 1, 15, 10, 10));
  });

  test("weekday ranges skip the weekend", () => {
    const expr = CronExpression.parse("30 9 * * 1-5");
    // 2024-01-06 is a Saturday
    expect(expr.next(localMs(2024, 1, 6, 12))).toBe(localMs(2024, 1, 8, 9, 30));
  });

  test("comma lists and months", () => {
    expect(CronExpression.parse("0 12 1,15 * *").next(localMs(2024, 1, 1, 13))).toBe(localMs(2024, 1, 15, 12));
    expect(CronExpression.parse("0 0 1 3 *").next(localMs(2024, 1, 10))).toBe(localMs(2024, 3, 1));
  });

  test("restricted day-of-month and day-of-week combine with OR", () => {
    const expr = CronExpression.parse("0 0 13 * 5");
    const first = expr.next(localMs(2024, 1, 1));
    const second = expr.next(first);
    const third = expr.next(second);
    // Fridays 5th and 12th, then Saturday the 13th
    expect([first, second, third]).toEqual([localMs(2024, 1, 5), localMs(2024, 1, 12), localMs(2024, 1, 13)]);
  });

  test("next is strictly increasing when chained", () => {
    const refs = [localMs(2024, 1, 15, 10, 2, 30), localMs(2024, 2, 29, 23, 59, 59), localMs(2024, 12, 31, 23, 59)];
    for (const source of ["* * * * *", "*/7 * * * *", "0 */2 * * *", "15 3 * * 0", "0 0 1 * *"]) {
      const expr = CronExpression.parse(source);
      for (const ref of refs) {
        const a = expr.next(ref);
        const b = expr.next(a);
        expect(a).toBeGreaterThan(ref);
        expect(b).toBeGreaterThan(a);
      }
    }
  });

  test("same inputs give the same answer", () => {
    const expr = CronExpression.parse("0 9 * * *");
    const ref = localMs(2024, 1, 15, 10);
    expect(expr.next(ref)).toBe(expr.next(ref));
    expect(expr.next(localMs(2024, 1, 15, 8))).toBe(localMs(2024, 1, 15, 9));
  });

  test("normalizes whitespace", () => {
    expect(CronExpression.parse("  */5   *  * * * ").source).toBe("*/5 * * * *");
  });

  test("rejects the wrong field count", () => {
    expect(() => CronExpression.parse("* * * *")).toThrow("expected 5 fields (minute hour day-of-month month day-of-week), got 4");
    expect(() => CronExpression.parse("0 * * * * *")).toThrow(ScheduleError);
    expect(() => CronExpression.parse("")).toThrow("got 0");
  });

  test.each(["99 * * * *", "* 24 * * *", "* * 32 * *", "* * * 13 *", "* * * * 8"])("rejects out-of-range '%s'", (source) => {
    expect(() => CronExpression.parse(source)).toThrow(ScheduleError);
  });

  test("month and weekday names", () => {
    // 2024-01-06 is a Saturday
    expect(CronExpression.parse("0 9 * * mon-fri").next(localMs(2024, 1, 6, 12))).toBe(localMs(2024, 1, 8, 9));
    expect(CronExpression.parse("0 0 1 MAR *").next(localMs(2024, 1, 10))).toBe(localMs(2024, 3, 1));
  });

  test.each([
    ["0 0 L * *", "unsupported syntax 'L' in day-of-month field"],
    ["0 0 15W * *", "unsupported syntax '15W' in day-of-month field"],
    ["0 0 * * 5#2", "unsupported syntax '5#2' in day-of-week field"],
    ["0 0 * * 5L", "unsupported syntax '5L' in day-of-week field"],
    ["0 0 ? * 1", "unsupported syntax '?' in day-of-month field"],
  ])("rejects extended syntax '%s'", (source, reason) => {
    expect(() => CronExpression.parse(source)).toThrow(`invalid cron expression '${source}': ${reason}`);
  });

  test("a full day-of-month range leaves only the weekday restriction", () => {
    const expr = CronExpression.parse("0 0 1-31 * 5");
    expect(expr.next(localMs(2024, 1, 1))).toBe(localMs(2024, 1, 5));
  });

  test("error names the expression", () => {
    expect(() => CronExpression.parse("99 * * * *")).toThrow("invalid cron expression '99 * * * *'");
  });
});
