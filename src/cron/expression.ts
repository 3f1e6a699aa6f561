import parser from "cron-parser";
import { ScheduleError, errorMessage } from "../errors.js";

const FIELD_NAMES = ["minute", "hour", "day-of-month", "month", "day-of-week"] as const;

/**
 * A validated 5-field cron expression evaluated against the host clock.
 *
 * Fields take numbers, `*`, ranges, steps, lists, and month or weekday names.
 * `L`, `W`, `#` and `?` are rejected. When day-of-month and day-of-week are
 * both restricted a day matching either one fires, but a day-of-month range
 * spanning 1-31 counts as unrestricted, so `0 0 1-31 * 5` means Fridays only.
 *
 * Holds nothing but the source text: every `next()` call starts a fresh
 * cron-parser iterator at the given reference, so calls can be made in any
 * order.
 */
export class CronExpression {
  private constructor(readonly source: string) {}

  static parse(expr: string): CronExpression {
    const source = expr.trim().replace(/\s+/g, " ");
    const fields = source ? source.split(" ") : [];
    if (fields.length !== FIELD_NAMES.length) {
      throw new ScheduleError(expr, `expected ${FIELD_NAMES.length} fields (${FIELD_NAMES.join(" ")}), got ${fields.length}`);
    }
    fields.forEach((field, i) => {
      if (/[^0-9*,\-/]/.test(field.replace(/\b[a-z]{3}\b/gi, ""))) {
        throw new ScheduleError(expr, `unsupported syntax '${field}' in ${FIELD_NAMES[i]} field`);
      }
    });
    try {
      parser.parseExpression(source);
    } catch (err) {
      throw new ScheduleError(expr, errorMessage(err), { cause: err });
    }
    return new CronExpression(source);
  }

  /** Earliest matching minute strictly after `reference` (epoch ms). */
  next(reference: number): number {
    const it = parser.parseExpression(this.source, { currentDate: new Date(reference) });
    return it.next().toDate().getTime();
  }

  toString(): string {
    return this.source;
  }
}
