import cronParser from "cron-parser";
import { DateTime } from "luxon";
import { ParseError, ScheduleExhaustedError, errorMessage } from "../core/errors.js";
import { zoneOf } from "../core/options.js";
import type { Schedule } from "./schedule.js";

/** Presets, expanded to seven fields: sec min hour dom month dow year. */
const ALIASES: Record<string, string> = {
  "@annually": "0 0 0 1 1 * *",
  "@yearly": "0 0 0 1 1 * *",
  "@monthly": "0 0 0 1 * * *",
  "@weekly": "0 0 0 * * 0 *",
  "@daily": "0 0 0 * * * *",
  "@hourly": "0 0 * * * * *",
};

const MIN_YEAR = 1970;
const MAX_YEAR = 2099;
const END_OF_RANGE = new Date(Date.UTC(MAX_YEAR + 1, 0, 1));

/**
 * Cron expression evaluated in a fixed time zone.
 *
 * Accepted shapes:
 * - 5 fields: minute hour day-of-month month day-of-week (second is 0)
 * - 6 fields: second minute hour day-of-month month day-of-week
 * - 7 fields: the six above plus year (1970-2099)
 *
 * The first six fields are matched by cron-parser; the year field is applied
 * on top of it by skipping whole years.
 */
export class CronExpression implements Schedule {
  readonly source: string;
  readonly timezone: string;
  private readonly body: string;
  private readonly years: number[] | null;

  constructor(expr: string, timezone = "UTC") {
    this.source = expr.trim();
    this.timezone = timezone;

    const expanded = ALIASES[this.source.toLowerCase()] ?? this.source;
    if (expanded.startsWith("@")) {
      throw new ParseError(expr, `unknown alias "${expanded}"`);
    }
    const fields = expanded.split(/\s+/).filter((f) => f !== "");
    switch (fields.length) {
      case 5:
        fields.unshift("0");
        break;
      case 6:
      case 7:
        break;
      default:
        throw new ParseError(expr, `expected 5, 6 or 7 fields, got ${fields.length}`);
    }

    const yearField = fields[6];
    this.years = yearField === undefined ? null : parseYearField(expr, yearField);
    this.body = fields.slice(0, 6).join(" ");

    try {
      cronParser.parseExpression(this.body, { tz: zoneOf(timezone) });
    } catch (err) {
      throw new ParseError(expr, errorMessage(err), { cause: err });
    }
  }

  next(prev: Date): Date {
    const zone = zoneOf(this.timezone) ?? "system";
    let after = prev;
    for (;;) {
      const candidate = this.nextIgnoringYear(after, prev);
      if (this.years === null) return candidate;

      const year = DateTime.fromJSDate(candidate, { zone }).year;
      if (this.years.includes(year)) return candidate;

      const nextYear = this.years.find((y) => y > year);
      if (nextYear === undefined) {
        throw new ScheduleExhaustedError(this.source, prev);
      }
      // One second before the year starts, so its first instant is still "after".
      after = DateTime.fromObject({ year: nextYear }, { zone })
        .minus({ seconds: 1 })
        .toJSDate();
    }
  }

  toString(): string {
    return this.source;
  }

  private nextIgnoringYear(after: Date, prev: Date): Date {
    let next: Date;
    try {
      next = cronParser
        .parseExpression(this.body, {
          currentDate: after,
          endDate: END_OF_RANGE,
          tz: zoneOf(this.timezone),
        })
        .next()
        .toDate();
    } catch (err) {
      throw new ScheduleExhaustedError(this.source, prev, { cause: err });
    }
    if (next.getTime() <= prev.getTime()) {
      throw new ScheduleExhaustedError(this.source, prev);
    }
    return next;
  }
}

function parseYearField(expr: string, field: string): number[] {
  const years = new Set<number>();
  for (const part of field.split(",")) {
    const [range = "", stepRaw] = part.split("/");
    let step = 1;
    if (stepRaw !== undefined) {
      step = toYearNumber(expr, stepRaw, 1, MAX_YEAR - MIN_YEAR);
    }

    let start: number;
    let end: number;
    if (range === "*" || range === "?") {
      start = MIN_YEAR;
      end = MAX_YEAR;
    } else if (range.includes("-")) {
      const [a = "", b = ""] = range.split("-");
      start = toYearNumber(expr, a, MIN_YEAR, MAX_YEAR);
      end = toYearNumber(expr, b, MIN_YEAR, MAX_YEAR);
      if (start > end) {
        throw new ParseError(expr, `invalid year range "${range}"`);
      }
    } else {
      start = toYearNumber(expr, range, MIN_YEAR, MAX_YEAR);
      end = stepRaw === undefined ? start : MAX_YEAR;
    }

    for (let y = start; y <= end; y += step) years.add(y);
  }
  return [...years].sort((a, b) => a - b);
}

function toYearNumber(expr: string, raw: string, min: number, max: number): number {
  if (!/^\d+$/.test(raw)) {
    throw new ParseError(expr, `invalid year value "${raw}"`);
  }
  const n = Number(raw);
  if (n < min || n > max) {
    throw new ParseError(expr, `year value ${n} out of range (${min}-${max})`);
  }
  return n;
}
