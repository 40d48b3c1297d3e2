import { formatDuration, parseDuration } from "../core/duration.js";
import { ScheduleExhaustedError } from "../core/errors.js";
import { CronExpression } from "./cron-expression.js";

/** Computes successive activation instants. `next(t)` is always later than `t`. */
export interface Schedule {
  next(prev: Date): Date;
}

export interface ParseOptions {
  /** Zone cron fields are matched in. Ignored by "@every". Defaults to "UTC". */
  timezone?: string;
}

const EVERY_PREFIX = "@every";

/** A schedule that activates once every `step` milliseconds, on whole seconds. */
export class FixedInterval implements Schedule {
  readonly step: number;

  constructor(ms: number) {
    const floored = Math.floor(ms / 1000) * 1000;
    this.step = floored < 1000 ? 1000 : floored;
  }

  next(prev: Date): Date {
    const next = truncateToSecond(prev.getTime() + this.step);
    if (Number.isNaN(next.getTime())) {
      throw new ScheduleExhaustedError(this.toString(), prev);
    }
    return next;
  }

  toString(): string {
    return `${EVERY_PREFIX} ${formatDuration(this.step)}`;
  }
}

/**
 * Schedule that activates once every `ms` milliseconds. The interval is floored
 * to whole seconds, and anything under one second becomes one second.
 */
export function every(ms: number): FixedInterval {
  return new FixedInterval(ms);
}

/**
 * Parse a schedule expression: either "@every <duration>" or a cron expression.
 * Throws ParseError on malformed input.
 */
export function parse(expr: string, options: ParseOptions = {}): Schedule {
  const trimmed = expr.trim();
  if (trimmed.startsWith(EVERY_PREFIX)) {
    return every(parseDuration(trimmed.slice(EVERY_PREFIX.length).trim()));
  }
  return new CronExpression(trimmed, options.timezone);
}

function truncateToSecond(ms: number): Date {
  return new Date(Math.floor(ms / 1000) * 1000);
}
