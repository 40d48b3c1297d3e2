import { IANAZone } from "luxon";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export type ErrorHandler = (err: Error) => void;

export interface CronOptions {
  /**
   * Zone cron fields are matched in: "Local", "UTC" or an IANA name such as
   * "Asia/Shanghai". Defaults to "UTC".
   */
  timezone?: string;
  /**
   * Milliseconds after which an obtained lock releases itself. It bounds the
   * clock skew tolerated between instances and must stay below the interval of
   * every job. Defaults to 1000.
   */
  lockTtl?: number;
  /** Receives every error raised after a timer fires. Defaults to a no-op. */
  errorHandler?: ErrorHandler;
}

export interface ResolvedOptions {
  timezone: string;
  lockTtl: number;
  errorHandler: ErrorHandler;
}

export const DEFAULT_TIMEZONE = "UTC";
export const DEFAULT_LOCK_TTL = 1000;

const optionsSchema = z.object({
  timezone: z.string().trim().min(1).default(DEFAULT_TIMEZONE),
  lockTtl: z.number().int().positive().default(DEFAULT_LOCK_TTL),
});

/** True for "Local", "UTC" and any zone in the IANA database. */
export function isValidTimezone(name: string): boolean {
  return name === "Local" || name === "UTC" || IANAZone.isValidZone(name);
}

/**
 * Zone identifier in the form the date libraries take: undefined means the
 * host's local zone.
 */
export function zoneOf(timezone: string): string | undefined {
  return timezone === "Local" ? undefined : timezone;
}

export function resolveOptions(opts: CronOptions = {}): ResolvedOptions {
  const parsed = optionsSchema.safeParse({
    timezone: opts.timezone,
    lockTtl: opts.lockTtl,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "options";
    throw new ConfigError(`invalid ${field}: ${issue?.message ?? "invalid value"}`);
  }
  const { timezone, lockTtl } = parsed.data;
  if (!isValidTimezone(timezone)) {
    throw new ConfigError(`unknown time zone "${timezone}"`);
  }
  return {
    timezone,
    lockTtl,
    errorHandler: opts.errorHandler ?? (() => {}),
  };
}
