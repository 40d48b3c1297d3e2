/**
 * Error taxonomy. Registration and construction errors are thrown to the caller;
 * errors raised after a timer fires are wrapped here and handed to the
 * configured error handler, since nobody is on the stack to catch them.
 */

export type SchedulerErrorCode =
  | "ALREADY_EXISTS"
  | "PARSE_ERROR"
  | "CONFIG_ERROR"
  | "REGISTRY_STATE"
  | "LOCK_BACKEND"
  | "TASK_FAILED"
  | "SCHEDULE_EXHAUSTED";

export class SchedulerError extends Error {
  readonly code: SchedulerErrorCode;

  constructor(code: SchedulerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A job with the same name is already registered. */
export class AlreadyExistsError extends SchedulerError {
  readonly job: string;

  constructor(job: string) {
    super("ALREADY_EXISTS", `add job ${job}: already exists`);
    this.job = job;
  }
}

/** Malformed schedule expression or duration literal. */
export class ParseError extends SchedulerError {
  readonly input: string;
  readonly reason: string;
  /** Set when the expression belonged to a job being registered. */
  readonly job?: string;

  constructor(input: string, reason: string, options?: ErrorOptions & { job?: string }) {
    const prefix = options?.job === undefined ? "" : `add job ${options.job}: `;
    super("PARSE_ERROR", `${prefix}parse "${input}": ${reason}`, options);
    this.input = input;
    this.reason = reason;
    this.job = options?.job;
  }

  /** The same error, attributed to a job. */
  forJob(job: string): ParseError {
    return new ParseError(this.input, this.reason, { cause: this.cause, job });
  }
}

export class ConfigError extends SchedulerError {
  constructor(message: string, options?: ErrorOptions) {
    super("CONFIG_ERROR", message, options);
  }
}

/** Registration after start, or a second start. */
export class RegistryStateError extends SchedulerError {
  constructor(message: string) {
    super("REGISTRY_STATE", message);
  }
}

export class LockBackendError extends SchedulerError {
  readonly job: string;

  constructor(job: string, cause: unknown) {
    super("LOCK_BACKEND", `lock job ${job}: ${errorMessage(cause)}`, { cause });
    this.job = job;
  }
}

export class TaskError extends SchedulerError {
  readonly job: string;
  readonly scheduledAt: Date;

  constructor(job: string, scheduledAt: Date, cause: unknown) {
    super("TASK_FAILED", `run job ${job}: ${errorMessage(cause)}`, { cause });
    this.job = job;
    this.scheduledAt = scheduledAt;
  }
}

/** The schedule has no activation after the given instant. Fatal for the job. */
export class ScheduleExhaustedError extends SchedulerError {
  readonly after: Date;

  constructor(expr: string, after: Date, options?: ErrorOptions) {
    super(
      "SCHEDULE_EXHAUSTED",
      `schedule "${expr}" has no activation after ${after.toISOString()}`,
      options,
    );
    this.after = after;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Normalize anything thrown into an Error instance. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
