import createDebug from "debug";
import {
  AlreadyExistsError,
  ConfigError,
  ParseError,
  RegistryStateError,
  errorMessage,
} from "../core/errors.js";
import { resolveOptions, type CronOptions, type ResolvedOptions } from "../core/options.js";
import type { Locker } from "../locker/locker.js";
import { FixedInterval, parse, type Schedule } from "../schedule/schedule.js";
import { Job, type JobState, type Task } from "./job.js";

const debug = createDebug("tickguard:cron");

/** A job as handed to Cron.addJob. */
export interface JobDefinition {
  /** Unique name of the job; also the key it is locked under. */
  name: string;
  /**
   * Schedule expression, either "@every <duration>" (e.g. "@every 1h30m") or a
   * cron expression with 5, 6 or 7 fields, or one of the presets "@annually",
   * "@yearly", "@monthly", "@weekly", "@daily", "@hourly".
   *
   * The interval between activations must be longer than the lock TTL.
   */
  expr: string;
  task: Task;
}

export interface JobInfo {
  name: string;
  state: JobState;
  nextRun: Date | null;
}

type Lifecycle = "created" | "started" | "stopped";

/**
 * Registry of uniquely named jobs that fire on every instance holding the same
 * definitions, each activation running on only the instance that wins the lock.
 *
 * Jobs are registered before start(). A Cron is started once and cannot be
 * restarted after stop().
 */
export class Cron {
  private readonly jobsByName = new Map<string, Job>();
  private readonly locker: Locker;
  private readonly options: ResolvedOptions;
  private lifecycle: Lifecycle = "created";

  /** Throws ConfigError for an unknown time zone or an invalid lock TTL. */
  constructor(locker: Locker, opts?: CronOptions) {
    this.locker = locker;
    this.options = resolveOptions(opts);
  }

  /**
   * Register a job. Throws AlreadyExistsError if `name` is taken, leaving the
   * registered job as it was, and ParseError if `expr` is malformed.
   */
  add(name: string, expr: string, task: Task): void {
    this.addJob({ name, expr, task });
  }

  /**
   * Register one or more jobs. Every name is checked against the registry and
   * the rest of the batch, and every expression parsed, before anything is
   * stored: on error no job from the batch is registered.
   */
  addJob(...defs: JobDefinition[]): void {
    this.assertLifecycle("created", "register jobs");

    const seen = new Set<string>();
    const built: Job[] = [];
    for (const def of defs) {
      if (def.name.trim() === "") {
        throw new ConfigError("job name must not be empty");
      }
      if (this.jobsByName.has(def.name) || seen.has(def.name)) {
        throw new AlreadyExistsError(def.name);
      }
      seen.add(def.name);
      built.push(this.build(def));
    }

    for (const job of built) {
      this.jobsByName.set(job.name, job);
      debug("registered %s", job.name);
    }
  }

  /** Arm every job from the current time. */
  start(): void {
    this.startFrom(new Date());
  }

  /** Arm every job with `from` as the previous activation. */
  startFrom(from: Date): void {
    this.assertLifecycle("created", "start");
    this.lifecycle = "started";
    for (const job of this.jobsByName.values()) {
      job.schedule(from);
    }
    debug("started %d job(s) from %s", this.jobsByName.size, from.toISOString());
  }

  /**
   * Stop every job. Returns immediately; tasks already running are not waited
   * for, and a job caught mid-fire may run once more.
   */
  stop(): void {
    if (this.lifecycle === "stopped") return;
    this.lifecycle = "stopped";
    for (const job of this.jobsByName.values()) {
      job.stop();
    }
    debug("stopped %d job(s)", this.jobsByName.size);
  }

  jobs(): JobInfo[] {
    return Array.from(this.jobsByName.values(), (job) => ({
      name: job.name,
      state: job.state,
      nextRun: job.nextRun,
    }));
  }

  private build(def: JobDefinition): Job {
    let schedule: Schedule;
    try {
      schedule = parse(def.expr, { timezone: this.options.timezone });
    } catch (err) {
      throw err instanceof ParseError ? err.forJob(def.name) : err;
    }
    this.checkLockTtl(def.name, schedule);

    return new Job({
      name: def.name,
      task: def.task,
      schedule,
      locker: this.locker,
      lockTtl: this.options.lockTtl,
      errorHandler: this.options.errorHandler,
    });
  }

  /**
   * A lock that outlives the interval swallows the next activation. Fixed
   * intervals are rejected outright; cron gaps vary, so only the first gap is
   * checked and a short one logged.
   */
  private checkLockTtl(name: string, schedule: Schedule): void {
    const { lockTtl } = this.options;
    if (schedule instanceof FixedInterval) {
      if (lockTtl >= schedule.step) {
        throw new ConfigError(
          `add job ${name}: lock TTL ${lockTtl}ms must be shorter than the interval ${schedule.step}ms`,
        );
      }
      return;
    }

    try {
      const first = schedule.next(new Date());
      const gap = schedule.next(first).getTime() - first.getTime();
      if (lockTtl >= gap) {
        debug("warning: job %s fires every %dms but the lock TTL is %dms", name, gap, lockTtl);
      }
    } catch (err) {
      debug("job %s: cannot check lock TTL: %s", name, errorMessage(err));
    }
  }

  private assertLifecycle(expected: Lifecycle, action: string): void {
    if (this.lifecycle !== expected) {
      throw new RegistryStateError(`cannot ${action}: cron is ${this.lifecycle}`);
    }
  }
}
