import createDebug from "debug";
import {
  LockBackendError,
  ScheduleExhaustedError,
  TaskError,
  toError,
} from "../core/errors.js";
import type { ErrorHandler } from "../core/options.js";
import type { Locker } from "../locker/locker.js";
import type { Schedule } from "../schedule/schedule.js";

const debug = createDebug("tickguard:job");

/** Longest delay setTimeout honours; longer waits are split into hops. */
const MAX_TIMEOUT = 2_147_483_647;

export interface JobContext {
  /** Job name, which is also the lock key. */
  name: string;
  /** Activation instant that fired this run. */
  scheduledAt: Date;
}

/** Unit of work. A throw or a rejection is reported as a TaskError. */
export type Task = (ctx: JobContext) => void | Promise<void>;

export type JobState = "idle" | "armed" | "running" | "halted";

export interface JobConfig {
  name: string;
  task: Task;
  schedule: Schedule;
  locker: Locker;
  lockTtl: number;
  errorHandler: ErrorHandler;
}

interface ArmedTimer {
  handle: ReturnType<typeof setTimeout>;
  deadline: Date;
  fired: boolean;
}

/**
 * A named task on a self-rescheduling chain of one-shot timers.
 *
 * When a timer fires the job checks its stopped flag, arms the next timer,
 * asks the locker for the job's lock and runs the task only if the lock was
 * obtained. The next timer is armed before the lock attempt, so a slow locker
 * or task never delays the following activation.
 */
export class Job {
  readonly name: string;
  private readonly task: Task;
  private readonly plan: Schedule;
  private readonly locker: Locker;
  private readonly lockTtl: number;
  private readonly errorHandler: ErrorHandler;

  private timer: ArmedTimer | null = null;
  private stopped = false;
  private halted = false;
  private inFlight = 0;

  constructor(config: JobConfig) {
    this.name = config.name;
    this.task = config.task;
    this.plan = config.schedule;
    this.locker = config.locker;
    this.lockTtl = config.lockTtl;
    this.errorHandler = config.errorHandler;
  }

  get state(): JobState {
    if (this.halted) return "halted";
    if (this.inFlight > 0) return "running";
    if (this.timer && !this.timer.fired) return "armed";
    return "idle";
  }

  /** Deadline of the live timer, or null when none is armed. */
  get nextRun(): Date | null {
    if (this.halted || !this.timer || this.timer.fired) return null;
    return this.timer.deadline;
  }

  /**
   * Arm a timer for the first activation after `prev`. A schedule with no
   * further activation, or an invalid one, halts the job and is reported to the
   * error handler. Does nothing once the job is stopped.
   */
  schedule(prev: Date): void {
    if (this.stopped) return;

    let next: Date;
    try {
      next = this.plan.next(prev);
      if (Number.isNaN(next.getTime())) {
        throw new ScheduleExhaustedError(String(this.plan), prev);
      }
    } catch (err) {
      this.halted = true;
      this.timer = null;
      this.report(toError(err));
      return;
    }
    this.arm(next);
  }

  /**
   * Cancel the live timer. If it already fired, set the stopped flag instead so
   * the chain ends at the next fire. Does not wait for a running task.
   */
  stop(): void {
    const timer = this.timer;
    this.stopped = true;
    if (timer && !timer.fired) {
      clearTimeout(timer.handle);
      this.timer = null;
      this.halted = true;
      debug("%s: cancelled timer for %s", this.name, timer.deadline.toISOString());
      return;
    }
    if (!timer) {
      this.halted = true;
      return;
    }
    debug("%s: stop requested while firing", this.name);
  }

  private arm(next: Date): void {
    const delay = Math.max(0, next.getTime() - Date.now());

    if (delay > MAX_TIMEOUT) {
      const hop: ArmedTimer = {
        deadline: next,
        fired: false,
        handle: setTimeout(() => {
          hop.fired = true;
          if (this.stopped) {
            this.halted = true;
            return;
          }
          this.arm(next);
        }, MAX_TIMEOUT),
      };
      this.timer = hop;
      return;
    }

    const timer: ArmedTimer = {
      deadline: next,
      fired: false,
      handle: setTimeout(() => {
        timer.fired = true;
        void this.fire(next);
      }, delay),
    };
    this.timer = timer;
    debug("%s: armed for %s (in %dms)", this.name, next.toISOString(), delay);
  }

  private async fire(scheduledAt: Date): Promise<void> {
    if (this.stopped) {
      this.halted = true;
      debug("%s: stopped, not rescheduling", this.name);
      return;
    }

    this.schedule(scheduledAt);

    let obtained: boolean;
    try {
      obtained = await this.locker.lock(this.name, this.lockTtl);
    } catch (err) {
      this.report(new LockBackendError(this.name, err));
      return;
    }
    if (!obtained) {
      debug("%s: lock held elsewhere, skipping %s", this.name, scheduledAt.toISOString());
      return;
    }

    this.inFlight++;
    const started = Date.now();
    try {
      await this.task({ name: this.name, scheduledAt });
      debug("%s: completed in %dms", this.name, Date.now() - started);
    } catch (err) {
      this.report(new TaskError(this.name, scheduledAt, err));
    } finally {
      this.inFlight--;
    }
  }

  private report(err: Error): void {
    debug("%s: %s", this.name, err.message);
    try {
      this.errorHandler(err);
    } catch (handlerErr) {
      debug("%s: error handler threw: %o", this.name, handlerErr);
    }
  }
}
