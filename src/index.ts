export { Cron } from "./lib/cron/cron.js";
export type { JobDefinition, JobInfo } from "./lib/cron/cron.js";
export { Job } from "./lib/cron/job.js";
export type { JobConfig, JobContext, JobState, Task } from "./lib/cron/job.js";

export { parse, every, FixedInterval } from "./lib/schedule/schedule.js";
export type { Schedule, ParseOptions } from "./lib/schedule/schedule.js";
export { CronExpression } from "./lib/schedule/cron-expression.js";

export type { Locker } from "./lib/locker/locker.js";
export { NilLocker } from "./lib/locker/nil-locker.js";
export { SemaphoreLocker } from "./lib/locker/semaphore-locker.js";
export {
  RedisLocker,
  createRedisLocker,
  DEFAULT_LOCK_PREFIX,
} from "./lib/locker/redis-locker.js";
export type { RedisLockerOptions } from "./lib/locker/redis-locker.js";
export { initRedis, getRedis, closeRedis } from "./lib/data/redis.js";

export {
  DEFAULT_LOCK_TTL,
  DEFAULT_TIMEZONE,
  isValidTimezone,
  resolveOptions,
} from "./lib/core/options.js";
export type { CronOptions, ErrorHandler, ResolvedOptions } from "./lib/core/options.js";
export { parseDuration, formatDuration } from "./lib/core/duration.js";
export {
  SchedulerError,
  AlreadyExistsError,
  ParseError,
  ConfigError,
  RegistryStateError,
  LockBackendError,
  TaskError,
  ScheduleExhaustedError,
} from "./lib/core/errors.js";
export type { SchedulerErrorCode } from "./lib/core/errors.js";
