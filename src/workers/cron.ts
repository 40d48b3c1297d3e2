/**
 * Cron worker: runs a Cron whose jobs are locked through Redis, so any number
 * of copies of this process can run side by side and each activation still
 * runs once. Without REDIS_URL it runs as a single instance with NilLocker.
 * Run with `npm run worker`; stop with SIGINT/SIGTERM.
 */
import createDebug from "debug";
import { hostname } from "os";
import { Cron } from "../lib/cron/cron.js";
import { parseDuration } from "../lib/core/duration.js";
import { closeRedis } from "../lib/data/redis.js";
import type { Locker } from "../lib/locker/locker.js";
import { NilLocker } from "../lib/locker/nil-locker.js";
import { createRedisLocker } from "../lib/locker/redis-locker.js";
import { env } from "../env.js";

const debug = createDebug("tickguard:workers:cron");

function createLocker(): Locker {
  if (!env.REDIS_URL) {
    debug("REDIS_URL is empty; running as a single instance");
    return new NilLocker();
  }
  return createRedisLocker(env.REDIS_URL, { prefix: env.TICKGUARD_LOCK_PREFIX });
}

async function main() {
  const cron = new Cron(createLocker(), {
    timezone: env.TICKGUARD_TIMEZONE,
    lockTtl: parseDuration(env.TICKGUARD_LOCK_TTL),
    errorHandler: (err) => debug("job error: %s", err.message),
  });

  const host = hostname();
  cron.add("heartbeat", "*/5 * * * * *", ({ scheduledAt }) => {
    debug("heartbeat %s from %s", scheduledAt.toISOString(), host);
  });
  cron.start();
  debug(
    "Cron worker started (tz %s, lock TTL %s, %s)",
    env.TICKGUARD_TIMEZONE,
    env.TICKGUARD_LOCK_TTL,
    env.REDIS_URL ? `locking via ${env.REDIS_URL}` : "no locking",
  );

  const shutdown = async () => {
    cron.stop();
    await closeRedis();
    debug("Cron worker stopped.");
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((err) => {
  debug("Cron worker failed: %o", err);
  process.exit(1);
});
