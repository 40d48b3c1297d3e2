import { randomUUID } from "crypto";
import createDebug from "debug";
import type { Redis } from "ioredis";
import { ConfigError } from "../core/errors.js";
import { initRedis } from "../data/redis.js";
import type { Locker } from "./locker.js";

const debug = createDebug("tickguard:locker:redis");

export const DEFAULT_LOCK_PREFIX = "tickguard:lock:";

export interface RedisLockerOptions {
  /** Prepended to the job name to form the Redis key. */
  prefix?: string;
}

/**
 * Lock backed by a single Redis endpoint: `SET key token PX ttl NX`, which
 * either creates the key with an expiry or leaves the current holder in place.
 *
 * Safety rests on that one server. Deployments that fail Redis over between
 * replicas can hand the same lock to two holders; they should use a quorum
 * lock service (Redlock across independent masters, etcd, ZooKeeper) instead.
 */
export class RedisLocker implements Locker {
  private readonly client: Redis;
  private readonly prefix: string;
  private readonly owner = randomUUID();

  constructor(client: Redis, opts: RedisLockerOptions = {}) {
    this.client = client;
    this.prefix = opts.prefix ?? DEFAULT_LOCK_PREFIX;
  }

  async lock(job: string, ttl: number): Promise<boolean> {
    const key = this.prefix + job;
    const reply = await this.client.set(key, this.owner, "PX", ttl, "NX");
    const obtained = reply === "OK";
    debug("%s %s (owner %s, ttl %dms)", obtained ? "obtained" : "missed", key, this.owner, ttl);
    return obtained;
  }
}

/**
 * Build a RedisLocker on the shared client for `redisUrl`. Lockers for other
 * URLs keep their own clients. Throws ConfigError when the URL is empty.
 */
export function createRedisLocker(redisUrl: string, opts: RedisLockerOptions = {}): RedisLocker {
  const client = initRedis(redisUrl);
  if (!client) {
    throw new ConfigError("a Redis URL is required for the Redis locker");
  }
  return new RedisLocker(client, opts);
}
