import createDebug from "debug";
import type { Locker } from "./locker.js";

const debug = createDebug("tickguard:locker:semaphore");

/**
 * In-process lock with one permit per job name, handed back by a timer once the
 * TTL elapses. For several schedulers sharing one process, such as tests or a
 * blue/green pair inside the same runtime.
 */
export class SemaphoreLocker implements Locker {
  private readonly held = new Map<string, ReturnType<typeof setTimeout>>();

  async lock(job: string, ttl: number): Promise<boolean> {
    if (this.held.has(job)) return false;

    const release = setTimeout(() => {
      this.held.delete(job);
      debug("released %s", job);
    }, ttl);
    release.unref();
    this.held.set(job, release);
    debug("obtained %s for %dms", job, ttl);
    return true;
  }

  /** Number of permits currently out. */
  get size(): number {
    return this.held.size;
  }
}
