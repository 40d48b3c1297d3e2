import type { Locker } from "./locker.js";

/**
 * Lock that is always obtainable. For deployments that run a single scheduler
 * instance.
 */
export class NilLocker implements Locker {
  async lock(_job: string, _ttl: number): Promise<boolean> {
    return true;
  }
}
