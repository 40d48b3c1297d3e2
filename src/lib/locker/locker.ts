/**
 * Distributed lock consulted before every activation.
 *
 * `lock` resolves true when the caller now holds the lock for `job`, and false
 * when another holder has it. An obtained lock must release itself once `ttl`
 * milliseconds have elapsed; there is no explicit unlock. A rejection means
 * the backend failed and the activation is skipped.
 *
 * Implementations are called concurrently by independent scheduler instances
 * for the same job name.
 */
export interface Locker {
  lock(job: string, ttl: number): Promise<boolean>;
}
