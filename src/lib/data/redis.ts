/**
 * Shared Redis clients, one per URL. Every locker built for the same URL
 * reuses one connection; lockers for other URLs get their own and never
 * disturb it. Call closeRedis() on process shutdown.
 */
import createDebug from "debug";
import { Redis } from "ioredis";

const debug = createDebug("tickguard:redis");

const clients = new Map<string, Redis>();

// A lock attempt is retried at most once across a reconnect.
const DEFAULT_OPTIONS = { maxRetriesPerRequest: 1 };

/**
 * Return the client for `redisUrl`, connecting on first use. An empty URL
 * yields null.
 */
export function initRedis(redisUrl: string): Redis | null {
  const url = redisUrl.trim();
  if (!url) return null;

  const existing = clients.get(url);
  if (existing) return existing;

  const client = new Redis(url, { ...DEFAULT_OPTIONS });
  client.on("error", (err: Error) => {
    // Lock calls reject on their own; the connection error is only logged.
    debug("connection error on %s: %s", url, err.message);
  });
  clients.set(url, client);
  debug("connected %s", url);
  return client;
}

/** The client already opened for `redisUrl`, or null. */
export function getRedis(redisUrl: string): Redis | null {
  return clients.get(redisUrl.trim()) ?? null;
}

/** Close every client. */
export async function closeRedis(): Promise<void> {
  const open = [...clients.entries()];
  clients.clear();
  await Promise.all(
    open.map(async ([url, client]) => {
      await client.quit();
      debug("closed %s", url);
    }),
  );
}
