import dotenv from "dotenv";
import { join, dirname, resolve } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(join(__dirname, ".."));

dotenv.config({ path: join(PROJECT_ROOT, ".env") });

function str(name: string, defaultValue: string): string {
  const v = process.env[name];
  return (typeof v === "string" && v.trim()) || defaultValue;
}

/** Loaded once at startup. Use this instead of process.env everywhere. */
export const env = {
  NODE_ENV: str("NODE_ENV", "development"),
  /** Empty disables the Redis locker and the worker falls back to NilLocker. */
  REDIS_URL: str("REDIS_URL", ""),
  TICKGUARD_TIMEZONE: str("TICKGUARD_TIMEZONE", "UTC"),
  /** Duration literal, e.g. "2s". */
  TICKGUARD_LOCK_TTL: str("TICKGUARD_LOCK_TTL", "1s"),
  TICKGUARD_LOCK_PREFIX: str("TICKGUARD_LOCK_PREFIX", "tickguard:lock:"),
} as const;

export { PROJECT_ROOT };
