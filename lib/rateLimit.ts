import { loadDrawConfig } from "@/lib/config";

export interface AttemptLimiterOptions {
  maxAttempts: number;
  windowMs: number;
  now?: () => number;
}

interface AttemptEntry {
  failures: number;
  resetAt: number;
}

/**
 * Counts failed attempts per key in memory. A key is locked once it reaches
 * `maxAttempts` failures inside one window; success clears it. State is per
 * process and is lost on restart.
 */
export function createAttemptLimiter({ maxAttempts, windowMs, now = Date.now }: AttemptLimiterOptions) {
  const entries = new Map<string, AttemptEntry>();

  const current = (key: string) => {
    const entry = entries.get(key);
    if (entry && entry.resetAt <= now()) {
      entries.delete(key);
      return null;
    }

    return entry ?? null;
  };

  return {
    check(key: string) {
      const entry = current(key);
      if (entry && entry.failures >= maxAttempts) {
        return { locked: true as const, retryAfterSeconds: Math.ceil((entry.resetAt - now()) / 1000) };
      }

      return { locked: false as const, remaining: maxAttempts - (entry?.failures ?? 0) };
    },

    recordFailure(key: string) {
      const entry = current(key);
      if (entry) {
        entry.failures += 1;
        return;
      }

      entries.set(key, { failures: 1, resetAt: now() + windowMs });
    },

    reset(key: string) {
      entries.delete(key);
    }
  };
}

export type AttemptLimiter = ReturnType<typeof createAttemptLimiter>;

export function getClientKey(headers: Headers) {
  const forwarded = headers.get("x-forwarded-for");
  const first = forwarded?.split(",")[0]?.trim();
  return first || headers.get("x-real-ip") || "unknown";
}

let unlockLimiter: AttemptLimiter | null = null;

// Shared by every route that checks an organizer PIN.
export function getUnlockLimiter() {
  unlockLimiter ??= createAttemptLimiter(loadDrawConfig().unlock);
  return unlockLimiter;
}
