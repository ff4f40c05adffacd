/**
 * Redis client for short-lived feedback claims. When REDIS_URL is empty or
 * "memory", uses an in-memory store so the app runs without Redis (e.g. local dev).
 */
import Redis from 'ioredis';
import { logger } from '../config/logger';

const KEY_PREFIX = 'interview_prep:';

/** Minimal interface used by FeedbackLock */
export type RedisLike = {
  /** SET key value EX seconds NX. Resolves true when the key was set. */
  setIfAbsent(key: string, value: string, seconds: number): Promise<boolean>;
  /** Delete key only while it still holds value, as one atomic step. Resolves 1 when deleted. */
  delIfEquals(key: string, value: string): Promise<number>;
  quit(): Promise<void>;
};

const DEL_IF_EQUALS_SCRIPT = `if redis.call('get', KEYS[1]) == ARGV[1] then return redis.call('del', KEYS[1]) end
return 0`;

export function createMemoryStore(now: () => number = Date.now): RedisLike {
  const store = new Map<string, { value: string; expiryTs: number }>();
  const live = (key: string) => {
    const entry = store.get(key);
    if (!entry) return null;
    if (now() > entry.expiryTs) {
      store.delete(key);
      return null;
    }
    return entry;
  };
  return {
    async setIfAbsent(key: string, value: string, seconds: number): Promise<boolean> {
      if (live(key)) return false;
      store.set(key, { value, expiryTs: now() + seconds * 1000 });
      return true;
    },
    async delIfEquals(key: string, value: string): Promise<number> {
      if (live(key)?.value !== value) return 0;
      store.delete(key);
      return 1;
    },
    async quit(): Promise<void> {
      store.clear();
    },
  };
}

function wrapIoredis(r: Redis): RedisLike {
  return {
    async setIfAbsent(key: string, value: string, seconds: number): Promise<boolean> {
      const reply = await r.set(key, value, 'EX', seconds, 'NX');
      return reply === 'OK';
    },
    async delIfEquals(key: string, value: string): Promise<number> {
      const deleted = await r.eval(DEL_IF_EQUALS_SCRIPT, 1, key, value);
      return deleted === 1 ? 1 : 0;
    },
    async quit(): Promise<void> {
      await r.quit();
    },
  };
}

export function createRedis(url: string): RedisLike {
  const trimmed = url.trim();
  if (trimmed === '' || trimmed.toLowerCase() === 'memory') {
    logger.info('Using in-memory store for feedback claims (no Redis). Set REDIS_URL to a running Redis to use it.');
    return createMemoryStore();
  }
  const r = new Redis(trimmed, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      return Math.min(times * 100, 3000);
    },
  });
  r.on('error', (err: Error) => {
    logger.error('Redis error', { error: err.message });
  });
  return wrapIoredis(r);
}

export function feedbackClaimKey(sessionId: string, questionIndex: number): string {
  return `${KEY_PREFIX}feedback:${sessionId}:${questionIndex}`;
}
