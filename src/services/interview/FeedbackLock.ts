import { v4 as uuidv4 } from 'uuid';
import { feedbackClaimKey, type RedisLike } from '../../redis/client';

/**
 * One in-flight feedback generation per (session, question index). The claim
 * expires on its own so a crashed request cannot wedge the slot.
 */
export class FeedbackLock {
  constructor(
    private readonly redis: RedisLike,
    private readonly ttlSeconds: number
  ) {}

  /** Returns a release function, or null when another request holds the slot. */
  async acquire(sessionId: string, questionIndex: number): Promise<(() => Promise<void>) | null> {
    const key = feedbackClaimKey(sessionId, questionIndex);
    const token = uuidv4();
    const acquired = await this.redis.setIfAbsent(key, token, this.ttlSeconds);
    if (!acquired) return null;
    return async () => {
      // The claim may have expired and been re-taken; only ours is removed.
      await this.redis.delIfEquals(key, token);
    };
  }
}
