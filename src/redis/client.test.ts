import { describe, expect, it } from 'vitest';
import { createMemoryStore, createRedis, feedbackClaimKey } from './client';

describe('createMemoryStore', () => {
  it('should set a key only when it is absent', async () => {
    const store = createMemoryStore();

    expect(await store.setIfAbsent('k', 'first', 60)).toBe(true);
    expect(await store.setIfAbsent('k', 'second', 60)).toBe(false);
  });

  it('should forget keys once their expiry has passed', async () => {
    let now = 1_000_000;
    const store = createMemoryStore(() => now);
    await store.setIfAbsent('k', 'first', 10);

    now += 10_000;
    expect(await store.setIfAbsent('k', 'second', 10)).toBe(false);
    now += 1;
    expect(await store.setIfAbsent('k', 'second', 10)).toBe(true);
  });

  it('should delete a key only while it holds the given value', async () => {
    const store = createMemoryStore();
    await store.setIfAbsent('k', 'mine', 60);

    expect(await store.delIfEquals('k', 'theirs')).toBe(0);
    expect(await store.setIfAbsent('k', 'other', 60)).toBe(false);
    expect(await store.delIfEquals('k', 'mine')).toBe(1);
    expect(await store.delIfEquals('k', 'mine')).toBe(0);
    expect(await store.setIfAbsent('k', 'other', 60)).toBe(true);
  });

  it('should not delete an expired value', async () => {
    let now = 0;
    const store = createMemoryStore(() => now);
    await store.setIfAbsent('k', 'mine', 1);

    now += 1001;
    expect(await store.delIfEquals('k', 'mine')).toBe(0);
  });
});

describe('createRedis', () => {
  it('should fall back to the in-memory store for "memory" and blank urls', async () => {
    for (const url of ['memory', ' MEMORY ', '']) {
      const store = createRedis(url);
      expect(await store.setIfAbsent('k', 'v', 1)).toBe(true);
      await store.quit();
    }
  });
});

describe('feedbackClaimKey', () => {
  it('should namespace claims by session and index', () => {
    expect(feedbackClaimKey('session-1', 2)).toBe('interview_prep:feedback:session-1:2');
  });
});
