import { describe, expect, it } from 'vitest';
import { MemorySessionStore } from './MemorySessionStore';
import type { NewSession } from './SessionStore';

function clock(start: string) {
  let t = Date.parse(start);
  return {
    now: () => new Date(t),
    advance: (ms: number) => {
      t += ms;
    },
  };
}

const input: NewSession = {
  userId: 'user-1',
  role: null,
  experienceYears: 2,
  topicsToFocus: 'sql',
  description: null,
  questions: [
    { questionId: 'q-1', prompt: 'What is an index?', category: 'databases', difficulty: 'medium', referenceAnswer: null, isPinned: false, note: '' },
    { questionId: 'q-2', prompt: 'What is a join?', category: 'databases', difficulty: 'easy', referenceAnswer: null, isPinned: false, note: '' },
  ],
};

describe('MemorySessionStore', () => {
  it('should create sessions with one empty slot per question', async () => {
    const c = clock('2026-03-01T09:00:00.000Z');
    const store = new MemorySessionStore(c.now);

    const session = await store.create(input);

    expect(session.answers).toEqual([null, null]);
    expect(session.feedback).toEqual([null, null]);
    expect(session.status).toBe('created');
    expect(session.createdAt).toBe('2026-03-01T09:00:00.000Z');
    expect(session.experienceYears).toBe(2);
  });

  it('should hand out copies so callers cannot mutate stored state', async () => {
    const store = new MemorySessionStore();
    const session = await store.create(input);

    session.answers[0] = 'tampered';

    expect((await store.findById(session.id))?.answers).toEqual([null, null]);
  });

  it('should list a user\'s sessions newest first', async () => {
    const c = clock('2026-03-01T09:00:00.000Z');
    const store = new MemorySessionStore(c.now);
    const older = await store.create(input);
    c.advance(60_000);
    const newer = await store.create(input);
    await store.create({ ...input, userId: 'user-2' });

    const listed = await store.listByUser('user-1');

    expect(listed.map((s) => s.id)).toEqual([newer.id, older.id]);
  });

  describe('saveAnswer', () => {
    it('should move created to in_progress and stamp startedAt once', async () => {
      const c = clock('2026-03-01T09:00:00.000Z');
      const store = new MemorySessionStore(c.now);
      const { id } = await store.create(input);

      c.advance(1000);
      const first = await store.saveAnswer(id, 0, 'a');
      c.advance(1000);
      const second = await store.saveAnswer(id, 1, 'b');

      expect(first?.status).toBe('in_progress');
      expect(first?.startedAt).toBe('2026-03-01T09:00:01.000Z');
      expect(second?.startedAt).toBe('2026-03-01T09:00:01.000Z');
      expect(second?.updatedAt).toBe('2026-03-01T09:00:02.000Z');
    });

    it('should refuse out-of-range indices and completed sessions', async () => {
      const store = new MemorySessionStore();
      const { id } = await store.create(input);

      expect(await store.saveAnswer(id, 2, 'x')).toBeNull();
      expect(await store.saveAnswer('missing', 0, 'x')).toBeNull();
      await store.markCompleted(id);
      expect(await store.saveAnswer(id, 0, 'x')).toBeNull();
    });
  });

  describe('saveFeedback', () => {
    it('should only write while the answer matches the expected text', async () => {
      const store = new MemorySessionStore();
      const { id } = await store.create(input);
      await store.saveAnswer(id, 0, 'current');

      expect(await store.saveFeedback(id, 0, 'stale', 'ignored')).toBeNull();
      const saved = await store.saveFeedback(id, 0, 'current', 'Nice.');

      expect(saved?.feedback).toEqual(['Nice.', null]);
    });
  });

  describe('markCompleted', () => {
    it('should keep the first completion time', async () => {
      const c = clock('2026-03-01T09:00:00.000Z');
      const store = new MemorySessionStore(c.now);
      const { id } = await store.create(input);

      c.advance(5000);
      const first = await store.markCompleted(id);
      c.advance(5000);
      const again = await store.markCompleted(id);

      expect(first?.completedAt).toBe('2026-03-01T09:00:05.000Z');
      expect(again?.completedAt).toBe('2026-03-01T09:00:05.000Z');
      expect(await store.markCompleted('missing')).toBeNull();
    });
  });

  describe('question markers', () => {
    it('should toggle pins and replace notes even after completion', async () => {
      const c = clock('2026-03-01T09:00:00.000Z');
      const store = new MemorySessionStore(c.now);
      const { id } = await store.create(input);
      await store.markCompleted(id);

      c.advance(1000);
      const pinned = await store.togglePin(id, 1);
      const noted = await store.setNote(id, 1, 'Outer vs inner');
      const unpinned = await store.togglePin(id, 1);

      expect(pinned?.questions[1].isPinned).toBe(true);
      expect(noted?.questions[1].note).toBe('Outer vs inner');
      expect(unpinned?.questions[1]).toMatchObject({ isPinned: false, note: 'Outer vs inner' });
      expect(unpinned?.updatedAt).toBe('2026-03-01T09:00:01.000Z');
      expect(unpinned?.questions[0]).toMatchObject({ isPinned: false, note: '' });
    });

    it('should refuse missing sessions and out-of-range indices', async () => {
      const store = new MemorySessionStore();
      const { id } = await store.create(input);

      expect(await store.togglePin(id, 2)).toBeNull();
      expect(await store.togglePin(id, -1)).toBeNull();
      expect(await store.setNote('missing', 0, 'x')).toBeNull();
    });
  });
});
