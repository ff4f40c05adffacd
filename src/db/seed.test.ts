import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { MemoryQuestionRepository } from '../services/question.service';
import { loadSeedQuestions, seedQuestions } from './seed';

describe('loadSeedQuestions', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  function writeTemp(content: string): string {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'seed-'));
    const file = path.join(dir, 'questions.json');
    fs.writeFileSync(file, content);
    return file;
  }

  it('should read the bundled question bank', () => {
    const items = loadSeedQuestions();

    expect(items.length).toBeGreaterThan(0);
    for (const item of items) {
      expect(['easy', 'medium', 'hard']).toContain(item.difficulty);
    }
  });

  it('should default a missing reference answer to null', () => {
    const file = writeTemp('[{"prompt":"P","category":"c","difficulty":"easy"}]');

    expect(loadSeedQuestions(file)).toEqual([{ prompt: 'P', category: 'c', difficulty: 'easy', referenceAnswer: null }]);
  });

  it('should name the first bad entry', () => {
    const file = writeTemp('[{"prompt":"P","category":"c","difficulty":"easy"},{"prompt":"P","category":"c","difficulty":"extreme"}]');

    expect(() => loadSeedQuestions(file)).toThrow(`${file}: entry 1 needs prompt, category and a valid difficulty`);
  });
});

describe('seedQuestions', () => {
  it('should only seed an empty bank', async () => {
    const repo = new MemoryQuestionRepository();
    const items = [{ prompt: 'P', category: 'c', difficulty: 'easy' as const }];

    expect(await seedQuestions(repo, items)).toBe(1);
    expect(await seedQuestions(repo, items)).toBe(0);
    expect(await repo.list()).toHaveLength(1);
  });
});
