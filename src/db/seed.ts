/**
 * Question bank seed. Inserts data/seed-questions.json when the bank is empty.
 * Runs automatically for DATABASE_URL=memory; against Postgres run `npm run seed`.
 */
import fs from 'fs';
import path from 'path';
import { isDifficulty, isRecord } from './rows';
import type { QuestionCreate, QuestionRepository } from '../services/question.service';

export const SEED_FILE = path.resolve(__dirname, '../../data/seed-questions.json');

export function loadSeedQuestions(file: string = SEED_FILE): QuestionCreate[] {
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  if (!Array.isArray(parsed)) throw new Error(`${file} must contain a JSON array`);
  return parsed.map((item: unknown, i: number): QuestionCreate => {
    if (
      !isRecord(item) ||
      typeof item.prompt !== 'string' ||
      typeof item.category !== 'string' ||
      !isDifficulty(item.difficulty)
    ) {
      throw new Error(`${file}: entry ${i} needs prompt, category and a valid difficulty`);
    }
    return {
      prompt: item.prompt,
      category: item.category,
      difficulty: item.difficulty,
      referenceAnswer: typeof item.referenceAnswer === 'string' ? item.referenceAnswer : null,
    };
  });
}

/** Returns the number of questions inserted (0 when the bank already has content). */
export async function seedQuestions(repo: QuestionRepository, items: QuestionCreate[]): Promise<number> {
  const existing = await repo.list();
  if (existing.length > 0) return 0;
  const created = await repo.create(items);
  return created.length;
}

if (require.main === module) {
  // Imported lazily so loading this module for the helpers has no side effects.
  void (async () => {
    const { config } = await import('../config');
    const { logger } = await import('../config/logger');
    const { createDatabase } = await import('./client');
    const { ensureQuestionsTable } = await import('./ensure-questions');
    const { PgQuestionRepository } = await import('../services/question.service');

    const db = createDatabase(config.database.url);
    try {
      await ensureQuestionsTable(db);
      const inserted = await seedQuestions(new PgQuestionRepository(db), loadSeedQuestions());
      logger.info('Seed done', { inserted });
    } catch (e) {
      logger.error('Seed failed', { error: e instanceof Error ? e.message : String(e) });
      process.exitCode = 1;
    } finally {
      await db.close();
    }
  })();
}
