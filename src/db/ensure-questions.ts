/**
 * Ensure the questions table exists. Called on server startup so the admin
 * question workflow works without manual migrations.
 */
import type { Queryable } from './client';

export async function ensureQuestionsTable(db: Queryable): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS questions (
      id UUID PRIMARY KEY,
      prompt TEXT NOT NULL,
      category VARCHAR(100) NOT NULL,
      difficulty VARCHAR(20) NOT NULL,
      reference_answer TEXT,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
  await db.query(`
    CREATE INDEX IF NOT EXISTS idx_questions_category_difficulty ON questions(category, difficulty);
  `);
}
