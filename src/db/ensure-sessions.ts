/**
 * Sessions keep their question snapshots, answers and feedback as positional
 * JSONB arrays so a single UPDATE can rewrite one slot atomically.
 */
import type { Queryable } from './client';

export async function ensureSessionsTable(db: Queryable): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS sessions (
      id UUID PRIMARY KEY,
      user_id UUID NOT NULL REFERENCES users(id),
      role VARCHAR(255),
      experience_years INT,
      topics_to_focus TEXT,
      description TEXT,
      questions JSONB NOT NULL DEFAULT '[]'::jsonb,
      answers JSONB NOT NULL DEFAULT '[]'::jsonb,
      feedback JSONB NOT NULL DEFAULT '[]'::jsonb,
      status VARCHAR(20) NOT NULL DEFAULT 'created',
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      started_at TIMESTAMPTZ,
      completed_at TIMESTAMPTZ,
      CONSTRAINT sessions_status_check CHECK (status IN ('created', 'in_progress', 'completed'))
    );
  `);
  await db.query(`
    CREATE INDEX IF NOT EXISTS idx_sessions_user_created ON sessions(user_id, created_at DESC);
  `);
}
