/**
 * Session persistence. Every mutation is one conditional statement keyed by
 * session id, so concurrent writers serialize on the row instead of doing
 * read-modify-write in the service. Conditional writes resolve to null when
 * their guard fails; the orchestrator re-reads to tell the caller why.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Queryable } from '../../db/client';
import { toIntOrNull, toIso, toIsoOrNull, toSlotArray, toTextOrNull, isDifficulty, isRecord } from '../../db/rows';
import { InfrastructureError } from '../errors';
import type { InterviewSession, SessionContext, SessionQuestion, SessionStatus } from '../../types';

export interface NewSession extends SessionContext {
  userId: string;
  questions: SessionQuestion[];
}

export interface SessionStore {
  create(input: NewSession): Promise<InterviewSession>;
  findById(id: string): Promise<InterviewSession | null>;
  /** Newest first */
  listByUser(userId: string): Promise<InterviewSession[]>;
  /**
   * Write answers[index]; created → in_progress. Guarded by: session not
   * completed, index within the question list. Feedback at the index is
   * cleared when the text differs from the stored answer.
   */
  saveAnswer(id: string, index: number, answerText: string): Promise<InterviewSession | null>;
  /** Write feedback[index] only while answers[index] still equals expectedAnswer. */
  saveFeedback(id: string, index: number, expectedAnswer: string, feedbackText: string): Promise<InterviewSession | null>;
  /** Any status → completed; keeps the first completedAt. */
  markCompleted(id: string): Promise<InterviewSession | null>;
  /** Flip questions[index].isPinned. Allowed in every status. */
  togglePin(id: string, index: number): Promise<InterviewSession | null>;
  /** Replace questions[index].note. Allowed in every status. */
  setNote(id: string, index: number, note: string): Promise<InterviewSession | null>;
}

type SessionRow = {
  id: string;
  user_id: string;
  role: unknown;
  experience_years: unknown;
  topics_to_focus: unknown;
  description: unknown;
  questions: unknown;
  answers: unknown;
  feedback: unknown;
  status: unknown;
  created_at: unknown;
  updated_at: unknown;
  started_at: unknown;
  completed_at: unknown;
};

const COLUMNS = `id, user_id, role, experience_years, topics_to_focus, description, questions, answers,
  feedback, status, created_at, updated_at, started_at, completed_at`;

function toStatus(value: unknown): SessionStatus {
  if (value === 'created' || value === 'in_progress' || value === 'completed') return value;
  throw new InfrastructureError('Column sessions.status holds an unknown status');
}

function toSessionQuestions(value: unknown): SessionQuestion[] {
  if (!Array.isArray(value)) throw new InfrastructureError('Column sessions.questions is not an array');
  return value.map((item: unknown) => {
    if (!isRecord(item)) {
      throw new InfrastructureError('Column sessions.questions holds a non-object entry');
    }
    const { questionId, prompt, category, difficulty, referenceAnswer, isPinned, note } = item;
    if (typeof questionId !== 'string' || typeof prompt !== 'string' || typeof category !== 'string' || !isDifficulty(difficulty)) {
      throw new InfrastructureError('Column sessions.questions holds a malformed entry');
    }
    return {
      questionId,
      prompt,
      category,
      difficulty,
      referenceAnswer: typeof referenceAnswer === 'string' ? referenceAnswer : null,
      isPinned: isPinned === true,
      note: typeof note === 'string' ? note : '',
    };
  });
}

export function toSession(row: SessionRow): InterviewSession {
  const questions = toSessionQuestions(row.questions);
  const answers = toSlotArray(row.answers, 'sessions.answers');
  const feedback = toSlotArray(row.feedback, 'sessions.feedback');
  if (answers.length !== questions.length || feedback.length !== questions.length) {
    throw new InfrastructureError(`Session ${row.id} has slot arrays out of line with its questions`);
  }
  return {
    id: row.id,
    userId: row.user_id,
    role: toTextOrNull(row.role, 'sessions.role'),
    experienceYears: toIntOrNull(row.experience_years, 'sessions.experience_years'),
    topicsToFocus: toTextOrNull(row.topics_to_focus, 'sessions.topics_to_focus'),
    description: toTextOrNull(row.description, 'sessions.description'),
    questions,
    answers,
    feedback,
    status: toStatus(row.status),
    createdAt: toIso(row.created_at, 'sessions.created_at'),
    updatedAt: toIso(row.updated_at, 'sessions.updated_at'),
    startedAt: toIsoOrNull(row.started_at, 'sessions.started_at'),
    completedAt: toIsoOrNull(row.completed_at, 'sessions.completed_at'),
  };
}

export class PgSessionStore implements SessionStore {
  constructor(private readonly db: Queryable) {}

  async create(input: NewSession): Promise<InterviewSession> {
    const empty = JSON.stringify(input.questions.map(() => null));
    const { rows } = await this.db.query<SessionRow>(
      `INSERT INTO sessions (id, user_id, role, experience_years, topics_to_focus, description,
         questions, answers, feedback, status, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8::jsonb, $8::jsonb, 'created', NOW(), NOW())
       RETURNING ${COLUMNS}`,
      [
        uuidv4(),
        input.userId,
        input.role,
        input.experienceYears,
        input.topicsToFocus,
        input.description,
        JSON.stringify(input.questions),
        empty,
      ]
    );
    return toSession(rows[0]);
  }

  async findById(id: string): Promise<InterviewSession | null> {
    const { rows } = await this.db.query<SessionRow>(`SELECT ${COLUMNS} FROM sessions WHERE id = $1`, [id]);
    return rows[0] ? toSession(rows[0]) : null;
  }

  async listByUser(userId: string): Promise<InterviewSession[]> {
    const { rows } = await this.db.query<SessionRow>(
      `SELECT ${COLUMNS} FROM sessions WHERE user_id = $1 ORDER BY created_at DESC`,
      [userId]
    );
    return rows.map(toSession);
  }

  async saveAnswer(id: string, index: number, answerText: string): Promise<InterviewSession | null> {
    const { rows } = await this.db.query<SessionRow>(
      `UPDATE sessions SET
         answers = jsonb_set(answers, $2::text[], to_jsonb($4::text)),
         feedback = CASE WHEN answers -> $3::int = to_jsonb($4::text) THEN feedback
                         ELSE jsonb_set(feedback, $2::text[], 'null'::jsonb) END,
         status = CASE WHEN status = 'created' THEN 'in_progress' ELSE status END,
         started_at = COALESCE(started_at, NOW()),
         updated_at = NOW()
       WHERE id = $1
         AND status <> 'completed'
         AND $3::int >= 0
         AND $3::int < jsonb_array_length(questions)
       RETURNING ${COLUMNS}`,
      [id, [String(index)], index, answerText]
    );
    return rows[0] ? toSession(rows[0]) : null;
  }

  async saveFeedback(id: string, index: number, expectedAnswer: string, feedbackText: string): Promise<InterviewSession | null> {
    const { rows } = await this.db.query<SessionRow>(
      `UPDATE sessions SET
         feedback = jsonb_set(feedback, $2::text[], to_jsonb($5::text)),
         updated_at = NOW()
       WHERE id = $1
         AND answers ->> $3::int = $4::text
       RETURNING ${COLUMNS}`,
      [id, [String(index)], index, expectedAnswer, feedbackText]
    );
    return rows[0] ? toSession(rows[0]) : null;
  }

  async markCompleted(id: string): Promise<InterviewSession | null> {
    const { rows } = await this.db.query<SessionRow>(
      `UPDATE sessions SET
         status = 'completed',
         completed_at = COALESCE(completed_at, NOW()),
         updated_at = CASE WHEN status = 'completed' THEN updated_at ELSE NOW() END
       WHERE id = $1
       RETURNING ${COLUMNS}`,
      [id]
    );
    return rows[0] ? toSession(rows[0]) : null;
  }

  async togglePin(id: string, index: number): Promise<InterviewSession | null> {
    const { rows } = await this.db.query<SessionRow>(
      `UPDATE sessions SET
         questions = jsonb_set(
           questions,
           $2::text[],
           to_jsonb(NOT COALESCE((questions -> $3::int ->> 'isPinned')::boolean, false))
         ),
         updated_at = NOW()
       WHERE id = $1
         AND $3::int >= 0
         AND $3::int < jsonb_array_length(questions)
       RETURNING ${COLUMNS}`,
      [id, [String(index), 'isPinned'], index]
    );
    return rows[0] ? toSession(rows[0]) : null;
  }

  async setNote(id: string, index: number, note: string): Promise<InterviewSession | null> {
    const { rows } = await this.db.query<SessionRow>(
      `UPDATE sessions SET
         questions = jsonb_set(questions, $2::text[], to_jsonb($4::text)),
         updated_at = NOW()
       WHERE id = $1
         AND $3::int >= 0
         AND $3::int < jsonb_array_length(questions)
       RETURNING ${COLUMNS}`,
      [id, [String(index), 'note'], index, note]
    );
    return rows[0] ? toSession(rows[0]) : null;
  }
}
