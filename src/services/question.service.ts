/**
 * Question bank. Read-mostly: the orchestrator only samples; the admin
 * workflow creates, edits and deletes. Raw SQL, no ORM.
 */
import { v4 as uuidv4 } from 'uuid';
import type { Queryable } from '../db/client';
import { toDifficulty, toIso, toText, toTextOrNull } from '../db/rows';
import type { DifficultyLevel, Question, QuestionFilter } from '../types';

export interface QuestionCreate {
  prompt: string;
  category: string;
  difficulty: DifficultyLevel;
  referenceAnswer?: string | null;
}

export interface QuestionUpdate {
  prompt?: string;
  category?: string;
  difficulty?: DifficultyLevel;
  referenceAnswer?: string | null;
}

export interface QuestionRepository {
  /** Random sample without replacement, at most `count` matches */
  sample(filter: QuestionFilter, count: number): Promise<Question[]>;
  findById(id: string): Promise<Question | null>;
  list(filter?: QuestionFilter): Promise<Question[]>;
  create(items: QuestionCreate[]): Promise<Question[]>;
  update(id: string, patch: QuestionUpdate): Promise<Question | null>;
  delete(id: string): Promise<boolean>;
}

type QuestionRow = {
  id: string;
  prompt: unknown;
  category: unknown;
  difficulty: unknown;
  reference_answer: unknown;
  created_at: unknown;
  updated_at: unknown;
};

const COLUMNS = 'id, prompt, category, difficulty, reference_answer, created_at, updated_at';

function toQuestion(row: QuestionRow): Question {
  return {
    id: row.id,
    prompt: toText(row.prompt, 'questions.prompt'),
    category: toText(row.category, 'questions.category'),
    difficulty: toDifficulty(row.difficulty, 'questions.difficulty'),
    referenceAnswer: toTextOrNull(row.reference_answer, 'questions.reference_answer'),
    createdAt: toIso(row.created_at, 'questions.created_at'),
    updatedAt: toIso(row.updated_at, 'questions.updated_at'),
  };
}

function whereClause(filter: QuestionFilter | undefined, params: unknown[]): string {
  const conditions: string[] = [];
  if (filter?.category) {
    params.push(filter.category);
    conditions.push(`LOWER(category) = LOWER($${params.length})`);
  }
  if (filter?.difficulty) {
    params.push(filter.difficulty);
    conditions.push(`difficulty = $${params.length}`);
  }
  return conditions.length ? ` WHERE ${conditions.join(' AND ')}` : '';
}

export class PgQuestionRepository implements QuestionRepository {
  constructor(private readonly db: Queryable) {}

  async sample(filter: QuestionFilter, count: number): Promise<Question[]> {
    if (count <= 0) return [];
    const params: unknown[] = [];
    const where = whereClause(filter, params);
    params.push(count);
    const { rows } = await this.db.query<QuestionRow>(
      `SELECT ${COLUMNS} FROM questions${where} ORDER BY random() LIMIT $${params.length}`,
      params
    );
    return rows.map(toQuestion);
  }

  async findById(id: string): Promise<Question | null> {
    const { rows } = await this.db.query<QuestionRow>(`SELECT ${COLUMNS} FROM questions WHERE id = $1`, [id]);
    return rows[0] ? toQuestion(rows[0]) : null;
  }

  async list(filter?: QuestionFilter): Promise<Question[]> {
    const params: unknown[] = [];
    const where = whereClause(filter, params);
    const { rows } = await this.db.query<QuestionRow>(
      `SELECT ${COLUMNS} FROM questions${where} ORDER BY created_at ASC, id ASC`,
      params
    );
    return rows.map(toQuestion);
  }

  async create(items: QuestionCreate[]): Promise<Question[]> {
    const created: Question[] = [];
    for (const item of items) {
      const { rows } = await this.db.query<QuestionRow>(
        `INSERT INTO questions (id, prompt, category, difficulty, reference_answer, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, NOW(), NOW())
         RETURNING ${COLUMNS}`,
        [uuidv4(), item.prompt, item.category, item.difficulty, item.referenceAnswer ?? null]
      );
      created.push(toQuestion(rows[0]));
    }
    return created;
  }

  async update(id: string, patch: QuestionUpdate): Promise<Question | null> {
    const updates: string[] = [];
    const params: unknown[] = [];
    if (patch.prompt !== undefined) { params.push(patch.prompt); updates.push(`prompt = $${params.length}`); }
    if (patch.category !== undefined) { params.push(patch.category); updates.push(`category = $${params.length}`); }
    if (patch.difficulty !== undefined) { params.push(patch.difficulty); updates.push(`difficulty = $${params.length}`); }
    if (patch.referenceAnswer !== undefined) { params.push(patch.referenceAnswer); updates.push(`reference_answer = $${params.length}`); }
    if (updates.length === 0) return this.findById(id);
    params.push(id);
    const { rows } = await this.db.query<QuestionRow>(
      `UPDATE questions SET ${updates.join(', ')}, updated_at = NOW() WHERE id = $${params.length}
       RETURNING ${COLUMNS}`,
      params
    );
    return rows[0] ? toQuestion(rows[0]) : null;
  }

  async delete(id: string): Promise<boolean> {
    const { rowCount } = await this.db.query(`DELETE FROM questions WHERE id = $1`, [id]);
    return rowCount > 0;
  }
}

function matches(question: Question, filter: QuestionFilter | undefined): boolean {
  if (filter?.category && question.category.toLowerCase() !== filter.category.toLowerCase()) return false;
  if (filter?.difficulty && question.difficulty !== filter.difficulty) return false;
  return true;
}

export class MemoryQuestionRepository implements QuestionRepository {
  private readonly questions = new Map<string, Question>();

  constructor(
    private readonly random: () => number = Math.random,
    private readonly now: () => Date = () => new Date()
  ) {}

  async sample(filter: QuestionFilter, count: number): Promise<Question[]> {
    if (count <= 0) return [];
    const pool = [...this.questions.values()].filter((q) => matches(q, filter));
    // Partial Fisher-Yates: only the first `count` positions are shuffled.
    const take = Math.min(count, pool.length);
    for (let i = 0; i < take; i++) {
      const j = i + Math.floor(this.random() * (pool.length - i));
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, take);
  }

  async findById(id: string): Promise<Question | null> {
    return this.questions.get(id) ?? null;
  }

  async list(filter?: QuestionFilter): Promise<Question[]> {
    return [...this.questions.values()].filter((q) => matches(q, filter));
  }

  async create(items: QuestionCreate[]): Promise<Question[]> {
    return items.map((item) => {
      const ts = this.now().toISOString();
      const question: Question = {
        id: uuidv4(),
        prompt: item.prompt,
        category: item.category,
        difficulty: item.difficulty,
        referenceAnswer: item.referenceAnswer ?? null,
        createdAt: ts,
        updatedAt: ts,
      };
      this.questions.set(question.id, question);
      return question;
    });
  }

  async update(id: string, patch: QuestionUpdate): Promise<Question | null> {
    const current = this.questions.get(id);
    if (!current) return null;
    const next: Question = {
      ...current,
      prompt: patch.prompt ?? current.prompt,
      category: patch.category ?? current.category,
      difficulty: patch.difficulty ?? current.difficulty,
      referenceAnswer: patch.referenceAnswer !== undefined ? patch.referenceAnswer : current.referenceAnswer,
      updatedAt: this.now().toISOString(),
    };
    this.questions.set(id, next);
    return next;
  }

  async delete(id: string): Promise<boolean> {
    return this.questions.delete(id);
  }
}
