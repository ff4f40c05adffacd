/**
 * In-process SessionStore for DATABASE_URL=memory and tests. Each mutation
 * runs synchronously between awaits, which gives the same per-row
 * serialization the Postgres store gets from its conditional UPDATEs.
 */
import { v4 as uuidv4 } from 'uuid';
import type { InterviewSession } from '../../types';
import type { NewSession, SessionStore } from './SessionStore';

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, InterviewSession>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(input: NewSession): Promise<InterviewSession> {
    const ts = this.now().toISOString();
    const session: InterviewSession = {
      id: uuidv4(),
      userId: input.userId,
      role: input.role,
      experienceYears: input.experienceYears,
      topicsToFocus: input.topicsToFocus,
      description: input.description,
      questions: input.questions.map((q) => ({ ...q })),
      answers: input.questions.map(() => null),
      feedback: input.questions.map(() => null),
      status: 'created',
      createdAt: ts,
      updatedAt: ts,
      startedAt: null,
      completedAt: null,
    };
    this.sessions.set(session.id, session);
    return structuredClone(session);
  }

  async findById(id: string): Promise<InterviewSession | null> {
    const session = this.sessions.get(id);
    return session ? structuredClone(session) : null;
  }

  async listByUser(userId: string): Promise<InterviewSession[]> {
    return [...this.sessions.values()]
      .filter((s) => s.userId === userId)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .map((s) => structuredClone(s));
  }

  async saveAnswer(id: string, index: number, answerText: string): Promise<InterviewSession | null> {
    const session = this.sessions.get(id);
    if (!session || session.status === 'completed') return null;
    if (!Number.isInteger(index) || index < 0 || index >= session.questions.length) return null;

    const ts = this.now().toISOString();
    if (session.answers[index] !== answerText) session.feedback[index] = null;
    session.answers[index] = answerText;
    if (session.status === 'created') session.status = 'in_progress';
    session.startedAt = session.startedAt ?? ts;
    session.updatedAt = ts;
    return structuredClone(session);
  }

  async saveFeedback(id: string, index: number, expectedAnswer: string, feedbackText: string): Promise<InterviewSession | null> {
    const session = this.sessions.get(id);
    if (!session || session.answers[index] !== expectedAnswer) return null;
    session.feedback[index] = feedbackText;
    session.updatedAt = this.now().toISOString();
    return structuredClone(session);
  }

  async markCompleted(id: string): Promise<InterviewSession | null> {
    const session = this.sessions.get(id);
    if (!session) return null;
    if (session.status !== 'completed') {
      const ts = this.now().toISOString();
      session.status = 'completed';
      session.completedAt = ts;
      session.updatedAt = ts;
    }
    return structuredClone(session);
  }

  async togglePin(id: string, index: number): Promise<InterviewSession | null> {
    const session = this.sessions.get(id);
    const question = session?.questions[index];
    if (!session || !question || !Number.isInteger(index)) return null;
    question.isPinned = !question.isPinned;
    session.updatedAt = this.now().toISOString();
    return structuredClone(session);
  }

  async setNote(id: string, index: number, note: string): Promise<InterviewSession | null> {
    const session = this.sessions.get(id);
    const question = session?.questions[index];
    if (!session || !question || !Number.isInteger(index)) return null;
    question.note = note;
    session.updatedAt = this.now().toISOString();
    return structuredClone(session);
  }
}
