/**
 * Session Orchestrator: the interview lifecycle. Creates sessions from a
 * sample of the question bank, records answers by position, asks the AI
 * gateway for feedback and completes sessions.
 *
 * created --submitAnswer--> in_progress --completeSession--> completed
 *
 * Feedback is two separately-failable steps: generate (no store lock held),
 * then a conditional write-back that only lands if the answer is unchanged.
 * A failed or timed-out generation leaves the slot empty and the session
 * untouched, so the client can simply retry.
 */

import type { AiGateway } from '../../ai/gateway';
import { SYSTEM_PROMPT_FEEDBACK, buildFeedbackPrompt } from '../../ai/prompts';
import { logger } from '../../config/logger';
import { InfrastructureError, SessionError, isSessionError } from '../errors';
import type { QuestionRepository } from '../question.service';
import type { FeedbackLock } from './FeedbackLock';
import type { SessionStore } from './SessionStore';
import type { InterviewSession, QuestionFilter, SessionContext, SessionQuestion } from '../../types';

export interface CreateSessionInput {
  userId: string;
  questionCount: number;
  filter?: QuestionFilter;
  context?: Partial<SessionContext>;
}

export interface FeedbackResult {
  feedback: string;
  session: InterviewSession;
}

export interface SessionOrchestratorDeps {
  sessions: SessionStore;
  questions: QuestionRepository;
  gateway: AiGateway;
  feedbackLock: FeedbackLock;
}

export interface SessionOrchestratorOptions {
  feedbackTimeoutMs: number;
  /** One extra attempt after a failed generation; never more. */
  feedbackRetry: boolean;
}

/**
 * Question indices in reading order: pinned questions first, each group in
 * session order. Slots stay positional; this is only a view.
 */
export function displayOrder(session: InterviewSession): number[] {
  const indices = session.questions.map((_, i) => i);
  return [
    ...indices.filter((i) => session.questions[i].isPinned),
    ...indices.filter((i) => !session.questions[i].isPinned),
  ];
}

function notFound(sessionId: string): SessionError {
  return new SessionError('SESSION_NOT_FOUND', `Session ${sessionId} not found`);
}

function closed(): SessionError {
  return new SessionError('SESSION_CLOSED', 'Session is completed and no longer accepts answers');
}

export class SessionOrchestrator {
  private readonly sessions: SessionStore;
  private readonly questions: QuestionRepository;
  private readonly gateway: AiGateway;
  private readonly feedbackLock: FeedbackLock;

  constructor(
    deps: SessionOrchestratorDeps,
    private readonly options: SessionOrchestratorOptions
  ) {
    this.sessions = deps.sessions;
    this.questions = deps.questions;
    this.gateway = deps.gateway;
    this.feedbackLock = deps.feedbackLock;
  }

  async createSession(input: CreateSessionInput): Promise<InterviewSession> {
    if (!Number.isInteger(input.questionCount) || input.questionCount <= 0) {
      throw new SessionError('INSUFFICIENT_QUESTIONS', 'questionCount must be a positive integer');
    }
    const filter = input.filter ?? {};
    const picked = await this.questions.sample(filter, input.questionCount);
    if (picked.length === 0) {
      throw new SessionError('INSUFFICIENT_QUESTIONS', 'No questions match the requested criteria', {
        details: { filter },
      });
    }

    const questions: SessionQuestion[] = picked.map((q) => ({
      questionId: q.id,
      prompt: q.prompt,
      category: q.category,
      difficulty: q.difficulty,
      referenceAnswer: q.referenceAnswer,
      isPinned: false,
      note: '',
    }));
    const session = await this.sessions.create({
      userId: input.userId,
      role: input.context?.role ?? null,
      experienceYears: input.context?.experienceYears ?? null,
      topicsToFocus: input.context?.topicsToFocus ?? null,
      description: input.context?.description ?? null,
      questions,
    });
    logger.info('Session created', {
      sessionId: session.id,
      userId: input.userId,
      requested: input.questionCount,
      selected: questions.length,
    });
    return session;
  }

  /** Owner-scoped read: another user's session is reported as not found. */
  async getSession(sessionId: string, userId: string): Promise<InterviewSession> {
    const session = await this.sessions.findById(sessionId);
    if (!session || session.userId !== userId) throw notFound(sessionId);
    return session;
  }

  async listSessions(userId: string): Promise<InterviewSession[]> {
    return this.sessions.listByUser(userId);
  }

  async submitAnswer(sessionId: string, questionIndex: number, answerText: string): Promise<InterviewSession> {
    const session = await this.load(sessionId);
    if (session.status === 'completed') throw closed();
    this.assertIndex(session, questionIndex);

    const updated = await this.sessions.saveAnswer(sessionId, questionIndex, answerText);
    if (updated) {
      if (session.status === 'created') {
        logger.info('Session started', { sessionId });
      }
      return updated;
    }

    // Guard failed between our read and the write: someone completed it meanwhile.
    const current = await this.load(sessionId);
    if (current.status === 'completed') throw closed();
    throw new InfrastructureError(`Answer write for session ${sessionId} was rejected`);
  }

  async requestFeedback(sessionId: string, questionIndex: number): Promise<FeedbackResult> {
    const session = await this.load(sessionId);
    this.assertIndex(session, questionIndex);
    const answer = session.answers[questionIndex];
    if (answer === null) {
      throw new SessionError('ANSWER_MISSING', `No answer submitted for question ${questionIndex}`);
    }

    const release = await this.feedbackLock.acquire(sessionId, questionIndex);
    if (!release) {
      throw new SessionError('FEEDBACK_IN_PROGRESS', `Feedback for question ${questionIndex} is already being generated`);
    }

    try {
      const prompt = buildFeedbackPrompt(session.questions[questionIndex], answer, session);
      const feedback = await this.generateFeedback(prompt, sessionId, questionIndex);

      const updated = await this.sessions.saveFeedback(sessionId, questionIndex, answer, feedback);
      if (!updated) {
        throw new SessionError(
          'ANSWER_CHANGED',
          `The answer to question ${questionIndex} changed while feedback was generated; request feedback again`
        );
      }
      logger.info('Feedback stored', { sessionId, questionIndex });
      return { feedback, session: updated };
    } finally {
      await release().catch((err: unknown) => {
        logger.warn('Could not release feedback claim; it will expire', {
          sessionId,
          questionIndex,
          error: err instanceof Error ? err.message : String(err),
        });
      });
    }
  }

  async completeSession(sessionId: string, force = false): Promise<InterviewSession> {
    const session = await this.load(sessionId);
    if (session.status === 'completed') return session;

    if (!force) {
      const missing = session.answers.flatMap((a, i) => (a === null ? [i] : []));
      if (missing.length > 0) {
        throw new SessionError(
          'INCOMPLETE_ANSWERS',
          `${missing.length} of ${session.questions.length} questions have no answer`,
          { details: { missingIndices: missing } }
        );
      }
    }

    const updated = await this.sessions.markCompleted(sessionId);
    if (!updated) throw notFound(sessionId);
    logger.info('Session completed', { sessionId, forced: force });
    return updated;
  }

  /** Flip the pin on one question. Works in every status, completed included. */
  async togglePin(sessionId: string, questionIndex: number): Promise<InterviewSession> {
    const session = await this.load(sessionId);
    this.assertIndex(session, questionIndex);
    const updated = await this.sessions.togglePin(sessionId, questionIndex);
    if (!updated) throw notFound(sessionId);
    return updated;
  }

  async updateNote(sessionId: string, questionIndex: number, note: string): Promise<InterviewSession> {
    const session = await this.load(sessionId);
    this.assertIndex(session, questionIndex);
    const updated = await this.sessions.setNote(sessionId, questionIndex, note);
    if (!updated) throw notFound(sessionId);
    return updated;
  }

  private async load(sessionId: string): Promise<InterviewSession> {
    const session = await this.sessions.findById(sessionId);
    if (!session) throw notFound(sessionId);
    return session;
  }

  private assertIndex(session: InterviewSession, questionIndex: number): void {
    if (!Number.isInteger(questionIndex) || questionIndex < 0 || questionIndex >= session.questions.length) {
      throw new SessionError(
        'INVALID_INDEX',
        `questionIndex must be between 0 and ${session.questions.length - 1}`,
        { details: { questionIndex, questionCount: session.questions.length } }
      );
    }
  }

  private async generateFeedback(prompt: string, sessionId: string, questionIndex: number): Promise<string> {
    const attempts = this.options.feedbackRetry ? 2 : 1;
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.gateway.generate(prompt, {
          system: SYSTEM_PROMPT_FEEDBACK,
          timeoutMs: this.options.feedbackTimeoutMs,
        });
      } catch (err) {
        if (attempt >= attempts || !isSessionError(err, 'UPSTREAM_UNAVAILABLE')) throw err;
        logger.warn('Retrying feedback generation', { sessionId, questionIndex, attempt });
      }
    }
  }
}
