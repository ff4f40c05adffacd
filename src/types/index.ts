/**
 * Shared domain types for the interview practice platform.
 * Keeps API, services and stores aligned on the same shapes.
 */

export type DifficultyLevel = 'easy' | 'medium' | 'hard';

export const DIFFICULTY_LEVELS: readonly DifficultyLevel[] = ['easy', 'medium', 'hard'];

export type UserRole = 'user' | 'admin';

export type SessionStatus = 'created' | 'in_progress' | 'completed';

export interface User {
  id: string;
  name: string;
  /** Always stored lower-case */
  email: string;
  passwordHash: string;
  role: UserRole;
  profileImageUrl: string | null;
  createdAt: string;
  updatedAt: string;
}

export type PublicUser = Omit<User, 'passwordHash'>;

export interface Question {
  id: string;
  prompt: string;
  category: string;
  difficulty: DifficultyLevel;
  /** Optional model answer, used to ground AI feedback */
  referenceAnswer: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface QuestionFilter {
  category?: string;
  difficulty?: DifficultyLevel;
}

/** Snapshot of a bank question taken when the session is created. */
export interface SessionQuestion {
  questionId: string;
  prompt: string;
  category: string;
  difficulty: DifficultyLevel;
  referenceAnswer: string | null;
  /** Candidate's own markers, editable at any time */
  isPinned: boolean;
  note: string;
}

export interface SessionContext {
  role: string | null;
  experienceYears: number | null;
  topicsToFocus: string | null;
  description: string | null;
}

export interface InterviewSession extends SessionContext {
  id: string;
  userId: string;
  questions: SessionQuestion[];
  /** Positional: answers[i] answers questions[i]; null until submitted */
  answers: (string | null)[];
  /** Positional: feedback[i] critiques answers[i]; null until generated */
  feedback: (string | null)[];
  status: SessionStatus;
  createdAt: string;
  updatedAt: string;
  startedAt: string | null;
  completedAt: string | null;
}

export interface GeneratedQuestion {
  question: string;
  answer: string;
}

export interface ConceptExplanation {
  title: string;
  explanation: string;
}

export interface FollowUpAnswer {
  answer: string;
}
