export { SessionOrchestrator, displayOrder } from './SessionOrchestrator';
export type { CreateSessionInput, FeedbackResult, SessionOrchestratorOptions } from './SessionOrchestrator';
export { PgSessionStore } from './SessionStore';
export type { SessionStore, NewSession } from './SessionStore';
export { MemorySessionStore } from './MemorySessionStore';
export { FeedbackLock } from './FeedbackLock';
