/**
 * Backend entry point: build the dependency graph once, ensure tables, start HTTP.
 */
import { createServer } from 'http';
import fs from 'fs';
import path from 'path';
import { createApp } from './api/app';
import { config } from './config';
import { logger } from './config/logger';
import { createDatabase, isMemoryUrl } from './db/client';
import { ensureUsersTable } from './db/ensure-users';
import { ensureQuestionsTable } from './db/ensure-questions';
import { ensureSessionsTable } from './db/ensure-sessions';
import { loadSeedQuestions, seedQuestions } from './db/seed';
import { createRedis } from './redis/client';
import { AiGateway } from './ai/gateway';
import { createLLMService } from './ai/llm';
import { AccountService, TokenService } from './services/auth.service';
import { AuthoringService } from './services/authoring.service';
import { MemoryQuestionRepository, PgQuestionRepository, type QuestionRepository } from './services/question.service';
import { MemoryUserRepository, PgUserRepository, type UserRepository } from './services/user.service';
import {
  FeedbackLock,
  MemorySessionStore,
  PgSessionStore,
  SessionOrchestrator,
  type SessionStore,
} from './services/interview';

interface Stores {
  users: UserRepository;
  questions: QuestionRepository;
  sessions: SessionStore;
  close(): Promise<void>;
}

async function createStores(): Promise<Stores> {
  if (isMemoryUrl(config.database.url)) {
    logger.warn('DATABASE_URL=memory: users, questions and sessions are kept in process and lost on restart');
    const questions = new MemoryQuestionRepository();
    const seeded = await seedQuestions(questions, loadSeedQuestions());
    logger.info('Question bank seeded', { count: seeded });
    return {
      users: new MemoryUserRepository(),
      questions,
      sessions: new MemorySessionStore(),
      close: async () => undefined,
    };
  }

  const db = createDatabase(config.database.url);
  await ensureUsersTable(db);
  logger.info('Users table ready');
  await ensureQuestionsTable(db);
  logger.info('Questions table ready');
  await ensureSessionsTable(db);
  logger.info('Sessions table ready');
  return {
    users: new PgUserRepository(db),
    questions: new PgQuestionRepository(db),
    sessions: new PgSessionStore(db),
    close: () => db.close(),
  };
}

async function start() {
  const stores = await createStores();
  const redis = createRedis(config.redis.url);

  const llm = createLLMService(config.ai);
  if (!llm) {
    logger.warn('AI_API_KEY is not set; feedback and generation endpoints will answer UPSTREAM_UNAVAILABLE');
  }
  const gateway = new AiGateway(llm, { timeoutMs: config.ai.feedbackTimeoutMs });
  const tokens = new TokenService(config.jwt.secret, config.jwt.expiresIn);

  // A claim must outlive every attempt of the call it guards.
  const claimTtlSeconds = Math.max(config.feedback.claimTtlSeconds, Math.ceil(config.ai.feedbackTimeoutMs / 1000) * 2);
  const orchestrator = new SessionOrchestrator(
    {
      sessions: stores.sessions,
      questions: stores.questions,
      gateway,
      feedbackLock: new FeedbackLock(redis, claimTtlSeconds),
    },
    { feedbackTimeoutMs: config.ai.feedbackTimeoutMs, feedbackRetry: config.ai.feedbackRetry }
  );

  fs.mkdirSync(path.resolve(process.cwd(), config.uploads.dir), { recursive: true });

  const app = createApp({
    config,
    tokens,
    accounts: new AccountService(stores.users, tokens, config.admin.inviteToken),
    questions: stores.questions,
    authoring: new AuthoringService(gateway, config.ai.feedbackTimeoutMs),
    orchestrator,
  });

  const httpServer = createServer(app);
  const host = process.env.HOST || '0.0.0.0';
  const server = httpServer.listen(config.port, host, () => {
    logger.info(`Server listening on ${host}:${config.port} (env: ${config.env})`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      Promise.all([stores.close(), redis.quit()])
        .then(() => process.exit(0))
        .catch((e: unknown) => {
          logger.error('Shutdown failed', { error: e instanceof Error ? e.message : String(e) });
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  return server;
}

const serverPromise = start().catch((e: unknown) => {
  logger.error('Startup failed', { error: e instanceof Error ? e.message : String(e) });
  process.exit(1);
});

export default serverPromise;
