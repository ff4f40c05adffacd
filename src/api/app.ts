/**
 * Express app: CORS, JSON body, static uploads, and the API routers.
 * Every collaborator is passed in, so tests and the entry point wire their own.
 */

import express, { type Express } from 'express';
import cors from 'cors';
import path from 'path';
import type { AppConfig } from '../config';
import type { AccountService, TokenService } from '../services/auth.service';
import type { AuthoringService } from '../services/authoring.service';
import type { QuestionRepository } from '../services/question.service';
import type { SessionOrchestrator } from '../services/interview';
import { createAuthMiddleware } from './middleware/auth';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createAuthRoutes } from './routes/auth';
import { createSessionRoutes } from './routes/sessions';
import { createQuestionRoutes } from './routes/questions';
import { createAiRoutes } from './routes/ai';

export interface AppDeps {
  config: Pick<AppConfig, 'apiPrefix' | 'corsOrigin' | 'uploads'>;
  tokens: TokenService;
  accounts: AccountService;
  questions: QuestionRepository;
  authoring: AuthoringService;
  orchestrator: SessionOrchestrator;
}

export function createApp(deps: AppDeps): Express {
  const { config } = deps;
  const app = express();
  const auth = createAuthMiddleware(deps.tokens);

  app.use(cors({ origin: config.corsOrigin, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  app.use('/uploads', express.static(path.resolve(process.cwd(), config.uploads.dir)));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  app.use(
    `${config.apiPrefix}/auth`,
    createAuthRoutes({ accounts: deps.accounts, auth, uploads: config.uploads })
  );
  app.use(`${config.apiPrefix}/sessions`, createSessionRoutes(deps.orchestrator, auth));
  app.use(
    `${config.apiPrefix}/questions`,
    createQuestionRoutes({ questions: deps.questions, authoring: deps.authoring, auth })
  );
  app.use(`${config.apiPrefix}/ai`, createAiRoutes(deps.authoring, auth));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
