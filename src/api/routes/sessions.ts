/**
 * Interview session API:
 * POST /sessions, GET /sessions/mine, GET /sessions/:id,
 * POST /sessions/:id/answers, POST /sessions/:id/feedback, POST /sessions/:id/complete,
 * POST /sessions/:id/questions/:index/pin, POST /sessions/:id/questions/:index/note
 */

import { Router, Request, Response, NextFunction } from 'express';
import { body, param } from 'express-validator';
import { displayOrder, type SessionOrchestrator } from '../../services/interview';
import type { DifficultyLevel } from '../../types';
import { DIFFICULTY_LEVELS } from '../../types';
import { idParam, validate } from '../middleware/validate';
import { currentUser, type AuthMiddleware } from '../middleware/auth';

interface CreateSessionBody {
  questionCount: number;
  category?: string;
  difficulty?: DifficultyLevel;
  role?: string;
  experienceYears?: number;
  topicsToFocus?: string;
  description?: string;
}

export function createSessionRoutes(orchestrator: SessionOrchestrator, auth: AuthMiddleware): Router {
  const router = Router();
  router.use(auth.requireUser);

  /** Ownership check before any mutation; foreign sessions look missing. */
  const ownSession = async (req: Request) => orchestrator.getSession(req.params.id, currentUser(req).id);

  router.post(
    '/',
    validate([
      body('questionCount').isInt().toInt(),
      body('category').optional().isString().trim().notEmpty(),
      body('difficulty').optional().isIn([...DIFFICULTY_LEVELS]),
      body('role').optional().isString().trim(),
      body('experienceYears').optional().isInt({ min: 0, max: 60 }).toInt(),
      body('topicsToFocus').optional().isString().trim(),
      body('description').optional().isString().trim(),
    ]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const input: CreateSessionBody = req.body;
        const session = await orchestrator.createSession({
          userId: currentUser(req).id,
          questionCount: input.questionCount,
          filter: { category: input.category, difficulty: input.difficulty },
          context: {
            role: input.role || null,
            experienceYears: input.experienceYears ?? null,
            topicsToFocus: input.topicsToFocus || null,
            description: input.description || null,
          },
        });
        res.status(201).json({ session });
      } catch (e) {
        next(e);
      }
    }
  );

  router.get('/mine', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ sessions: await orchestrator.listSessions(currentUser(req).id) });
    } catch (e) {
      next(e);
    }
  });

  router.get('/:id', validate([idParam()]), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await ownSession(req);
      res.json({ session, order: displayOrder(session) });
    } catch (e) {
      next(e);
    }
  });

  /** Submit (or overwrite) the answer at questionIndex */
  router.post(
    '/:id/answers',
    validate([
      idParam(),
      body('questionIndex').isInt().toInt(),
      // Stored exactly as sent: leading indentation matters in code answers.
      body('answerText')
        .isString()
        .custom((value: unknown) => typeof value === 'string' && value.trim() !== '')
        .withMessage('answerText is required'),
    ]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { questionIndex, answerText }: { questionIndex: number; answerText: string } = req.body;
        await ownSession(req);
        const session = await orchestrator.submitAnswer(req.params.id, questionIndex, answerText);
        res.json({ session });
      } catch (e) {
        next(e);
      }
    }
  );

  /** Generate AI feedback for the answer at questionIndex and store it */
  router.post(
    '/:id/feedback',
    validate([idParam(), body('questionIndex').isInt().toInt()]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { questionIndex }: { questionIndex: number } = req.body;
        await ownSession(req);
        const result = await orchestrator.requestFeedback(req.params.id, questionIndex);
        res.json({ feedback: result.feedback, session: result.session });
      } catch (e) {
        next(e);
      }
    }
  );

  router.post(
    '/:id/complete',
    validate([idParam(), body('force').optional().isBoolean().toBoolean()]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { force }: { force?: boolean } = req.body;
        await ownSession(req);
        const session = await orchestrator.completeSession(req.params.id, force === true);
        res.json({ session });
      } catch (e) {
        next(e);
      }
    }
  );

  router.post(
    '/:id/questions/:index/pin',
    validate([idParam(), param('index').isInt().toInt()]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        await ownSession(req);
        const session = await orchestrator.togglePin(req.params.id, Number(req.params.index));
        res.json({ session, order: displayOrder(session) });
      } catch (e) {
        next(e);
      }
    }
  );

  router.post(
    '/:id/questions/:index/note',
    validate([
      idParam(),
      param('index').isInt().toInt(),
      body('note').isString().isLength({ max: 5000 }).withMessage('note must be a string of at most 5000 characters'),
    ]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { note }: { note: string } = req.body;
        await ownSession(req);
        const session = await orchestrator.updateNote(req.params.id, Number(req.params.index), note);
        res.json({ session });
      } catch (e) {
        next(e);
      }
    }
  );

  return router;
}
