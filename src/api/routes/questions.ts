/**
 * Question bank. Reading is open to any signed-in user; writes are admin-only.
 * POST /questions/generate asks the AI provider for questions with reference
 * answers and stores them in the bank.
 */
import { Router, Request, Response, NextFunction } from 'express';
import { body, query } from 'express-validator';
import type { QuestionCreate, QuestionRepository, QuestionUpdate } from '../../services/question.service';
import type { AuthoringService } from '../../services/authoring.service';
import { HttpError } from '../../services/errors';
import { DIFFICULTY_LEVELS, type DifficultyLevel } from '../../types';
import { idParam, validate } from '../middleware/validate';
import type { AuthMiddleware } from '../middleware/auth';

export interface QuestionRoutesDeps {
  questions: QuestionRepository;
  authoring: AuthoringService;
  auth: AuthMiddleware;
}

function questionNotFound(id: string): HttpError {
  return new HttpError(404, 'QUESTION_NOT_FOUND', `Question ${id} not found`);
}

export function createQuestionRoutes({ questions, authoring, auth }: QuestionRoutesDeps): Router {
  const router = Router();

  router.get(
    '/',
    auth.requireUser,
    validate([
      query('category').optional().isString().trim().notEmpty(),
      query('difficulty').optional().isIn([...DIFFICULTY_LEVELS]),
    ]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const category = typeof req.query.category === 'string' ? req.query.category : undefined;
        const difficulty = DIFFICULTY_LEVELS.find((d) => d === req.query.difficulty);
        res.json({ questions: await questions.list({ category, difficulty }) });
      } catch (e) {
        next(e);
      }
    }
  );

  router.post(
    '/',
    auth.requireAdmin,
    validate([
      body('questions').isArray({ min: 1, max: 100 }).withMessage('questions must be a non-empty array'),
      body('questions.*.prompt').isString().trim().notEmpty(),
      body('questions.*.category').isString().trim().notEmpty(),
      body('questions.*.difficulty').isIn([...DIFFICULTY_LEVELS]),
      body('questions.*.referenceAnswer').optional({ values: 'null' }).isString(),
    ]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const items: QuestionCreate[] = req.body.questions;
        res.status(201).json({ questions: await questions.create(items) });
      } catch (e) {
        next(e);
      }
    }
  );

  router.post(
    '/generate',
    auth.requireAdmin,
    validate([
      body('category').isString().trim().notEmpty(),
      body('difficulty').isIn([...DIFFICULTY_LEVELS]),
      body('count').isInt({ min: 1, max: 20 }).toInt(),
      body('role').optional().isString().trim().notEmpty(),
      body('experienceYears').optional().isInt({ min: 0, max: 60 }).toInt(),
    ]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const input: {
          category: string;
          difficulty: DifficultyLevel;
          count: number;
          role?: string;
          experienceYears?: number;
        } = req.body;
        const generated = await authoring.generateQuestions({
          role: input.role ?? 'Software Engineer',
          experienceYears: input.experienceYears ?? 2,
          topicsToFocus: input.category,
          count: input.count,
        });
        const created = await questions.create(
          generated.map((g) => ({
            prompt: g.question,
            category: input.category,
            difficulty: input.difficulty,
            referenceAnswer: g.answer,
          }))
        );
        res.status(201).json({ questions: created });
      } catch (e) {
        next(e);
      }
    }
  );

  router.patch(
    '/:id',
    auth.requireAdmin,
    validate([
      idParam(),
      body('prompt').optional().isString().trim().notEmpty(),
      body('category').optional().isString().trim().notEmpty(),
      body('difficulty').optional().isIn([...DIFFICULTY_LEVELS]),
      body('referenceAnswer').optional({ values: 'null' }).isString(),
    ]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { prompt, category, difficulty, referenceAnswer }: QuestionUpdate = req.body;
        const updated = await questions.update(req.params.id, { prompt, category, difficulty, referenceAnswer });
        if (!updated) throw questionNotFound(req.params.id);
        res.json({ question: updated });
      } catch (e) {
        next(e);
      }
    }
  );

  // Running sessions keep their own snapshot, so deleting from the bank is safe.
  router.delete('/:id', auth.requireAdmin, validate([idParam()]), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const deleted = await questions.delete(req.params.id);
      if (!deleted) throw questionNotFound(req.params.id);
      res.json({ deleted: true });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
