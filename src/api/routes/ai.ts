import { Router, Request, Response, NextFunction } from 'express';
import { body } from 'express-validator';
import type { AuthoringService } from '../../services/authoring.service';
import { validate } from '../middleware/validate';
import type { AuthMiddleware } from '../middleware/auth';

export function createAiRoutes(authoring: AuthoringService, auth: AuthMiddleware): Router {
  const router = Router();
  router.use(auth.requireUser);

  /** POST /ai/generate-questions - practice questions with model answers (not stored) */
  router.post(
    '/generate-questions',
    validate([
      body('role').isString().trim().notEmpty().withMessage('role is required'),
      body('experience').isInt({ min: 0, max: 60 }).toInt(),
      body('topicsToFocus').isString().trim().notEmpty(),
      body('numberOfQuestions').isInt({ min: 1, max: 20 }).toInt(),
    ]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { role, experience, topicsToFocus, numberOfQuestions }: {
          role: string;
          experience: number;
          topicsToFocus: string;
          numberOfQuestions: number;
        } = req.body;
        const questions = await authoring.generateQuestions({
          role,
          experienceYears: experience,
          topicsToFocus,
          count: numberOfQuestions,
        });
        res.json({ questions });
      } catch (e) {
        next(e);
      }
    }
  );

  /** POST /ai/generate-explanation - explanation of one question, pitched at `experience` years (beginner if absent) */
  router.post(
    '/generate-explanation',
    validate([
      body('question').isString().trim().notEmpty().withMessage('question is required'),
      body('experience').optional().isInt({ min: 0, max: 60 }).toInt(),
    ]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { question, experience }: { question: string; experience?: number } = req.body;
        res.json(await authoring.explainConcept(question, experience));
      } catch (e) {
        next(e);
      }
    }
  );

  /** POST /ai/follow-up - ask a follow-up about a question, answer or explanation */
  router.post(
    '/follow-up',
    validate([
      body('context')
        .isString()
        .trim()
        .notEmpty()
        .withMessage('context is required')
        .isLength({ max: 20000 })
        .withMessage('context must be at most 20000 characters'),
      body('question').isString().trim().notEmpty().withMessage('question is required'),
    ]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { context, question }: { context: string; question: string } = req.body;
        res.json(await authoring.followUp(context, question));
      } catch (e) {
        next(e);
      }
    }
  );

  return router;
}
