/**
 * Accounts: POST /auth/register, POST /auth/login, GET /auth/profile,
 * POST /auth/change-password, POST /auth/upload-image (multipart "image").
 */
import { Router, Request, Response, NextFunction } from 'express';
import { body } from 'express-validator';
import multer from 'multer';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { AccountService } from '../../services/auth.service';
import { HttpError } from '../../services/errors';
import { validate } from '../middleware/validate';
import { currentUser, type AuthMiddleware } from '../middleware/auth';

export interface AuthRoutesDeps {
  accounts: AccountService;
  auth: AuthMiddleware;
  uploads: { dir: string; publicUrl: string; maxBytes: number };
}

export function createAuthRoutes({ accounts, auth, uploads }: AuthRoutesDeps): Router {
  const router = Router();

  const upload = multer({
    storage: multer.diskStorage({
      destination: path.resolve(process.cwd(), uploads.dir),
      filename: (_req, file, cb) => {
        cb(null, `${uuidv4()}${path.extname(file.originalname).toLowerCase()}`);
      },
    }),
    limits: { fileSize: uploads.maxBytes, files: 1 },
    fileFilter: (_req, file, cb) => {
      if (/^image\//i.test(file.mimetype)) cb(null, true);
      else cb(new HttpError(415, 'UNSUPPORTED_MEDIA_TYPE', `Invalid content-type: ${file.mimetype}`));
    },
  });

  router.post(
    '/register',
    validate([
      body('name').isString().trim().notEmpty().withMessage('name is required'),
      body('email').isEmail().withMessage('email must be valid'),
      body('password').isString().isLength({ min: 6 }).withMessage('password must be at least 6 characters'),
      body('profileImageUrl').optional({ values: 'null' }).isURL({ require_protocol: true, require_tld: false }),
      body('adminInviteToken').optional().isString(),
    ]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { name, email, password, profileImageUrl, adminInviteToken }: {
          name: string;
          email: string;
          password: string;
          profileImageUrl?: string | null;
          adminInviteToken?: string;
        } = req.body;
        const result = await accounts.register({ name, email, password, profileImageUrl, adminInviteToken });
        res.status(201).json(result);
      } catch (e) {
        next(e);
      }
    }
  );

  router.post(
    '/login',
    validate([body('email').isEmail(), body('password').isString().notEmpty()]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { email, password }: { email: string; password: string } = req.body;
        res.json(await accounts.login(email, password));
      } catch (e) {
        next(e);
      }
    }
  );

  router.get('/profile', auth.requireUser, async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ user: await accounts.profile(currentUser(req).id) });
    } catch (e) {
      next(e);
    }
  });

  router.post(
    '/change-password',
    auth.requireUser,
    validate([
      body('currentPassword').isString().notEmpty(),
      body('newPassword').isString().isLength({ min: 6 }).withMessage('newPassword must be at least 6 characters'),
    ]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { currentPassword, newPassword }: { currentPassword: string; newPassword: string } = req.body;
        await accounts.changePassword(currentUser(req).id, currentPassword, newPassword);
        res.json({ updated: true });
      } catch (e) {
        next(e);
      }
    }
  );

  router.post('/upload-image', auth.requireUser, upload.single('image'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.file) {
        res.status(400).json({ error: 'Image file is required', code: 'VALIDATION_FAILED' });
        return;
      }
      const imageUrl = `${uploads.publicUrl}/uploads/${req.file.filename}`;
      const user = await accounts.setProfileImage(currentUser(req).id, imageUrl);
      res.status(201).json({ imageUrl, user });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
