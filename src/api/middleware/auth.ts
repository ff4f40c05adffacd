/**
 * JWT auth middleware. Every session, question and AI route requires a user
 * token; question-bank writes additionally require role === 'admin'.
 */
import { Request, Response, NextFunction, RequestHandler } from 'express';
import type { AuthUser, TokenService } from '../../services/auth.service';

export interface AuthMiddleware {
  requireUser: RequestHandler;
  requireAdmin: RequestHandler;
}

function bearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header || !header.startsWith('Bearer ')) return null;
  return header.slice(7).trim() || null;
}

export function createAuthMiddleware(tokens: TokenService): AuthMiddleware {
  const authenticate = (req: Request, res: Response): AuthUser | null => {
    const token = bearerToken(req);
    if (!token) {
      res.status(401).json({ error: 'Missing or invalid Authorization header', code: 'UNAUTHORIZED' });
      return null;
    }
    const user = tokens.verify(token);
    if (!user) {
      res.status(401).json({ error: 'Invalid or expired token', code: 'UNAUTHORIZED' });
      return null;
    }
    return user;
  };

  return {
    requireUser(req: Request, res: Response, next: NextFunction): void {
      const user = authenticate(req, res);
      if (!user) return;
      req.user = user;
      next();
    },

    /** Requires a valid token with role === 'admin'. */
    requireAdmin(req: Request, res: Response, next: NextFunction): void {
      const user = authenticate(req, res);
      if (!user) return;
      if (user.role !== 'admin') {
        res.status(403).json({ error: 'Admin access required', code: 'FORBIDDEN' });
        return;
      }
      req.user = user;
      next();
    },
  };
}

/** The authenticated caller; only valid behind requireUser / requireAdmin. */
export function currentUser(req: Request): AuthUser {
  if (!req.user) throw new Error('currentUser() used on a route without auth middleware');
  return req.user;
}
