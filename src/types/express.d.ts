import type { AuthUser } from '../services/auth.service';

declare global {
  namespace Express {
    interface Request {
      /** Set by the auth middleware from a verified bearer token */
      user?: AuthUser;
    }
  }
}

export {};
