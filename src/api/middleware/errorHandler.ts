/**
 * Last middleware in the chain. Domain and HTTP errors become
 * { error, code, details? }; anything else (database, driver, bugs) is logged
 * and answered with a bare 500.
 */
import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { logger } from '../../config/logger';
import { HttpError, InfrastructureError, SessionError } from '../../services/errors';

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof SessionError) {
    res.status(err.status).json({
      error: err.message,
      code: err.code,
      ...(err.details ? { details: err.details } : {}),
    });
    return;
  }
  if (err instanceof HttpError) {
    res.status(err.status).json({ error: err.message, code: err.code });
    return;
  }
  // express.json() parse failures carry the raw body
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({ error: 'Malformed JSON body', code: 'INVALID_JSON' });
    return;
  }
  if (err instanceof MulterError) {
    res.status(400).json({ error: err.message, code: 'UPLOAD_REJECTED' });
    return;
  }

  logger.error(err instanceof InfrastructureError ? 'Infrastructure failure' : 'Unhandled error', {
    method: req.method,
    path: req.originalUrl,
    error: err instanceof Error ? err.message : String(err),
    cause: err instanceof Error && err.cause instanceof Error ? err.cause.message : undefined,
  });
  res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: `Route ${req.method} ${req.path} not found`, code: 'ROUTE_NOT_FOUND' });
}
