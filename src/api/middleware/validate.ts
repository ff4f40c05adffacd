import { Request, Response, NextFunction } from 'express';
import { param, validationResult, type ValidationChain, type ValidationError } from 'express-validator';

export interface FieldError {
  field: string;
  message: string;
}

function toFieldError(error: ValidationError): FieldError {
  return {
    field: error.type === 'field' ? error.path : error.type,
    message: String(error.msg),
  };
}

export function validate(validations: ValidationChain[]) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await Promise.all(validations.map((v) => v.run(req)));
    const errors = validationResult(req);
    if (errors.isEmpty()) {
      next();
      return;
    }
    res.status(400).json({
      error: 'Validation failed',
      code: 'VALIDATION_FAILED',
      details: errors.array().map(toFieldError),
    });
  };
}

/** `:id` route parameter carrying a generated uuid */
export const idParam = () => param('id').isUUID().withMessage('id must be a UUID');
