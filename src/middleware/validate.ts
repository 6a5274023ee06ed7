import type { Request, Response, NextFunction } from 'express';
import { validationResult, type ValidationError } from 'express-validator';
import { AppError } from './errorHandler.js';

const fieldOf = (err: ValidationError): string => {
  switch (err.type) {
    case 'field':
      return err.path;
    case 'alternative':
    case 'alternative_grouped':
    case 'unknown_fields':
      return '_request';
  }
};

export const validate = (req: Request, _res: Response, next: NextFunction) => {
  const errors = validationResult(req);

  if (!errors.isEmpty()) {
    const details = errors.array().map((err) => ({
      field: fieldOf(err),
      message: String(err.msg),
    }));
    return next(new AppError('Validation failed', 400, 'VALIDATION_ERROR', details));
  }

  next();
};
