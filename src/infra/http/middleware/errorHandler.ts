import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ValidationError } from '../../../domain/errors.js';
import { NotFoundError, UnauthorizedError, ConflictError } from '../../../application/errors.js';
import { logger as sharedLogger, type Logger } from '../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

/**
 * Map known errors to status codes. Anything unrecognised is a 500;
 * infrastructure failures are never reported as authentication failures.
 */
export function createErrorHandler(logger: Logger = sharedLogger) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof ZodError) {
      const response: ErrorResponse = {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
      };
      res.status(400).json(response);
      return;
    }

    if (err instanceof ValidationError) {
      const response: ErrorResponse = {
        code: 'VALIDATION_ERROR',
        message: err.message,
      };
      res.status(400).json(response);
      return;
    }

    if (err instanceof UnauthorizedError) {
      const response: ErrorResponse = {
        code: 'UNAUTHORIZED',
        message: err.message,
      };
      res.setHeader('WWW-Authenticate', 'Bearer');
      res.status(401).json(response);
      return;
    }

    if (err instanceof NotFoundError) {
      const response: ErrorResponse = {
        code: 'NOT_FOUND',
        message: err.message,
      };
      res.status(404).json(response);
      return;
    }

    if (err instanceof ConflictError) {
      const response: ErrorResponse = {
        code: 'CONFLICT',
        message: err.message,
      };
      res.status(409).json(response);
      return;
    }

    logger.error('Unhandled error', { err, method: req.method, path: req.path });

    const response: ErrorResponse = {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    res.status(500).json(response);
  };
}
