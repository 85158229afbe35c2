import { Request, Response, NextFunction } from 'express';
import { TokenService } from '../../../application/auth/tokenService.js';
import { UnauthorizedError } from '../../../application/errors.js';

export interface AuthContext {
  subjectId: string;
  email: string | null;
}

declare global {
  namespace Express {
    interface Request {
      auth?: AuthContext;
    }
  }
}

const BEARER_PREFIX = 'Bearer ';

/**
 * Pull the raw token out of an `Authorization: Bearer <token>` header.
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith(BEARER_PREFIX)) {
    return null;
  }
  const token = header.substring(BEARER_PREFIX.length).trim();
  return token || null;
}

/**
 * Reject the request unless it carries a currently valid bearer token.
 * Every protected route goes through TokenService.verify here.
 */
export function authMiddleware(tokenService: TokenService) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      next(new UnauthorizedError('Missing or invalid authorization header'));
      return;
    }

    try {
      const claims = tokenService.verify(token);
      req.auth = { subjectId: claims.subjectId, email: claims.email };
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Auth context of a request that passed authMiddleware.
 */
export function requireAuth(req: Request): AuthContext {
  if (!req.auth) {
    throw new UnauthorizedError();
  }
  return req.auth;
}
