import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import { Authenticator } from '../../../application/auth/login.js';
import { TokenGrant, TokenService } from '../../../application/auth/tokenService.js';
import { UnauthorizedError } from '../../../application/errors.js';
import { authMiddleware, extractBearerToken, requireAuth } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/v1/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive a bearer token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/TokenResponse' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/v1/auth/refresh:
 *   post:
 *     tags: [Auth]
 *     summary: Exchange a valid token for a new one (the old one stays valid)
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: New token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/TokenResponse' }
 *       401:
 *         description: Invalid or expired token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/v1/auth/verify:
 *   post:
 *     tags: [Auth]
 *     summary: Check a token and return its claims
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: Token is valid }
 *       401:
 *         description: Invalid token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const loginBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

/**
 * Wire format for login and refresh responses.
 */
export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
  subject_id: string;
  email: string;
  expires_at: string;
}

export function toTokenResponse(grant: TokenGrant): TokenResponse {
  return {
    access_token: grant.accessToken,
    token_type: grant.tokenType,
    subject_id: grant.subjectId,
    email: grant.email,
    expires_at: grant.expiresAt.toISOString(),
  };
}

export interface AuthRouteDeps {
  authenticator: Authenticator;
  tokenService: TokenService;
  loginRateLimiter: RequestHandler;
}

export function createAuthRoutes(deps: AuthRouteDeps) {
  const router = Router();
  const { authenticator, tokenService } = deps;

  router.post(
    '/login',
    deps.loginRateLimiter,
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const grant = await authenticator.execute(body);
      res.status(200).json(toTokenResponse(grant));
    })
  );

  router.post('/refresh', (req, res, next) => {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      next(new UnauthorizedError('Missing or invalid authorization header'));
      return;
    }
    try {
      res.status(200).json(toTokenResponse(tokenService.refresh(token)));
    } catch (error) {
      next(error);
    }
  });

  router.post('/verify', authMiddleware(tokenService), (req, res) => {
    const auth = requireAuth(req);
    res.status(200).json({ valid: true, subject_id: auth.subjectId, email: auth.email });
  });

  return router;
}
