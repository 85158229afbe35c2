import { randomUUID } from 'crypto';
import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import type { TokenSettings } from '../../config.js';
import { UnauthorizedError } from '../errors.js';

/**
 * Claims a verified token asserts.
 */
export interface TokenClaims {
  subjectId: string;
  email: string | null;
  expiresAt: Date;
}

/**
 * What login and refresh hand back to the caller.
 */
export interface TokenGrant {
  accessToken: string;
  tokenType: 'bearer';
  subjectId: string;
  email: string;
  expiresAt: Date;
}

// Only these claims are read back out of a token; anything else is dropped.
const claimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string().min(1).optional(),
  exp: z.number().int(),
});

type DecodedClaims = z.infer<typeof claimsSchema>;

/**
 * Issues and checks stateless HMAC-signed bearer tokens.
 * Nothing is stored: validity is signature plus expiry, so a token
 * cannot be revoked before it expires and refresh leaves the old one valid.
 */
export class TokenService {
  constructor(private readonly settings: TokenSettings) {}

  issue(
    subjectId: string,
    email: string,
    ttlMinutes: number = this.settings.accessTokenTtlMinutes
  ): TokenGrant {
    const issuedAt = Math.floor(Date.now() / 1000);
    const exp = issuedAt + Math.round(ttlMinutes * 60);

    const accessToken = jwt.sign(
      { sub: subjectId, email, iat: issuedAt, exp, jti: randomUUID() },
      this.settings.secret,
      { algorithm: this.settings.algorithm }
    );

    return {
      accessToken,
      tokenType: 'bearer',
      subjectId,
      email,
      expiresAt: new Date(exp * 1000),
    };
  }

  verify(token: string): TokenClaims {
    const claims = this.decode(token, 'Invalid token');
    return {
      subjectId: claims.sub,
      email: claims.email ?? null,
      expiresAt: new Date(claims.exp * 1000),
    };
  }

  /**
   * Mint a new token for the same subject. Requires the email claim,
   * which verify() tolerates being absent.
   */
  refresh(token: string): TokenGrant {
    const claims = this.decode(token, 'Invalid or expired token');
    if (claims.email === undefined) {
      throw new UnauthorizedError('Invalid or expired token');
    }
    return this.issue(claims.sub, claims.email);
  }

  private decode(token: string, failureMessage: string): DecodedClaims {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.settings.secret, {
        algorithms: [this.settings.algorithm],
      });
    } catch (err) {
      if (err instanceof jwt.JsonWebTokenError) {
        throw new UnauthorizedError(failureMessage);
      }
      throw err;
    }

    const parsed = claimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UnauthorizedError(failureMessage);
    }
    return parsed.data;
  }
}
