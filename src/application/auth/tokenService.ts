import jwt from 'jsonwebtoken';
import type { JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import type { UserIdentity } from '../../domain/auth/user.js';
import { TokenExpiredError, TokenInvalidError } from '../../domain/auth/errors.js';

export type TokenType = 'access' | 'refresh';

export interface TokenSettings {
  secret: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
}

export interface IssuedToken {
  token: string;
  /** Lifetime in seconds. */
  expiresIn: number;
  expiresAt: Date;
}

/**
 * Milliseconds since the epoch. Injected so expiry can be tested without waiting.
 */
export type Clock = () => number;

const claimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(['user', 'admin']),
  typ: z.enum(['access', 'refresh']),
  iat: z.number().int(),
  exp: z.number().int(),
});

/**
 * Issues and validates HS256 JWTs. The secret is fixed for the life of the instance.
 */
export class TokenService {
  constructor(
    private readonly settings: TokenSettings,
    private readonly clock: Clock = Date.now
  ) {
    if (settings.secret.length === 0) {
      throw new Error('Token signing secret must not be empty');
    }
  }

  issue(identity: UserIdentity, type: TokenType = 'access'): IssuedToken {
    const expiresIn =
      type === 'access' ? this.settings.accessTtlSeconds : this.settings.refreshTtlSeconds;
    const issuedAt = this.nowSeconds();

    const token = jwt.sign(
      {
        sub: identity.id,
        role: identity.role,
        typ: type,
        iat: issuedAt,
      },
      this.settings.secret,
      {
        algorithm: 'HS256',
        expiresIn,
      }
    );

    return {
      token,
      expiresIn,
      expiresAt: new Date((issuedAt + expiresIn) * 1000),
    };
  }

  /**
   * Returns the identity behind a token of the expected type.
   *
   * @throws TokenExpiredError when the signature holds but `now >= exp`
   * @throws TokenInvalidError for anything malformed, forged or of the wrong type
   */
  validate(token: string, expected: TokenType = 'access'): UserIdentity {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.settings.secret, {
        algorithms: ['HS256'],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new TokenExpiredError(error.expiredAt);
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw new TokenInvalidError(`Token is invalid: ${error.message}`);
      }
      throw error;
    }

    const claims = claimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw new TokenInvalidError('Token is invalid: missing or malformed claims');
    }
    if (claims.data.typ !== expected) {
      throw new TokenInvalidError(`Token is invalid: expected a ${expected} token`);
    }

    return { id: claims.data.sub, role: claims.data.role };
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000);
  }
}
