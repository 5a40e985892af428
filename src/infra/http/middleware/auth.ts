import type { Request, RequestHandler } from 'express';
import type { Role, UserIdentity } from '../../../domain/auth/user.js';
import { ForbiddenError } from '../../../domain/auth/errors.js';
import type { AuthenticateUseCase } from '../../../application/auth/authenticate.js';
import { UnauthorizedError } from '../../../application/errors.js';
import { asyncHandler } from './asyncHandler.js';

export interface AuthRequest extends Request {
  identity?: UserIdentity;
}

const BEARER_PREFIX = 'Bearer ';

/**
 * Validates `Authorization: Bearer <token>` and attaches the identity to the request.
 */
export function authMiddleware(authenticate: AuthenticateUseCase): RequestHandler {
  return asyncHandler(async (req: AuthRequest, _res, next) => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
      throw new UnauthorizedError('Missing or invalid authorization header');
    }

    const token = authHeader.substring(BEARER_PREFIX.length).trim();
    if (token.length === 0) {
      throw new UnauthorizedError('Missing or invalid authorization header');
    }

    req.identity = await authenticate.execute(token);
    next();
  });
}

/**
 * The identity set by authMiddleware. Throws if the route was mounted without it.
 */
export function currentIdentity(req: AuthRequest): UserIdentity {
  if (!req.identity) {
    throw new UnauthorizedError();
  }
  return req.identity;
}

export function requireRole(role: Role): RequestHandler {
  return (req: AuthRequest, _res, next) => {
    try {
      if (currentIdentity(req).role !== role) {
        throw new ForbiddenError('Not authorized to access this resource');
      }
      next();
    } catch (error) {
      next(error);
    }
  };
}
