import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import {
  ForbiddenError,
  InvalidCredentialsError,
  TokenExpiredError,
  TokenInvalidError,
  WeakCredentialError,
} from '../../../domain/auth/errors.js';
import {
  ConflictError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
} from '../../../application/errors.js';
import type { Logger } from '../../logging/logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

/**
 * Every rejected bearer token gets this body, expired or forged alike.
 */
export const UNAUTHORIZED_MESSAGE = 'Could not validate credentials';

interface Mapped {
  status: number;
  body: ErrorResponse;
}

function isMalformedJson(err: Error): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

/**
 * Errors raised by express.json() carry their own 4xx `status`.
 */
function clientHttpStatus(err: Error): number | null {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return null;
}

function mapClientHttpError(err: Error, status: number): Mapped {
  if (status === 413) {
    return { status, body: { code: 'PAYLOAD_TOO_LARGE', message: 'Request body too large' } };
  }
  if (status === 415) {
    return { status, body: { code: 'UNSUPPORTED_MEDIA_TYPE', message: err.message } };
  }
  return { status, body: { code: 'BAD_REQUEST', message: err.message } };
}

function mapError(err: Error): Mapped | null {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
      },
    };
  }

  if (isMalformedJson(err)) {
    return { status: 400, body: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' } };
  }

  const clientStatus = clientHttpStatus(err);
  if (clientStatus !== null) {
    return mapClientHttpError(err, clientStatus);
  }

  if (err instanceof WeakCredentialError) {
    return { status: 400, body: { code: 'WEAK_PASSWORD', message: err.message } };
  }

  // ConflictError is a ValidationError, so it goes first
  if (err instanceof ConflictError) {
    return { status: 409, body: { code: 'CONFLICT', message: err.message } };
  }

  if (err instanceof ValidationError) {
    return { status: 400, body: { code: 'VALIDATION_ERROR', message: err.message } };
  }

  if (err instanceof InvalidCredentialsError) {
    return { status: 401, body: { code: 'INVALID_CREDENTIALS', message: err.message } };
  }

  if (
    err instanceof TokenExpiredError ||
    err instanceof TokenInvalidError ||
    err instanceof UnauthorizedError
  ) {
    return { status: 401, body: { code: 'UNAUTHORIZED', message: UNAUTHORIZED_MESSAGE } };
  }

  if (err instanceof ForbiddenError) {
    return { status: 403, body: { code: 'FORBIDDEN', message: err.message } };
  }

  if (err instanceof NotFoundError) {
    return { status: 404, body: { code: 'NOT_FOUND', message: err.message } };
  }

  return null;
}

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    const mapped = mapError(err);

    if (!mapped) {
      logger.error({ err }, 'Unhandled error');
      const response: ErrorResponse = {
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
      };
      res.status(500).json(response);
      return;
    }

    if (mapped.status === 401) {
      res.setHeader('WWW-Authenticate', 'Bearer');
    }
    res.status(mapped.status).json(mapped.body);
  };
}
