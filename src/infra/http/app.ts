import express from 'express';
import cors from 'cors';
import { AuthenticateUseCase } from '../../application/auth/authenticate.js';
import type { TokenService } from '../../application/auth/tokenService.js';
import type { UnitOfWork } from '../db/repositories.js';
import type { Logger } from '../logging/logger.js';
import { createAuthRoutes } from './routes/auth.js';
import { createPostRoutes } from './routes/posts.js';
import { createCommentRoutes } from './routes/comments.js';
import { createAdminRoutes } from './routes/admin.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createErrorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter, createLoginRateLimiter } from './middleware/rateLimit.js';
import { createRequestLogger } from './middleware/requestLogger.js';

export interface AppDependencies {
  uow: UnitOfWork;
  tokens: TokenService;
  logger: Logger;
  masterKey: string;
  /** Served by GET /admin/logs when set. */
  auditLogFile?: string;
  corsOrigins: string[];
  rateLimit: {
    max: number;
    loginMax: number;
  };
  /** Resolves when the database answers. */
  healthCheck: () => Promise<unknown>;
}

const HEALTH_TIMEOUT_MS = 2000;

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDependencies): express.Application {
  const app = express();
  const authenticate = new AuthenticateUseCase(deps.uow, deps.tokens, deps.logger);
  const loginRateLimiter = createLoginRateLimiter(deps.rateLimit.loginMax);
  const blogDeps = { uow: deps.uow, authenticate, logger: deps.logger };

  app.disable('x-powered-by');
  app.use(createRequestLogger(deps.logger));
  app.use(cors({ origin: deps.corsOrigins, credentials: true }));
  app.use(express.json({ limit: '100kb' }));
  app.use(createApiRateLimiter(deps.rateLimit.max));

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res) => {
    withTimeout(deps.healthCheck(), HEALTH_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((err: unknown) => {
        deps.logger.error({ err }, 'Health check failed');
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      });
  });

  app.use(createSwaggerRoutes());

  app.use(
    '/auth',
    createAuthRoutes({
      uow: deps.uow,
      tokens: deps.tokens,
      authenticate,
      logger: deps.logger,
      loginRateLimiter,
    })
  );
  app.use('/posts', createPostRoutes(blogDeps));
  app.use('/comments', createCommentRoutes(blogDeps));
  app.use(
    '/admin',
    createAdminRoutes({
      uow: deps.uow,
      tokens: deps.tokens,
      authenticate,
      logger: deps.logger,
      masterKey: deps.masterKey,
      auditLogFile: deps.auditLogFile,
      loginRateLimiter,
    })
  );

  app.use((_req, res) => {
    res.status(404).json({ code: 'NOT_FOUND', message: 'Route not found' });
  });

  // Error handler (must be last)
  app.use(createErrorHandler(deps.logger));

  return app;
}
