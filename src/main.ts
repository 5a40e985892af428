import dotenv from 'dotenv';
import { loadConfig } from './infra/config/config.js';
import { createLogger } from './infra/logging/logger.js';
import { createPool } from './infra/db/pool.js';
import { PgUnitOfWork } from './infra/db/unitOfWork.js';
import { TokenService } from './application/auth/tokenService.js';
import { createApp } from './infra/http/app.js';

dotenv.config();

/**
 * Bootstrap: config, logger, pool, token service, then the HTTP server.
 * Misconfiguration fails before anything listens.
 */
function bootstrap(): void {
  const config = loadConfig();
  const logger = createLogger({ level: config.log.level, auditFile: config.log.auditFile });
  const pool = createPool(config.databaseUrl, logger);
  const tokens = new TokenService(config.jwt);

  const app = createApp({
    uow: new PgUnitOfWork(pool),
    tokens,
    logger,
    masterKey: config.masterKey,
    auditLogFile: config.log.auditFile,
    corsOrigins: config.corsOrigins,
    rateLimit: config.rateLimit,
    healthCheck: () => pool.query('SELECT 1'),
  });

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, env: config.env }, `Server running on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      pool
        .end()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Failed to close database pool');
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap();
