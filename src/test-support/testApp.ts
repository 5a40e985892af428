import type express from 'express';
import request from 'supertest';
import { TokenService, type Clock } from '../application/auth/tokenService.js';
import { createApp } from '../infra/http/app.js';
import { createLogger, type Logger } from '../infra/logging/logger.js';
import { InMemoryUnitOfWork } from './inMemoryUnitOfWork.js';

export const TEST_SECRET = 'test-secret-for-signing';
export const TEST_MASTER_KEY = 'test-master-key';

export interface TestApp {
  app: express.Application;
  uow: InMemoryUnitOfWork;
  tokens: TokenService;
  logger: Logger;
}

export function silentLogger(): Logger {
  return createLogger({ level: 'silent' });
}

export function createTestApp(
  options: {
    clock?: Clock;
    healthCheck?: () => Promise<unknown>;
    loginMax?: number;
    auditLogFile?: string;
  } = {}
): TestApp {
  const uow = new InMemoryUnitOfWork();
  const logger = silentLogger();
  const tokens = new TokenService(
    { secret: TEST_SECRET, accessTtlSeconds: 3600, refreshTtlSeconds: 7 * 24 * 3600 },
    options.clock
  );

  const app = createApp({
    uow,
    tokens,
    logger,
    masterKey: TEST_MASTER_KEY,
    auditLogFile: options.auditLogFile,
    corsOrigins: ['http://localhost:3000'],
    rateLimit: { max: 1000, loginMax: options.loginMax ?? 1000 },
    healthCheck: options.healthCheck ?? (() => Promise.resolve()),
  });

  return { app, uow, tokens, logger };
}

export interface Session {
  userId: string;
  token: string;
}

/**
 * Registers then logs in, returning the access token.
 */
export async function signUp(
  app: express.Application,
  username: string,
  password = 'pw12345'
): Promise<Session> {
  const registerRes = await request(app)
    .post('/auth/register')
    .send({ username, email: `${username}@example.com`, password });
  if (registerRes.status !== 201) {
    throw new Error(`register failed with ${registerRes.status}`);
  }

  const loginRes = await request(app)
    .post('/auth/login')
    .send({ identifier: username, password });
  if (loginRes.status !== 200) {
    throw new Error(`login failed with ${loginRes.status}`);
  }

  return { userId: registerRes.body.id, token: loginRes.body.access_token };
}
