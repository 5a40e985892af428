import { describe, it, expect } from 'vitest';
import request from 'supertest';
import express from 'express';
import { createErrorHandler } from '../middleware/errorHandler.js';
import { ConflictError, NotFoundError, ValidationError } from '../../../application/errors.js';
import {
  ForbiddenError,
  TokenExpiredError,
  WeakCredentialError,
} from '../../../domain/auth/errors.js';
import { createTestApp, signUp, silentLogger } from '../../../test-support/testApp.js';

function appThrowing(error: Error): express.Application {
  const app = express();
  app.get('/boom', () => {
    throw error;
  });
  app.use(createErrorHandler(silentLogger()));
  return app;
}

describe('Error mapping', () => {
  it.each([
    [new WeakCredentialError('too weak'), 400, 'WEAK_PASSWORD'],
    [new ValidationError('bad'), 400, 'VALIDATION_ERROR'],
    [new ConflictError('taken'), 409, 'CONFLICT'],
    [new ForbiddenError(), 403, 'FORBIDDEN'],
    [new NotFoundError(), 404, 'NOT_FOUND'],
    [new TokenExpiredError(new Date(0)), 401, 'UNAUTHORIZED'],
  ])('should map %s', async (error, status, code) => {
    const response = await request(appThrowing(error)).get('/boom');

    expect(response.status).toBe(status);
    expect(response.body.code).toBe(code);
  });

  it('should answer an oversized body with 413', async () => {
    const { app } = createTestApp();
    const { token } = await signUp(app, 'alice');

    const response = await request(app)
      .post('/posts')
      .set('Authorization', `Bearer ${token}`)
      .send({ title: 'Long read', content: 'x'.repeat(150_000) });

    expect(response.status).toBe(413);
    expect(response.body).toEqual({
      code: 'PAYLOAD_TOO_LARGE',
      message: 'Request body too large',
    });
  });

  it('should answer an unsupported charset with 415', async () => {
    const { app } = createTestApp();

    const response = await request(app)
      .post('/auth/login')
      .set('Content-Type', 'application/json; charset=latin1')
      .send('{}');

    expect(response.status).toBe(415);
    expect(response.body.code).toBe('UNSUPPORTED_MEDIA_TYPE');
  });

  it('should hide unexpected failures', async () => {
    const response = await request(appThrowing(new Error('connection refused'))).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ code: 'INTERNAL_ERROR', message: 'Internal server error' });
  });
});

describe('App', () => {
  it('should report health', async () => {
    const { app } = createTestApp();

    const response = await request(app).get('/healthz');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok' });
  });

  it('should report an unreachable database', async () => {
    const { app } = createTestApp({
      healthCheck: () => Promise.reject(new Error('ECONNREFUSED')),
    });

    const response = await request(app).get('/healthz');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ code: 'DB_UNAVAILABLE', message: 'Database unavailable' });
  });

  it('should echo the request id', async () => {
    const { app } = createTestApp();

    const response = await request(app).get('/healthz').set('x-request-id', 'req-123');

    expect(response.headers['x-request-id']).toBe('req-123');
  });

  it('should answer unknown routes with 404', async () => {
    const { app } = createTestApp();

    const response = await request(app).get('/nope');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ code: 'NOT_FOUND', message: 'Route not found' });
  });

  it('should serve the OpenAPI document', async () => {
    const { app } = createTestApp();

    const response = await request(app).get('/docs.json');

    expect(response.status).toBe(200);
    expect(response.body.paths).toHaveProperty('/auth/login');
  });
});
