import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import { RegisterUseCase } from '../../../application/auth/register.js';
import { LoginUseCase } from '../../../application/auth/login.js';
import { RefreshUseCase } from '../../../application/auth/refresh.js';
import { AccountUseCases } from '../../../application/auth/account.js';
import type { AuthenticateUseCase } from '../../../application/auth/authenticate.js';
import type { TokenService } from '../../../application/auth/tokenService.js';
import type { UnitOfWork } from '../../db/repositories.js';
import type { Logger } from '../../logging/logger.js';
import { authMiddleware, currentIdentity, requireRole } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, email, password]
 *             properties:
 *               username: { type: string, minLength: 3, maxLength: 50 }
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 6 }
 *     responses:
 *       201:
 *         description: User created
 *       400:
 *         description: Validation error or weak password
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Username or email already registered
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login with username or email and receive tokens
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [identifier, password]
 *             properties:
 *               identifier: { type: string, description: Username or email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /auth/refresh:
 *   post:
 *     tags: [Auth]
 *     summary: Exchange a refresh token for a new access token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [refresh_token]
 *             properties:
 *               refresh_token: { type: string }
 *     responses:
 *       200:
 *         description: New access token
 *       401:
 *         description: Invalid or expired refresh token
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /auth/me:
 *   get:
 *     tags: [Auth]
 *     summary: Profile of the authenticated user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: OK }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /auth/account:
 *   delete:
 *     tags: [Auth]
 *     summary: Delete the authenticated user's account with its posts and comments
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: Deleted }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

export const registerBodySchema = z.object({
  username: z
    .string()
    .trim()
    .min(3)
    .max(50)
    .regex(/^[A-Za-z0-9_.-]+$/, 'Username may contain letters, digits, ".", "_" and "-"'),
  email: z.string().trim().toLowerCase().email().max(255),
  // Strength is checked by the password policy, not here.
  password: z.string().min(1).max(1024),
});

export const loginBodySchema = z.object({
  identifier: z.string().trim().min(1).max(255),
  password: z.string().min(1).max(1024),
});

const refreshBodySchema = z.object({
  refresh_token: z.string().min(1),
});

export interface AuthRouteDeps {
  uow: UnitOfWork;
  tokens: TokenService;
  authenticate: AuthenticateUseCase;
  logger: Logger;
  loginRateLimiter: RequestHandler;
}

export function createAuthRoutes(deps: AuthRouteDeps) {
  const router = Router();
  const registerUseCase = new RegisterUseCase(deps.uow, deps.logger);
  const loginUseCase = new LoginUseCase(deps.uow, deps.tokens, deps.logger);
  const refreshUseCase = new RefreshUseCase(deps.authenticate, deps.tokens);
  const accountUseCases = new AccountUseCases(deps.uow, deps.logger);
  const requireUser = [authMiddleware(deps.authenticate), requireRole('user')];

  router.post(
    '/register',
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const result = await registerUseCase.execute(body);
      res.status(201).json(result);
    })
  );

  router.post(
    '/login',
    deps.loginRateLimiter,
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await loginUseCase.execute(body);
      res.status(200).json({
        access_token: result.accessToken,
        refresh_token: result.refreshToken,
        token_type: result.tokenType,
        expires_in: result.expiresIn,
        user_id: result.userId,
        username: result.username,
      });
    })
  );

  router.post(
    '/refresh',
    asyncHandler(async (req, res) => {
      const body = refreshBodySchema.parse(req.body);
      const result = await refreshUseCase.execute(body.refresh_token);
      res.status(200).json({
        access_token: result.accessToken,
        token_type: result.tokenType,
        expires_in: result.expiresIn,
      });
    })
  );

  router.get(
    '/me',
    ...requireUser,
    asyncHandler(async (req, res) => {
      const profile = await accountUseCases.getProfile(currentIdentity(req));
      res.json(profile);
    })
  );

  router.delete(
    '/account',
    ...requireUser,
    asyncHandler(async (req, res) => {
      const { username } = await accountUseCases.deleteAccount(currentIdentity(req));
      res.json({ detail: `Deleted account of '${username}' successfully` });
    })
  );

  return router;
}
