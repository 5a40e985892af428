import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import { RegisterAdminUseCase } from '../../../application/admin/registerAdmin.js';
import { ManageUsersUseCase } from '../../../application/admin/manageUsers.js';
import { AuditLogUseCase } from '../../../application/admin/auditLog.js';
import { LoginUseCase } from '../../../application/auth/login.js';
import type { AuthenticateUseCase } from '../../../application/auth/authenticate.js';
import type { TokenService } from '../../../application/auth/tokenService.js';
import type { UnitOfWork } from '../../db/repositories.js';
import type { Logger } from '../../logging/logger.js';
import { authMiddleware, currentIdentity, requireRole } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { loginBodySchema, registerBodySchema } from './auth.js';
import { idParamsSchema, pageQuerySchema } from './posts.js';

/**
 * @openapi
 * /admin/register:
 *   post:
 *     tags: [Admin]
 *     summary: Register an admin (requires the master key)
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, email, password, masterKey]
 *             properties:
 *               username: { type: string }
 *               email: { type: string, format: email }
 *               password: { type: string }
 *               masterKey: { type: string }
 *     responses:
 *       201: { description: Admin created }
 *       400:
 *         description: Validation error or incorrect master key
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Username or email already registered
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /admin/login:
 *   post:
 *     tags: [Admin]
 *     summary: Admin login
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [identifier, password]
 *             properties:
 *               identifier: { type: string }
 *               password: { type: string }
 *     responses:
 *       200: { description: Authenticated }
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /admin/users:
 *   get:
 *     tags: [Admin]
 *     summary: List users
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: query, name: limit, schema: { type: integer, minimum: 1, maximum: 100, default: 10 } }
 *       - { in: query, name: offset, schema: { type: integer, minimum: 0, default: 0 } }
 *     responses:
 *       200: { description: OK }
 *       403:
 *         description: Not an admin
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /admin/users/{id}:
 *   delete:
 *     tags: [Admin]
 *     summary: Delete a user with their posts and comments
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: string, format: uuid } }
 *     responses:
 *       200: { description: Deleted }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /admin/logs:
 *   get:
 *     tags: [Admin]
 *     summary: Page through the audit log
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: query, name: limit, schema: { type: integer, minimum: 1, maximum: 1000, default: 100 } }
 *       - { in: query, name: offset, schema: { type: integer, minimum: 0, default: 0 } }
 *     responses:
 *       200: { description: Log lines in file order }
 *       403:
 *         description: Not an admin
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: No audit log file
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const registerAdminBodySchema = registerBodySchema.extend({
  masterKey: registerBodySchema.shape.password,
});

const logsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export interface AdminRouteDeps {
  uow: UnitOfWork;
  tokens: TokenService;
  authenticate: AuthenticateUseCase;
  logger: Logger;
  masterKey: string;
  auditLogFile?: string;
  loginRateLimiter: RequestHandler;
}

export function createAdminRoutes(deps: AdminRouteDeps) {
  const router = Router();
  const registerAdminUseCase = new RegisterAdminUseCase(deps.uow, deps.masterKey, deps.logger);
  const loginUseCase = new LoginUseCase(deps.uow, deps.tokens, deps.logger, 'admin');
  const manageUsersUseCase = new ManageUsersUseCase(deps.uow, deps.logger);
  const auditLogUseCase = new AuditLogUseCase(deps.auditLogFile, deps.logger);
  const requireAdmin = [authMiddleware(deps.authenticate), requireRole('admin')];

  router.post(
    '/register',
    asyncHandler(async (req, res) => {
      const body = registerAdminBodySchema.parse(req.body);
      const result = await registerAdminUseCase.execute(body);
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

  router.get(
    '/users',
    ...requireAdmin,
    asyncHandler(async (req, res) => {
      const page = pageQuerySchema.parse(req.query);
      const users = await manageUsersUseCase.list(currentIdentity(req), page);
      res.json(users);
    })
  );

  router.delete(
    '/users/:id',
    ...requireAdmin,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const { username } = await manageUsersUseCase.delete(currentIdentity(req), id);
      res.json({ detail: `Deleted user '${username}' successfully` });
    })
  );

  router.get(
    '/logs',
    ...requireAdmin,
    asyncHandler(async (req, res) => {
      const page = logsQuerySchema.parse(req.query);
      const result = await auditLogUseCase.read(currentIdentity(req), page);
      res.json(result);
    })
  );

  return router;
}
