import { Router } from 'express';
import { z } from 'zod';
import { CreatePostUseCase } from '../../../application/blog/createPost.js';
import { UpdatePostUseCase } from '../../../application/blog/updatePost.js';
import { DeletePostUseCase } from '../../../application/blog/deletePost.js';
import { CreateCommentUseCase } from '../../../application/blog/createComment.js';
import { BlogQueries } from '../../../application/blog/queries.js';
import type { AuthenticateUseCase } from '../../../application/auth/authenticate.js';
import { POST_TITLE_MAX_LENGTH } from '../../../domain/blog/post.js';
import type { UnitOfWork } from '../../db/repositories.js';
import type { Logger } from '../../logging/logger.js';
import { authMiddleware, currentIdentity, requireRole } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /posts:
 *   get:
 *     tags: [Posts]
 *     summary: List posts, newest first
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: query, name: limit, schema: { type: integer, minimum: 1, maximum: 100, default: 10 } }
 *       - { in: query, name: offset, schema: { type: integer, minimum: 0, default: 0 } }
 *       - { in: query, name: published, schema: { type: boolean } }
 *       - { in: query, name: author, schema: { type: string, format: uuid } }
 *     responses:
 *       200: { description: OK }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   post:
 *     tags: [Posts]
 *     summary: Create a post owned by the caller
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [title, content]
 *             properties:
 *               title: { type: string, maxLength: 150 }
 *               content: { type: string }
 *               isPublished: { type: boolean }
 *     responses:
 *       201: { description: Created }
 *       403:
 *         description: Admin accounts cannot author content
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /posts/{id}:
 *   get:
 *     tags: [Posts]
 *     summary: Get a post
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: string, format: uuid } }
 *     responses:
 *       200: { description: OK }
 *       404:
 *         description: Post not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   patch:
 *     tags: [Posts]
 *     summary: Update a post (owner only)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: string, format: uuid } }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               title: { type: string, maxLength: 150 }
 *               content: { type: string }
 *               isPublished: { type: boolean }
 *     responses:
 *       200: { description: Updated }
 *       403:
 *         description: Caller does not own the post
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: Post not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Posts]
 *     summary: Delete a post with its comments (owner or admin)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: string, format: uuid } }
 *     responses:
 *       204: { description: Deleted }
 *       403:
 *         description: Caller may not delete the post
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /posts/{id}/comments:
 *   get:
 *     tags: [Comments]
 *     summary: List comments on a post, oldest first
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: string, format: uuid } }
 *     responses:
 *       200: { description: OK }
 *   post:
 *     tags: [Comments]
 *     summary: Comment on a post
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: string, format: uuid } }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [content]
 *             properties:
 *               content: { type: string }
 *     responses:
 *       201: { description: Created }
 *       403:
 *         description: Admin accounts cannot author content
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: Post not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

export const idParamsSchema = z.object({
  id: z.string().uuid(),
});

export const pageQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
  offset: z.coerce.number().int().min(0).default(0),
});

const listPostsQuerySchema = pageQuerySchema.extend({
  published: z.enum(['true', 'false']).transform((value) => value === 'true').optional(),
  author: z.string().uuid().optional(),
});

const createPostBodySchema = z.object({
  title: z.string().trim().min(1).max(POST_TITLE_MAX_LENGTH),
  content: z.string().trim().min(1),
  isPublished: z.boolean().optional(),
});

const updatePostBodySchema = createPostBodySchema
  .partial()
  .refine((body) => Object.values(body).some((value) => value !== undefined), {
    message: 'At least one field must be provided',
  });

export const commentBodySchema = z.object({
  content: z.string().trim().min(1).max(5000),
});

export interface BlogRouteDeps {
  uow: UnitOfWork;
  authenticate: AuthenticateUseCase;
  logger: Logger;
}

export function createPostRoutes(deps: BlogRouteDeps) {
  const router = Router();
  const createPostUseCase = new CreatePostUseCase(deps.uow);
  const updatePostUseCase = new UpdatePostUseCase(deps.uow);
  const deletePostUseCase = new DeletePostUseCase(deps.uow, deps.logger);
  const createCommentUseCase = new CreateCommentUseCase(deps.uow);
  const queries = new BlogQueries(deps.uow);

  // Admins moderate but do not author
  const requireUser = requireRole('user');

  // All routes require authentication
  router.use(authMiddleware(deps.authenticate));

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const query = listPostsQuerySchema.parse(req.query);
      const posts = await queries.listPosts(currentIdentity(req), {
        limit: query.limit,
        offset: query.offset,
        published: query.published,
        authorId: query.author,
      });
      res.json(posts);
    })
  );

  router.post(
    '/',
    requireUser,
    asyncHandler(async (req, res) => {
      const body = createPostBodySchema.parse(req.body);
      const post = await createPostUseCase.execute({
        identity: currentIdentity(req),
        ...body,
      });
      res.status(201).json(post);
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const post = await queries.getPost(currentIdentity(req), id);
      res.json(post);
    })
  );

  router.patch(
    '/:id',
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const changes = updatePostBodySchema.parse(req.body);
      const post = await updatePostUseCase.execute({
        identity: currentIdentity(req),
        postId: id,
        changes,
      });
      res.json(post);
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      await deletePostUseCase.execute({ identity: currentIdentity(req), postId: id });
      res.status(204).end();
    })
  );

  router.get(
    '/:id/comments',
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const page = pageQuerySchema.parse(req.query);
      const comments = await queries.listComments(currentIdentity(req), id, page);
      res.json(comments);
    })
  );

  router.post(
    '/:id/comments',
    requireUser,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const body = commentBodySchema.parse(req.body);
      const comment = await createCommentUseCase.execute({
        identity: currentIdentity(req),
        postId: id,
        content: body.content,
      });
      res.status(201).json(comment);
    })
  );

  return router;
}
