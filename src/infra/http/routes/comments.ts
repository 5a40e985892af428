import { Router } from 'express';
import { UpdateCommentUseCase } from '../../../application/blog/updateComment.js';
import { DeleteCommentUseCase } from '../../../application/blog/deleteComment.js';
import { authMiddleware, currentIdentity } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { commentBodySchema, idParamsSchema, type BlogRouteDeps } from './posts.js';

/**
 * @openapi
 * /comments/{id}:
 *   patch:
 *     tags: [Comments]
 *     summary: Edit a comment (owner only)
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
 *       200: { description: Updated }
 *       403:
 *         description: Caller does not own the comment
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: Comment not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Comments]
 *     summary: Delete a comment (owner or admin)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: string, format: uuid } }
 *     responses:
 *       204: { description: Deleted }
 *       403:
 *         description: Caller may not delete the comment
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

export function createCommentRoutes(deps: BlogRouteDeps) {
  const router = Router();
  const updateCommentUseCase = new UpdateCommentUseCase(deps.uow);
  const deleteCommentUseCase = new DeleteCommentUseCase(deps.uow, deps.logger);

  router.use(authMiddleware(deps.authenticate));

  router.patch(
    '/:id',
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const body = commentBodySchema.parse(req.body);
      const comment = await updateCommentUseCase.execute({
        identity: currentIdentity(req),
        commentId: id,
        content: body.content,
      });
      res.json(comment);
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      await deleteCommentUseCase.execute({ identity: currentIdentity(req), commentId: id });
      res.status(204).end();
    })
  );

  return router;
}
