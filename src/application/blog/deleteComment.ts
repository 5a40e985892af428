import { authorize } from '../../domain/auth/authorize.js';
import type { UserIdentity } from '../../domain/auth/user.js';
import { commentAsResource } from '../../domain/blog/comment.js';
import type { UnitOfWork } from '../../infra/db/repositories.js';
import type { Logger } from '../../infra/logging/logger.js';
import { NotFoundError } from '../errors.js';

export interface DeleteCommentCommand {
  identity: UserIdentity;
  commentId: string;
}

export class DeleteCommentUseCase {
  constructor(
    private uow: UnitOfWork,
    private logger: Logger
  ) {}

  async execute(command: DeleteCommentCommand): Promise<void> {
    await this.uow.run(async (repos) => {
      const comment = await repos.comments.findById(command.commentId);
      if (!comment) {
        throw new NotFoundError('Comment not found');
      }

      authorize(command.identity, commentAsResource(comment), 'delete');

      await repos.comments.delete(comment.id);

      if (comment.authorId !== command.identity.id) {
        this.logger.info(
          { commentId: comment.id, authorId: comment.authorId, moderatorId: command.identity.id },
          'Comment removed by admin'
        );
      }
    });
  }
}
