import { authorize } from '../../domain/auth/authorize.js';
import type { UserIdentity } from '../../domain/auth/user.js';
import { commentAsResource, type Comment } from '../../domain/blog/comment.js';
import type { UnitOfWork } from '../../infra/db/repositories.js';
import { NotFoundError } from '../errors.js';

export interface UpdateCommentCommand {
  identity: UserIdentity;
  commentId: string;
  content: string;
}

export class UpdateCommentUseCase {
  constructor(private uow: UnitOfWork) {}

  async execute(command: UpdateCommentCommand): Promise<Comment> {
    return this.uow.run(async (repos) => {
      const comment = await repos.comments.findById(command.commentId);
      if (!comment) {
        throw new NotFoundError('Comment not found');
      }

      authorize(command.identity, commentAsResource(comment), 'update');

      const updated = await repos.comments.update(comment.id, command.content);
      if (!updated) {
        throw new NotFoundError('Comment not found');
      }
      return updated;
    });
  }
}
