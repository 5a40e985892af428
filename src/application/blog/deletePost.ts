import { authorize } from '../../domain/auth/authorize.js';
import type { UserIdentity } from '../../domain/auth/user.js';
import { postAsResource } from '../../domain/blog/post.js';
import type { UnitOfWork } from '../../infra/db/repositories.js';
import type { Logger } from '../../infra/logging/logger.js';
import { NotFoundError } from '../errors.js';

export interface DeletePostCommand {
  identity: UserIdentity;
  postId: string;
}

/**
 * Removes a post and, through the foreign key, its comments.
 */
export class DeletePostUseCase {
  constructor(
    private uow: UnitOfWork,
    private logger: Logger
  ) {}

  async execute(command: DeletePostCommand): Promise<void> {
    await this.uow.run(async (repos) => {
      const post = await repos.posts.findById(command.postId);
      if (!post) {
        throw new NotFoundError('Post not found');
      }

      authorize(command.identity, postAsResource(post), 'delete');

      await repos.posts.delete(post.id);

      if (post.authorId !== command.identity.id) {
        this.logger.info(
          { postId: post.id, authorId: post.authorId, moderatorId: command.identity.id },
          'Post removed by admin'
        );
      }
    });
  }
}
