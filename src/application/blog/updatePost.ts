import { authorize } from '../../domain/auth/authorize.js';
import type { UserIdentity } from '../../domain/auth/user.js';
import { postAsResource, type Post, type PostChanges } from '../../domain/blog/post.js';
import type { UnitOfWork } from '../../infra/db/repositories.js';
import { NotFoundError } from '../errors.js';

export interface UpdatePostCommand {
  identity: UserIdentity;
  postId: string;
  changes: PostChanges;
}

export class UpdatePostUseCase {
  constructor(private uow: UnitOfWork) {}

  async execute(command: UpdatePostCommand): Promise<Post> {
    return this.uow.run(async (repos) => {
      const post = await repos.posts.findById(command.postId);
      if (!post) {
        throw new NotFoundError('Post not found');
      }

      authorize(command.identity, postAsResource(post), 'update');

      const updated = await repos.posts.update(post.id, command.changes);
      if (!updated) {
        throw new NotFoundError('Post not found');
      }
      return updated;
    });
  }
}
