import type { UserIdentity } from '../../domain/auth/user.js';
import type { Comment } from '../../domain/blog/comment.js';
import type { UnitOfWork } from '../../infra/db/repositories.js';
import { NotFoundError } from '../errors.js';

export interface CreateCommentCommand {
  identity: UserIdentity;
  postId: string;
  content: string;
}

export class CreateCommentUseCase {
  constructor(private uow: UnitOfWork) {}

  async execute(command: CreateCommentCommand): Promise<Comment> {
    return this.uow.run(async (repos) => {
      const post = await repos.posts.findById(command.postId);
      if (!post) {
        throw new NotFoundError('Post not found');
      }

      return repos.comments.create({
        postId: post.id,
        authorId: command.identity.id,
        content: command.content,
      });
    });
  }
}
