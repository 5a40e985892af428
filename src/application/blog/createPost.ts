import type { UserIdentity } from '../../domain/auth/user.js';
import type { Post } from '../../domain/blog/post.js';
import type { UnitOfWork } from '../../infra/db/repositories.js';

export interface CreatePostCommand {
  identity: UserIdentity;
  title: string;
  content: string;
  isPublished?: boolean;
}

export class CreatePostUseCase {
  constructor(private uow: UnitOfWork) {}

  async execute(command: CreatePostCommand): Promise<Post> {
    return this.uow.run((repos) =>
      repos.posts.create({
        authorId: command.identity.id,
        title: command.title,
        content: command.content,
        isPublished: command.isPublished ?? false,
      })
    );
  }
}
