import { authorize } from '../../domain/auth/authorize.js';
import type { UserIdentity } from '../../domain/auth/user.js';
import { postAsResource, type Post } from '../../domain/blog/post.js';
import { commentAsResource, type Comment } from '../../domain/blog/comment.js';
import type { Page, PostListFilter, UnitOfWork } from '../../infra/db/repositories.js';
import { NotFoundError } from '../errors.js';

export class BlogQueries {
  constructor(private uow: UnitOfWork) {}

  async listPosts(identity: UserIdentity, filter: PostListFilter): Promise<Post[]> {
    const posts = await this.uow.run((repos) => repos.posts.list(filter));
    posts.forEach((post) => authorize(identity, postAsResource(post), 'read'));
    return posts;
  }

  async getPost(identity: UserIdentity, postId: string): Promise<Post> {
    const post = await this.uow.run((repos) => repos.posts.findById(postId));
    if (!post) {
      throw new NotFoundError('Post not found');
    }
    authorize(identity, postAsResource(post), 'read');
    return post;
  }

  async listComments(
    identity: UserIdentity,
    postId: string,
    page: Page
  ): Promise<Comment[]> {
    return this.uow.run(async (repos) => {
      const post = await repos.posts.findById(postId);
      if (!post) {
        throw new NotFoundError('Post not found');
      }
      const comments = await repos.comments.listByPost(post.id, page);
      comments.forEach((comment) =>
        authorize(identity, commentAsResource(comment), 'read')
      );
      return comments;
    });
  }
}
