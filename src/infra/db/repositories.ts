import type { Admin, NewAccount, User } from '../../domain/auth/user.js';
import type { NewPost, Post, PostChanges } from '../../domain/blog/post.js';
import type { Comment, NewComment } from '../../domain/blog/comment.js';

export interface Page {
  limit: number;
  offset: number;
}

/**
 * Lookups shared by the users and admins tables.
 */
export interface CredentialRepo<T extends Admin> {
  findById(id: string): Promise<T | null>;
  findByUsername(username: string): Promise<T | null>;
  findByEmail(email: string): Promise<T | null>;
  /**
   * Match on username, or on email compared lower-case.
   */
  findByIdentifier(identifier: string): Promise<T | null>;
  create(account: NewAccount): Promise<T>;
}

export interface UserRepo extends CredentialRepo<User> {
  list(page: Page): Promise<User[]>;
  delete(id: string): Promise<boolean>;
}

export type AdminRepo = CredentialRepo<Admin>;

export interface PostListFilter extends Page {
  published?: boolean;
  authorId?: string;
}

export interface PostRepo {
  findById(id: string): Promise<Post | null>;
  list(filter: PostListFilter): Promise<Post[]>;
  create(post: NewPost): Promise<Post>;
  update(id: string, changes: PostChanges): Promise<Post | null>;
  delete(id: string): Promise<boolean>;
}

export interface CommentRepo {
  findById(id: string): Promise<Comment | null>;
  listByPost(postId: string, page: Page): Promise<Comment[]>;
  create(comment: NewComment): Promise<Comment>;
  update(id: string, content: string): Promise<Comment | null>;
  delete(id: string): Promise<boolean>;
}

export interface Repositories {
  users: UserRepo;
  admins: AdminRepo;
  posts: PostRepo;
  comments: CommentRepo;
}

/**
 * Scoped acquisition of a transactional session. `run` commits when `work`
 * resolves, rolls back when it rejects, and releases the session either way.
 */
export interface UnitOfWork {
  run<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
}
