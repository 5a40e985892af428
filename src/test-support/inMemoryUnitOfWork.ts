import { randomUUID } from 'crypto';
import type { Admin, NewAccount, User } from '../domain/auth/user.js';
import type { NewPost, Post, PostChanges } from '../domain/blog/post.js';
import type { Comment, NewComment } from '../domain/blog/comment.js';
import { ConflictError } from '../application/errors.js';
import type {
  AdminRepo,
  CommentRepo,
  Page,
  PostListFilter,
  PostRepo,
  Repositories,
  UnitOfWork,
  UserRepo,
} from '../infra/db/repositories.js';

interface Tables {
  users: Map<string, User>;
  admins: Map<string, Admin>;
  posts: Map<string, Post>;
  comments: Map<string, Comment>;
}

function cloneTables(tables: Tables): Tables {
  return {
    users: new Map(tables.users),
    admins: new Map(tables.admins),
    posts: new Map(tables.posts),
    comments: new Map(tables.comments),
  };
}

function paginate<T>(rows: T[], page: Page): T[] {
  return rows.slice(page.offset, page.offset + page.limit);
}

/**
 * Strictly increasing timestamps so ordering by creation time is deterministic.
 */
class Ticker {
  private last = 0;

  next(): Date {
    this.last = Math.max(Date.now(), this.last + 1);
    return new Date(this.last);
  }
}

function matchesIdentifier(account: Admin, identifier: string): boolean {
  return account.username === identifier || account.email === identifier.toLowerCase();
}

function assertUnique(rows: Iterable<Admin>, account: NewAccount): void {
  for (const row of rows) {
    if (row.username === account.username) {
      throw new ConflictError('Username already registered');
    }
    if (row.email === account.email.toLowerCase()) {
      throw new ConflictError('Email already registered');
    }
  }
}

class MemoryUserRepo implements UserRepo {
  constructor(
    private tables: Tables,
    private ticker: Ticker
  ) {}

  async findById(id: string): Promise<User | null> {
    return this.tables.users.get(id) ?? null;
  }

  async findByUsername(username: string): Promise<User | null> {
    return [...this.tables.users.values()].find((u) => u.username === username) ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const wanted = email.toLowerCase();
    return [...this.tables.users.values()].find((u) => u.email === wanted) ?? null;
  }

  async findByIdentifier(identifier: string): Promise<User | null> {
    return (
      [...this.tables.users.values()].find((u) => matchesIdentifier(u, identifier)) ?? null
    );
  }

  async create(account: NewAccount): Promise<User> {
    assertUnique(this.tables.users.values(), account);
    const user: User = {
      id: randomUUID(),
      username: account.username,
      email: account.email.toLowerCase(),
      passwordHash: account.passwordHash,
      createdAt: this.ticker.next(),
      fullName: null,
      bio: null,
    };
    this.tables.users.set(user.id, user);
    return user;
  }

  async list(page: Page): Promise<User[]> {
    const rows = [...this.tables.users.values()].sort(
      (a, b) => a.createdAt.getTime() - b.createdAt.getTime()
    );
    return paginate(rows, page);
  }

  async delete(id: string): Promise<boolean> {
    if (!this.tables.users.delete(id)) {
      return false;
    }
    // ON DELETE CASCADE
    for (const post of [...this.tables.posts.values()]) {
      if (post.authorId === id) {
        this.tables.posts.delete(post.id);
      }
    }
    for (const comment of [...this.tables.comments.values()]) {
      if (comment.authorId === id || !this.tables.posts.has(comment.postId)) {
        this.tables.comments.delete(comment.id);
      }
    }
    return true;
  }
}

class MemoryAdminRepo implements AdminRepo {
  constructor(
    private tables: Tables,
    private ticker: Ticker
  ) {}

  async findById(id: string): Promise<Admin | null> {
    return this.tables.admins.get(id) ?? null;
  }

  async findByUsername(username: string): Promise<Admin | null> {
    return [...this.tables.admins.values()].find((a) => a.username === username) ?? null;
  }

  async findByEmail(email: string): Promise<Admin | null> {
    const wanted = email.toLowerCase();
    return [...this.tables.admins.values()].find((a) => a.email === wanted) ?? null;
  }

  async findByIdentifier(identifier: string): Promise<Admin | null> {
    return (
      [...this.tables.admins.values()].find((a) => matchesIdentifier(a, identifier)) ?? null
    );
  }

  async create(account: NewAccount): Promise<Admin> {
    assertUnique(this.tables.admins.values(), account);
    const admin: Admin = {
      id: randomUUID(),
      username: account.username,
      email: account.email.toLowerCase(),
      passwordHash: account.passwordHash,
      createdAt: this.ticker.next(),
    };
    this.tables.admins.set(admin.id, admin);
    return admin;
  }
}

class MemoryPostRepo implements PostRepo {
  constructor(
    private tables: Tables,
    private ticker: Ticker
  ) {}

  async findById(id: string): Promise<Post | null> {
    return this.tables.posts.get(id) ?? null;
  }

  async list(filter: PostListFilter): Promise<Post[]> {
    const rows = [...this.tables.posts.values()]
      .filter((p) => filter.published === undefined || p.isPublished === filter.published)
      .filter((p) => filter.authorId === undefined || p.authorId === filter.authorId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    return paginate(rows, filter);
  }

  async create(post: NewPost): Promise<Post> {
    if (!this.tables.users.has(post.authorId)) {
      throw new Error(`insert on posts violates foreign key: author ${post.authorId}`);
    }
    const now = this.ticker.next();
    const created: Post = { id: randomUUID(), ...post, createdAt: now, updatedAt: now };
    this.tables.posts.set(created.id, created);
    return created;
  }

  async update(id: string, changes: PostChanges): Promise<Post | null> {
    const existing = this.tables.posts.get(id);
    if (!existing) {
      return null;
    }
    const updated: Post = {
      ...existing,
      title: changes.title ?? existing.title,
      content: changes.content ?? existing.content,
      isPublished: changes.isPublished ?? existing.isPublished,
      updatedAt: this.ticker.next(),
    };
    this.tables.posts.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    if (!this.tables.posts.delete(id)) {
      return false;
    }
    for (const comment of [...this.tables.comments.values()]) {
      if (comment.postId === id) {
        this.tables.comments.delete(comment.id);
      }
    }
    return true;
  }
}

class MemoryCommentRepo implements CommentRepo {
  constructor(
    private tables: Tables,
    private ticker: Ticker
  ) {}

  async findById(id: string): Promise<Comment | null> {
    return this.tables.comments.get(id) ?? null;
  }

  async listByPost(postId: string, page: Page): Promise<Comment[]> {
    const rows = [...this.tables.comments.values()]
      .filter((c) => c.postId === postId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    return paginate(rows, page);
  }

  async create(comment: NewComment): Promise<Comment> {
    if (!this.tables.posts.has(comment.postId)) {
      throw new Error(`insert on comments violates foreign key: post ${comment.postId}`);
    }
    if (!this.tables.users.has(comment.authorId)) {
      throw new Error(`insert on comments violates foreign key: author ${comment.authorId}`);
    }
    const now = this.ticker.next();
    const created: Comment = { id: randomUUID(), ...comment, createdAt: now, updatedAt: now };
    this.tables.comments.set(created.id, created);
    return created;
  }

  async update(id: string, content: string): Promise<Comment | null> {
    const existing = this.tables.comments.get(id);
    if (!existing) {
      return null;
    }
    const updated: Comment = { ...existing, content, updatedAt: this.ticker.next() };
    this.tables.comments.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    return this.tables.comments.delete(id);
  }
}

/**
 * In-process stand-in for PgUnitOfWork. Each run works on a copy of the tables
 * that replaces the committed state only when the work resolves.
 */
export class InMemoryUnitOfWork implements UnitOfWork {
  private tables: Tables = {
    users: new Map(),
    admins: new Map(),
    posts: new Map(),
    comments: new Map(),
  };
  private ticker = new Ticker();

  commits = 0;
  rollbacks = 0;

  async run<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    const draft = cloneTables(this.tables);
    const repos: Repositories = {
      users: new MemoryUserRepo(draft, this.ticker),
      admins: new MemoryAdminRepo(draft, this.ticker),
      posts: new MemoryPostRepo(draft, this.ticker),
      comments: new MemoryCommentRepo(draft, this.ticker),
    };

    try {
      const result = await work(repos);
      this.tables = draft;
      this.commits += 1;
      return result;
    } catch (error) {
      this.rollbacks += 1;
      throw error;
    }
  }

  /**
   * Committed state, for assertions.
   */
  snapshot(): Readonly<Tables> {
    return cloneTables(this.tables);
  }
}
