import type { NewPost, Post, PostChanges } from '../../domain/blog/post.js';
import type { PostListFilter, PostRepo } from './repositories.js';
import type { Queryable } from './pool.js';

interface PostRow {
  id: string;
  author_id: string;
  title: string;
  content: string;
  is_published: boolean;
  created_at: Date;
  updated_at: Date;
}

const POST_COLUMNS =
  'id, author_id, title, content, is_published, created_at, updated_at';

function toPost(row: PostRow): Post {
  return {
    id: row.id,
    authorId: row.author_id,
    title: row.title,
    content: row.content,
    isPublished: row.is_published,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class PgPostRepo implements PostRepo {
  constructor(private db: Queryable) {}

  async findById(id: string): Promise<Post | null> {
    const result = await this.db.query<PostRow>(
      `SELECT ${POST_COLUMNS} FROM posts WHERE id = $1`,
      [id]
    );
    return result.rows.length === 0 ? null : toPost(result.rows[0]);
  }

  async list(filter: PostListFilter): Promise<Post[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.published !== undefined) {
      params.push(filter.published);
      conditions.push(`is_published = $${params.length}`);
    }
    if (filter.authorId !== undefined) {
      params.push(filter.authorId);
      conditions.push(`author_id = $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(filter.limit, filter.offset);

    const result = await this.db.query<PostRow>(
      `SELECT ${POST_COLUMNS} FROM posts
       ${where}
       ORDER BY created_at DESC, id DESC
       LIMIT $${params.length - 1} OFFSET $${params.length}`,
      params
    );
    return result.rows.map(toPost);
  }

  async create(post: NewPost): Promise<Post> {
    const result = await this.db.query<PostRow>(
      `INSERT INTO posts (author_id, title, content, is_published)
       VALUES ($1, $2, $3, $4)
       RETURNING ${POST_COLUMNS}`,
      [post.authorId, post.title, post.content, post.isPublished]
    );
    return toPost(result.rows[0]);
  }

  async update(id: string, changes: PostChanges): Promise<Post | null> {
    // COALESCE keeps columns the caller left out.
    const result = await this.db.query<PostRow>(
      `UPDATE posts
       SET title = COALESCE($2, title),
           content = COALESCE($3, content),
           is_published = COALESCE($4, is_published),
           updated_at = NOW()
       WHERE id = $1
       RETURNING ${POST_COLUMNS}`,
      [id, changes.title ?? null, changes.content ?? null, changes.isPublished ?? null]
    );
    return result.rows.length === 0 ? null : toPost(result.rows[0]);
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM posts WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
