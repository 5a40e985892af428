import type { Comment, NewComment } from '../../domain/blog/comment.js';
import type { CommentRepo, Page } from './repositories.js';
import type { Queryable } from './pool.js';

interface CommentRow {
  id: string;
  post_id: string;
  author_id: string;
  content: string;
  created_at: Date;
  updated_at: Date;
}

const COMMENT_COLUMNS = 'id, post_id, author_id, content, created_at, updated_at';

function toComment(row: CommentRow): Comment {
  return {
    id: row.id,
    postId: row.post_id,
    authorId: row.author_id,
    content: row.content,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class PgCommentRepo implements CommentRepo {
  constructor(private db: Queryable) {}

  async findById(id: string): Promise<Comment | null> {
    const result = await this.db.query<CommentRow>(
      `SELECT ${COMMENT_COLUMNS} FROM comments WHERE id = $1`,
      [id]
    );
    return result.rows.length === 0 ? null : toComment(result.rows[0]);
  }

  async listByPost(postId: string, page: Page): Promise<Comment[]> {
    const result = await this.db.query<CommentRow>(
      `SELECT ${COMMENT_COLUMNS} FROM comments
       WHERE post_id = $1
       ORDER BY created_at ASC, id ASC
       LIMIT $2 OFFSET $3`,
      [postId, page.limit, page.offset]
    );
    return result.rows.map(toComment);
  }

  async create(comment: NewComment): Promise<Comment> {
    const result = await this.db.query<CommentRow>(
      `INSERT INTO comments (post_id, author_id, content)
       VALUES ($1, $2, $3)
       RETURNING ${COMMENT_COLUMNS}`,
      [comment.postId, comment.authorId, comment.content]
    );
    return toComment(result.rows[0]);
  }

  async update(id: string, content: string): Promise<Comment | null> {
    const result = await this.db.query<CommentRow>(
      `UPDATE comments SET content = $2, updated_at = NOW()
       WHERE id = $1
       RETURNING ${COMMENT_COLUMNS}`,
      [id, content]
    );
    return result.rows.length === 0 ? null : toComment(result.rows[0]);
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM comments WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
