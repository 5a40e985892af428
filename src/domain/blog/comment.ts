import type { OwnedResource } from '../auth/authorize.js';

export interface Comment {
  readonly id: string;
  readonly postId: string;
  readonly authorId: string;
  readonly content: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewComment {
  postId: string;
  authorId: string;
  content: string;
}

export function commentAsResource(comment: Comment): OwnedResource {
  return { id: comment.id, ownerId: comment.authorId };
}
