import type { OwnedResource } from '../auth/authorize.js';

export const POST_TITLE_MAX_LENGTH = 150;

export interface Post {
  readonly id: string;
  readonly authorId: string;
  readonly title: string;
  readonly content: string;
  readonly isPublished: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewPost {
  authorId: string;
  title: string;
  content: string;
  isPublished: boolean;
}

export interface PostChanges {
  title?: string;
  content?: string;
  isPublished?: boolean;
}

export function postAsResource(post: Post): OwnedResource {
  return { id: post.id, ownerId: post.authorId };
}
