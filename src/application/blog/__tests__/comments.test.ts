import { describe, it, expect, beforeEach } from 'vitest';
import { CreatePostUseCase } from '../createPost.js';
import { CreateCommentUseCase } from '../createComment.js';
import { UpdateCommentUseCase } from '../updateComment.js';
import { DeleteCommentUseCase } from '../deleteComment.js';
import { BlogQueries } from '../queries.js';
import { RegisterUseCase } from '../../auth/register.js';
import { ForbiddenError } from '../../../domain/auth/errors.js';
import type { UserIdentity } from '../../../domain/auth/user.js';
import type { Comment } from '../../../domain/blog/comment.js';
import { InMemoryUnitOfWork } from '../../../test-support/inMemoryUnitOfWork.js';
import { silentLogger } from '../../../test-support/testApp.js';

describe('Comment use cases', () => {
  let uow: InMemoryUnitOfWork;
  let alice: UserIdentity;
  let bob: UserIdentity;
  let postId: string;
  let bobsComment: Comment;

  beforeEach(async () => {
    uow = new InMemoryUnitOfWork();
    const register = new RegisterUseCase(uow, silentLogger());
    const a = await register.execute({ username: 'alice', email: 'a@x.com', password: 'pw12345' });
    const b = await register.execute({ username: 'bob', email: 'b@x.com', password: 'pw12345' });
    alice = { id: a.id, role: 'user' };
    bob = { id: b.id, role: 'user' };

    const post = await new CreatePostUseCase(uow).execute({
      identity: alice,
      title: 'Post',
      content: 'Body',
    });
    postId = post.id;
    bobsComment = await new CreateCommentUseCase(uow).execute({
      identity: bob,
      postId,
      content: 'First!',
    });
  });

  it('should let the author edit the comment', async () => {
    const updated = await new UpdateCommentUseCase(uow).execute({
      identity: bob,
      commentId: bobsComment.id,
      content: 'Edited',
    });

    expect(updated.content).toBe('Edited');
    expect(updated.postId).toBe(postId);
  });

  it('should not let the post owner edit or delete a comment by someone else', async () => {
    await expect(
      new UpdateCommentUseCase(uow).execute({
        identity: alice,
        commentId: bobsComment.id,
        content: 'Edited',
      })
    ).rejects.toThrow(ForbiddenError);

    await expect(
      new DeleteCommentUseCase(uow, silentLogger()).execute({
        identity: alice,
        commentId: bobsComment.id,
      })
    ).rejects.toThrow(ForbiddenError);

    expect(uow.snapshot().comments.get(bobsComment.id)?.content).toBe('First!');
  });

  it('should let an admin delete the comment', async () => {
    await new DeleteCommentUseCase(uow, silentLogger()).execute({
      identity: { id: 'admin-1', role: 'admin' },
      commentId: bobsComment.id,
    });

    expect(uow.snapshot().comments.size).toBe(0);
  });

  it('should list comments oldest first', async () => {
    const second = await new CreateCommentUseCase(uow).execute({
      identity: alice,
      postId,
      content: 'Thanks',
    });

    const comments = await new BlogQueries(uow).listComments(alice, postId, {
      limit: 10,
      offset: 0,
    });

    expect(comments.map((c) => c.id)).toEqual([bobsComment.id, second.id]);
  });

  it('should refuse an author that is not a user', async () => {
    await expect(
      new CreateCommentUseCase(uow).execute({
        identity: { id: 'admin-1', role: 'admin' },
        postId,
        content: 'Hi',
      })
    ).rejects.toThrow('violates foreign key');
    expect(uow.snapshot().comments.size).toBe(1);
  });
});
