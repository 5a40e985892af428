import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { randomUUID } from 'crypto';
import type { Pool } from 'pg';
import { createPool } from '../pool.js';
import { migrate } from '../migrate.js';
import { PgUnitOfWork } from '../unitOfWork.js';
import { ConflictError } from '../../../application/errors.js';
import { silentLogger } from '../../../test-support/testApp.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('PgUnitOfWork', () => {
  let pool: Pool;
  let uow: PgUnitOfWork;
  const suffix = randomUUID().slice(0, 8);
  const username = `vitest-${suffix}`;

  beforeAll(async () => {
    pool = createPool(process.env.DATABASE_URL ?? '', silentLogger());
    await migrate(pool, silentLogger());
    uow = new PgUnitOfWork(pool);
  });

  afterAll(async () => {
    await pool.query('DELETE FROM users WHERE username LIKE $1', [`vitest-${suffix}%`]);
    await pool.end();
  });

  it('should store emails lower-case and find by either identifier', async () => {
    const created = await uow.run((repos) =>
      repos.users.create({
        username,
        email: `${username}@EXAMPLE.com`,
        passwordHash: 'hash',
      })
    );

    expect(created.email).toBe(`${username}@example.com`);
    const byEmail = await uow.run((repos) =>
      repos.users.findByIdentifier(`${username}@Example.COM`)
    );
    const byName = await uow.run((repos) => repos.users.findByIdentifier(username));
    expect(byEmail?.id).toBe(created.id);
    expect(byName?.id).toBe(created.id);
  });

  it('should turn a unique violation into a ConflictError', async () => {
    await expect(
      uow.run((repos) =>
        repos.users.create({
          username: `${username}-other`,
          email: `${username}@example.com`,
          passwordHash: 'hash',
        })
      )
    ).rejects.toThrow(new ConflictError('Email already registered'));
  });

  it('should roll back everything when the work throws', async () => {
    const rolledBack = `${username}-rollback`;

    await expect(
      uow.run(async (repos) => {
        await repos.users.create({
          username: rolledBack,
          email: `${rolledBack}@example.com`,
          passwordHash: 'hash',
        });
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');

    const found = await uow.run((repos) => repos.users.findByUsername(rolledBack));
    expect(found).toBeNull();
  });

  it('should cascade a user deletion to posts and comments', async () => {
    const author = `${username}-author`;
    const { postId, commentId, userId } = await uow.run(async (repos) => {
      const user = await repos.users.create({
        username: author,
        email: `${author}@example.com`,
        passwordHash: 'hash',
      });
      const post = await repos.posts.create({
        authorId: user.id,
        title: 'Title',
        content: 'Body',
        isPublished: true,
      });
      const comment = await repos.comments.create({
        postId: post.id,
        authorId: user.id,
        content: 'Comment',
      });
      return { postId: post.id, commentId: comment.id, userId: user.id };
    });

    await uow.run((repos) => repos.users.delete(userId));

    const leftovers = await uow.run(async (repos) => ({
      post: await repos.posts.findById(postId),
      comment: await repos.comments.findById(commentId),
    }));
    expect(leftovers).toEqual({ post: null, comment: null });
  });
});
