import type { Pool } from 'pg';
import type { Repositories, UnitOfWork } from './repositories.js';
import { PgAdminRepo, PgUserRepo } from './userRepo.js';
import { PgPostRepo } from './postRepo.js';
import { PgCommentRepo } from './commentRepo.js';

/**
 * One pooled client per unit of work, wrapped in BEGIN/COMMIT.
 */
export class PgUnitOfWork implements UnitOfWork {
  constructor(private pool: Pool) {}

  async run<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      const result = await work({
        users: new PgUserRepo(client),
        admins: new PgAdminRepo(client),
        posts: new PgPostRepo(client),
        comments: new PgCommentRepo(client),
      });

      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
}
