import { describe, it, expect } from 'vitest';
import { getMigrations } from '../migrate.js';

describe('getMigrations', () => {
  it('should list the SQL migrations in version order', async () => {
    const migrations = await getMigrations();

    expect(migrations).toEqual([
      { filename: '001_create_users.sql', version: 1 },
      { filename: '002_create_admins.sql', version: 2 },
      { filename: '003_create_posts_and_comments.sql', version: 3 },
    ]);
  });
});
