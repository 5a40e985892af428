import type { Admin, NewAccount, User } from '../../domain/auth/user.js';
import { ConflictError } from '../../application/errors.js';
import type { AdminRepo, Page, UserRepo } from './repositories.js';
import { isUniqueViolation, type Queryable } from './pool.js';

interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  created_at: Date;
  full_name: string | null;
  bio: string | null;
}

const USER_COLUMNS = 'id, username, email, password_hash, created_at, full_name, bio';
const ADMIN_COLUMNS = 'id, username, email, password_hash, created_at';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
    fullName: row.full_name,
    bio: row.bio,
  };
}

function toAdmin(row: Omit<UserRow, 'full_name' | 'bio'>): Admin {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

/**
 * Translate a unique_violation on insert into a ConflictError naming the field.
 */
function rethrowDuplicate(error: unknown): never {
  if (isUniqueViolation(error)) {
    const field = error.constraint?.includes('email') ? 'Email' : 'Username';
    throw new ConflictError(`${field} already registered`);
  }
  throw error;
}

export class PgUserRepo implements UserRepo {
  constructor(private db: Queryable) {}

  private async findOne(where: string, value: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE ${where}`,
      [value]
    );

    if (result.rows.length === 0) {
      return null;
    }

    return toUser(result.rows[0]);
  }

  async findById(id: string): Promise<User | null> {
    return this.findOne('id = $1', id);
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.findOne('username = $1', username);
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.findOne('email = lower($1)', email);
  }

  async findByIdentifier(identifier: string): Promise<User | null> {
    return this.findOne('username = $1 OR email = lower($1)', identifier);
  }

  async create(account: NewAccount): Promise<User> {
    try {
      const result = await this.db.query<UserRow>(
        `INSERT INTO users (username, email, password_hash)
         VALUES ($1, lower($2), $3)
         RETURNING ${USER_COLUMNS}`,
        [account.username, account.email, account.passwordHash]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      rethrowDuplicate(error);
    }
  }

  async list(page: Page): Promise<User[]> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users
       ORDER BY created_at ASC, id ASC
       LIMIT $1 OFFSET $2`,
      [page.limit, page.offset]
    );
    return result.rows.map(toUser);
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM users WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}

export class PgAdminRepo implements AdminRepo {
  constructor(private db: Queryable) {}

  private async findOne(where: string, value: string): Promise<Admin | null> {
    const result = await this.db.query<Omit<UserRow, 'full_name' | 'bio'>>(
      `SELECT ${ADMIN_COLUMNS} FROM admins WHERE ${where}`,
      [value]
    );

    if (result.rows.length === 0) {
      return null;
    }

    return toAdmin(result.rows[0]);
  }

  async findById(id: string): Promise<Admin | null> {
    return this.findOne('id = $1', id);
  }

  async findByUsername(username: string): Promise<Admin | null> {
    return this.findOne('username = $1', username);
  }

  async findByEmail(email: string): Promise<Admin | null> {
    return this.findOne('email = lower($1)', email);
  }

  async findByIdentifier(identifier: string): Promise<Admin | null> {
    return this.findOne('username = $1 OR email = lower($1)', identifier);
  }

  async create(account: NewAccount): Promise<Admin> {
    try {
      const result = await this.db.query<Omit<UserRow, 'full_name' | 'bio'>>(
        `INSERT INTO admins (username, email, password_hash)
         VALUES ($1, lower($2), $3)
         RETURNING ${ADMIN_COLUMNS}`,
        [account.username, account.email, account.passwordHash]
      );
      return toAdmin(result.rows[0]);
    } catch (error) {
      rethrowDuplicate(error);
    }
  }
}
