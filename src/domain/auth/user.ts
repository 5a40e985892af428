/**
 * Account roles. Admins live in their own table but share the credential shape.
 */
export type Role = 'user' | 'admin';

/**
 * User entity as stored in the credential store.
 */
export interface User {
  readonly id: string;
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly createdAt: Date;
  readonly fullName: string | null;
  readonly bio: string | null;
}

export type Admin = Omit<User, 'fullName' | 'bio'>;

export interface NewAccount {
  username: string;
  email: string;
  passwordHash: string;
}

/**
 * The authenticated principal behind a validated access token.
 */
export interface UserIdentity {
  readonly id: string;
  readonly role: Role;
}

/**
 * Public projection of a user; never carries the hash.
 */
export interface UserProfile {
  id: string;
  username: string;
  email: string;
  createdAt: Date;
  fullName?: string | null;
  bio?: string | null;
}

export function toProfile(user: User): UserProfile {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    createdAt: user.createdAt,
    fullName: user.fullName,
    bio: user.bio,
  };
}
