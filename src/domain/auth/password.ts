import { hash, verify, argon2id } from 'argon2';
import { WeakCredentialError } from './errors.js';

export const PASSWORD_MIN_LENGTH = 6;
export const PASSWORD_MAX_LENGTH = 128;

/**
 * Password hashing using Argon2id. The encoded hash carries its own random salt.
 */
export class Password {
  /**
   * Hash a plain text password.
   */
  static async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword, { type: argon2id });
  }

  /**
   * Verify a plain password against a hash. A malformed hash never verifies.
   */
  static async verify(plainPassword: string, hash: string): Promise<boolean> {
    try {
      return await verify(hash, plainPassword);
    } catch {
      return false;
    }
  }

  /**
   * Enforce the registration policy: length bounds, at least one letter and one digit.
   */
  static assertStrong(plainPassword: string): void {
    if (plainPassword.length < PASSWORD_MIN_LENGTH) {
      throw new WeakCredentialError(
        `Password must be at least ${PASSWORD_MIN_LENGTH} characters`
      );
    }
    if (plainPassword.length > PASSWORD_MAX_LENGTH) {
      throw new WeakCredentialError(
        `Password must be at most ${PASSWORD_MAX_LENGTH} characters`
      );
    }
    if (!/[A-Za-z]/.test(plainPassword) || !/\d/.test(plainPassword)) {
      throw new WeakCredentialError('Password must contain a letter and a digit');
    }
  }
}
