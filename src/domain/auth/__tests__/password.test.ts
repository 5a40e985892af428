import { describe, it, expect } from 'vitest';
import { Password } from '../password.js';
import { WeakCredentialError } from '../errors.js';

describe('Password', () => {
  describe('hash / verify', () => {
    it('should never return the plain password', async () => {
      const hash = await Password.hash('pw12345');

      expect(hash).not.toBe('pw12345');
      expect(hash).not.toContain('pw12345');
      expect(hash.startsWith('$argon2id$')).toBe(true);
    });

    it('should salt every hash differently', async () => {
      const first = await Password.hash('pw12345');
      const second = await Password.hash('pw12345');

      expect(first).not.toBe(second);
    });

    it('should verify the original password', async () => {
      const hash = await Password.hash('pw12345');

      expect(await Password.verify('pw12345', hash)).toBe(true);
    });

    it('should reject any other password', async () => {
      const hash = await Password.hash('pw12345');

      expect(await Password.verify('pw12346', hash)).toBe(false);
      expect(await Password.verify('PW12345', hash)).toBe(false);
      expect(await Password.verify('', hash)).toBe(false);
    });

    it('should return false for a malformed hash', async () => {
      expect(await Password.verify('pw12345', 'not-a-hash')).toBe(false);
    });
  });

  describe('assertStrong', () => {
    it('should accept a password with letters and digits', () => {
      expect(() => Password.assertStrong('pw12345')).not.toThrow();
    });

    it('should reject a short password', () => {
      expect(() => Password.assertStrong('ab123')).toThrow(
        new WeakCredentialError('Password must be at least 6 characters')
      );
    });

    it('should reject a password without digits', () => {
      expect(() => Password.assertStrong('abcdefgh')).toThrow(WeakCredentialError);
    });

    it('should reject a password without letters', () => {
      expect(() => Password.assertStrong('12345678')).toThrow(WeakCredentialError);
    });

    it('should reject an overlong password', () => {
      expect(() => Password.assertStrong('a1'.repeat(65))).toThrow(
        'Password must be at most 128 characters'
      );
    });
  });
});
