import { describe, it, expect, beforeEach } from 'vitest';
import jwt from 'jsonwebtoken';
import { TokenService } from '../tokenService.js';
import { TokenExpiredError, TokenInvalidError } from '../../../domain/auth/errors.js';

const SECRET = 'test-secret-for-signing';
const START = Date.UTC(2024, 0, 1, 12, 0, 0);

describe('TokenService', () => {
  let now: number;
  let service: TokenService;
  const alice = { id: 'user-a', role: 'user' as const };

  beforeEach(() => {
    now = START;
    service = new TokenService(
      { secret: SECRET, accessTtlSeconds: 1, refreshTtlSeconds: 60 },
      () => now
    );
  });

  it('should round-trip the identity of an access token', () => {
    const issued = service.issue(alice);

    expect(issued.expiresIn).toBe(1);
    expect(issued.expiresAt).toEqual(new Date(START + 1000));
    expect(service.validate(issued.token)).toEqual({ id: 'user-a', role: 'user' });
  });

  it('should sign subject, role, type and expiry into the token', () => {
    const { token } = service.issue(alice, 'refresh');

    expect(jwt.decode(token)).toEqual({
      sub: 'user-a',
      role: 'user',
      typ: 'refresh',
      iat: START / 1000,
      exp: START / 1000 + 60,
    });
  });

  it('should still accept a token just before expiry', () => {
    const { token } = service.issue(alice);
    now = START + 999;

    expect(service.validate(token)).toEqual({ id: 'user-a', role: 'user' });
  });

  it('should reject a token at its expiry instant', () => {
    const { token } = service.issue(alice);
    now = START + 1000;

    expect(() => service.validate(token)).toThrow(TokenExpiredError);
  });

  it('should report expiry for a 1-second token checked 2 seconds later', () => {
    const { token } = service.issue(alice);
    now = START + 2000;

    let caught: unknown;
    try {
      service.validate(token);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(TokenExpiredError);
    expect(caught).not.toBeInstanceOf(TokenInvalidError);
  });

  it('should reject a token signed with another secret', () => {
    const other = new TokenService(
      { secret: 'another-test-secret', accessTtlSeconds: 60, refreshTtlSeconds: 60 },
      () => now
    );
    const { token } = other.issue(alice);

    expect(() => service.validate(token)).toThrow(TokenInvalidError);
  });

  it('should reject the token after any single character is changed', () => {
    const { token } = service.issue(alice);

    for (let i = 0; i < token.length; i++) {
      if (token[i] === '.') continue;
      const replacement = token[i] === 'A' ? 'B' : 'A';
      const tampered = token.slice(0, i) + replacement + token.slice(i + 1);

      expect(() => service.validate(tampered), `position ${i}`).toThrow(TokenInvalidError);
    }
  });

  it('should reject garbage', () => {
    expect(() => service.validate('not-a-token')).toThrow(TokenInvalidError);
    expect(() => service.validate('')).toThrow(TokenInvalidError);
  });

  it('should reject an unsigned token', () => {
    const encode = (value: object) => Buffer.from(JSON.stringify(value)).toString('base64url');
    const unsigned = `${encode({ alg: 'none', typ: 'JWT' })}.${encode({
      sub: 'user-a',
      role: 'admin',
      typ: 'access',
      iat: START / 1000,
      exp: START / 1000 + 60,
    })}.`;

    expect(() => service.validate(unsigned)).toThrow(TokenInvalidError);
  });

  it('should reject a refresh token where an access token is expected, and vice versa', () => {
    const refresh = service.issue(alice, 'refresh').token;
    const access = service.issue(alice, 'access').token;

    expect(() => service.validate(refresh)).toThrow('expected a access token');
    expect(() => service.validate(access, 'refresh')).toThrow('expected a refresh token');
  });

  it('should reject a correctly signed token without the expected claims', () => {
    const token = jwt.sign({ userId: 'user-a' }, SECRET, { expiresIn: 60 });
    const lenient = new TokenService({
      secret: SECRET,
      accessTtlSeconds: 60,
      refreshTtlSeconds: 60,
    });

    expect(() => lenient.validate(token)).toThrow(TokenInvalidError);
  });

  it('should refuse an empty secret', () => {
    expect(
      () => new TokenService({ secret: '', accessTtlSeconds: 60, refreshTtlSeconds: 60 })
    ).toThrow('Token signing secret must not be empty');
  });
});
