import { describe, it, expect, beforeEach } from 'vitest';
import { AuthenticateUseCase } from '../authenticate.js';
import { RefreshUseCase } from '../refresh.js';
import { RegisterUseCase } from '../register.js';
import { TokenService } from '../tokenService.js';
import { AccountUseCases } from '../account.js';
import { TokenExpiredError, TokenInvalidError } from '../../../domain/auth/errors.js';
import { InMemoryUnitOfWork } from '../../../test-support/inMemoryUnitOfWork.js';
import { TEST_SECRET, silentLogger } from '../../../test-support/testApp.js';

const START = Date.UTC(2024, 5, 1);

describe('AuthenticateUseCase', () => {
  let now: number;
  let uow: InMemoryUnitOfWork;
  let tokens: TokenService;
  let authenticate: AuthenticateUseCase;
  let aliceId: string;

  beforeEach(async () => {
    now = START;
    uow = new InMemoryUnitOfWork();
    tokens = new TokenService(
      { secret: TEST_SECRET, accessTtlSeconds: 60, refreshTtlSeconds: 600 },
      () => now
    );
    authenticate = new AuthenticateUseCase(uow, tokens, silentLogger());

    const alice = await new RegisterUseCase(uow, silentLogger()).execute({
      username: 'alice',
      email: 'a@x.com',
      password: 'pw12345',
    });
    aliceId = alice.id;
  });

  it('should resolve a live token to its identity', async () => {
    const { token } = tokens.issue({ id: aliceId, role: 'user' });

    await expect(authenticate.execute(token)).resolves.toEqual({ id: aliceId, role: 'user' });
  });

  it('should reject an expired token', async () => {
    const { token } = tokens.issue({ id: aliceId, role: 'user' });
    now = START + 61_000;

    await expect(authenticate.execute(token)).rejects.toThrow(TokenExpiredError);
  });

  it('should reject a token whose account has been deleted', async () => {
    const { token } = tokens.issue({ id: aliceId, role: 'user' });
    await new AccountUseCases(uow, silentLogger()).deleteAccount({ id: aliceId, role: 'user' });

    await expect(authenticate.execute(token)).rejects.toThrow(
      new TokenInvalidError('Token subject no longer exists')
    );
  });

  it('should look admin tokens up among admins', async () => {
    const { token } = tokens.issue({ id: aliceId, role: 'admin' });

    await expect(authenticate.execute(token)).rejects.toThrow(TokenInvalidError);
  });

  describe('RefreshUseCase', () => {
    it('should exchange a refresh token for a new access token', async () => {
      const refresh = new RefreshUseCase(authenticate, tokens);
      const { token } = tokens.issue({ id: aliceId, role: 'user' }, 'refresh');
      now = START + 120_000;

      const result = await refresh.execute(token);

      expect(result.tokenType).toBe('bearer');
      expect(result.expiresIn).toBe(60);
      expect(tokens.validate(result.accessToken)).toEqual({ id: aliceId, role: 'user' });
    });

    it('should refuse an access token', async () => {
      const refresh = new RefreshUseCase(authenticate, tokens);
      const { token } = tokens.issue({ id: aliceId, role: 'user' });

      await expect(refresh.execute(token)).rejects.toThrow(TokenInvalidError);
    });
  });
});
