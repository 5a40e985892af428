import { TokenExpiredError, TokenInvalidError } from '../../domain/auth/errors.js';
import type { UserIdentity } from '../../domain/auth/user.js';
import type { UnitOfWork } from '../../infra/db/repositories.js';
import type { Logger } from '../../infra/logging/logger.js';
import type { TokenService, TokenType } from './tokenService.js';
import { credentialRepoFor } from './register.js';

/**
 * Turns a bearer token into an identity whose account still exists.
 */
export class AuthenticateUseCase {
  constructor(
    private uow: UnitOfWork,
    private tokens: TokenService,
    private logger: Logger
  ) {}

  async execute(token: string, expected: TokenType = 'access'): Promise<UserIdentity> {
    let identity: UserIdentity;
    try {
      identity = this.tokens.validate(token, expected);
    } catch (error) {
      if (error instanceof TokenExpiredError) {
        this.logger.info({ expiredAt: error.expiredAt }, 'Rejected expired token');
      } else if (error instanceof TokenInvalidError) {
        this.logger.warn({ reason: error.message }, 'Rejected invalid token');
      }
      throw error;
    }

    const account = await this.uow.run((repos) =>
      credentialRepoFor(repos, identity.role).findById(identity.id)
    );
    if (!account) {
      this.logger.warn(
        { accountId: identity.id, role: identity.role },
        'Token subject no longer exists'
      );
      throw new TokenInvalidError('Token subject no longer exists');
    }

    return identity;
  }
}
