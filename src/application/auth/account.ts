import { toProfile, type UserIdentity, type UserProfile } from '../../domain/auth/user.js';
import type { UnitOfWork } from '../../infra/db/repositories.js';
import type { Logger } from '../../infra/logging/logger.js';
import { NotFoundError } from '../errors.js';

/**
 * Self-service operations on the caller's own user account.
 */
export class AccountUseCases {
  constructor(
    private uow: UnitOfWork,
    private logger: Logger
  ) {}

  async getProfile(identity: UserIdentity): Promise<UserProfile> {
    const user = await this.uow.run((repos) => repos.users.findById(identity.id));
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return toProfile(user);
  }

  /**
   * Deletes the account; posts and comments go with it.
   */
  async deleteAccount(identity: UserIdentity): Promise<{ username: string }> {
    const username = await this.uow.run(async (repos) => {
      const user = await repos.users.findById(identity.id);
      if (!user) {
        throw new NotFoundError('User not found');
      }
      await repos.users.delete(user.id);
      return user.username;
    });

    this.logger.info({ accountId: identity.id, username }, 'Account deleted by owner');
    return { username };
  }
}
