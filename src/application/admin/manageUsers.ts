import { toProfile, type UserIdentity, type UserProfile } from '../../domain/auth/user.js';
import type { Page, UnitOfWork } from '../../infra/db/repositories.js';
import type { Logger } from '../../infra/logging/logger.js';
import { NotFoundError } from '../errors.js';

export class ManageUsersUseCase {
  constructor(
    private uow: UnitOfWork,
    private logger: Logger
  ) {}

  async list(admin: UserIdentity, page: Page): Promise<UserProfile[]> {
    const users = await this.uow.run((repos) => repos.users.list(page));
    this.logger.info(
      { adminId: admin.id, limit: page.limit, offset: page.offset },
      'Admin listed users'
    );
    return users.map(toProfile);
  }

  async delete(admin: UserIdentity, userId: string): Promise<{ username: string }> {
    const username = await this.uow.run(async (repos) => {
      const target = await repos.users.findById(userId);
      if (!target) {
        this.logger.warn(
          { adminId: admin.id, userId },
          'Attempted deletion of non-existent user'
        );
        throw new NotFoundError('User not found');
      }
      await repos.users.delete(target.id);
      return target.username;
    });

    this.logger.info({ adminId: admin.id, userId, username }, 'Admin deleted user');
    return { username };
  }
}
