import { Password } from '../../domain/auth/password.js';
import type { Admin, Role } from '../../domain/auth/user.js';
import type { CredentialRepo, Repositories, UnitOfWork } from '../../infra/db/repositories.js';
import type { Logger } from '../../infra/logging/logger.js';
import { ConflictError } from '../errors.js';

export interface RegisterCommand {
  username: string;
  email: string;
  password: string;
}

export interface RegisterResult {
  id: string;
  username: string;
  email: string;
  createdAt: Date;
}

export function credentialRepoFor(repos: Repositories, role: Role): CredentialRepo<Admin> {
  return role === 'admin' ? repos.admins : repos.users;
}

export class RegisterUseCase {
  constructor(
    private uow: UnitOfWork,
    private logger: Logger,
    private role: Role = 'user'
  ) {}

  async execute(command: RegisterCommand): Promise<RegisterResult> {
    Password.assertStrong(command.password);

    const passwordHash = await Password.hash(command.password);

    const account = await this.uow.run(async (repos) => {
      const accounts = credentialRepoFor(repos, this.role);

      if (await accounts.findByUsername(command.username)) {
        this.logger.warn(
          { username: command.username, role: this.role },
          'Attempt to register with an existing username'
        );
        throw new ConflictError('Username already registered');
      }

      if (await accounts.findByEmail(command.email)) {
        this.logger.warn(
          { email: command.email, role: this.role },
          'Attempt to register with an existing email'
        );
        throw new ConflictError('Email already registered');
      }

      return accounts.create({
        username: command.username,
        email: command.email,
        passwordHash,
      });
    });

    this.logger.info(
      { accountId: account.id, username: account.username, role: this.role },
      'New account registered'
    );

    return {
      id: account.id,
      username: account.username,
      email: account.email,
      createdAt: account.createdAt,
    };
  }
}
