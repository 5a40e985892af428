import { Password } from '../../domain/auth/password.js';
import { InvalidCredentialsError } from '../../domain/auth/errors.js';
import type { Role } from '../../domain/auth/user.js';
import type { UnitOfWork } from '../../infra/db/repositories.js';
import type { Logger } from '../../infra/logging/logger.js';
import type { TokenService } from './tokenService.js';
import { credentialRepoFor } from './register.js';

export interface LoginCommand {
  /** Username or email. */
  identifier: string;
  password: string;
}

export interface LoginResult {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
  expiresIn: number;
  userId: string;
  username: string;
}

export class LoginUseCase {
  private dummyHash?: Promise<string>;

  constructor(
    private uow: UnitOfWork,
    private tokens: TokenService,
    private logger: Logger,
    private role: Role = 'user'
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    const account = await this.uow.run((repos) =>
      credentialRepoFor(repos, this.role).findByIdentifier(command.identifier)
    );

    // Verify against a throwaway hash when the account is missing so both
    // failure paths cost one argon2 verification.
    const hash = account ? account.passwordHash : await this.getDummyHash();
    const isValid = await Password.verify(command.password, hash);

    if (!account || !isValid) {
      this.logger.warn(
        { identifier: command.identifier, role: this.role },
        'Failed login attempt'
      );
      throw new InvalidCredentialsError();
    }

    const identity = { id: account.id, role: this.role };
    const access = this.tokens.issue(identity, 'access');
    const refresh = this.tokens.issue(identity, 'refresh');

    this.logger.info(
      { accountId: account.id, username: account.username, role: this.role },
      'Logged in'
    );

    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      tokenType: 'bearer',
      expiresIn: access.expiresIn,
      userId: account.id,
      username: account.username,
    };
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = Password.hash('not-a-real-password-0');
    }
    return this.dummyHash;
  }
}
