import { timingSafeEqual, createHash } from 'crypto';
import type { UnitOfWork } from '../../infra/db/repositories.js';
import type { Logger } from '../../infra/logging/logger.js';
import { RegisterUseCase, type RegisterCommand, type RegisterResult } from '../auth/register.js';
import { ValidationError } from '../errors.js';

export interface RegisterAdminCommand extends RegisterCommand {
  masterKey: string;
}

/**
 * Compare digests so the comparison time does not depend on the key length.
 */
function sameSecret(a: string, b: string): boolean {
  const digestA = createHash('sha256').update(a).digest();
  const digestB = createHash('sha256').update(b).digest();
  return timingSafeEqual(digestA, digestB);
}

export class RegisterAdminUseCase {
  private register: RegisterUseCase;

  constructor(
    uow: UnitOfWork,
    private masterKey: string,
    private logger: Logger
  ) {
    this.register = new RegisterUseCase(uow, logger, 'admin');
  }

  async execute(command: RegisterAdminCommand): Promise<RegisterResult> {
    if (!sameSecret(command.masterKey, this.masterKey)) {
      this.logger.warn(
        { username: command.username, email: command.email },
        'Invalid master key used during admin registration'
      );
      throw new ValidationError('Incorrect master key');
    }

    return this.register.execute({
      username: command.username,
      email: command.email,
      password: command.password,
    });
  }
}
