import { readFile } from 'fs/promises';
import type { UserIdentity } from '../../domain/auth/user.js';
import type { Page } from '../../infra/db/repositories.js';
import type { Logger } from '../../infra/logging/logger.js';
import { NotFoundError } from '../errors.js';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads the audit trail written through AUDIT_LOG_FILE, one entry per line.
 */
export class AuditLogUseCase {
  constructor(
    private auditFile: string | undefined,
    private logger: Logger
  ) {}

  async read(admin: UserIdentity, page: Page): Promise<{ logs: string[] }> {
    if (!this.auditFile) {
      this.logger.warn({ adminId: admin.id }, 'Audit log requested but none is configured');
      throw new NotFoundError('Log file not found');
    }

    let content: string;
    try {
      content = await readFile(this.auditFile, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.error({ adminId: admin.id }, 'Audit log file not found');
        throw new NotFoundError('Log file not found');
      }
      throw error;
    }

    const logs = content
      .split('\n')
      .filter((line) => line.length > 0)
      .slice(page.offset, page.offset + page.limit)
      .map((line) => line.replace(/password/gi, '****'));

    this.logger.info(
      { adminId: admin.id, limit: page.limit, offset: page.offset },
      'Admin retrieved audit log'
    );
    return { logs };
  }
}
