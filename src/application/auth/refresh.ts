import type { TokenService } from './tokenService.js';
import type { AuthenticateUseCase } from './authenticate.js';

export interface RefreshResult {
  accessToken: string;
  tokenType: 'bearer';
  expiresIn: number;
}

/**
 * Exchanges a refresh token for a fresh access token.
 */
export class RefreshUseCase {
  constructor(
    private authenticate: AuthenticateUseCase,
    private tokens: TokenService
  ) {}

  async execute(refreshToken: string): Promise<RefreshResult> {
    const identity = await this.authenticate.execute(refreshToken, 'refresh');
    const access = this.tokens.issue(identity, 'access');

    return {
      accessToken: access.token,
      tokenType: 'bearer',
      expiresIn: access.expiresIn,
    };
  }
}
