// =============================================================================
// STOCKROOM — Credential Issuance
//
// Exchanges a proof of identity (a registered email, or an assertion from an
// external identity provider) for an access/refresh token pair. There are no
// passwords: the API is bearer-token only.
// =============================================================================

import { LoginError, TokenError } from '../errors';
import { createLogger } from '../logging';
import { TokenPair } from '../types/auth';
import { IdentityProvider } from './identity-provider';
import { RoleLookup } from './role-lookup';
import { TokenCodec } from './token-codec';
import { UserDirectory } from './user-directory';

const log = createLogger('Auth');

export interface AuthServiceDeps {
  codec: TokenCodec;
  roleLookup: RoleLookup;
  users: UserDirectory;
  identityProvider?: IdentityProvider;
}

export interface LoginResult extends TokenPair {
  userId: string;
}

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  /** Issue a token pair for an active user holding an active role. */
  async loginWithEmail(email: string): Promise<LoginResult> {
    const userId = await this.deps.users.findActiveUserIdByEmail(email);
    if (!userId) {
      throw new LoginError(401, 'invalid email');
    }

    const roles = await this.deps.roleLookup.fetchRoles(userId);
    if (roles.length === 0) {
      throw new LoginError(401, 'invalid email');
    }

    try {
      const accessToken = this.deps.codec.issueAccess(userId, roles);
      const refreshToken = this.deps.codec.issueRefresh(userId);
      log.info(`Issued token pair for ${userId}`);
      return { userId, accessToken, refreshToken };
    } catch (err) {
      if (err instanceof TokenError) {
        throw new LoginError(500, 'failed to generate tokens', { cause: err });
      }
      throw err;
    }
  }

  /**
   * Verify an external identity assertion, then log in as the registered
   * user with the asserted email.
   */
  async loginWithAssertion(assertion: string): Promise<LoginResult> {
    const provider = this.deps.identityProvider;
    if (!provider) {
      throw new LoginError(501, 'external login not configured');
    }

    let email: string;
    try {
      ({ email } = await provider.verifyAssertion(assertion));
    } catch (err) {
      log.warn('Identity assertion rejected:', err instanceof Error ? err.message : err);
      throw new LoginError(401, 'invalid identity assertion', { cause: err });
    }

    return this.loginWithEmail(email);
  }
}
