// =============================================================================
// STOCKROOM — Token Codec
//
// Issues and verifies the two classes of signed tokens:
//   access  — sub + roles, short-lived, signed with the access secret
//   refresh — sub only, long-lived, signed with the refresh secret
//
// Stateless. Secrets and lifetimes come in through the constructor; nothing
// here reads the environment.
// =============================================================================

import jwt, { Algorithm, JwtPayload, TokenExpiredError } from 'jsonwebtoken';
import { TokenError } from '../errors';
import { AccessClaims, RefreshClaims, TokenKind } from '../types/auth';
import { Role, parseRoles } from '../types/roles';

/** The only algorithm issued or accepted. */
export const TOKEN_ALGORITHM: Algorithm = 'HS256';

export interface TokenCodecSettings {
  accessSecret: string;
  refreshSecret: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  /** Current time in whole epoch seconds. Defaults to the system clock. */
  now?: () => number;
}

export interface VerifiedAccess {
  subject: string;
  roles: Role[];
}

export function epochSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export class TokenCodec {
  private readonly now: () => number;

  constructor(private readonly settings: TokenCodecSettings) {
    this.now = settings.now ?? epochSeconds;
  }

  issueAccess(subject: string, roles: readonly Role[]): string {
    const iat = this.now();
    const claims: AccessClaims = {
      sub: subject,
      roles: [...roles],
      typ: 'access',
      iat,
      exp: iat + this.settings.accessTtlSeconds,
    };
    return this.sign('access', claims, this.settings.accessSecret);
  }

  issueRefresh(subject: string): string {
    const claims: RefreshClaims = {
      sub: subject,
      typ: 'refresh',
      exp: this.now() + this.settings.refreshTtlSeconds,
    };
    return this.sign('refresh', claims, this.settings.refreshSecret);
  }

  /**
   * Verify an access token. A missing or malformed roles claim yields an
   * empty role list rather than a failure.
   */
  verifyAccess(token: string): VerifiedAccess {
    const payload = this.verify(token, this.settings.accessSecret);
    return { subject: payload.sub, roles: parseRoles(payload.roles) };
  }

  /** Verify a refresh token and return its subject. */
  verifyRefresh(token: string): string {
    const payload = this.verify(token, this.settings.refreshSecret);
    if (payload.typ !== 'refresh') {
      throw new TokenError('invalid', 'token is not a refresh token');
    }
    return payload.sub;
  }

  private sign(kind: TokenKind, claims: AccessClaims | RefreshClaims, secret: string): string {
    try {
      return jwt.sign(claims, secret, {
        algorithm: TOKEN_ALGORITHM,
        // refresh tokens carry no iat; access tokens set their own
        noTimestamp: kind === 'refresh',
      });
    } catch (err) {
      throw new TokenError('signing', `failed to sign ${kind} token`, { cause: err });
    }
  }

  /**
   * Signature and algorithm are checked before expiry, so a token is only
   * ever reported as expired when it was genuinely issued with our secret.
   * No clock tolerance: a token is expired once now >= exp. A correctly
   * signed token without an exp claim is rejected as invalid rather than
   * treated as non-expiring.
   */
  private verify(token: string, secret: string): JwtPayload & { sub: string } {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, secret, {
        algorithms: [TOKEN_ALGORITHM],
        clockTimestamp: this.now(),
      });
    } catch (err) {
      if (err instanceof TokenExpiredError) {
        throw new TokenError('expired', 'token expired', { cause: err });
      }
      const message = err instanceof Error ? err.message : 'invalid token';
      throw new TokenError('invalid', message, { cause: err });
    }

    if (typeof decoded === 'string') {
      throw new TokenError('invalid', 'token payload is not a claim set');
    }
    if (typeof decoded.exp !== 'number') {
      throw new TokenError('invalid', "missing 'exp' claim");
    }
    const { sub } = decoded;
    if (typeof sub !== 'string') {
      throw new TokenError('invalid', "invalid 'sub' claim");
    }
    return { ...decoded, sub };
  }
}
