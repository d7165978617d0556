// =============================================================================
// STOCKROOM — Authentication Types
// =============================================================================

import { Role } from './roles';

export type TokenKind = 'access' | 'refresh';

/** Claims carried by an access token */
export interface AccessClaims {
  /** User ID */
  sub: string;
  /** Roles held when the token was issued */
  roles: Role[];
  typ: 'access';
  /** Issued at (epoch seconds) */
  iat: number;
  /** Expires at (epoch seconds) */
  exp: number;
}

/**
 * Claims carried by a refresh token. No roles: renewal always re-reads them
 * from storage.
 */
export interface RefreshClaims {
  sub: string;
  typ: 'refresh';
  exp: number;
}

/** Verified caller identity attached to an in-flight request */
export interface IdentityContext {
  readonly subjectId: string;
  readonly roles: readonly Role[];
}

/** Result of an external identity provider verifying its own assertion */
export interface ExternalIdentity {
  subjectId: string;
  email: string;
}

/** Names of the inbound credential headers */
export interface AuthHeaderNames {
  access: string;
  refresh: string;
}

/** Response headers carrying a rotated token pair */
export const ROTATED_ACCESS_HEADER = 'Authorization';
export const ROTATED_REFRESH_HEADER = 'Refresh_token';

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
}
