// =============================================================================
// STOCKROOM — Error Types
//
// Every rejection the auth pipeline can produce maps to one AuthErrorCode,
// an HTTP status, and a stable reason string clients can branch on.
// =============================================================================

import { Response } from 'express';

export type AuthErrorCode =
  | 'CredentialMissing'
  | 'CredentialInvalid'
  | 'CredentialExpired'
  | 'RefreshMissing'
  | 'RefreshInvalid'
  | 'RoleLookupFailed'
  | 'SigningFailed'
  | 'Forbidden'
  | 'ContextMissing'
  | 'RequestAborted'
  | 'RequestTimeout';

const AUTH_ERROR_STATUS: Record<AuthErrorCode, number> = {
  CredentialMissing: 401,
  CredentialInvalid: 401,
  CredentialExpired: 401,
  RefreshMissing:    401,
  RefreshInvalid:    401,
  RoleLookupFailed:  500,
  SigningFailed:     500,
  Forbidden:         403,
  ContextMissing:    401,
  RequestAborted:    499,
  RequestTimeout:    408,
};

const AUTH_ERROR_REASON: Record<AuthErrorCode, string> = {
  CredentialMissing: 'missing access token',
  CredentialInvalid: 'unauthorized',
  CredentialExpired: 'access token expired',
  RefreshMissing:    'access token expired, and refresh token missing',
  RefreshInvalid:    'invalid or expired refresh token',
  RoleLookupFailed:  'failed to fetch roles',
  SigningFailed:     'failed to generate token',
  Forbidden:         'forbidden',
  ContextMissing:    'unauthorized',
  RequestAborted:    'request aborted',
  RequestTimeout:    'request timeout',
};

export class AuthError extends Error {
  readonly status: number;
  readonly reason: string;

  constructor(readonly code: AuthErrorCode, reason?: string, options?: ErrorOptions) {
    super(reason ?? AUTH_ERROR_REASON[code], options);
    this.name = 'AuthError';
    this.status = AUTH_ERROR_STATUS[code];
    this.reason = reason ?? AUTH_ERROR_REASON[code];
  }

  /** Collaborator and environment faults, as opposed to caller mistakes. */
  get isServerFault(): boolean {
    return this.status >= 500;
  }
}

/** Write the JSON rejection body for an AuthError. */
export function sendAuthError(res: Response, err: AuthError): void {
  if (res.headersSent) return;
  res.status(err.status).json({ error: err.reason, code: err.code });
}

/** Failure modes of token signing and verification. */
export type TokenFailure = 'expired' | 'invalid' | 'signing';

export class TokenError extends Error {
  constructor(readonly kind: TokenFailure, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TokenError';
  }
}

/** Login failures surfaced by the credential issuance routes. */
export class LoginError extends Error {
  constructor(readonly status: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LoginError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
