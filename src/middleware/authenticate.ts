// =============================================================================
// STOCKROOM — Authentication Middleware
//
// Verifies the access token and attaches the caller's identity to the
// request. An access token that has merely expired is renewed transparently
// from the refresh token: roles are re-read from storage, a brand-new token
// pair is issued, and the pair is returned in the response headers.
// =============================================================================

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthError, TokenError, sendAuthError } from '../errors';
import { createLogger } from '../logging';
import { RoleLookup } from '../services/role-lookup';
import { TokenCodec } from '../services/token-codec';
import {
  AuthHeaderNames,
  ROTATED_ACCESS_HEADER,
  ROTATED_REFRESH_HEADER,
} from '../types/auth';
import { Role } from '../types/roles';
import { attachIdentity } from './identity';
import { createRequestSignal, raceAbort } from './request-signal';

const log = createLogger('Auth');

export interface AuthenticateOptions {
  codec: TokenCodec;
  roleLookup: RoleLookup;
  headers: AuthHeaderNames;
  /** Deadline for the role lookup during renewal. */
  roleLookupTimeoutMs: number;
}

/**
 * Read a credential header. Accepts the raw token or a `Bearer <token>`
 * value; blank values count as absent.
 */
export function readCredential(req: Request, header: string): string | undefined {
  const raw = req.get(header)?.trim();
  if (!raw) return undefined;
  const token = raw.replace(/^bearer(?:\s+|$)/i, '').trim();
  return token || undefined;
}

/**
 * Authenticate incoming requests.
 *
 *   access token valid    → attach identity, proceed (no storage access)
 *   access token invalid  → 401 "unauthorized"; never renewed
 *   access token expired  → renew from the refresh token, then proceed
 */
export function authenticate(options: AuthenticateOptions): RequestHandler {
  const { codec, headers } = options;

  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const accessToken = readCredential(req, headers.access);
    if (!accessToken) {
      reject(res, new AuthError('CredentialMissing'));
      return;
    }

    let verified: { subject: string; roles: Role[] };
    try {
      verified = codec.verifyAccess(accessToken);
    } catch (err) {
      // Only expiry is eligible for renewal. A forged or corrupt token is
      // never repaired.
      if (!(err instanceof TokenError && err.kind === 'expired')) {
        const detail = err instanceof Error ? err.message : String(err);
        reject(res, new AuthError('CredentialInvalid', 'unauthorized', { cause: err }), detail);
        return;
      }

      try {
        verified = await renew(req, res, options);
      } catch (renewErr) {
        if (renewErr instanceof AuthError) {
          reject(res, renewErr);
          return;
        }
        next(renewErr);
        return;
      }
    }

    try {
      attachIdentity(req, verified.subject, verified.roles);
    } catch (err) {
      next(err);
      return;
    }
    next();
  };
}

/**
 * Renewal path: verify the refresh token, re-read roles, rotate both tokens
 * and publish them in the response headers. Strictly sequential.
 */
async function renew(
  req: Request,
  res: Response,
  { codec, roleLookup, headers, roleLookupTimeoutMs }: AuthenticateOptions
): Promise<{ subject: string; roles: Role[] }> {
  const refreshToken = readCredential(req, headers.refresh);
  if (!refreshToken) {
    throw new AuthError('RefreshMissing');
  }

  let subject: string;
  try {
    subject = codec.verifyRefresh(refreshToken);
  } catch (err) {
    throw new AuthError('RefreshInvalid', undefined, { cause: err });
  }

  const { signal, release } = createRequestSignal(res, roleLookupTimeoutMs);
  let roles: Role[];
  try {
    roles = await raceAbort(roleLookup.fetchRoles(subject, signal), signal);
  } catch (err) {
    if (signal.aborted) {
      throw signal.reason instanceof AuthError ? signal.reason : new AuthError('RequestAborted');
    }
    log.error(`Role lookup failed for ${subject}:`, err instanceof Error ? err.message : err);
    throw new AuthError('RoleLookupFailed', undefined, { cause: err });
  } finally {
    release();
  }

  // The client may have gone away between lookup and here; never rotate
  // against an abandoned request.
  if (signal.aborted) {
    throw signal.reason instanceof AuthError ? signal.reason : new AuthError('RequestAborted');
  }

  const accessToken = issue(() => codec.issueAccess(subject, roles), 'failed to generate access token');
  const refreshTokenNext = issue(() => codec.issueRefresh(subject), 'failed to generate refresh token');

  res.set(ROTATED_ACCESS_HEADER, accessToken);
  res.set(ROTATED_REFRESH_HEADER, refreshTokenNext);
  log.info(`Rotated token pair for ${subject}`);

  return { subject, roles };
}

function issue(sign: () => string, reason: string): string {
  try {
    return sign();
  } catch (err) {
    log.error(reason, err instanceof Error ? err.message : err);
    throw new AuthError('SigningFailed', reason, { cause: err });
  }
}

function reject(res: Response, err: AuthError, detail?: string): void {
  if (err.isServerFault) {
    log.error(`Rejected (${err.code}): ${err.reason}`);
  } else {
    log.warn(`Rejected (${err.code}): ${detail ?? err.reason}`);
  }
  sendAuthError(res, err);
}
