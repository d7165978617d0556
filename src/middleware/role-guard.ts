// =============================================================================
// STOCKROOM — Role Guard Middleware
//
// Verifies the authenticated caller holds at least one of the allowed roles.
// Used on route groups: requireRole('asset_manager', 'admin')
// =============================================================================

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthError, sendAuthError } from '../errors';
import { createLogger } from '../logging';
import { Role, sortRoles } from '../types/roles';
import { findIdentity } from './identity';

const log = createLogger('RoleGuard');

/**
 * Returns middleware that lets the request through when any of the caller's
 * roles is in the allow-list. No hierarchy: `admin` only passes where it is
 * listed. A caller with no roles never passes. Must be used AFTER the
 * authenticate middleware.
 */
export function requireRole(...allowed: Role[]): RequestHandler {
  if (allowed.length === 0) {
    throw new Error('requireRole needs at least one role');
  }
  const allowList = new Set<Role>(allowed);
  const required = sortRoles(allowed);

  return (req: Request, res: Response, next: NextFunction): void => {
    const identity = findIdentity(req);
    if (!identity) {
      log.warn(`No identity on ${req.method} ${req.originalUrl}; is authenticate mounted?`);
      sendAuthError(res, new AuthError('ContextMissing'));
      return;
    }

    const hasRole = identity.roles.some((r) => allowList.has(r));
    if (!hasRole) {
      log.warn(`Forbidden: ${identity.subjectId} [${identity.roles.join(', ')}] on ${req.originalUrl}`);
      res.status(403).json({
        error: 'forbidden',
        code: 'Forbidden',
        required,
        current: identity.roles,
      });
      return;
    }

    next();
  };
}
