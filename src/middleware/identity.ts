// =============================================================================
// STOCKROOM — Request Identity
//
// Per-request store for the verified caller. Written once by the
// authenticate middleware; read by role guards and route handlers.
// =============================================================================

import { Request } from 'express';
import { AuthError } from '../errors';
import { IdentityContext } from '../types/auth';
import { Role } from '../types/roles';

const identities = new WeakMap<Request, IdentityContext>();

/**
 * Attach the verified identity to a request. The stored value is frozen and
 * a second attach on the same request throws.
 */
export function attachIdentity(
  req: Request,
  subjectId: string,
  roles: readonly Role[]
): IdentityContext {
  if (identities.has(req)) {
    throw new Error('identity already attached to this request');
  }
  const identity: IdentityContext = Object.freeze({
    subjectId,
    roles: Object.freeze([...roles]),
  });
  identities.set(req, identity);
  return identity;
}

/** The request's identity, or undefined when authentication never ran. */
export function findIdentity(req: Request): IdentityContext | undefined {
  return identities.get(req);
}

/**
 * The request's identity. Throws ContextMissing when the request did not
 * pass through the authenticate middleware.
 */
export function getIdentity(req: Request): IdentityContext {
  const identity = identities.get(req);
  if (!identity) {
    throw new AuthError('ContextMissing', 'unauthorized', {
      cause: new Error('identity not found on request'),
    });
  }
  return identity;
}
