// =============================================================================
// STOCKROOM — External Identity Provider
//
// Alternate credential issuance path: a third-party provider vouches for the
// caller, and we exchange its assertion for our own token pair.
// =============================================================================

import { ExternalIdentity } from '../types/auth';

export interface IdentityProvider {
  /**
   * Verify an assertion issued by the provider. Rejects when the assertion
   * is forged, expired, or otherwise unacceptable.
   */
  verifyAssertion(assertion: string): Promise<ExternalIdentity>;
}
