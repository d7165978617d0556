// =============================================================================
// STOCKROOM — Role Definitions
// =============================================================================

/** All roles in the system */
export type Role =
  | 'admin'
  | 'asset_manager'
  | 'employee_manager'
  | 'employee';

/**
 * Canonical ordering of roles. Allow-lists and error bodies are reported in
 * this order regardless of how a route group declared them.
 */
export const ROLE_ORDER: readonly Role[] = [
  'admin',
  'asset_manager',
  'employee_manager',
  'employee',
];

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLE_ORDER.some((role) => role === value);
}

/**
 * Narrow an untrusted roles claim. Anything that is not an array yields an
 * empty list; unknown or non-string entries are dropped. Order is preserved.
 */
export function parseRoles(value: unknown): Role[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRole);
}

export function sortRoles(roles: Iterable<Role>): Role[] {
  return [...new Set(roles)].sort((a, b) => ROLE_ORDER.indexOf(a) - ROLE_ORDER.indexOf(b));
}
