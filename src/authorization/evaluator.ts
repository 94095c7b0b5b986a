// =============================================================================
// WARDEN — Pattern Authorization
//
// Deny-first evaluation over wildcard patterns:
//   1. user forbidden   → denied
//   2. user permissions → granted
//   3. role forbidden   → denied
//   4. role permissions → granted
//   5. otherwise        → denied
//
// Malformed stored entries never match.
// =============================================================================

import { AuthorizationRequest, AuthorizationResult } from '../types/authorization';
import { AccessPattern, covers, formatPattern, parsePatternList, parseRbac, parseUbac, Rbac } from './patterns';

function firstCovering(patterns: AccessPattern[], requested: Rbac): AccessPattern | null {
  return patterns.find((p) => covers(p, requested)) ?? null;
}

export class PatternAuthorizer {
  readonly name = 'Wildcard pattern RBAC/UBAC';

  authorize(request: AuthorizationRequest): AuthorizationResult {
    if (request.user) {
      const userForbidden = parsePatternList(request.user.forbidden, parseUbac).patterns;
      const deny = firstCovering(userForbidden, request.rbac);
      if (deny) return this.result(false, 'user_forbidden', deny);

      const userPermissions = parsePatternList(request.user.permissions, parseUbac).patterns;
      const allow = firstCovering(userPermissions, request.rbac);
      if (allow) return this.result(true, 'user_permission', allow);
    }

    const roleForbidden = parsePatternList(request.role.forbidden, parseRbac).patterns;
    const deny = firstCovering(roleForbidden, request.rbac);
    if (deny) return this.result(false, 'role_forbidden', deny);

    const rolePermissions = parsePatternList(request.role.permissions, parseRbac).patterns;
    const allow = firstCovering(rolePermissions, request.rbac);
    if (allow) return this.result(true, 'role_permission', allow);

    return this.result(false, 'no_match', null);
  }

  /** Convenience for callers holding the request as text */
  isAuthorized(request: Omit<AuthorizationRequest, 'rbac'> & { rbac: string }): boolean {
    return this.authorize({ ...request, rbac: parseRbac(request.rbac) }).granted;
  }

  private result(
    granted: boolean,
    decidedBy: AuthorizationResult['decidedBy'],
    pattern: AccessPattern | null,
  ): AuthorizationResult {
    return {
      granted,
      decidedBy,
      matchedPattern: pattern ? formatPattern(pattern) : null,
    };
  }
}
