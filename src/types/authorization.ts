// =============================================================================
// WARDEN — Authorization Types
//
// An authorization request asks whether an acting identity may perform
// `subject.resource.action.object`. The answer is decided from the role's
// allow/deny sets, with the user's own sets taking precedence.
// =============================================================================

import { Rbac } from '../authorization/patterns';

/** Allow and deny sets of a role or of a single user */
export interface PermissionSets {
  permissions: readonly string[];
  forbidden: readonly string[];
}

export interface AuthorizationRequest {
  /** Requested access, fully specified (wildcards allowed but unusual) */
  rbac: Rbac;
  /** Role of the acting identity */
  role: PermissionSets;
  /** The acting user's own Ubac sets, when the actor is a user */
  user?: PermissionSets;
}

export interface AuthorizationResult {
  granted: boolean;

  /** Which set decided the outcome */
  decidedBy: 'user_forbidden' | 'user_permission' | 'role_forbidden' | 'role_permission' | 'no_match';

  /** The pattern that matched (formatted), if any */
  matchedPattern: string | null;
}
