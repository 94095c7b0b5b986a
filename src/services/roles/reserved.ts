// =============================================================================
// WARDEN — Reserved Roles
//
// 'administrator' and 'server' are synthesized per membership and held in a
// write-once table: the first computed entry for a membership is kept for
// the life of the process. Concurrent first lookups may both compute it;
// the result is pure, and only the first one is stored.
// =============================================================================

import { MembershipService } from '../memberships';
import {
  RESERVED_RESOURCES,
  RESERVED_ROLES,
  ReservedRoleSlug,
  Role,
  SERVER_ROLE_PERMISSIONS,
} from '../../types/roles';

/** `*.<resource>.*.*` for every reserved resource */
export function administratorPermissions(): string[] {
  return RESERVED_RESOURCES.map((resource) => `*.${resource}.*.*`);
}

function synthesize(membershipId: string): Record<ReservedRoleSlug, Role> {
  return {
    administrator: {
      _id: RESERVED_ROLES.administrator,
      membership_id: membershipId,
      name: 'Administrator',
      slug: RESERVED_ROLES.administrator,
      description: 'Administrator',
      permissions: administratorPermissions(),
      forbidden: [],
      sys: null,
    },
    server: {
      _id: RESERVED_ROLES.server,
      membership_id: membershipId,
      name: 'Server',
      slug: RESERVED_ROLES.server,
      description: 'System-initiated password flows',
      permissions: [...SERVER_ROLE_PERMISSIONS],
      forbidden: [],
      sys: null,
    },
  };
}

function copyRole(role: Role): Role {
  return { ...role, permissions: [...role.permissions], forbidden: [...role.forbidden] };
}

export class ReservedRoleTable {
  private readonly entries = new Map<string, Readonly<Record<ReservedRoleSlug, Role>>>();

  constructor(private readonly memberships: MembershipService) {}

  /** The synthesized role; MembershipNotFoundError for an unknown membership */
  async get(membershipId: string, slug: ReservedRoleSlug): Promise<Role> {
    let entry = this.entries.get(membershipId);
    if (!entry) {
      await this.memberships.require(membershipId);
      const computed = Object.freeze(synthesize(membershipId));
      entry = this.entries.get(membershipId) ?? computed;
      if (!this.entries.has(membershipId)) this.entries.set(membershipId, entry);
    }
    return copyRole(entry[slug]);
  }
}
