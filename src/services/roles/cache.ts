// =============================================================================
// WARDEN — Role Cache
//
// One frozen snapshot of every stored role per membership, keyed
// `roles.<membershipId>`. Only mutation paths write it; reads that miss fall
// back to the store without populating.
// =============================================================================

import { Role } from '../../types/roles';
import { TtlCache } from '../cache';

export function roleCacheKey(membershipId: string): string {
  return `roles.${membershipId}`;
}

function copyRole(role: Role): Role {
  return { ...role, permissions: [...role.permissions], forbidden: [...role.forbidden] };
}

export class RoleCache {
  private readonly cache: TtlCache<readonly Role[]>;

  constructor(
    private readonly ttlSeconds: number,
    clock: () => Date = () => new Date(),
  ) {
    this.cache = new TtlCache(clock);
  }

  snapshot(membershipId: string): readonly Role[] | undefined {
    return this.cache.get(roleCacheKey(membershipId));
  }

  /** Swap in a new snapshot with a fresh TTL */
  replace(membershipId: string, roles: Role[]): void {
    const frozen = Object.freeze(roles.map((role) => Object.freeze(copyRole(role))));
    this.cache.replace(roleCacheKey(membershipId), frozen, this.ttlSeconds);
  }

  findById(membershipId: string, id: string): Role | null {
    const role = this.snapshot(membershipId)?.find((r) => r._id === id);
    return role ? copyRole(role) : null;
  }

  findBySlug(membershipId: string, slug: string): Role | null {
    const role = this.snapshot(membershipId)?.find((r) => r.slug === slug);
    return role ? copyRole(role) : null;
  }
}
