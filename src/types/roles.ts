// =============================================================================
// WARDEN — Role Definitions
//
// Roles are tenant-owned documents carrying an allow set (permissions) and a
// deny set (forbidden) of Rbac patterns. Two slugs are reserved: they are
// synthesized per membership and never read from the cache or the store.
// =============================================================================

import { SysMetadata } from './documents';

export const RESERVED_ROLES = {
  administrator: 'administrator',
  server: 'server',
} as const;

export type ReservedRoleSlug = (typeof RESERVED_ROLES)[keyof typeof RESERVED_ROLES];

export function isReservedRoleSlug(slug: string): slug is ReservedRoleSlug {
  return slug === RESERVED_ROLES.administrator || slug === RESERVED_ROLES.server;
}

/**
 * Resource kinds the administrator role is granted over.
 * Administrator permissions are `*.<resource>.*.*` for each of these.
 */
export const RESERVED_RESOURCES = [
  'memberships',
  'users',
  'user-types',
  'roles',
  'applications',
  'providers',
  'tokens',
  'active-tokens',
  'revoked-tokens',
  'webhooks',
  'mailhooks',
  'events',
] as const;

/** Permissions of the synthesized server role */
export const SERVER_ROLE_PERMISSIONS = [
  '*.users.reset-password.*',
  '*.users.set-password.*',
] as const;

export type Role = {
  _id: string;
  membership_id: string;
  name: string;
  slug: string;
  description: string | null;
  /** Rbac allow patterns */
  permissions: string[];
  /** Rbac deny patterns */
  forbidden: string[];
  sys: SysMetadata | null;
};
