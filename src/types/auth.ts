// =============================================================================
// WARDEN — Acting Identity
//
// Every mutating call names who is acting. Human utilizers carry their
// user id and role slug; system utilizers are the core itself or a trusted
// backend flow (bootstrap, password-reset mail handlers).
// =============================================================================

export interface HumanUtilizer {
  kind: 'human';
  /** User id */
  id: string;
  /** Membership the utilizer authenticated against */
  membershipId: string;
  /** Role slug */
  role: string;
  username: string | null;
}

export interface SystemUtilizer {
  kind: 'system';
  membershipId: string | null;
}

export type Utilizer = HumanUtilizer | SystemUtilizer;

export const SYSTEM_ACTOR = 'system';

export function systemUtilizer(membershipId: string | null = null): SystemUtilizer {
  return { kind: 'system', membershipId };
}

/** Identifier recorded on events for the acting identity */
export function utilizerId(utilizer: Utilizer): string {
  return utilizer.kind === 'human' ? utilizer.id : SYSTEM_ACTOR;
}

/** Name recorded in sys.created_by / sys.modified_by */
export function utilizerName(utilizer: Utilizer): string {
  return utilizer.kind === 'human' ? (utilizer.username ?? utilizer.id) : SYSTEM_ACTOR;
}
