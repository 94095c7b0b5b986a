// =============================================================================
// WARDEN — Membership Lookup
//
// Memberships are administered outside this core. Every operation resolves
// the owning membership through here before touching anything else.
// =============================================================================

import { config } from '../config';
import { MembershipNotFoundError } from '../errors';
import { DocumentObject, SysMetadata } from '../types/documents';
import { HashAlgorithm, isHashAlgorithm, Membership } from '../types/membership';
import { DocumentStore } from '../types/store';
import { readNumber, readObject, readString } from '../utils/dynamic-object';
import { and, eq } from './store/filters';

export const MEMBERSHIPS_COLLECTION = 'memberships';

function defaultHashAlgorithm(): HashAlgorithm {
  const configured = config.passwords.defaultHashAlgorithm;
  return isHashAlgorithm(configured) ? configured : 'SHA2-512';
}

export function toSysMetadata(doc: DocumentObject | null): SysMetadata | null {
  if (!doc) return null;
  const createdAt = readString(doc, 'created_at');
  const createdBy = readString(doc, 'created_by');
  if (createdAt === null || createdBy === null) return null;
  return {
    created_at: createdAt,
    created_by: createdBy,
    modified_at: readString(doc, 'modified_at'),
    modified_by: readString(doc, 'modified_by'),
  };
}

export function toMembership(doc: DocumentObject): Membership {
  const algorithm = readString(doc, 'hash_algorithm');
  return {
    _id: readString(doc, '_id') ?? '',
    name: readString(doc, 'name') ?? '',
    secret_key: readString(doc, 'secret_key') ?? '',
    hash_algorithm: algorithm !== null && isHashAlgorithm(algorithm) ? algorithm : defaultHashAlgorithm(),
    default_encoding: readString(doc, 'default_encoding') ?? 'UTF-8',
    default_language: readString(doc, 'default_language') ?? 'none',
    expires_in: readNumber(doc, 'expires_in') ?? 43200,
    refresh_token_expires_in: readNumber(doc, 'refresh_token_expires_in') ?? 86400,
    sys: toSysMetadata(readObject(doc, 'sys')),
  };
}

export class MembershipService {
  constructor(private readonly store: DocumentStore) {}

  async get(membershipId: string): Promise<Membership | null> {
    const doc = await this.store.findOne(MEMBERSHIPS_COLLECTION, eq('_id', membershipId));
    return doc ? toMembership(doc) : null;
  }

  /** The membership, or MembershipNotFoundError */
  async require(membershipId: string): Promise<Membership> {
    const membership = await this.get(membershipId);
    if (!membership) throw new MembershipNotFoundError(membershipId);
    return membership;
  }

  async getAll(): Promise<Membership[]> {
    const { items } = await this.store.find(MEMBERSHIPS_COLLECTION, and());
    return items.map(toMembership);
  }
}
