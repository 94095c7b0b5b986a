// =============================================================================
// WARDEN — Membership (tenant)
//
// The isolation boundary. Memberships are administered elsewhere; this core
// only reads them: for existence checks, the password hash algorithm, the
// text-search language and the secret key used for signing and encryption.
// =============================================================================

import { SysMetadata } from './documents';

export const HASH_ALGORITHMS = [
  'MD5',
  'SHA1',
  'SHA2-256',
  'SHA2-384',
  'SHA2-512',
  'SHA3-256',
  'SHA3-512',
  'BCRYPT',
] as const;

export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export function isHashAlgorithm(value: string): value is HashAlgorithm {
  return HASH_ALGORITHMS.some((algorithm) => algorithm === value);
}

export interface Membership {
  _id: string;
  name: string;
  secret_key: string;
  hash_algorithm: HashAlgorithm;
  default_encoding: string;
  /** ISO 639-1 code, or 'none' */
  default_language: string;
  /** Access token lifetime (seconds) */
  expires_in: number;
  /** Refresh token lifetime (seconds) */
  refresh_token_expires_in: number;
  sys: SysMetadata | null;
}
