// =============================================================================
// WARDEN — Password Hashing
//
// The algorithm is chosen per membership. SHA-family algorithms are HMACs
// keyed by the membership secret, hex encoded, so a leaked hash table is
// useless without the secret. BCRYPT hashes are salted by bcryptjs and can
// only be checked with verify(), never by comparing two hash() results.
// =============================================================================

import bcrypt from 'bcryptjs';
import { createHmac, timingSafeEqual } from 'crypto';
import { config } from '../../config';
import { HashAlgorithm } from '../../types/membership';

type Keyed = { secret_key: string; hash_algorithm: HashAlgorithm };

const HMAC_DIGESTS: Record<Exclude<HashAlgorithm, 'BCRYPT'>, string> = {
  MD5: 'md5',
  SHA1: 'sha1',
  'SHA2-256': 'sha256',
  'SHA2-384': 'sha384',
  'SHA2-512': 'sha512',
  'SHA3-256': 'sha3-256',
  'SHA3-512': 'sha3-512',
};

export interface PasswordHasherOptions {
  bcryptRounds?: number;
}

export class PasswordHasher {
  private readonly bcryptRounds: number;

  constructor(options: PasswordHasherOptions = {}) {
    this.bcryptRounds = options.bcryptRounds ?? config.passwords.bcryptRounds;
  }

  async hash(membership: Keyed, password: string): Promise<string> {
    if (membership.hash_algorithm === 'BCRYPT') {
      return bcrypt.hash(password, this.bcryptRounds);
    }
    return createHmac(HMAC_DIGESTS[membership.hash_algorithm], membership.secret_key)
      .update(password, 'utf-8')
      .digest('hex');
  }

  async verify(membership: Keyed, password: string, storedHash: string): Promise<boolean> {
    if (membership.hash_algorithm === 'BCRYPT') {
      return bcrypt.compare(password, storedHash);
    }

    const computed = Buffer.from(await this.hash(membership, password), 'utf-8');
    const stored = Buffer.from(storedHash, 'utf-8');
    return computed.length === stored.length && timingSafeEqual(computed, stored);
  }
}
