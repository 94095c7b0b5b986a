// =============================================================================
// WARDEN — Test Suite 10: Crypto Primitives
//
// Unit-level checks of the crypto core:
//   - SHA-512 integrity hashing is consistent
//   - AES-256-GCM string encryption round-trips and detects tampering
//   - associated data is bound to the ciphertext
//   - password hashes are keyed by the membership secret
//   - tokens carry their claims and report expiry without enforcing it
// =============================================================================

import { createHash, createHmac } from 'crypto';
import { decryptString, deriveKey, encryptString, sha512 } from '../src/services/crypto/encryption';
import { PasswordHasher } from '../src/services/crypto/hashing';
import { TokenService } from '../src/services/crypto/tokens';
import { TEST_SECRET, TestClock } from './helpers';

describe('SHA-512 Hashing', () => {
  test('produces consistent 128-char hex output', () => {
    const hash = sha512('hello world');
    expect(hash).toHaveLength(128);
    expect(hash).toMatch(/^[0-9a-f]+$/);
    expect(sha512('hello world')).toBe(hash);
  });

  test('different input produces different hash', () => {
    expect(sha512('input-a')).not.toBe(sha512('input-b'));
  });

  test('string and Buffer input agree', () => {
    expect(sha512(Buffer.from('buffer data', 'utf-8'))).toBe(sha512('buffer data'));
  });
});

describe('AES-256-GCM String Encryption', () => {
  const plaintext = 'emailAddress=ada%40example.com&serverUrl=https%3A%2F%2Fapi.example.com';

  test('the key is SHA-256 of the secret', () => {
    expect(deriveKey(TEST_SECRET).equals(createHash('sha256').update(TEST_SECRET).digest())).toBe(true);
  });

  test('round-trips', () => {
    expect(decryptString(encryptString(plaintext, TEST_SECRET), TEST_SECRET)).toBe(plaintext);
  });

  test('output is URL-safe and differs per call', () => {
    const first = encryptString(plaintext, TEST_SECRET);
    const second = encryptString(plaintext, TEST_SECRET);

    expect(first).toMatch(/^[A-Za-z0-9_-]+$/);
    expect(first).not.toBe(second);
  });

  test('a ciphertext can be encrypted again', () => {
    const inner = encryptString('reset-token', TEST_SECRET);
    const outer = encryptString(`token=${inner}`, TEST_SECRET);
    const opened = decryptString(outer, TEST_SECRET);

    expect(decryptString(opened.slice('token='.length), TEST_SECRET)).toBe('reset-token');
  });

  test('tampering is detected', () => {
    const raw = Buffer.from(encryptString(plaintext, TEST_SECRET), 'base64url');
    raw[raw.length - 1] ^= 0xff;

    expect(() => decryptString(raw.toString('base64url'), TEST_SECRET)).toThrow(/^GCM authentication failure/);
  });

  test('the wrong secret fails', () => {
    expect(() => decryptString(encryptString(plaintext, TEST_SECRET), 'other-secret')).toThrow('GCM authentication failure');
  });

  test('associated data must match', () => {
    const sealed = encryptString(plaintext, TEST_SECRET, 'membership-1');

    expect(decryptString(sealed, TEST_SECRET, 'membership-1')).toBe(plaintext);
    expect(() => decryptString(sealed, TEST_SECRET, 'membership-2')).toThrow('GCM authentication failure');
    expect(() => decryptString(sealed, TEST_SECRET)).toThrow('GCM authentication failure');
  });

  test('short input and empty secrets are refused', () => {
    expect(() => decryptString('AAAA', TEST_SECRET)).toThrow('Ciphertext is too short');
    expect(() => encryptString(plaintext, '')).toThrow('Encryption secret must not be empty');
  });
});

describe('Password Hashing', () => {
  const hasher = new PasswordHasher({ bcryptRounds: 4 });

  test('SHA algorithms are HMACs keyed by the membership secret', async () => {
    const membership = { secret_key: TEST_SECRET, hash_algorithm: 'SHA2-256' as const };
    const expected = createHmac('sha256', TEST_SECRET).update('test-password').digest('hex');

    expect(await hasher.hash(membership, 'test-password')).toBe(expected);
    expect(await hasher.verify(membership, 'test-password', expected)).toBe(true);
  });

  test('another secret gives another hash', async () => {
    const hash = await hasher.hash({ secret_key: TEST_SECRET, hash_algorithm: 'SHA2-512' }, 'test-password');
    const other = await hasher.hash({ secret_key: 'other-secret', hash_algorithm: 'SHA2-512' }, 'test-password');

    expect(hash).toHaveLength(128);
    expect(other).not.toBe(hash);
    expect(await hasher.verify({ secret_key: 'other-secret', hash_algorithm: 'SHA2-512' }, 'test-password', hash)).toBe(false);
  });

  test('a stored hash of another length never verifies', async () => {
    expect(await hasher.verify({ secret_key: TEST_SECRET, hash_algorithm: 'MD5' }, 'test-password', 'short')).toBe(false);
  });

  test('BCRYPT hashes are salted and checked with verify', async () => {
    const membership = { secret_key: TEST_SECRET, hash_algorithm: 'BCRYPT' as const };
    const first = await hasher.hash(membership, 'test-password');
    const second = await hasher.hash(membership, 'test-password');

    expect(first).not.toBe(second);
    expect(first.startsWith('$2')).toBe(true);
    expect(await hasher.verify(membership, 'test-password', second)).toBe(true);
    expect(await hasher.verify(membership, 'wrong-password', first)).toBe(false);
  });
});

describe('Tokens', () => {
  test('claims, issue time and expiry follow the clock', () => {
    const clock = new TestClock('2026-03-01T12:00:00.000Z');
    const tokens = new TokenService({ clock: clock.now });
    const token = tokens.generate({ sub: 'user-1', token_type: 'reset_token' }, TEST_SECRET, 600);

    const decoded = tokens.tryDecode(token, TEST_SECRET);
    expect(decoded).not.toBe(false);
    if (!decoded) return;

    expect(decoded.claims).toEqual({
      sub: 'user-1',
      token_type: 'reset_token',
      iat: 1772366400,
      exp: 1772367000,
    });
    expect(decoded.validTo.toISOString()).toBe('2026-03-01T12:10:00.000Z');
  });

  test('an elapsed token still decodes', () => {
    const tokens = new TokenService({ clock: new TestClock('2020-01-01T00:00:00.000Z').now });
    const token = tokens.generate({ sub: 'user-1' }, TEST_SECRET, 60);

    expect(tokens.tryDecode(token, TEST_SECRET)).toMatchObject({ claims: { sub: 'user-1' } });
  });

  test('bad signatures and garbage decode to false', () => {
    const tokens = new TokenService();
    const token = tokens.generate({ sub: 'user-1' }, TEST_SECRET, 60);

    expect(tokens.tryDecode(token, 'other-secret')).toBe(false);
    expect(tokens.tryDecode('not-a-token', TEST_SECRET)).toBe(false);
  });
});
