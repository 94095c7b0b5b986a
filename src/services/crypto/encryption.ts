// =============================================================================
// WARDEN — AES-256-GCM String Encryption
//
// Reversible encryption for the password-reset delivery payload.
// Keys are derived from a membership's secret key:
//   key = SHA-256(secret)
// Output is URL-safe base64 of iv ‖ authTag ‖ ciphertext, so a ciphertext
// can itself be encrypted again or embedded in a link.
// =============================================================================

import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'crypto';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;          // GCM recommended IV length
const AUTH_TAG_LENGTH = 16;    // 128-bit authentication tag

/**
 * Compute SHA-512 hash of data.
 * Used for event integrity hashes.
 */
export function sha512(data: string | Buffer): string {
  return createHash('sha512')
    .update(typeof data === 'string' ? Buffer.from(data, 'utf-8') : data)
    .digest('hex');
}

export function deriveKey(secret: string): Buffer {
  return createHash('sha256').update(secret, 'utf-8').digest();
}

/**
 * Encrypt plaintext under a secret.
 *
 * @param associatedData bound to the ciphertext; decryption must present the same value
 */
export function encryptString(plaintext: string, secret: string, associatedData?: string): string {
  if (secret.length === 0) {
    throw new Error('Encryption secret must not be empty');
  }

  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, deriveKey(secret), iv, { authTagLength: AUTH_TAG_LENGTH });
  if (associatedData !== undefined) {
    cipher.setAAD(Buffer.from(associatedData, 'utf-8'));
  }

  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf-8'), cipher.final()]);
  return Buffer.concat([iv, cipher.getAuthTag(), encrypted]).toString('base64url');
}

/**
 * Inverse of encryptString.
 * @throws when the ciphertext was tampered with or the secret is wrong
 */
export function decryptString(ciphertext: string, secret: string, associatedData?: string): string {
  const raw = Buffer.from(ciphertext, 'base64url');
  if (raw.length < IV_LENGTH + AUTH_TAG_LENGTH) {
    throw new Error('Ciphertext is too short');
  }

  const iv = raw.subarray(0, IV_LENGTH);
  const authTag = raw.subarray(IV_LENGTH, IV_LENGTH + AUTH_TAG_LENGTH);
  const body = raw.subarray(IV_LENGTH + AUTH_TAG_LENGTH);

  const decipher = createDecipheriv(ALGORITHM, deriveKey(secret), iv, { authTagLength: AUTH_TAG_LENGTH });
  decipher.setAuthTag(authTag);
  if (associatedData !== undefined) {
    decipher.setAAD(Buffer.from(associatedData, 'utf-8'));
  }

  try {
    return Buffer.concat([decipher.update(body), decipher.final()]).toString('utf-8');
  } catch (err) {
    throw new Error(
      `GCM authentication failure: ciphertext or authentication tag has been tampered with (${err instanceof Error ? err.message : String(err)})`,
    );
  }
}
