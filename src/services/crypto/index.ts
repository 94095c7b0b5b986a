// =============================================================================
// WARDEN — Crypto Services
// =============================================================================

export { encryptString, decryptString, deriveKey, sha512 } from './encryption';
export { PasswordHasher } from './hashing';
export type { PasswordHasherOptions } from './hashing';
export { TokenService } from './tokens';
export type { DecodedToken, TokenClaims, TokenServiceOptions } from './tokens';
