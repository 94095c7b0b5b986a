import { PasswordRequiredError, PasswordTooShortError } from '../../errors';
import { DocumentObject } from '../../types/documents';
import { config } from '../../config';

/** The payload's password, or the policy failure. Blank counts as missing. */
export function ensurePassword(payload: DocumentObject, minLength: number = config.passwords.minLength): string {
  const password = payload.password;
  if (typeof password !== 'string' || password.trim().length === 0) {
    throw new PasswordRequiredError();
  }
  if (password.length < minLength) {
    throw new PasswordTooShortError(minLength);
  }
  return password;
}
