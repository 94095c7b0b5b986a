// =============================================================================
// WARDEN — Password Reset Link
//
//   https://<host>/set-password?token=<urlencoded "<membershipId>:<payload>">
//
// payload = encrypt("emailAddress=…&serverUrl=…&membershipId=…
//                    &encryptedResetPasswordToken=encrypt(token)")
//
// Both layers use the membership secret. Field values are URI-encoded
// before joining.
// =============================================================================

import { decryptString, encryptString } from '../crypto/encryption';

export interface ResetPasswordLinkInput {
  emailAddress: string;
  resetToken: string;
  membershipId: string;
  secretKey: string;
  serverUrl: string;
  host: string;
}

export interface ResetPasswordLinkPayload {
  emailAddress: string;
  serverUrl: string;
  membershipId: string;
  resetToken: string;
}

const FIELDS = ['emailAddress', 'serverUrl', 'membershipId', 'encryptedResetPasswordToken'] as const;

export function buildResetPasswordLink(input: ResetPasswordLinkInput): string {
  const fields: Record<(typeof FIELDS)[number], string> = {
    emailAddress: input.emailAddress,
    serverUrl: input.serverUrl,
    membershipId: input.membershipId,
    encryptedResetPasswordToken: encryptString(input.resetToken, input.secretKey),
  };

  const joined = FIELDS.map((key) => `${key}=${encodeURIComponent(fields[key])}`).join('&');
  const payload = `${input.membershipId}:${encryptString(joined, input.secretKey)}`;
  return `https://${input.host}/set-password?token=${encodeURIComponent(payload)}`;
}

/**
 * Inverse of buildResetPasswordLink, for the set-password page.
 * @throws when the link is not a reset link or was not encrypted with `secretKey`
 */
export function decodeResetPasswordLink(link: string, secretKey: string): ResetPasswordLinkPayload {
  const token = new URL(link).searchParams.get('token');
  const separator = token ? token.indexOf(':') : -1;
  if (!token || separator <= 0) {
    throw new Error('Not a password reset link');
  }

  const membershipId = token.slice(0, separator);
  const joined = decryptString(token.slice(separator + 1), secretKey);

  const fields = new Map<string, string>();
  for (const pair of joined.split('&')) {
    const equals = pair.indexOf('=');
    if (equals > 0) fields.set(pair.slice(0, equals), decodeURIComponent(pair.slice(equals + 1)));
  }

  const encryptedToken = fields.get('encryptedResetPasswordToken');
  if (fields.get('membershipId') !== membershipId || encryptedToken === undefined) {
    throw new Error('Password reset link payload is inconsistent');
  }

  return {
    emailAddress: fields.get('emailAddress') ?? '',
    serverUrl: fields.get('serverUrl') ?? '',
    membershipId,
    resetToken: decryptString(encryptedToken, secretKey),
  };
}
