// =============================================================================
// WARDEN — Credential Lifecycle
//
// Password policy, hashing, password change, and the reset protocol:
//
//   resetPassword  gate → sign reset token (HS256, membership secret)
//                  → build encrypted redemption link → user_password_reset
//   setPassword    gate → verify signature (InvalidToken) → check expiry
//                  against the clock (TokenExpired) → changePassword
//
// The gate admits system utilizers, the reserved administrator and server
// roles, and the user acting on their own account.
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { config } from '../../config';
import {
  AccessDeniedError,
  InvalidTokenError,
  NotFoundError,
  TokenExpiredError,
  ValidationFailedError,
} from '../../errors';
import { HumanUtilizer, Utilizer } from '../../types/auth';
import { DocumentObject, OperationOptions } from '../../types/documents';
import { Membership } from '../../types/membership';
import { RESERVED_ROLES } from '../../types/roles';
import { ResetPasswordServerContext, ResetPasswordToken, UserDocument } from '../../types/users';
import { readString } from '../../utils/dynamic-object';
import { PasswordHasher } from '../crypto/hashing';
import { TokenService } from '../crypto/tokens';
import { EventEmitter } from '../events';
import { MembershipService } from '../memberships';
import type { UserService } from './index';
import { ensurePassword } from './password-policy';
import { buildResetPasswordLink } from './reset-link';

export const RESET_TOKEN_TYPE = 'reset_token';

export interface CredentialServiceDependencies {
  memberships: MembershipService;
  users: UserService;
  events: EventEmitter;
  hasher: PasswordHasher;
  tokens: TokenService;
  clock?: () => Date;
}

export interface CredentialServiceOptions {
  minPasswordLength?: number;
  resetTokenLifetimeSeconds?: number;
}

function mayManageCredentials(utilizer: Utilizer, userId: string): boolean {
  if (utilizer.kind === 'system') return true;
  return utilizer.role === RESERVED_ROLES.administrator
    || utilizer.role === RESERVED_ROLES.server
    || utilizer.id === userId;
}

function requireIdentifier(value: string): void {
  if (value.trim().length === 0) {
    throw new ValidationFailedError([
      { field: 'email_address', reason: 'required', message: 'Username or email required' },
    ]);
  }
}

export class CredentialService {
  private readonly memberships: MembershipService;
  private readonly users: UserService;
  private readonly events: EventEmitter;
  private readonly hasher: PasswordHasher;
  private readonly tokens: TokenService;
  private readonly clock: () => Date;
  private readonly minPasswordLength: number;
  private readonly resetTokenLifetimeSeconds: number;

  constructor(deps: CredentialServiceDependencies, options: CredentialServiceOptions = {}) {
    this.memberships = deps.memberships;
    this.users = deps.users;
    this.events = deps.events;
    this.hasher = deps.hasher;
    this.tokens = deps.tokens;
    this.clock = deps.clock ?? (() => new Date());
    this.minPasswordLength = options.minPasswordLength ?? config.passwords.minLength;
    this.resetTokenLifetimeSeconds = options.resetTokenLifetimeSeconds ?? config.tokens.resetTokenLifetimeSeconds;
  }

  ensurePassword(payload: DocumentObject): string {
    return ensurePassword(payload, this.minPasswordLength);
  }

  hash(membership: Membership, password: string): Promise<string> {
    return this.hasher.hash(membership, password);
  }

  verify(membership: Membership, password: string, storedHash: string): Promise<boolean> {
    return this.hasher.verify(membership, password, storedHash);
  }

  async changePassword(
    utilizer: Utilizer,
    membershipId: string,
    userId: string,
    newPassword: string,
    options: OperationOptions = {},
  ): Promise<UserDocument> {
    const password = this.ensurePassword({ password: newPassword });
    const membership = await this.memberships.require(membershipId);

    const current = await this.users.getWithPasswordHash(membershipId, userId, options);
    if (!current) throw new NotFoundError('User', userId);

    const passwordHash = await this.hasher.hash(membership, password);
    const { prior, updated } = await this.users.replacePasswordHash(utilizer, current, passwordHash, options);

    await this.events.emit({
      membershipId,
      eventType: 'user_password_changed',
      utilizerId: userId,
      document: updated,
      prior,
    });
    return updated;
  }

  async resetPassword(
    utilizer: Utilizer,
    membershipId: string,
    emailOrUsername: string,
    server: ResetPasswordServerContext,
    options: OperationOptions = {},
  ): Promise<ResetPasswordToken> {
    requireIdentifier(emailOrUsername);
    const membership = await this.memberships.require(membershipId);

    const user = await this.users.findWithPasswordHash(membershipId, emailOrUsername, options);
    const userId = user ? readString(user, '_id') : null;
    if (!user || userId === null) throw new NotFoundError('User', emailOrUsername, 'email_address');

    if (!mayManageCredentials(utilizer, userId)) {
      throw new AccessDeniedError('Unauthorized access');
    }

    const issuedAt = this.clock();
    const resetToken = this.tokens.generate(
      {
        jti: uuidv4(),
        sub: userId,
        prn: readString(user, 'username') ?? '',
        mem: membershipId,
        token_type: RESET_TOKEN_TYPE,
      },
      membership.secret_key,
      this.resetTokenLifetimeSeconds,
    );

    const token: ResetPasswordToken = {
      reset_token: resetToken,
      expires_in: this.resetTokenLifetimeSeconds,
      created_at: issuedAt.toISOString(),
    };

    const link = buildResetPasswordLink({
      emailAddress: readString(user, 'email_address') ?? emailOrUsername,
      resetToken,
      membershipId,
      secretKey: membership.secret_key,
      serverUrl: server.serverUrl,
      host: server.host,
    });

    const visibleUser: DocumentObject = { ...user };
    delete visibleUser.password_hash;

    await this.events.emit({
      membershipId,
      eventType: 'user_password_reset',
      utilizerId: userId,
      document: {
        reset_password_token: token,
        reset_password_link: link,
        user: visibleUser,
        membership: { _id: membership._id, name: membership.name },
      },
      prior: null,
    });

    return token;
  }

  async setPassword(
    utilizer: Utilizer,
    membershipId: string,
    resetToken: string,
    usernameOrEmail: string,
    newPassword: string,
    options: OperationOptions = {},
  ): Promise<void> {
    requireIdentifier(usernameOrEmail);
    const membership = await this.memberships.require(membershipId);

    const user = await this.users.findWithPasswordHash(membershipId, usernameOrEmail, options);
    const userId = user ? readString(user, '_id') : null;
    if (!user || userId === null) throw new NotFoundError('User', usernameOrEmail, 'username or email_address');

    if (!mayManageCredentials(utilizer, userId)) {
      throw new AccessDeniedError('Unauthorized access');
    }

    const decoded = this.tokens.tryDecode(resetToken, membership.secret_key);
    if (!decoded || decoded.claims.token_type !== RESET_TOKEN_TYPE || decoded.claims.sub !== userId) {
      throw new InvalidTokenError();
    }
    if (this.clock().getTime() > decoded.validTo.getTime()) {
      throw new TokenExpiredError();
    }

    await this.changePassword(utilizer, membershipId, userId, newPassword, options);
  }

  /** False for an empty password; never throws for a wrong one */
  async checkPassword(utilizer: HumanUtilizer, password: string): Promise<boolean> {
    if (password.length === 0) return false;

    const membership = await this.memberships.require(utilizer.membershipId);
    const user = await this.users.getWithPasswordHash(utilizer.membershipId, utilizer.id);
    if (!user) throw new NotFoundError('User', utilizer.id);

    const storedHash = readString(user, 'password_hash');
    if (storedHash === null) return false;
    return this.hasher.verify(membership, password, storedHash);
  }
}
