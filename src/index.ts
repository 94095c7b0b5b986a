// =============================================================================
// WARDEN — Identity Core
//
// Builds the service graph over a document store:
//
//   memberships ─┐
//   events ──────┼─ userTypes ─┐
//                ├─ roles ─────┼─ users ─ credentials
//   store ───────┘             │
//                 schema ──────┘
//
// initialize() declares the unique indexes and bootstraps the stored
// administrator role of every membership.
// =============================================================================

import { Pool } from 'pg';
import { PatternAuthorizer } from './authorization/evaluator';
import { getPool } from './db/pool';
import { PasswordHasher, TokenService } from './services/crypto';
import { EventEmitter, PgEventSink } from './services/events';
import { MembershipService } from './services/memberships';
import { RoleService, RoleServiceOptions } from './services/roles';
import { PgDocumentStore } from './services/store';
import { UserTypeService } from './services/user-types';
import { UserService } from './services/users';
import { CredentialService } from './services/users/credentials';
import { EventSink } from './types/events';
import { DocumentStore } from './types/store';

export interface IdentityCoreOptions {
  store: DocumentStore;
  sinks?: EventSink[];
  clock?: () => Date;
  roles?: RoleServiceOptions;
  passwords?: {
    minLength?: number;
    bcryptRounds?: number;
  };
  tokens?: {
    resetTokenLifetimeSeconds?: number;
  };
}

export interface IdentityCore {
  store: DocumentStore;
  events: EventEmitter;
  memberships: MembershipService;
  userTypes: UserTypeService;
  roles: RoleService;
  users: UserService;
  credentials: CredentialService;
  authorizer: PatternAuthorizer;
  initialize(): Promise<void>;
}

export function createIdentityCore(options: IdentityCoreOptions): IdentityCore {
  const { store, clock } = options;

  const events = new EventEmitter(options.sinks ?? [], clock);
  const memberships = new MembershipService(store);
  const crud = { store, memberships, events, clock };

  const hasher = new PasswordHasher({ bcryptRounds: options.passwords?.bcryptRounds });
  const tokens = new TokenService({ clock });

  const userTypes = new UserTypeService(crud);
  const roles = new RoleService(crud, options.roles);
  const users = new UserService(
    { ...crud, userTypes, roles, hasher },
    { minPasswordLength: options.passwords?.minLength },
  );
  const credentials = new CredentialService(
    { memberships, users, events, hasher, tokens, clock },
    {
      minPasswordLength: options.passwords?.minLength,
      resetTokenLifetimeSeconds: options.tokens?.resetTokenLifetimeSeconds,
    },
  );

  return {
    store,
    events,
    memberships,
    userTypes,
    roles,
    users,
    credentials,
    authorizer: new PatternAuthorizer(),

    async initialize() {
      await userTypes.initialize();
      await roles.initialize();
      await users.initialize();
      await roles.bootstrap();
    },
  };
}

/** Core over Postgres: JSONB document store and the identity_events sink */
export function createPostgresIdentityCore(
  options: Omit<IdentityCoreOptions, 'store' | 'sinks'> & { pool?: Pool; sinks?: EventSink[] } = {},
): IdentityCore {
  const pool = options.pool ?? getPool();
  return createIdentityCore({
    ...options,
    store: new PgDocumentStore(pool),
    sinks: [new PgEventSink(pool), ...(options.sinks ?? [])],
  });
}

export * from './errors';
export * from './authorization/patterns';
export { PatternAuthorizer } from './authorization/evaluator';
export * from './types/auth';
export * from './types/authorization';
export * from './types/documents';
export * from './types/events';
export * from './types/membership';
export * from './types/roles';
export * from './types/store';
export * from './types/users';
export * from './services/store';
export * from './services/crypto';
export { EventEmitter, InMemoryEventSink, PgEventSink } from './services/events';
export { MembershipService } from './services/memberships';
export { UserTypeService, originUserType } from './services/user-types';
export { RoleService } from './services/roles';
export { UserService } from './services/users';
export { CredentialService } from './services/users/credentials';
export { decodeResetPasswordLink } from './services/users/reset-link';
export { SchemaEngine } from './services/schema';
export type { BulkDeleteResult, BulkDeleteOutcome } from './services/crud';
export { migrate } from './db/migrate';
export { getPool, closePool } from './db/pool';
