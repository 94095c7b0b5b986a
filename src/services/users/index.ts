// =============================================================================
// WARDEN — User Service
//
// Users are dynamic documents validated against their user type. On top of
// the CRUD pipeline:
//   - sourceProvider falls back to 'local' when missing or unknown
//   - local users must pass the password policy on create; the hash is
//     written after validation and never returned
//   - user_type defaults to the origin type for local users and is
//     immutable once stored
//   - the role slug must resolve in the same membership
// =============================================================================

import { FieldError, raiseFieldErrors, ValidationFailedError } from '../../errors';
import { Utilizer } from '../../types/auth';
import { DocumentObject, OperationOptions } from '../../types/documents';
import {
  EffectiveSchema,
  ORIGIN_USER_TYPE_SLUG,
  SOURCE_PROVIDERS,
  SourceProvider,
  UserDocument,
} from '../../types/users';
import { readString } from '../../utils/dynamic-object';
import { PasswordHasher } from '../crypto/hashing';
import { CrudDependencies, MembershipBoundCrudService, WriteContext } from '../crud';
import { RoleService } from '../roles';
import { SchemaEngine } from '../schema';
import { and, eq, or } from '../store/filters';
import { UserTypeService } from '../user-types';
import { ensurePassword } from './password-policy';

export const USERS_COLLECTION = 'users';

export interface UserServiceDependencies extends CrudDependencies {
  userTypes: UserTypeService;
  roles: RoleService;
  hasher: PasswordHasher;
}

export interface UserServiceOptions {
  minPasswordLength?: number;
}

function isSourceProvider(value: unknown): value is SourceProvider {
  return typeof value === 'string' && SOURCE_PROVIDERS.some((provider) => provider === value);
}

export class UserService extends MembershipBoundCrudService<UserDocument> {
  protected readonly collection = USERS_COLLECTION;
  protected readonly resourceName = 'User';
  protected readonly eventTypes = {
    created: 'user_created',
    updated: 'user_updated',
    deleted: 'user_deleted',
  } as const;
  protected readonly managedFields = ['_id', 'password', 'password_hash', 'membership_id', 'sys'];

  private readonly userTypes: UserTypeService;
  private readonly roles: RoleService;
  private readonly hasher: PasswordHasher;
  private readonly schema: SchemaEngine;
  private readonly minPasswordLength: number | undefined;

  constructor(deps: UserServiceDependencies, options: UserServiceOptions = {}) {
    super(deps);
    this.userTypes = deps.userTypes;
    this.roles = deps.roles;
    this.hasher = deps.hasher;
    this.schema = new SchemaEngine(deps.store, deps.userTypes);
    this.minPasswordLength = options.minPasswordLength;
  }

  protected toModel(doc: DocumentObject): UserDocument {
    return doc;
  }

  async initialize(): Promise<void> {
    await this.store.ensureUniqueIndex(this.collection, 'username');
    await this.store.ensureUniqueIndex(this.collection, 'email_address');
  }

  // ── Lookups ────────────────────────────────────────────────────────

  async findByUsernameOrEmail(
    membershipId: string,
    usernameOrEmail: string,
    options: OperationOptions = {},
  ): Promise<UserDocument | null> {
    const doc = await this.findWithPasswordHash(membershipId, usernameOrEmail, options);
    return doc ? this.hide(doc) : null;
  }

  /** Stored document including password_hash. Not for returning to callers. */
  async getWithPasswordHash(membershipId: string, id: string, options: OperationOptions = {}): Promise<UserDocument | null> {
    await this.requireMembership(membershipId, options);
    return this.store.findOne(this.collection, and(eq('membership_id', membershipId), eq('_id', id)));
  }

  /** Stored document including password_hash. Not for returning to callers. */
  async findWithPasswordHash(
    membershipId: string,
    usernameOrEmail: string,
    options: OperationOptions = {},
  ): Promise<UserDocument | null> {
    await this.requireMembership(membershipId, options);
    return this.store.findOne(
      this.collection,
      and(
        eq('membership_id', membershipId),
        or(eq('username', usernameOrEmail), eq('email_address', usernameOrEmail)),
      ),
    );
  }

  /**
   * Write a new password hash onto a stored user, skipping schema
   * validation. Returns the prior and updated documents, both hidden.
   */
  async replacePasswordHash(
    utilizer: Utilizer,
    current: UserDocument,
    passwordHash: string,
    options: OperationOptions = {},
  ): Promise<{ prior: UserDocument; updated: UserDocument }> {
    const id = readString(current, '_id');
    if (id === null) {
      throw new Error('[Users] Can not replace the password of an unsaved user');
    }

    const document: DocumentObject = { ...current, password_hash: passwordHash };
    delete document._id;
    document.sys = this.stampModified(utilizer, current.sys);

    const stored = await this.replaceDocument(id, document, options);
    return { prior: this.hide(current), updated: this.hide(stored) };
  }

  // ── Write hooks ────────────────────────────────────────────────────

  protected async beforeValidate(ctx: WriteContext): Promise<void> {
    const { document } = ctx;

    if (!isSourceProvider(document.sourceProvider)) {
      if (document.sourceProvider !== undefined && document.sourceProvider !== null) {
        console.warn(`[Users] Unknown source provider ${JSON.stringify(document.sourceProvider)}, falling back to 'local'`);
      }
      document.sourceProvider = 'local';
    }

    if (ctx.operation !== 'create') return;

    if (document.sourceProvider === 'local') {
      ensurePassword(ctx.payload, this.minPasswordLength);
      if (typeof document.user_type !== 'string' || document.user_type.length === 0) {
        document.user_type = ORIGIN_USER_TYPE_SLUG;
      }
    }
  }

  protected async validate(ctx: WriteContext): Promise<void> {
    const { document, membership } = ctx;
    const schema = await this.resolveSchema(membership._id, document);
    const uniqueScopes = await this.userTypes.uniqueScopes(membership._id, schema.slug);

    const errors: FieldError[] = await this.schema.collectErrors(document, schema, {
      membershipId: membership._id,
      collection: this.collection,
      selfId: ctx.id,
      priorType: ctx.prior ? readString(ctx.prior, 'user_type') : null,
      uniqueScopes,
    });

    const role = readString(document, 'role');
    if (role !== null && !await this.roles.getBySlug(membership._id, role)) {
      errors.push({ field: 'role', reason: 'reference', message: `Role '${role}' not found`, value: role });
    }

    raiseFieldErrors(errors);

    for (const property of schema.properties) {
      if (property.unique) await this.store.ensureUniqueIndex(this.collection, property.path, uniqueScopes.get(property.path));
    }
  }

  protected async afterValidate(ctx: WriteContext): Promise<void> {
    if (ctx.operation === 'create' && ctx.document.sourceProvider === 'local') {
      const password = ensurePassword(ctx.payload, this.minPasswordLength);
      ctx.document.password_hash = await this.hasher.hash(ctx.membership, password);
    }
  }

  private async resolveSchema(membershipId: string, document: DocumentObject): Promise<EffectiveSchema> {
    const slug = readString(document, 'user_type');
    if (!slug) {
      throw new ValidationFailedError([{ field: 'user_type', reason: 'required', message: 'user_type is a required field' }]);
    }

    const schema = await this.userTypes.getEffectiveSchema(membershipId, slug);
    if (!schema) {
      throw new ValidationFailedError([
        { field: 'user_type', reason: 'not_found', message: `User type '${slug}' not found`, value: slug },
      ]);
    }
    return schema;
  }
}

export { ensurePassword } from './password-policy';
export { buildResetPasswordLink, decodeResetPasswordLink } from './reset-link';
export { CredentialService } from './credentials';
