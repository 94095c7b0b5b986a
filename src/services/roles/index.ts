// =============================================================================
// WARDEN — Role Service
//
// CRUD over tenant roles plus:
//   - reserved roles ('administrator', 'server'), synthesized, never read
//     from the cache or the store
//   - a per-membership role cache, rebuilt synchronously after every
//     create / update / delete before the call returns
//   - slug derivation and immutability; reserved slugs writable only by a
//     system utilizer
//   - bootstrap of a stored administrator role for every membership
// =============================================================================

import { parseRbac } from '../../authorization/patterns';
import {
  AlreadyExistsError,
  FieldError,
  ImmutableError,
  raiseFieldErrors,
  ReservedNameViolationError,
} from '../../errors';
import { systemUtilizer } from '../../types/auth';
import { DocumentObject, OperationOptions } from '../../types/documents';
import { isReservedRoleSlug, RESERVED_ROLES, Role } from '../../types/roles';
import { readObject, readString, readStringArray } from '../../utils/dynamic-object';
import { slugify } from '../../utils/slug';
import { config } from '../../config';
import { CrudDependencies, MembershipBoundCrudService, WriteContext } from '../crud';
import { toSysMetadata } from '../memberships';
import { validatePermissionSets } from '../schema/permissions';
import { and, eq, withMembership } from '../store/filters';
import { RoleCache } from './cache';
import { administratorPermissions, ReservedRoleTable } from './reserved';

export const ROLES_COLLECTION = 'roles';

export interface RoleServiceOptions {
  cacheTtlSeconds?: number;
}

export class RoleService extends MembershipBoundCrudService<Role> {
  protected readonly collection = ROLES_COLLECTION;
  protected readonly resourceName = 'Role';
  protected readonly eventTypes = {
    created: 'role_created',
    updated: 'role_updated',
    deleted: 'role_deleted',
  } as const;
  protected readonly rejectIdenticalUpdates = true;

  readonly cache: RoleCache;
  private readonly reserved: ReservedRoleTable;

  constructor(deps: CrudDependencies, options: RoleServiceOptions = {}) {
    super(deps);
    this.cache = new RoleCache(options.cacheTtlSeconds ?? config.roles.cacheTtlSeconds, this.clock);
    this.reserved = new ReservedRoleTable(deps.memberships);

    const refresh = (event: { membership_id: string }) => this.refreshCache(event.membership_id);
    this.onCreated(refresh);
    this.onUpdated(refresh);
    this.onDeleted(refresh);
  }

  protected toModel(doc: DocumentObject): Role {
    return {
      _id: readString(doc, '_id') ?? '',
      membership_id: readString(doc, 'membership_id') ?? '',
      name: readString(doc, 'name') ?? '',
      slug: readString(doc, 'slug') ?? '',
      description: readString(doc, 'description'),
      permissions: readStringArray(doc, 'permissions') ?? [],
      forbidden: readStringArray(doc, 'forbidden') ?? [],
      sys: toSysMetadata(readObject(doc, 'sys')),
    };
  }

  async initialize(): Promise<void> {
    await this.store.ensureUniqueIndex(this.collection, 'slug');
  }

  // ── Cache ──────────────────────────────────────────────────────────

  async refreshCache(membershipId: string): Promise<void> {
    const { items } = await this.store.find(this.collection, withMembership(membershipId));
    this.cache.replace(membershipId, items.map((doc) => this.toModel(this.hide(doc))));
  }

  // ── Reads ──────────────────────────────────────────────────────────

  /** By id; the reserved slugs double as the ids of the reserved roles */
  async get(membershipId: string, id: string, options: OperationOptions = {}): Promise<Role | null> {
    if (isReservedRoleSlug(id)) {
      options.signal?.throwIfAborted();
      return this.reserved.get(membershipId, id);
    }
    return this.cache.findById(membershipId, id) ?? super.get(membershipId, id, options);
  }

  async getBySlug(membershipId: string, slug: string, options: OperationOptions = {}): Promise<Role | null> {
    if (isReservedRoleSlug(slug)) {
      options.signal?.throwIfAborted();
      return this.reserved.get(membershipId, slug);
    }

    const cached = this.cache.findBySlug(membershipId, slug);
    if (cached) return cached;

    await this.requireMembership(membershipId, options);
    const doc = await this.store.findOne(this.collection, and(eq('membership_id', membershipId), eq('slug', slug)));
    return doc ? this.toModel(this.hide(doc)) : null;
  }

  // ── Write hooks ────────────────────────────────────────────────────

  protected async beforeValidate(ctx: WriteContext): Promise<void> {
    const { document } = ctx;

    if (ctx.operation === 'update' && ctx.prior) {
      const currentSlug = ctx.prior.slug ?? null;
      const requested = ctx.payload.slug;
      if (typeof requested === 'string' && slugify(requested) !== currentSlug) {
        throw new ImmutableError('slug');
      }
      document.slug = currentSlug;
    } else if (typeof document.slug === 'string' && document.slug.trim().length > 0) {
      // explicit slugs share the derived form, so 'Editor' and 'editor' collide
      document.slug = slugify(document.slug);
    } else {
      document.slug = typeof document.name === 'string' ? slugify(document.name) : null;
    }

    if (typeof document.slug === 'string' && isReservedRoleSlug(document.slug) && ctx.utilizer.kind !== 'system') {
      throw new ReservedNameViolationError(document.slug);
    }

    document.description = typeof document.description === 'string' ? document.description : null;
    document.permissions = document.permissions ?? [];
    document.forbidden = document.forbidden ?? [];
  }

  protected async validate(ctx: WriteContext): Promise<void> {
    const { document } = ctx;
    const errors: FieldError[] = [];

    if (!readString(document, 'name')) {
      errors.push({ field: 'name', reason: 'required', message: 'name is a required field' });
    }
    if (!readString(document, 'membership_id')) {
      errors.push({ field: 'membership_id', reason: 'required', message: 'membership_id is a required field' });
    }

    const slug = readString(document, 'slug');
    if (!slug) {
      errors.push({ field: 'slug', reason: 'required', message: 'slug could not be derived from the name' });
    } else {
      const existing = await this.store.findOne(
        this.collection,
        and(eq('membership_id', ctx.membership._id), eq('slug', slug)),
      );
      if (existing && existing._id !== ctx.id) {
        errors.push({ field: 'slug', reason: 'unique', message: `A role with slug '${slug}' already exists`, value: slug });
      }
    }

    errors.push(...validatePermissionSets(document.permissions, document.forbidden, parseRbac));
    raiseFieldErrors(errors);
  }

  // ── Bootstrap ──────────────────────────────────────────────────────

  /** Ensure every membership has a stored administrator role */
  async bootstrap(): Promise<void> {
    for (const membership of await this.memberships.getAll()) {
      const existing = await this.store.findOne(
        this.collection,
        and(eq('membership_id', membership._id), eq('slug', RESERVED_ROLES.administrator)),
      );
      if (existing) continue;

      try {
        await this.create(systemUtilizer(membership._id), membership._id, {
          name: 'Administrator',
          slug: RESERVED_ROLES.administrator,
          description: 'Administrator',
          permissions: administratorPermissions(),
          forbidden: [],
        });
        console.log(`[Roles] Created administrator role for membership ${membership._id}`);
      } catch (err) {
        if (!(err instanceof AlreadyExistsError)) throw err;
        console.log(`[Roles] Administrator role for membership ${membership._id} was created concurrently`);
      }
    }
  }
}
