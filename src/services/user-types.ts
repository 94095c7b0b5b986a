// =============================================================================
// WARDEN — User Type Registry
//
// Tenant-defined schemas for user documents. Types form a single-parent
// hierarchy through base_type; the synthesized origin type 'base-user' is
// the root of every membership's hierarchy and is never stored.
//
// The effective schema of a type folds in every ancestor: own property
// definitions override inherited ones of the same path, required paths
// accumulate.
// =============================================================================

import { FieldError, raiseFieldErrors } from '../errors';
import { DocumentObject, DocumentValue } from '../types/documents';
import { UniqueScope } from '../types/store';
import {
  EffectiveSchema,
  ORIGIN_USER_TYPE_SLUG,
  PROPERTY_TYPES,
  PropertyDefinition,
  PropertyType,
  ReferenceDefinition,
  UserType,
} from '../types/users';
import {
  isDocumentObject,
  readBoolean,
  readObject,
  readString,
  readStringArray,
} from '../utils/dynamic-object';
import { slugify } from '../utils/slug';
import { MembershipBoundCrudService, WriteContext } from './crud';
import { toSysMetadata } from './memberships';
import { TypeRegistry } from './schema/references';
import { and, eq, or } from './store/filters';

export const USER_TYPES_COLLECTION = 'user_types';

const PATH_PATTERN = /^[A-Za-z0-9_]+(\.[A-Za-z0-9_]+)*$/;

function property(
  path: string,
  type: PropertyType,
  unique = false,
  description: string | null = null,
): PropertyDefinition {
  return { path, type, unique, reference: null, description };
}

/** The root type of a membership's hierarchy */
export function originUserType(membershipId: string): UserType {
  return {
    _id: ORIGIN_USER_TYPE_SLUG,
    membership_id: membershipId,
    name: 'Base User',
    slug: ORIGIN_USER_TYPE_SLUG,
    description: 'Origin type of every user type',
    is_abstract: false,
    base_type: null,
    properties: [
      property('firstname', 'string'),
      property('lastname', 'string'),
      property('username', 'string', true),
      property('email_address', 'email', true),
      property('role', 'string', false, 'Role slug'),
      property('permissions', 'array', false, 'Ubac allow patterns'),
      property('forbidden', 'array', false, 'Ubac deny patterns'),
      property('sourceProvider', 'string'),
    ],
    required: ['username', 'email_address', 'role'],
    sys: null,
  };
}

/** Unique across the membership; subtypes may not relax them */
const ORIGIN_UNIQUE_PATHS = originUserType('').properties.filter((p) => p.unique).map((p) => p.path);

function isPropertyType(value: string): value is PropertyType {
  return PROPERTY_TYPES.some((type) => type === value);
}

function toReferenceDefinition(value: DocumentValue | undefined): ReferenceDefinition | null {
  if (!isDocumentObject(value)) return null;
  const cardinality = value.cardinality === 'multiple' ? 'multiple' : 'single';
  const contentType = typeof value.content_type === 'string' && value.content_type.length > 0
    ? value.content_type
    : null;
  return { cardinality, content_type: contentType };
}

/** Lenient read of a stored definition; validation happens on write */
function toPropertyDefinition(value: DocumentValue): PropertyDefinition | null {
  if (!isDocumentObject(value)) return null;
  const path = readString(value, 'path');
  const type = readString(value, 'type');
  if (path === null || type === null || !isPropertyType(type)) return null;
  return {
    path,
    type,
    unique: readBoolean(value, 'unique') ?? false,
    reference: type === 'reference' ? toReferenceDefinition(value.reference) ?? { cardinality: 'single', content_type: null } : null,
    description: readString(value, 'description'),
  };
}

/** The same walk as UserTypeService.lineage, over types already loaded */
function lineageWithin(type: UserType, bySlug: Map<string, UserType>, membershipId: string): UserType[] {
  const chain: UserType[] = [type];
  const seen = new Set<string>([type.slug]);
  let current = type;

  while (current.base_type !== null && !seen.has(current.base_type)) {
    const parent = current.base_type === ORIGIN_USER_TYPE_SLUG
      ? originUserType(membershipId)
      : bySlug.get(current.base_type);
    if (!parent) break;
    chain.push(parent);
    seen.add(parent.slug);
    current = parent;
  }
  return chain;
}

/**
 * Unique path → slug of the type whose declaration makes it unique, for a
 * lineage ordered own type first. Redeclaring a path unique again keeps
 * the ancestor's declaration; redeclaring it non-unique ends it.
 */
function uniqueDeclarations(chain: UserType[]): Map<string, string> {
  const declaring = new Map<string, string>();
  for (const type of [...chain].reverse()) {
    for (const definition of type.properties) {
      if (!definition.unique) declaring.delete(definition.path);
      else if (!declaring.has(definition.path)) declaring.set(definition.path, type.slug);
    }
  }
  return declaring;
}

export class UserTypeService extends MembershipBoundCrudService<UserType> implements TypeRegistry {
  protected readonly collection = USER_TYPES_COLLECTION;
  protected readonly resourceName = 'UserType';
  protected readonly eventTypes = {
    created: 'user_type_created',
    updated: 'user_type_updated',
    deleted: 'user_type_deleted',
  } as const;

  protected toModel(doc: DocumentObject): UserType {
    const properties = Array.isArray(doc.properties) ? doc.properties : [];
    return {
      _id: readString(doc, '_id') ?? '',
      membership_id: readString(doc, 'membership_id') ?? '',
      name: readString(doc, 'name') ?? '',
      slug: readString(doc, 'slug') ?? '',
      description: readString(doc, 'description'),
      is_abstract: readBoolean(doc, 'is_abstract') ?? false,
      base_type: readString(doc, 'base_type') ?? ORIGIN_USER_TYPE_SLUG,
      properties: properties
        .map(toPropertyDefinition)
        .filter((p): p is PropertyDefinition => p !== null),
      required: readStringArray(doc, 'required') ?? [],
      sys: toSysMetadata(readObject(doc, 'sys')),
    };
  }

  async initialize(): Promise<void> {
    await this.store.ensureUniqueIndex(this.collection, 'slug');
  }

  // ── Registry ───────────────────────────────────────────────────────

  /** Stored or origin type by slug, without membership validation */
  async findBySlug(membershipId: string, slug: string): Promise<UserType | null> {
    if (slug === ORIGIN_USER_TYPE_SLUG) return originUserType(membershipId);
    const doc = await this.store.findOne(this.collection, and(eq('membership_id', membershipId), eq('slug', slug)));
    return doc ? this.toModel(doc) : null;
  }

  async getByNameOrSlug(membershipId: string, nameOrSlug: string): Promise<UserType | null> {
    await this.requireMembership(membershipId);
    const origin = originUserType(membershipId);
    if (nameOrSlug === origin.slug || nameOrSlug === origin.name) return origin;

    const doc = await this.store.findOne(
      this.collection,
      and(eq('membership_id', membershipId), or(eq('name', nameOrSlug), eq('slug', nameOrSlug))),
    );
    return doc ? this.toModel(doc) : null;
  }

  /** The type followed by its ancestors, origin last. Stops at a cycle or a missing parent. */
  private async lineage(membershipId: string, type: UserType): Promise<UserType[]> {
    const chain: UserType[] = [type];
    const seen = new Set<string>([type.slug]);
    let current = type;

    while (current.base_type !== null) {
      if (seen.has(current.base_type)) break;
      const parent = await this.findBySlug(membershipId, current.base_type);
      if (!parent) break;
      chain.push(parent);
      seen.add(parent.slug);
      current = parent;
    }
    return chain;
  }

  async getEffectiveSchema(membershipId: string, slug: string): Promise<EffectiveSchema | null> {
    const type = await this.findBySlug(membershipId, slug);
    return type ? this.effectiveSchemaOf(membershipId, type) : null;
  }

  async effectiveSchemaOf(membershipId: string, type: UserType): Promise<EffectiveSchema> {
    const chain = await this.lineage(membershipId, type);

    const properties = new Map<string, PropertyDefinition>();
    const required = new Set<string>();
    for (const ancestor of [...chain].reverse()) {
      for (const definition of ancestor.properties) properties.set(definition.path, definition);
      for (const path of ancestor.required) required.add(path);
    }

    return {
      name: type.name,
      slug: type.slug,
      is_abstract: type.is_abstract,
      properties: [...properties.values()],
      required: [...required],
    };
  }

  /**
   * Scope of each unique path of a type's effective schema that a stored
   * type declares: every type sharing that declaration (the declaring type
   * and the descendants that keep it unique). Paths the origin type
   * declares are absent; they are unique across the whole membership.
   */
  async uniqueScopes(membershipId: string, slug: string): Promise<Map<string, UniqueScope>> {
    const scopes = new Map<string, UniqueScope>();
    const type = await this.findBySlug(membershipId, slug);
    if (!type) return scopes;

    const own = uniqueDeclarations(await this.lineage(membershipId, type));
    const scoped = [...own].filter(([, declaring]) => declaring !== ORIGIN_USER_TYPE_SLUG);
    if (scoped.length === 0) return scopes;

    const { items } = await this.store.find(this.collection, eq('membership_id', membershipId));
    const stored = items.map((doc) => this.toModel(doc));
    const bySlug = new Map(stored.map((t): [string, UserType] => [t.slug, t]));
    const declarationsOf = stored.map((t) => ({ slug: t.slug, declared: uniqueDeclarations(lineageWithin(t, bySlug, membershipId)) }));

    for (const [path, declaring] of scoped) {
      const values = declarationsOf
        .filter((entry) => entry.declared.get(path) === declaring)
        .map((entry) => entry.slug)
        .sort();
      scopes.set(path, { path: 'user_type', values });
    }
    return scopes;
  }

  async isInheritFrom(membershipId: string, typeSlug: string, ancestorSlug: string): Promise<boolean> {
    const type = await this.findBySlug(membershipId, typeSlug);
    if (!type) return false;
    const chain = await this.lineage(membershipId, type);
    return chain.slice(1).some((ancestor) => ancestor.slug === ancestorSlug);
  }

  // ── Write hooks ────────────────────────────────────────────────────

  protected async beforeValidate(ctx: WriteContext): Promise<void> {
    const { document } = ctx;

    if (ctx.operation === 'update' && ctx.prior) {
      // slug is the reference key of every user document; it never changes
      document.slug = ctx.prior.slug ?? null;
    } else if (typeof document.slug !== 'string' || document.slug.length === 0) {
      document.slug = typeof document.name === 'string' ? slugify(document.name) : null;
    }

    if (document.base_type === undefined || document.base_type === null || document.base_type === '') {
      document.base_type = ORIGIN_USER_TYPE_SLUG;
    }
    document.is_abstract = document.is_abstract === true;
    document.description = typeof document.description === 'string' ? document.description : null;
    document.required = document.required ?? [];
    document.properties = document.properties ?? [];
  }

  protected async validate(ctx: WriteContext): Promise<void> {
    const { document, membership } = ctx;
    const errors: FieldError[] = [];

    const name = readString(document, 'name');
    if (!name) {
      errors.push({ field: 'name', reason: 'required', message: 'name is a required field' });
    }

    const slug = readString(document, 'slug');
    if (!slug) {
      errors.push({ field: 'slug', reason: 'required', message: 'slug could not be derived from the name' });
    } else if (slug === ORIGIN_USER_TYPE_SLUG) {
      errors.push({ field: 'slug', reason: 'unique', message: `'${slug}' is reserved for the origin type`, value: slug });
    } else {
      const existing = await this.store.findOne(
        this.collection,
        and(eq('membership_id', membership._id), eq('slug', slug)),
      );
      if (existing && existing._id !== ctx.id) {
        errors.push({ field: 'slug', reason: 'unique', message: `A user type with slug '${slug}' already exists`, value: slug });
      }
    }

    const inherited = await this.validateBaseType(ctx, slug, errors);
    const declared = this.validateProperties(document, errors);
    await this.validateContentTypes(membership._id, declared, errors);

    const required = document.required;
    if (!Array.isArray(required) || !required.every((p): p is string => typeof p === 'string')) {
      errors.push({ field: 'required', reason: 'type', message: 'required must be a list of property paths' });
    } else {
      const known = new Set([...declared.map((p) => p.path), ...inherited]);
      for (const path of required) {
        if (!known.has(path)) {
          errors.push({ field: 'required', reason: 'not_found', message: `Required path '${path}' is not a declared property`, value: path });
        }
      }
    }

    raiseFieldErrors(errors);
    document.properties = declared.map((p) => ({ ...p, reference: p.reference ? { ...p.reference } : null }));
  }

  /** Checks base_type; returns the property paths it contributes */
  private async validateBaseType(ctx: WriteContext, slug: string | null, errors: FieldError[]): Promise<string[]> {
    const baseSlug = readString(ctx.document, 'base_type');
    if (baseSlug === null) {
      errors.push({ field: 'base_type', reason: 'type', message: 'base_type must be a user type slug' });
      return [];
    }

    const base = await this.findBySlug(ctx.membership._id, baseSlug);
    if (!base) {
      errors.push({ field: 'base_type', reason: 'not_found', message: `Base type '${baseSlug}' not found`, value: baseSlug });
      return [];
    }

    const lineage = await this.lineage(ctx.membership._id, base);
    if (slug !== null && lineage.some((ancestor) => ancestor.slug === slug)) {
      errors.push({ field: 'base_type', reason: 'reference', message: `Base type '${baseSlug}' would create an inheritance cycle`, value: baseSlug });
      return [];
    }

    const schema = await this.effectiveSchemaOf(ctx.membership._id, base);
    return schema.properties.map((p) => p.path);
  }

  private validateProperties(document: DocumentObject, errors: FieldError[]): PropertyDefinition[] {
    const raw = document.properties;
    if (!Array.isArray(raw)) {
      errors.push({ field: 'properties', reason: 'type', message: 'properties must be a list of property definitions' });
      return [];
    }

    const declared: PropertyDefinition[] = [];
    const paths = new Set<string>();

    raw.forEach((entry, index) => {
      const field = `properties.${index}`;
      if (!isDocumentObject(entry)) {
        errors.push({ field, reason: 'type', message: `${field} must be an object` });
        return;
      }

      const path = readString(entry, 'path');
      const type = readString(entry, 'type');
      if (path === null || !PATH_PATTERN.test(path)) {
        errors.push({ field: `${field}.path`, reason: 'format', message: `${field}.path must be a dotted property path` });
        return;
      }
      if (type === null || !isPropertyType(type)) {
        errors.push({ field: `${field}.type`, reason: 'type', message: `${field}.type must be one of ${PROPERTY_TYPES.join(', ')}` });
        return;
      }
      if (paths.has(path)) {
        errors.push({ field: `${field}.path`, reason: 'unique', message: `Property '${path}' is declared twice`, value: path });
        return;
      }
      if (type === 'reference' && entry.reference !== undefined && entry.reference !== null && !isDocumentObject(entry.reference)) {
        errors.push({ field: `${field}.reference`, reason: 'type', message: `${field}.reference must be an object` });
        return;
      }

      if (ORIGIN_UNIQUE_PATHS.includes(path) && readBoolean(entry, 'unique') !== true) {
        errors.push({ field: `${field}.unique`, reason: 'format', message: `'${path}' is unique for every user type`, value: path });
        return;
      }

      paths.add(path);
      declared.push({
        path,
        type,
        unique: readBoolean(entry, 'unique') ?? false,
        reference: type === 'reference' ? toReferenceDefinition(entry.reference) ?? { cardinality: 'single', content_type: null } : null,
        description: readString(entry, 'description'),
      });
    });

    return declared;
  }

  private async validateContentTypes(membershipId: string, declared: PropertyDefinition[], errors: FieldError[]): Promise<void> {
    for (const definition of declared) {
      const contentType = definition.reference?.content_type;
      if (!contentType) continue;
      if (!await this.findBySlug(membershipId, contentType)) {
        errors.push({
          field: 'properties',
          reason: 'not_found',
          message: `Content type '${contentType}' of '${definition.path}' not found`,
          value: contentType,
        });
      }
    }
  }
}
