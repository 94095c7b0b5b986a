// =============================================================================
// WARDEN — Schema Engine
//
// Validates a dynamic document against the effective schema of its type.
//
//   1. abstract type          → fails immediately
//   2. user_type changed      → fails immediately (ImmutableError)
//   3. structure              ┐
//   4. uniqueness             │ appended to one accumulator,
//   5. reference resolution   │ reported together
//   6. Ubac set conflicts     ┘
//
// Reference resolution rewrites the document in place (embedding).
// =============================================================================

import { parseUbac } from '../../authorization/patterns';
import { FieldError, ImmutableError, raiseFieldErrors, ValidationFailedError } from '../../errors';
import { DocumentObject } from '../../types/documents';
import { DocumentStore, UniqueScope } from '../../types/store';
import { EffectiveSchema } from '../../types/users';
import { validatePermissionSets } from './permissions';
import { resolveReferences, TypeRegistry } from './references';
import { validateStructure } from './structure';
import { validateUniqueness } from './uniqueness';

export interface SchemaValidationContext {
  membershipId: string;
  /** Collection holding both the document and its reference targets */
  collection: string;
  /** Id of the document on update; excluded from uniqueness matches */
  selfId: string | null;
  /** Type of the persisted document on update */
  priorType: string | null;
  /** Unique paths narrowed to part of the collection; others are membership-wide */
  uniqueScopes?: ReadonlyMap<string, UniqueScope>;
}

export class SchemaEngine {
  constructor(
    private readonly store: DocumentStore,
    private readonly registry: TypeRegistry,
  ) {}

  /**
   * Every field error of the document. Throws only for the fail-fast
   * steps (abstract type, type change).
   */
  async collectErrors(
    document: DocumentObject,
    schema: EffectiveSchema,
    context: SchemaValidationContext,
  ): Promise<FieldError[]> {
    if (schema.is_abstract) {
      throw new ValidationFailedError([
        {
          field: 'user_type',
          reason: 'abstract',
          message: `'${schema.slug}' is an abstract type and can not be assigned to a document`,
          value: schema.slug,
        },
      ]);
    }

    if (context.priorType !== null && document.user_type !== context.priorType) {
      throw new ImmutableError('user_type');
    }

    const errors: FieldError[] = [];
    errors.push(...validateStructure(document, schema));
    errors.push(...await validateUniqueness(
      this.store, context.collection, context.membershipId, document, schema, context.selfId, context.uniqueScopes,
    ));
    errors.push(...await resolveReferences(
      this.store, this.registry, context.collection, context.membershipId, document, schema,
    ));
    errors.push(...validatePermissionSets(document.permissions, document.forbidden, parseUbac));
    return errors;
  }

  async validate(document: DocumentObject, schema: EffectiveSchema, context: SchemaValidationContext): Promise<void> {
    raiseFieldErrors(await this.collectErrors(document, schema, context));
  }
}

export { validatePermissionSets, conflictMessage } from './permissions';
export { resolveReferences } from './references';
export type { TypeRegistry } from './references';
export { matchesKind, validateStructure } from './structure';
export { validateUniqueness } from './uniqueness';
