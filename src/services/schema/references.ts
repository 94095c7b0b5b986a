// =============================================================================
// WARDEN — Reference Resolution
//
// Reference properties hold ids (or previously embedded documents). Each id
// is looked up in the same membership, checked against the declared
// content type, and replaced by the resolved document. A property is
// embedded only when every one of its ids resolves.
// =============================================================================

import { FieldError } from '../../errors';
import { DocumentObject, DocumentValue } from '../../types/documents';
import { DocumentStore } from '../../types/store';
import { EffectiveSchema, PropertyDefinition } from '../../types/users';
import { getPath, isDocumentObject, omitFields, setPath } from '../../utils/dynamic-object';
import { and, eq } from '../store/filters';

/** Answers content-type inheritance questions */
export interface TypeRegistry {
  isInheritFrom(membershipId: string, typeSlug: string, ancestorSlug: string): Promise<boolean>;
}

/** Fields never carried into an embedded copy */
const EMBED_EXCLUDED = ['password_hash'];

/** An id, or the id of an already embedded document */
function referenceId(value: DocumentValue): string | null {
  if (typeof value === 'string' && value.length > 0) return value;
  if (isDocumentObject(value) && typeof value._id === 'string') return value._id;
  return null;
}

async function resolveOne(
  store: DocumentStore,
  registry: TypeRegistry,
  collection: string,
  membershipId: string,
  property: PropertyDefinition,
  value: DocumentValue,
  field: string,
): Promise<{ resolved: DocumentObject } | { error: FieldError }> {
  const id = referenceId(value);
  if (id === null) {
    return { error: { field, reason: 'type', message: `${field} must be a document id` } };
  }

  const target = await store.findOne(collection, and(eq('membership_id', membershipId), eq('_id', id)));
  if (!target) {
    return { error: { field, reason: 'reference', message: `Referenced document '${id}' not found`, value: id } };
  }

  const contentType = property.reference?.content_type ?? null;
  if (contentType) {
    const targetType = target.user_type;
    if (typeof targetType !== 'string' || targetType.length === 0) {
      return {
        error: { field, reason: 'content_type', message: `Referenced document '${id}' has no content type`, value: id },
      };
    }
    const compatible = targetType === contentType
      || await registry.isInheritFrom(membershipId, targetType, contentType);
    if (!compatible) {
      return {
        error: {
          field,
          reason: 'content_type',
          message: `Referenced document '${id}' is a '${targetType}', expected '${contentType}'`,
          value: id,
        },
      };
    }
  }

  return { resolved: omitFields(target, EMBED_EXCLUDED) };
}

/**
 * Resolve every reference property of `document`, embedding on success.
 * Returns the field errors; never throws for a bad reference.
 */
export async function resolveReferences(
  store: DocumentStore,
  registry: TypeRegistry,
  collection: string,
  membershipId: string,
  document: DocumentObject,
  schema: EffectiveSchema,
): Promise<FieldError[]> {
  const errors: FieldError[] = [];

  for (const property of schema.properties) {
    if (property.type !== 'reference') continue;

    const value = getPath(document, property.path);
    if (value === undefined || value === null) continue;

    const cardinality = property.reference?.cardinality ?? 'single';

    if (cardinality === 'single') {
      const outcome = await resolveOne(store, registry, collection, membershipId, property, value, property.path);
      if ('error' in outcome) {
        errors.push(outcome.error);
      } else {
        setPath(document, property.path, outcome.resolved);
      }
      continue;
    }

    if (!Array.isArray(value)) {
      errors.push({ field: property.path, reason: 'type', message: `${property.path} must be a list of document ids` });
      continue;
    }

    const resolved: DocumentObject[] = [];
    const propertyErrors: FieldError[] = [];
    for (const [index, item] of value.entries()) {
      const outcome = await resolveOne(
        store, registry, collection, membershipId, property, item, `${property.path}.${index}`,
      );
      if ('error' in outcome) {
        propertyErrors.push(outcome.error);
      } else {
        resolved.push(outcome.resolved);
      }
    }

    if (propertyErrors.length > 0) {
      errors.push(...propertyErrors);
    } else {
      setPath(document, property.path, resolved);
    }
  }

  return errors;
}
