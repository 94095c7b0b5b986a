// =============================================================================
// WARDEN — Uniqueness Pre-Check
//
// Read-then-compare, so racy under concurrent writes. The store's unique
// index is the authoritative guard; this check exists to report every
// collision of a payload at once, with the offending value. A scoped path
// is compared only against documents inside the same scope, as the index
// does.
// =============================================================================

import { FieldError } from '../../errors';
import { DocumentObject, DocumentValue } from '../../types/documents';
import { DocumentStore, Filter, UniqueScope } from '../../types/store';
import { EffectiveSchema } from '../../types/users';
import { getPath } from '../../utils/dynamic-object';
import { and, eq, or } from '../store/filters';

function describe(value: DocumentValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export async function validateUniqueness(
  store: DocumentStore,
  collection: string,
  membershipId: string,
  document: DocumentObject,
  schema: EffectiveSchema,
  selfId: string | null,
  scopes: ReadonlyMap<string, UniqueScope> = new Map(),
): Promise<FieldError[]> {
  const errors: FieldError[] = [];

  for (const property of schema.properties) {
    if (!property.unique) continue;

    const value = getPath(document, property.path);
    if (value === undefined || value === null) continue;

    const clauses: Filter[] = [eq('membership_id', membershipId), eq(property.path, value)];
    const scope = scopes.get(property.path);
    if (scope) clauses.push(or(...scope.values.map((v) => eq(scope.path, v))));

    const existing = await store.findOne(collection, and(...clauses));
    if (existing && existing._id !== selfId) {
      errors.push({
        field: property.path,
        reason: 'unique',
        message: `${property.path} must be unique; '${describe(value)}' is already in use`,
        value,
      });
    }
  }

  return errors;
}
