// =============================================================================
// WARDEN — Structural Validation
//
// Required paths must be present and non-null; present values must match
// their declared kind. Reference shapes are left to reference resolution.
// =============================================================================

import { FieldError } from '../../errors';
import { DocumentObject, DocumentValue } from '../../types/documents';
import { EffectiveSchema, PropertyType } from '../../types/users';
import { getPath, isDocumentObject } from '../../utils/dynamic-object';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/;

export function matchesKind(value: DocumentValue, type: PropertyType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'float':
      return typeof value === 'number';
    case 'boolean':
      return typeof value === 'boolean';
    case 'object':
      return isDocumentObject(value);
    case 'array':
      return Array.isArray(value);
    case 'date':
      return typeof value === 'string' && ISO_DATE_PATTERN.test(value) && !Number.isNaN(Date.parse(value));
    case 'email':
      return typeof value === 'string' && EMAIL_PATTERN.test(value);
    case 'reference':
      return true;
  }
}

const KIND_LABELS: Record<PropertyType, string> = {
  string: 'a string',
  integer: 'an integer',
  float: 'a number',
  boolean: 'a boolean',
  object: 'an object',
  array: 'an array',
  date: 'an ISO-8601 date',
  email: 'a valid email address',
  reference: 'a reference',
};

export function validateStructure(document: DocumentObject, schema: EffectiveSchema): FieldError[] {
  const errors: FieldError[] = [];

  for (const path of schema.required) {
    const value = getPath(document, path);
    if (value === undefined || value === null) {
      errors.push({ field: path, reason: 'required', message: `${path} is a required field` });
    }
  }

  for (const property of schema.properties) {
    const value = getPath(document, property.path);
    if (value === undefined || value === null) continue;
    if (!matchesKind(value, property.type)) {
      errors.push({
        field: property.path,
        reason: property.type === 'email' || property.type === 'date' ? 'format' : 'type',
        message: `${property.path} must be ${KIND_LABELS[property.type]}`,
      });
    }
  }

  return errors;
}
