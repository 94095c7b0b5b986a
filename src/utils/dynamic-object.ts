// =============================================================================
// WARDEN — Dynamic Object Helpers
//
// Path-based access over the generic document tree. Paths are dotted
// ("address.city"); array elements are not addressable by path.
// =============================================================================

import { DocumentObject, DocumentValue } from '../types/documents';

export function isDocumentObject(value: DocumentValue | undefined): value is DocumentObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Runtime check for values arriving from outside the type system (JSON columns, parsed payloads) */
export function isDocumentValue(value: unknown): value is DocumentValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'boolean':
    case 'string':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isDocumentValue);
      return Object.values(value).every(isDocumentValue);
    default:
      return false;
  }
}

export function asDocumentObject(value: unknown): DocumentObject | null {
  return isDocumentValue(value) && isDocumentObject(value) ? value : null;
}

function splitPath(path: string): string[] {
  return path.split('.').filter((segment) => segment.length > 0);
}

/** Value at path, or undefined when any segment is missing */
export function getPath(doc: DocumentObject, path: string): DocumentValue | undefined {
  let current: DocumentValue | undefined = doc;
  for (const segment of splitPath(path)) {
    if (!isDocumentObject(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

export function hasPath(doc: DocumentObject, path: string): boolean {
  return getPath(doc, path) !== undefined;
}

/** Set value at path, creating intermediate objects (and replacing non-objects) */
export function setPath(doc: DocumentObject, path: string, value: DocumentValue): void {
  const segments = splitPath(path);
  if (segments.length === 0) return;

  let current = doc;
  for (const segment of segments.slice(0, -1)) {
    const next = current[segment];
    if (isDocumentObject(next)) {
      current = next;
    } else {
      const created: DocumentObject = {};
      current[segment] = created;
      current = created;
    }
  }
  current[segments[segments.length - 1]] = value;
}

/** Remove value at path. Returns whether something was removed. */
export function removePath(doc: DocumentObject, path: string): boolean {
  const segments = splitPath(path);
  if (segments.length === 0) return false;

  let current: DocumentValue | undefined = doc;
  for (const segment of segments.slice(0, -1)) {
    if (!isDocumentObject(current)) return false;
    current = current[segment];
  }
  const last = segments[segments.length - 1];
  if (!isDocumentObject(current) || !Object.prototype.hasOwnProperty.call(current, last)) {
    return false;
  }
  delete current[last];
  return true;
}

export function cloneDocument<T extends DocumentObject>(doc: T): T {
  return structuredClone(doc);
}

/**
 * Right-biased, top-level merge: a key present in `partial` replaces the
 * current value wholesale; absent keys keep their current value. The
 * identifier never survives the merge.
 */
export function mergeDocuments(current: DocumentObject, partial: DocumentObject): DocumentObject {
  const merged: DocumentObject = { ...cloneDocument(current), ...cloneDocument(partial) };
  delete merged._id;
  return merged;
}

export function deepEqual(a: DocumentValue | undefined, b: DocumentValue | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined || a === null || b === null) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i]));
  }

  if (isDocumentObject(a) && isDocumentObject(b)) {
    const keysA = Object.keys(a);
    const keysB = Object.keys(b);
    if (keysA.length !== keysB.length) return false;
    return keysA.every((key) => Object.prototype.hasOwnProperty.call(b, key) && deepEqual(a[key], b[key]));
  }

  return false;
}

/** Copy of `doc` without the given top-level keys */
export function omitFields(doc: DocumentObject, fields: readonly string[]): DocumentObject {
  const result: DocumentObject = {};
  for (const [key, value] of Object.entries(doc)) {
    if (!fields.includes(key)) result[key] = value;
  }
  return result;
}

/**
 * Apply a projection. Any `true` entry switches to include-mode (only
 * listed paths plus _id); otherwise `false` entries are excluded.
 * `_id: false` drops the id in either mode.
 */
export function projectFields(doc: DocumentObject, fields: Record<string, boolean> | undefined): DocumentObject {
  if (!fields || Object.keys(fields).length === 0) return doc;

  const entries = Object.entries(fields);
  const includeMode = entries.some(([path, include]) => include && path !== '_id');

  if (includeMode) {
    const projected: DocumentObject = {};
    if (fields._id !== false && doc._id !== undefined) projected._id = doc._id;
    for (const [path, include] of entries) {
      if (!include || path === '_id') continue;
      const value = getPath(doc, path);
      if (value !== undefined) setPath(projected, path, cloneValue(value));
    }
    return projected;
  }

  const projected = cloneDocument(doc);
  for (const [path, include] of entries) {
    if (!include) removePath(projected, path);
  }
  return projected;
}

function cloneValue(value: DocumentValue): DocumentValue {
  return structuredClone(value);
}

// ── Typed readers ──────────────────────────────────────────────────────
// Used when mapping stored documents onto fixed-shape entities.

export function readString(doc: DocumentObject, key: string): string | null {
  const value = doc[key];
  return typeof value === 'string' ? value : null;
}

export function readNumber(doc: DocumentObject, key: string): number | null {
  const value = doc[key];
  return typeof value === 'number' ? value : null;
}

export function readBoolean(doc: DocumentObject, key: string): boolean | null {
  const value = doc[key];
  return typeof value === 'boolean' ? value : null;
}

export function readStringArray(doc: DocumentObject, key: string): string[] | null {
  const value = doc[key];
  if (!Array.isArray(value)) return null;
  return value.filter((item): item is string => typeof item === 'string');
}

export function readObject(doc: DocumentObject, key: string): DocumentObject | null {
  const value = doc[key];
  return isDocumentObject(value) ? value : null;
}
