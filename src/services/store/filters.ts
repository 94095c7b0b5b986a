// =============================================================================
// WARDEN — Filter Builders & In-Process Evaluation
//
// Builders produce the Filter tree every adapter understands. matchesFilter
// evaluates a tree against a document for the in-memory store; the Postgres
// adapter compiles the same tree to SQL instead.
// =============================================================================

import { DocumentObject, DocumentValue, SortOptions } from '../../types/documents';
import { Filter, RangeBound } from '../../types/store';
import { deepEqual, getPath, isDocumentObject, omitFields } from '../../utils/dynamic-object';

export const eq = (path: string, value: DocumentValue): Filter => ({ op: 'eq', path, value });

export const and = (...filters: Filter[]): Filter => ({ op: 'and', filters });

export const or = (...filters: Filter[]): Filter => ({ op: 'or', filters });

export const range = (
  path: string,
  bounds: { gt?: RangeBound; gte?: RangeBound; lt?: RangeBound; lte?: RangeBound },
): Filter => ({ op: 'range', path, ...bounds });

export const text = (keyword: string, language: string | null = null, ignore: readonly string[] = []): Filter => ({
  op: 'text',
  keyword,
  language,
  ignore: [...ignore],
});

/** Scope a caller's filter to one membership */
export function withMembership(membershipId: string, filter?: Filter): Filter {
  const scope = eq('membership_id', membershipId);
  return filter ? and(scope, filter) : scope;
}

// ── Evaluation ─────────────────────────────────────────────────────────

function compareBound(value: DocumentValue | undefined, bound: RangeBound): number | null {
  if (typeof bound === 'number' && typeof value === 'number') return value - bound;
  if (typeof bound === 'string' && typeof value === 'string') return value < bound ? -1 : value > bound ? 1 : 0;
  return null;
}

function inRange(value: DocumentValue | undefined, filter: Extract<Filter, { op: 'range' }>): boolean {
  const checks: Array<[RangeBound | undefined, (c: number) => boolean]> = [
    [filter.gt, (c) => c > 0],
    [filter.gte, (c) => c >= 0],
    [filter.lt, (c) => c < 0],
    [filter.lte, (c) => c <= 0],
  ];

  let constrained = false;
  for (const [bound, test] of checks) {
    if (bound === undefined) continue;
    constrained = true;
    const comparison = compareBound(value, bound);
    if (comparison === null || !test(comparison)) return false;
  }
  return constrained;
}

function containsText(value: DocumentValue | undefined, needle: string): boolean {
  if (typeof value === 'string') return value.toLowerCase().includes(needle);
  if (Array.isArray(value)) return value.some((item) => containsText(item, needle));
  if (isDocumentObject(value)) return Object.values(value).some((item) => containsText(item, needle));
  return false;
}

/** Equality also matches an array containing the value, as document stores do */
function equalsAt(doc: DocumentObject, path: string, expected: DocumentValue): boolean {
  const actual = getPath(doc, path);
  if (deepEqual(actual, expected)) return true;
  return Array.isArray(actual) && !Array.isArray(expected) && actual.some((item) => deepEqual(item, expected));
}

export function matchesFilter(doc: DocumentObject, filter: Filter): boolean {
  switch (filter.op) {
    case 'eq':
      return equalsAt(doc, filter.path, filter.value);
    case 'range':
      return inRange(getPath(doc, filter.path), filter);
    case 'text': {
      const words = filter.keyword.toLowerCase().split(/\s+/).filter((w) => w.length > 0);
      const searched = filter.ignore.length > 0 ? omitFields(doc, filter.ignore) : doc;
      return words.length > 0 && words.every((word) => containsText(searched, word));
    }
    case 'and':
      return filter.filters.every((f) => matchesFilter(doc, f));
    case 'or':
      return filter.filters.some((f) => matchesFilter(doc, f));
  }
}

function sortKey(value: DocumentValue | undefined): number | string | null {
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  return null;
}

/** Comparator for a sort option; missing values sort last */
export function compareBySort(sort: SortOptions): (a: DocumentObject, b: DocumentObject) => number {
  const direction = sort.direction === 'desc' ? -1 : 1;
  return (a, b) => {
    const left = sortKey(getPath(a, sort.field));
    const right = sortKey(getPath(b, sort.field));
    if (left === right) return 0;
    if (left === null) return 1;
    if (right === null) return -1;
    return (left < right ? -1 : 1) * direction;
  };
}
