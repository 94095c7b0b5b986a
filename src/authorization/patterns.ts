// =============================================================================
// WARDEN — Access Patterns (Rbac / Ubac)
//
// Rbac (role level):  subject.resource.action.object
//                     a three-segment Rbac has an implicit wildcard subject
// Ubac (user level):  resource.action.object
//                     the subject is implicitly the user owning the pattern
//
// Every segment is '*' or a literal. Equality is structural: '*' equals '*'
// only. Wildcard matching ('*' matches any literal) is a separate question,
// answered by covers().
// =============================================================================

import { MalformedPatternError } from '../errors';

export const WILDCARD = '*';

const SEGMENT_PATTERN = /^[A-Za-z0-9_\-:@{}]+$/;

export interface Rbac {
  kind: 'rbac';
  subject: string;
  resource: string;
  action: string;
  object: string;
}

export interface Ubac {
  kind: 'ubac';
  resource: string;
  action: string;
  object: string;
}

export type AccessPattern = Rbac | Ubac;

function splitSegments(text: string): string[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new MalformedPatternError(text, 'pattern is empty');
  }

  const segments = trimmed.split('.');
  for (const segment of segments) {
    if (segment === WILDCARD) continue;
    if (segment.length === 0) {
      throw new MalformedPatternError(text, 'empty segment');
    }
    if (!SEGMENT_PATTERN.test(segment)) {
      throw new MalformedPatternError(text, `invalid segment '${segment}'`);
    }
  }
  return segments;
}

/** Resource and action names are case-insensitive; subjects and objects are ids */
function normalizeName(segment: string): string {
  return segment === WILDCARD ? segment : segment.toLowerCase();
}

export function parseRbac(text: string): Rbac {
  const segments = splitSegments(text);

  if (segments.length === 3) {
    const [resource, action, object] = segments;
    return {
      kind: 'rbac',
      subject: WILDCARD,
      resource: normalizeName(resource),
      action: normalizeName(action),
      object,
    };
  }

  if (segments.length === 4) {
    const [subject, resource, action, object] = segments;
    return {
      kind: 'rbac',
      subject,
      resource: normalizeName(resource),
      action: normalizeName(action),
      object,
    };
  }

  throw new MalformedPatternError(text, `expected 3 or 4 segments, got ${segments.length}`);
}

export function parseUbac(text: string): Ubac {
  const segments = splitSegments(text);
  if (segments.length !== 3) {
    throw new MalformedPatternError(text, `expected 3 segments, got ${segments.length}`);
  }

  const [resource, action, object] = segments;
  return {
    kind: 'ubac',
    resource: normalizeName(resource),
    action: normalizeName(action),
    object,
  };
}

export function formatPattern(pattern: AccessPattern): string {
  return pattern.kind === 'rbac'
    ? `${pattern.subject}.${pattern.resource}.${pattern.action}.${pattern.object}`
    : `${pattern.resource}.${pattern.action}.${pattern.object}`;
}

/** Structural equality. Symmetric and transitive. */
export function patternsEqual(a: AccessPattern, b: AccessPattern): boolean {
  if (a.kind === 'rbac' && b.kind === 'rbac') {
    return a.subject === b.subject
      && a.resource === b.resource
      && a.action === b.action
      && a.object === b.object;
  }
  if (a.kind === 'ubac' && b.kind === 'ubac') {
    return a.resource === b.resource && a.action === b.action && a.object === b.object;
  }
  return false;
}

/**
 * Patterns that appear in both the allow and the deny set.
 * Pairwise comparison, O(|allow| × |deny|). Each conflicting pattern is
 * reported once, in allow-set order.
 */
export function findConflicts<P extends AccessPattern>(allow: P[], deny: P[]): P[] {
  const conflicts: P[] = [];
  for (const permitted of allow) {
    for (const forbidden of deny) {
      if (patternsEqual(permitted, forbidden)) {
        if (!conflicts.some((c) => patternsEqual(c, permitted))) {
          conflicts.push(permitted);
        }
        break;
      }
    }
  }
  return conflicts;
}

function segmentCovers(granted: string, requested: string): boolean {
  return granted === WILDCARD || granted === requested;
}

/**
 * Whether `granted` grants `requested`: every segment of the grant is a
 * wildcard or equals the requested segment. A Ubac grant is compared on
 * resource/action/object only (its subject is its owner).
 */
export function covers(granted: AccessPattern, requested: Rbac): boolean {
  if (granted.kind === 'rbac' && !segmentCovers(granted.subject, requested.subject)) {
    return false;
  }
  return segmentCovers(granted.resource, requested.resource)
    && segmentCovers(granted.action, requested.action)
    && segmentCovers(granted.object, requested.object);
}

/** Parse a list, collecting malformed entries instead of stopping at the first */
export function parsePatternList<P extends AccessPattern>(
  texts: readonly string[],
  parse: (text: string) => P,
): { patterns: P[]; malformed: Array<{ index: number; error: MalformedPatternError }> } {
  const patterns: P[] = [];
  const malformed: Array<{ index: number; error: MalformedPatternError }> = [];

  texts.forEach((text, index) => {
    try {
      patterns.push(parse(text));
    } catch (err) {
      if (!(err instanceof MalformedPatternError)) throw err;
      malformed.push({ index, error: err });
    }
  });

  return { patterns, malformed };
}
