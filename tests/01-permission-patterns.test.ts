// =============================================================================
// WARDEN — Test Suite 01: Permission Patterns
//
// Parsing, formatting and comparison of Rbac/Ubac patterns, conflict
// detection between allow and deny sets, and deny-first authorization.
// =============================================================================

import { PatternAuthorizer } from '../src/authorization/evaluator';
import {
  covers,
  findConflicts,
  formatPattern,
  parsePatternList,
  parseRbac,
  parseUbac,
  patternsEqual,
} from '../src/authorization/patterns';
import { MalformedPatternError } from '../src/errors';

describe('Rbac parsing', () => {
  test('four segments map onto subject.resource.action.object', () => {
    expect(parseRbac('u-1.users.read.42')).toEqual({
      kind: 'rbac',
      subject: 'u-1',
      resource: 'users',
      action: 'read',
      object: '42',
    });
  });

  test('three segments get a wildcard subject', () => {
    expect(parseRbac('blog.posts.*')).toEqual({
      kind: 'rbac',
      subject: '*',
      resource: 'blog',
      action: 'posts',
      object: '*',
    });
  });

  test('resource and action are lower-cased, surrounding whitespace trimmed', () => {
    const rbac = parseRbac('  *.Users.READ.Abc  ');
    expect(rbac.resource).toBe('users');
    expect(rbac.action).toBe('read');
    expect(rbac.object).toBe('Abc');
  });

  test.each([
    ['', 'pattern is empty'],
    ['a.b', 'expected 3 or 4 segments, got 2'],
    ['a.b.c.d.e', 'expected 3 or 4 segments, got 5'],
    ['a..b.c', 'empty segment'],
    ['a.b c.d', "invalid segment 'b c'"],
  ])('rejects %p (%s)', (text, reason) => {
    expect(() => parseRbac(text)).toThrow(new MalformedPatternError(text, reason));
  });
});

describe('Ubac parsing', () => {
  test('exactly three segments', () => {
    expect(parseUbac('users.update.me')).toEqual({
      kind: 'ubac',
      resource: 'users',
      action: 'update',
      object: 'me',
    });
    expect(() => parseUbac('x.users.update.me')).toThrow(MalformedPatternError);
  });
});

describe('Round trip', () => {
  test.each(['*.users.*.*', 'u-1.roles.delete.r-9', 'user-types.read.*'])('parse(format(p)) equals p for %p', (text) => {
    const rbac = parseRbac(text);
    expect(parseRbac(formatPattern(rbac))).toEqual(rbac);
  });

  test('ubac', () => {
    const ubac = parseUbac('tokens.revoke.*');
    expect(formatPattern(ubac)).toBe('tokens.revoke.*');
    expect(parseUbac(formatPattern(ubac))).toEqual(ubac);
  });

  test('a three-segment Rbac formats with its implicit subject', () => {
    expect(formatPattern(parseRbac('blog.posts.*'))).toBe('*.blog.posts.*');
  });
});

describe('Structural equality', () => {
  test('a wildcard equals only a wildcard', () => {
    expect(patternsEqual(parseRbac('*.users.read.*'), parseRbac('*.users.read.42'))).toBe(false);
    expect(patternsEqual(parseRbac('*.users.read.*'), parseRbac('users.read.*'))).toBe(true);
  });

  test('case differences in resource and action do not matter', () => {
    expect(patternsEqual(parseUbac('Users.Read.x'), parseUbac('users.read.x'))).toBe(true);
  });

  test('rbac never equals ubac', () => {
    expect(patternsEqual(parseRbac('users.read.x'), parseUbac('users.read.x'))).toBe(false);
  });
});

describe('Conflict detection', () => {
  const allow = ['blog.posts.*', 'blog.posts.delete', 'users.read.*'].map(parseRbac);
  const deny = ['blog.posts.delete', 'users.read.*', 'roles.delete.*'].map(parseRbac);

  test('returns every pattern present in both sets, in allow order', () => {
    expect(findConflicts(allow, deny).map(formatPattern)).toEqual(['*.blog.posts.delete', '*.users.read.*']);
  });

  test('is symmetric as a set', () => {
    const forward = findConflicts(allow, deny).map(formatPattern).sort();
    const backward = findConflicts(deny, allow).map(formatPattern).sort();
    expect(backward).toEqual(forward);
  });

  test('a wildcard does not conflict with the literal it would match', () => {
    expect(findConflicts([parseRbac('blog.posts.*')], [parseRbac('blog.posts.delete')])).toEqual([]);
  });

  test('duplicates in the allow set are reported once', () => {
    const twice = [parseRbac('a.b.c'), parseRbac('A.B.c')];
    expect(findConflicts(twice, [parseRbac('a.b.c')])).toHaveLength(1);
  });
});

describe('parsePatternList', () => {
  test('collects malformed entries by index', () => {
    const { patterns, malformed } = parsePatternList(['a.b.c', 'bad', 'x.y.z.w'], parseRbac);
    expect(patterns.map(formatPattern)).toEqual(['*.a.b.c', 'x.y.z.w']);
    expect(malformed.map((m) => m.index)).toEqual([1]);
  });
});

describe('Wildcard coverage', () => {
  const requested = parseRbac('u-1.users.delete.42');

  test('wildcards match any literal', () => {
    expect(covers(parseRbac('*.users.*.*'), requested)).toBe(true);
    expect(covers(parseRbac('u-1.users.delete.*'), requested)).toBe(true);
  });

  test('literals must match exactly', () => {
    expect(covers(parseRbac('u-2.users.delete.42'), requested)).toBe(false);
    expect(covers(parseRbac('*.roles.*.*'), requested)).toBe(false);
  });

  test('ubac ignores the subject', () => {
    expect(covers(parseUbac('users.delete.42'), requested)).toBe(true);
  });
});

describe('PatternAuthorizer', () => {
  const authorizer = new PatternAuthorizer();
  const role = { permissions: ['*.users.*.*'], forbidden: ['*.users.delete.*'] };

  test('role permissions grant', () => {
    const result = authorizer.authorize({ rbac: parseRbac('u-1.users.read.42'), role });
    expect(result).toEqual({ granted: true, decidedBy: 'role_permission', matchedPattern: '*.users.*.*' });
  });

  test('role forbidden wins over role permissions', () => {
    const result = authorizer.authorize({ rbac: parseRbac('u-1.users.delete.42'), role });
    expect(result).toEqual({ granted: false, decidedBy: 'role_forbidden', matchedPattern: '*.users.delete.*' });
  });

  test('user permissions take precedence over the role', () => {
    const user = { permissions: ['users.delete.42'], forbidden: [] };
    const result = authorizer.authorize({ rbac: parseRbac('u-1.users.delete.42'), role, user });
    expect(result.decidedBy).toBe('user_permission');
    expect(result.granted).toBe(true);
  });

  test('user forbidden denies before anything else', () => {
    const user = { permissions: ['users.read.*'], forbidden: ['users.read.42'] };
    const result = authorizer.authorize({ rbac: parseRbac('u-1.users.read.42'), role, user });
    expect(result).toEqual({ granted: false, decidedBy: 'user_forbidden', matchedPattern: 'users.read.42' });
  });

  test('nothing matching denies', () => {
    expect(authorizer.isAuthorized({ rbac: 'u-1.roles.read.1', role })).toBe(false);
  });

  test('malformed stored entries never match', () => {
    expect(authorizer.isAuthorized({ rbac: 'u-1.roles.read.1', role: { permissions: ['roles'], forbidden: [] } })).toBe(false);
  });
});
