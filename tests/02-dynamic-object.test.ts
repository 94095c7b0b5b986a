// =============================================================================
// WARDEN — Test Suite 02: Dynamic Documents
//
// Dotted-path access, merge semantics and projection over the generic
// document tree.
// =============================================================================

import { DocumentObject } from '../src/types/documents';
import {
  asDocumentObject,
  deepEqual,
  getPath,
  hasPath,
  mergeDocuments,
  omitFields,
  projectFields,
  removePath,
  setPath,
} from '../src/utils/dynamic-object';
import { slugify } from '../src/utils/slug';

function sample(): DocumentObject {
  return {
    _id: 'doc-1',
    username: 'ada',
    address: { city: 'London', geo: { lat: 51.5 } },
    tags: ['a', 'b'],
  };
}

describe('Path access', () => {
  test('reads nested values', () => {
    expect(getPath(sample(), 'address.geo.lat')).toBe(51.5);
    expect(getPath(sample(), 'address.zip')).toBeUndefined();
    expect(getPath(sample(), 'tags.0')).toBeUndefined();
    expect(hasPath(sample(), 'address.city')).toBe(true);
  });

  test('setPath creates intermediate objects', () => {
    const doc = sample();
    setPath(doc, 'profile.links.home', 'https://example.com');
    expect(doc.profile).toEqual({ links: { home: 'https://example.com' } });
  });

  test('setPath replaces a non-object on the way', () => {
    const doc = sample();
    setPath(doc, 'username.first', 'Ada');
    expect(doc.username).toEqual({ first: 'Ada' });
  });

  test('removePath reports whether something was removed', () => {
    const doc = sample();
    expect(removePath(doc, 'address.geo')).toBe(true);
    expect(doc.address).toEqual({ city: 'London' });
    expect(removePath(doc, 'address.geo')).toBe(false);
  });
});

describe('Merge', () => {
  test('is a right-biased top-level override without _id', () => {
    const current = sample();
    const partial: DocumentObject = { _id: 'other', address: { city: 'Paris' }, active: true };
    const merged = mergeDocuments(current, partial);

    expect(merged).toEqual({
      username: 'ada',
      address: { city: 'Paris' },
      tags: ['a', 'b'],
      active: true,
    });
    expect(merged._id).toBeUndefined();
  });

  test('does not alias its inputs', () => {
    const current = sample();
    const merged = mergeDocuments(current, {});
    setPath(merged, 'address.city', 'Oslo');
    expect(getPath(current, 'address.city')).toBe('London');
  });
});

describe('Equality and shaping', () => {
  test('deepEqual ignores key order, respects array order', () => {
    expect(deepEqual({ a: 1, b: [1, 2] }, { b: [1, 2], a: 1 })).toBe(true);
    expect(deepEqual({ a: [1, 2] }, { a: [2, 1] })).toBe(false);
    expect(deepEqual(null, undefined)).toBe(false);
  });

  test('omitFields drops top-level keys', () => {
    expect(omitFields(sample(), ['_id', 'tags', 'address'])).toEqual({ username: 'ada' });
  });

  test('projection in include mode keeps _id', () => {
    expect(projectFields(sample(), { 'address.city': true })).toEqual({ _id: 'doc-1', address: { city: 'London' } });
    expect(projectFields(sample(), { username: true, _id: false })).toEqual({ username: 'ada' });
  });

  test('projection in exclude mode removes listed paths', () => {
    expect(projectFields(sample(), { address: false, tags: false })).toEqual({ _id: 'doc-1', username: 'ada' });
  });

  test('asDocumentObject rejects non-JSON values', () => {
    expect(asDocumentObject({ a: 1 })).toEqual({ a: 1 });
    expect(asDocumentObject([1])).toBeNull();
    expect(asDocumentObject({ a: () => 1 })).toBeNull();
    expect(asDocumentObject({ a: Number.NaN })).toBeNull();
  });
});

describe('slugify', () => {
  test.each([
    ['Content Editors!', 'content-editors'],
    ['  Crème brûlée  ', 'creme-brulee'],
    ['Editor', 'editor'],
    ['!!!', ''],
  ])('%p → %p', (input, slug) => {
    expect(slugify(input)).toBe(slug);
  });
});
