// =============================================================================
// WARDEN — Test Suite 03: Document Stores
//
// The in-memory adapter end to end, the Postgres adapter through a fake
// Queryable (exact SQL and parameters), and schema migration.
// =============================================================================

import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { migrate } from '../src/db/migrate';
import { DuplicateKeyError } from '../src/services/store/duplicate-key';
import { and, eq, or, range, text, withMembership } from '../src/services/store/filters';
import { InMemoryDocumentStore } from '../src/services/store/memory';
import { compileFilter, PgDocumentStore, textSearchConfig, uniqueIndexName } from '../src/services/store/postgres';
import { FakeQueryable, queryResult, sql } from './helpers';

const DOC_ID = '3f1c2b4e-8d7a-4c1e-9f2a-1b2c3d4e5f60';

describe('InMemoryDocumentStore', () => {
  let store: InMemoryDocumentStore;

  beforeEach(async () => {
    store = new InMemoryDocumentStore();
    await store.insert('people', { membership_id: 'm1', name: 'Ada', age: 36, tags: ['math'], bio: 'Analytical engine notes' });
    await store.insert('people', { membership_id: 'm1', name: 'Grace', age: 85, tags: ['navy', 'cobol'] });
    await store.insert('people', { membership_id: 'm1', name: 'Linus', age: 20 });
    await store.insert('people', { membership_id: 'm2', name: 'Ada', age: 50 });
  });

  test('eq is scoped by every clause and matches inside arrays', async () => {
    const { items } = await store.find('people', withMembership('m1', eq('tags', 'cobol')));
    expect(items.map((d) => d.name)).toEqual(['Grace']);
  });

  test('range bounds combine; strings compare lexically', async () => {
    const adults = await store.find('people', withMembership('m1', range('age', { gte: 21, lt: 90 })));
    expect(adults.items.map((d) => d.name)).toEqual(['Ada', 'Grace']);

    const early = await store.count('people', range('name', { lt: 'H' }));
    expect(early).toBe(3);
  });

  test('text search requires every word somewhere in the document', async () => {
    expect(await store.count('people', text('analytical NOTES'))).toBe(1);
    expect(await store.count('people', text('analytical cobol'))).toBe(0);
  });

  test('text search skips the ignored top-level fields', async () => {
    await store.insert('people', { membership_id: 'm1', name: 'Hidden', secret: 'c0ffee1234' });

    expect(await store.count('people', text('c0ffee1234'))).toBe(1);
    expect(await store.count('people', text('c0ffee1234', null, ['secret']))).toBe(0);
    expect(await store.count('people', text('hidden', null, ['secret']))).toBe(1);
  });

  test('or, sort, paging and count', async () => {
    const page = await store.find(
      'people',
      or(eq('name', 'Ada'), eq('name', 'Linus')),
      { sort: { field: 'age', direction: 'desc' }, skip: 1, limit: 2, withCount: true },
    );
    expect(page.items.map((d) => d.age)).toEqual([36, 20]);
    expect(page.count).toBe(3);
  });

  test('reads return clones', async () => {
    const first = await store.findOne('people', eq('name', 'Linus'));
    expect(first).not.toBeNull();
    if (first) first.age = 99;
    const again = await store.findOne('people', eq('name', 'Linus'));
    expect(again?.age).toBe(20);
  });

  test('replace and delete report whether the id existed', async () => {
    const found = await store.findOne('people', eq('name', 'Linus'));
    const id = typeof found?._id === 'string' ? found._id : '';

    expect(await store.replace('people', id, { membership_id: 'm1', name: 'Linus T.' })).toBe(true);
    expect((await store.findOne('people', eq('_id', id)))?.name).toBe('Linus T.');
    expect(await store.replace('people', 'missing', {})).toBe(false);
    expect(await store.delete('people', id)).toBe(true);
    expect(await store.delete('people', id)).toBe(false);
  });

  test('unique indexes are per membership and ignore null values', async () => {
    await store.ensureUniqueIndex('people', 'name');

    await expect(store.insert('people', { membership_id: 'm1', name: 'Ada' })).rejects.toThrow(DuplicateKeyError);
    await expect(store.insert('people', { membership_id: 'm3', name: 'Ada' })).resolves.toEqual(expect.any(String));
    await store.insert('people', { membership_id: 'm1', name: null });
    await expect(store.insert('people', { membership_id: 'm1', name: null })).resolves.toEqual(expect.any(String));
  });

  test('a scoped unique index only compares documents inside its scope', async () => {
    await store.ensureUniqueIndex('people', 'badge', { path: 'kind', values: ['staff', 'manager'] });
    await store.insert('people', { membership_id: 'm1', kind: 'staff', badge: 'B-1' });

    await expect(store.insert('people', { membership_id: 'm1', kind: 'manager', badge: 'B-1' })).rejects.toThrow(
      "Duplicate key in 'people' at 'badge'",
    );
    await expect(store.insert('people', { membership_id: 'm1', kind: 'guest', badge: 'B-1' })).resolves.toEqual(expect.any(String));
    await expect(store.insert('people', { membership_id: 'm1', kind: 'guest', badge: 'B-1' })).resolves.toEqual(expect.any(String));
  });

  test('concurrent inserts of one unique value: exactly one succeeds', async () => {
    await store.ensureUniqueIndex('people', 'email');
    const results = await Promise.allSettled([
      store.insert('people', { membership_id: 'm1', email: 'same@example.com' }),
      store.insert('people', { membership_id: 'm1', email: 'same@example.com' }),
    ]);
    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    expect(results.filter((r) => r.status === 'rejected')).toHaveLength(1);
  });
});

describe('Filter compilation', () => {
  test('membership and body equality', () => {
    const params: unknown[] = ['users'];
    const where = compileFilter(and(eq('membership_id', 'm1'), eq('email_address', 'a@b.co')), params);

    expect(where).toBe(
      '(membership_id = $2 AND (body #> $3::text[] = $4::jsonb'
      + " OR (jsonb_typeof(body #> $3::text[]) = 'array' AND body #> $3::text[] @> $5::jsonb)))",
    );
    expect(params).toEqual(['users', 'm1', ['email_address'], '"a@b.co"', '["a@b.co"]']);
  });

  test('ids that are not uuids match nothing', () => {
    const params: unknown[] = [];
    expect(compileFilter(eq('_id', 'administrator'), params)).toBe('FALSE');
    expect(params).toEqual([]);
    expect(compileFilter(eq('_id', DOC_ID), params)).toBe('id = $1');
  });

  test('numeric range', () => {
    const params: unknown[] = [];
    expect(compileFilter(range('age', { gte: 18, lt: 65 }), params)).toBe(
      '((body #>> $1::text[])::numeric >= $2 AND (body #>> $1::text[])::numeric < $3)',
    );
    expect(params).toEqual([['age'], 18, 65]);
  });

  test('string range on a nested path', () => {
    const params: unknown[] = [];
    expect(compileFilter(range('sys.created_at', { gt: '2026-01-01' }), params)).toBe(
      '(body #>> $1::text[] > $2)',
    );
    expect(params).toEqual([['sys', 'created_at'], '2026-01-01']);
  });

  test('full text uses the membership language', () => {
    const params: unknown[] = [];
    expect(compileFilter(text('editor', 'de'), params)).toBe(
      'to_tsvector($1::regconfig, body::text) @@ plainto_tsquery($1::regconfig, $2)',
    );
    expect(params).toEqual(['german', 'editor']);
  });

  test('full text leaves ignored fields out of the document', () => {
    const params: unknown[] = [];
    expect(compileFilter(text('5858b9', null, ['password_hash']), params)).toBe(
      "to_tsvector($1::regconfig, (body - $2::text[])::text) @@ plainto_tsquery($1::regconfig, $3)",
    );
    expect(params).toEqual(['simple', ['password_hash'], '5858b9']);
  });

  test('empty combinators', () => {
    expect(compileFilter(and(), [])).toBe('TRUE');
    expect(compileFilter(or(), [])).toBe('FALSE');
  });

  test('text search configurations', () => {
    expect(textSearchConfig('EN')).toBe('english');
    expect(textSearchConfig('none')).toBe('simple');
    expect(textSearchConfig(null)).toBe('simple');
  });

  test('unique index names stay under 63 characters', () => {
    expect(uniqueIndexName('users', 'address.city')).toBe('uq_users_address__city');
    const long = uniqueIndexName('users', 'a_really_long_property_name.with_another_long_segment');
    expect(long.length).toBeLessThanOrEqual(63);
    expect(long.startsWith('uq_users_')).toBe(true);
  });
});

describe('PgDocumentStore', () => {
  test('findOne issues one scoped query and maps the row', async () => {
    const db = new FakeQueryable().respond(queryResult([{ id: DOC_ID, body: { name: 'Ada' } }]));
    const store = new PgDocumentStore(db);

    const doc = await store.findOne('users', eq('membership_id', 'm1'));

    expect(doc).toEqual({ name: 'Ada', _id: DOC_ID });
    expect(sql(db.calls[0].text)).toBe(
      'SELECT id, body FROM documents WHERE collection = $1 AND membership_id = $2 ORDER BY created_at ASC LIMIT 1',
    );
    expect(db.calls[0].params).toEqual(['users', 'm1']);
  });

  test('find pages, sorts and counts', async () => {
    const db = new FakeQueryable().respond(
      queryResult([{ id: DOC_ID, body: { name: 'Ada', age: 36 } }]),
      queryResult([{ count: 7 }]),
    );
    const store = new PgDocumentStore(db);

    const page = await store.find('users', eq('membership_id', 'm1'), {
      sort: { field: 'age', direction: 'desc' },
      limit: 10,
      skip: 20,
      withCount: true,
      fields: { name: true },
    });

    expect(page).toEqual({ items: [{ _id: DOC_ID, name: 'Ada' }], count: 7 });
    expect(sql(db.calls[0].text)).toBe(
      'SELECT id, body FROM documents WHERE collection = $1 AND membership_id = $2 '
      + 'ORDER BY body #> $3::text[] DESC NULLS LAST LIMIT $4 OFFSET $5',
    );
    expect(db.calls[0].params).toEqual(['users', 'm1', ['age'], 10, 20]);
    expect(sql(db.calls[1].text)).toBe(
      'SELECT count(*)::int AS count FROM documents WHERE collection = $1 AND membership_id = $2',
    );
    expect(db.calls[1].params).toEqual(['users', 'm1']);
  });

  test('insert stores the body without _id', async () => {
    const db = new FakeQueryable();
    const store = new PgDocumentStore(db);

    const id = await store.insert('roles', { _id: 'ignored', membership_id: 'm1', slug: 'editor' });

    expect(db.calls[0].params).toEqual([id, 'roles', 'm1', '{"membership_id":"m1","slug":"editor"}']);
  });

  test('a unique violation becomes DuplicateKeyError with the indexed path', async () => {
    const violation = Object.assign(new Error('duplicate key value'), {
      code: '23505',
      constraint: 'uq_users_email_address',
    });
    const db = new FakeQueryable().respond(queryResult(), violation);
    const store = new PgDocumentStore(db);

    await store.ensureUniqueIndex('users', 'email_address');
    const failure = store.insert('users', { membership_id: 'm1', email_address: 'a@b.co' });

    await expect(failure).rejects.toEqual(new DuplicateKeyError('users', 'email_address'));
  });

  test('ensureUniqueIndex builds a partial expression index once', async () => {
    const db = new FakeQueryable();
    const store = new PgDocumentStore(db);

    await store.ensureUniqueIndex('users', 'profile.handle');
    await store.ensureUniqueIndex('users', 'profile.handle');

    expect(db.calls).toHaveLength(1);
    expect(sql(db.calls[0].text)).toBe(
      "CREATE UNIQUE INDEX IF NOT EXISTS uq_users_profile__handle ON documents (membership_id, (body #>> '{profile,handle}')) WHERE collection = 'users'",
    );
  });

  test('a scoped index narrows the partial predicate to the scope values', async () => {
    const db = new FakeQueryable();
    const store = new PgDocumentStore(db);
    const scope = { path: 'user_type', values: ['staff', 'manager'] };
    const name = uniqueIndexName('users', 'badge', scope);

    await store.ensureUniqueIndex('users', 'badge', scope);
    await store.ensureUniqueIndex('users', 'badge', { path: 'user_type', values: ['manager', 'staff'] });

    expect(name).toMatch(/^uq_users_badge_s[0-9a-f]{8}$/);
    expect(db.calls).toHaveLength(1);
    expect(sql(db.calls[0].text)).toBe(
      `CREATE UNIQUE INDEX IF NOT EXISTS ${name} ON documents (membership_id, (body #>> '{badge}')) `
        + "WHERE collection = 'users' AND body #>> '{user_type}' IN ('manager', 'staff')",
    );
  });

  test('scope values are checked before they are inlined', async () => {
    const store = new PgDocumentStore(new FakeQueryable());
    await expect(store.ensureUniqueIndex('users', 'badge', { path: 'user_type', values: ["x') OR ('1"] })).rejects.toThrow(
      "[Store] Can not scope index 'users.badge' by 'user_type': unsupported value",
    );
  });

  test('ensureUniqueIndex refuses identifiers it can not inline', async () => {
    const store = new PgDocumentStore(new FakeQueryable());
    await expect(store.ensureUniqueIndex('users', "name'; DROP TABLE documents; --")).rejects.toThrow(
      "[Store] Can not index 'users.name'; DROP TABLE documents; --': unsupported identifier",
    );
  });

  test('replace and delete skip the query for non-uuid ids', async () => {
    const db = new FakeQueryable();
    const store = new PgDocumentStore(db);

    expect(await store.replace('roles', 'administrator', {})).toBe(false);
    expect(await store.delete('roles', 'administrator')).toBe(false);
    expect(db.calls).toHaveLength(0);
  });

  test('delete reports the affected row count', async () => {
    const db = new FakeQueryable().respond(queryResult([], 1), queryResult([], 0));
    const store = new PgDocumentStore(db);

    expect(await store.delete('roles', DOC_ID)).toBe(true);
    expect(await store.delete('roles', DOC_ID)).toBe(false);
    expect(db.calls[0].params).toEqual(['roles', DOC_ID]);
  });
});

describe('migrate', () => {
  test('applies the schema file in one statement batch', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'warden-'));
    const schemaPath = path.join(dir, 'schema.sql');
    await writeFile(schemaPath, 'CREATE TABLE IF NOT EXISTS t (id int);');
    const db = new FakeQueryable();
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    await migrate(db, schemaPath);

    expect(db.calls).toEqual([{ text: 'CREATE TABLE IF NOT EXISTS t (id int);', params: [] }]);
    expect(log).toHaveBeenCalledWith('[DB] Schema applied');
    log.mockRestore();
  });

  test('the shipped schema declares both tables', async () => {
    const db = new FakeQueryable();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);

    await migrate(db);

    expect(db.calls[0].text).toContain('CREATE TABLE IF NOT EXISTS documents');
    expect(db.calls[0].text).toContain('CREATE TABLE IF NOT EXISTS identity_events');
    jest.restoreAllMocks();
  });
});
