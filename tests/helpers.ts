// =============================================================================
// WARDEN — Test Helpers
//
// In-process fixtures: an in-memory document store, a recording event sink,
// a controllable clock, and seeded memberships. All memberships use the
// placeholder secret 'test-secret'.
// =============================================================================

import { QueryResult, QueryResultRow } from 'pg';
import { createIdentityCore, IdentityCore, IdentityCoreOptions } from '../src';
import { InMemoryEventSink } from '../src/services/events';
import { MEMBERSHIPS_COLLECTION } from '../src/services/memberships';
import { InMemoryDocumentStore } from '../src/services/store/memory';
import { Queryable } from '../src/services/store/postgres';
import { HumanUtilizer, SystemUtilizer, systemUtilizer } from '../src/types/auth';
import { DocumentObject } from '../src/types/documents';
import { DocumentStore } from '../src/types/store';

export const TEST_SECRET = 'test-secret';
export const TEST_PASSWORD = 'test-password';

/** Clock that only moves when told to */
export class TestClock {
  private current: Date;

  constructor(iso = '2026-01-01T00:00:00.000Z') {
    this.current = new Date(iso);
  }

  readonly now = (): Date => new Date(this.current.getTime());

  advance(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }
}

export async function seedMembership(store: DocumentStore, overrides: DocumentObject = {}): Promise<string> {
  return store.insert(MEMBERSHIPS_COLLECTION, {
    name: 'Test Membership',
    secret_key: TEST_SECRET,
    hash_algorithm: 'SHA2-512',
    default_encoding: 'UTF-8',
    default_language: 'en',
    expires_in: 43200,
    refresh_token_expires_in: 86400,
    ...overrides,
  });
}

export interface TestContext {
  core: IdentityCore;
  store: InMemoryDocumentStore;
  sink: InMemoryEventSink;
  clock: TestClock;
  membershipId: string;
}

/** Fresh core over an empty in-memory store with one seeded membership */
export async function createTestContext(
  options: Partial<Omit<IdentityCoreOptions, 'store' | 'sinks' | 'clock'>> = {},
): Promise<TestContext> {
  const store = new InMemoryDocumentStore();
  const sink = new InMemoryEventSink();
  const clock = new TestClock();
  const membershipId = await seedMembership(store);

  const core = createIdentityCore({
    ...options,
    store,
    sinks: [sink],
    clock: clock.now,
    passwords: { bcryptRounds: 4, ...options.passwords },
  });
  await core.initialize();
  sink.clear();

  return { core, store, sink, clock, membershipId };
}

export function human(membershipId: string, id: string, role: string, username: string | null = null): HumanUtilizer {
  return { kind: 'human', id, membershipId, role, username };
}

export function system(membershipId: string): SystemUtilizer {
  return systemUtilizer(membershipId);
}

/** Minimal valid user payload for the origin type */
export function userPayload(username: string, overrides: DocumentObject = {}): DocumentObject {
  return {
    username,
    email_address: `${username}@example.com`,
    firstname: 'Test',
    lastname: 'User',
    role: 'administrator',
    password: TEST_PASSWORD,
    ...overrides,
  };
}

// ── Fake Postgres ────────────────────────────────────────────────────

export function queryResult(rows: QueryResultRow[] = [], rowCount: number | null = rows.length): QueryResult<QueryResultRow> {
  return { command: 'SELECT', rowCount, oid: 0, fields: [], rows };
}

/** Records every query; answers from a queue (empty result when exhausted) */
export class FakeQueryable implements Queryable {
  readonly calls: Array<{ text: string; params: unknown[] }> = [];
  private readonly responses: Array<QueryResult<QueryResultRow> | Error> = [];

  respond(...responses: Array<QueryResult<QueryResultRow> | Error>): this {
    this.responses.push(...responses);
    return this;
  }

  async query(text: string, params: unknown[] = []): Promise<QueryResult<QueryResultRow>> {
    this.calls.push({ text, params });
    const next = this.responses.shift();
    if (next instanceof Error) throw next;
    return next ?? queryResult();
  }
}

/** Collapse whitespace so SQL can be compared as one line */
export function sql(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
