export { DuplicateKeyError } from './duplicate-key';
export { and, eq, or, range, text, withMembership, matchesFilter } from './filters';
export { InMemoryDocumentStore } from './memory';
export { PgDocumentStore, compileFilter } from './postgres';
export type { Queryable } from './postgres';
