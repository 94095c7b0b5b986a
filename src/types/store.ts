// =============================================================================
// WARDEN — Document Store Contract
//
// The persistence boundary. The core never talks to a database directly;
// it issues typed filters against this interface. Two adapters exist:
// Postgres (JSONB) for deployments, in-memory for tests and embedding.
// =============================================================================

import { DocumentObject, DocumentValue, PaginatedResult, PageOptions } from './documents';

export type RangeBound = number | string;

/** Filter tree. Built with the helpers in services/store/filters. */
export type Filter =
  | { op: 'eq'; path: string; value: DocumentValue }
  | { op: 'range'; path: string; gt?: RangeBound; gte?: RangeBound; lt?: RangeBound; lte?: RangeBound }
  /** `ignore` lists top-level fields left out of matching */
  | { op: 'text'; keyword: string; language: string | null; ignore: string[] }
  | { op: 'and'; filters: Filter[] }
  | { op: 'or'; filters: Filter[] };

/** Restricts a unique index to documents whose value at `path` is one of `values` */
export interface UniqueScope {
  path: string;
  values: string[];
}

export interface DocumentStore {
  /** Human-readable adapter name (for logging) */
  readonly name: string;

  findOne(collection: string, filter: Filter): Promise<DocumentObject | null>;

  find(collection: string, filter: Filter, options?: PageOptions): Promise<PaginatedResult<DocumentObject>>;

  count(collection: string, filter: Filter): Promise<number>;

  /**
   * Insert a new document and return its generated id.
   * Throws DuplicateKeyError when a unique index rejects the document.
   */
  insert(collection: string, document: DocumentObject): Promise<string>;

  /**
   * Replace the body of an existing document. Returns false when no
   * document has that id. Throws DuplicateKeyError like insert.
   */
  replace(collection: string, id: string, document: DocumentObject): Promise<boolean>;

  delete(collection: string, id: string): Promise<boolean>;

  /**
   * Declare that the value at `path` is unique per membership within the
   * collection, or within the documents `scope` selects. The store rejects
   * violating writes atomically. Idempotent.
   */
  ensureUniqueIndex(collection: string, path: string, scope?: UniqueScope): Promise<void>;
}
