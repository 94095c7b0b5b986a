// =============================================================================
// WARDEN — In-Memory Document Store
//
// Process-local DocumentStore used by tests and embedded deployments.
// Documents are cloned on every read and write. Unique indexes are checked
// and the write applied in the same synchronous step, so two concurrent
// inserts of the same value cannot both succeed.
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { DocumentObject, PaginatedResult, PageOptions } from '../../types/documents';
import { DocumentStore, Filter, UniqueScope } from '../../types/store';
import { cloneDocument, deepEqual, getPath, projectFields } from '../../utils/dynamic-object';
import { DuplicateKeyError } from './duplicate-key';
import { compareBySort, matchesFilter } from './filters';

function inScope(doc: DocumentObject, scope: UniqueScope): boolean {
  const value = getPath(doc, scope.path);
  return typeof value === 'string' && scope.values.includes(value);
}

export class InMemoryDocumentStore implements DocumentStore {
  readonly name = 'in-memory';

  private readonly collections = new Map<string, Map<string, DocumentObject>>();
  /** collection → index key → indexed path and optional scope */
  private readonly uniqueIndexes = new Map<string, Map<string, { path: string; scope: UniqueScope | null }>>();

  private collection(name: string): Map<string, DocumentObject> {
    let docs = this.collections.get(name);
    if (!docs) {
      docs = new Map();
      this.collections.set(name, docs);
    }
    return docs;
  }

  private matching(collection: string, filter: Filter): DocumentObject[] {
    return [...this.collection(collection).values()].filter((doc) => matchesFilter(doc, filter));
  }

  async findOne(collection: string, filter: Filter): Promise<DocumentObject | null> {
    const found = this.matching(collection, filter)[0];
    return found ? cloneDocument(found) : null;
  }

  async find(
    collection: string,
    filter: Filter,
    options: PageOptions = {},
  ): Promise<PaginatedResult<DocumentObject>> {
    let matches = this.matching(collection, filter);
    if (options.sort) {
      matches = [...matches].sort(compareBySort(options.sort));
    }

    const skip = options.skip ?? 0;
    const page = options.limit !== undefined ? matches.slice(skip, skip + options.limit) : matches.slice(skip);

    return {
      items: page.map((doc) => projectFields(cloneDocument(doc), options.fields)),
      count: options.withCount ? matches.length : null,
    };
  }

  async count(collection: string, filter: Filter): Promise<number> {
    return this.matching(collection, filter).length;
  }

  async insert(collection: string, document: DocumentObject): Promise<string> {
    const id = uuidv4();
    const stored: DocumentObject = { ...cloneDocument(document), _id: id };
    this.assertUnique(collection, stored, null);
    this.collection(collection).set(id, stored);
    return id;
  }

  async replace(collection: string, id: string, document: DocumentObject): Promise<boolean> {
    const docs = this.collection(collection);
    if (!docs.has(id)) return false;

    const stored: DocumentObject = { ...cloneDocument(document), _id: id };
    this.assertUnique(collection, stored, id);
    docs.set(id, stored);
    return true;
  }

  async delete(collection: string, id: string): Promise<boolean> {
    return this.collection(collection).delete(id);
  }

  async ensureUniqueIndex(collection: string, path: string, scope?: UniqueScope): Promise<void> {
    let indexes = this.uniqueIndexes.get(collection);
    if (!indexes) {
      indexes = new Map();
      this.uniqueIndexes.set(collection, indexes);
    }
    const values = scope ? [...scope.values].sort() : [];
    const key = scope ? `${path}|${scope.path}=${values.join(',')}` : path;
    indexes.set(key, { path, scope: scope ? { path: scope.path, values } : null });
  }

  /** Unique per membership and scope; null and missing values are not indexed */
  private assertUnique(collection: string, candidate: DocumentObject, selfId: string | null): void {
    const indexes = this.uniqueIndexes.get(collection);
    if (!indexes) return;

    for (const { path, scope } of indexes.values()) {
      if (scope && !inScope(candidate, scope)) continue;
      const value = getPath(candidate, path);
      if (value === undefined || value === null) continue;

      for (const [id, existing] of this.collection(collection)) {
        if (id === selfId) continue;
        if (existing.membership_id !== candidate.membership_id) continue;
        if (scope && !inScope(existing, scope)) continue;
        if (deepEqual(getPath(existing, path), value)) {
          throw new DuplicateKeyError(collection, path);
        }
      }
    }
  }
}
