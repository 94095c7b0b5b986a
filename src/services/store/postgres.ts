// =============================================================================
// WARDEN — Postgres Document Store
//
// All collections share one JSONB table (see db/schema.sql):
//   documents(id uuid, collection text, membership_id text, body jsonb)
//
// Filters compile to parameterised SQL. Unique constraints are partial
// expression indexes over (membership_id, body #>> path) per collection,
// optionally narrowed to a set of values at a scope path; Postgres
// enforces them atomically and a violation (23505) surfaces as
// DuplicateKeyError.
// =============================================================================

import { createHash } from 'crypto';
import { QueryResult, QueryResultRow } from 'pg';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { DocumentObject, PaginatedResult, PageOptions, SortOptions } from '../../types/documents';
import { DocumentStore, Filter, RangeBound, UniqueScope } from '../../types/store';
import { asDocumentObject, omitFields, projectFields } from '../../utils/dynamic-object';
import { DuplicateKeyError } from './duplicate-key';

/** The part of pg's Pool / PoolClient this adapter needs */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<QueryResult<QueryResultRow>>;
}

const IDENTIFIER = /^[A-Za-z][A-Za-z0-9_]*$/;
const PATH_SEGMENT = /^[A-Za-z0-9_]+$/;
const SCOPE_VALUE = /^[A-Za-z0-9_-]+$/;

/** Membership languages (ISO 639-1) → Postgres text search configurations */
const TEXT_SEARCH_CONFIGS: Record<string, string> = {
  da: 'danish',
  de: 'german',
  en: 'english',
  es: 'spanish',
  fi: 'finnish',
  fr: 'french',
  hu: 'hungarian',
  it: 'italian',
  nl: 'dutch',
  no: 'norwegian',
  pt: 'portuguese',
  ro: 'romanian',
  ru: 'russian',
  sv: 'swedish',
  tr: 'turkish',
};

export function textSearchConfig(language: string | null): string {
  return (language && TEXT_SEARCH_CONFIGS[language.toLowerCase()]) || 'simple';
}

function pathArray(path: string): string[] {
  return path.split('.').filter((s) => s.length > 0);
}

// ── Filter compilation ─────────────────────────────────────────────────

/**
 * Compile a filter to a SQL boolean expression, appending its parameters.
 * `_id` and `membership_id` map onto real columns; everything else is
 * read from the JSONB body.
 */
export function compileFilter(filter: Filter, params: unknown[]): string {
  const bind = (value: unknown): string => {
    params.push(value);
    return `$${params.length}`;
  };

  switch (filter.op) {
    case 'eq': {
      if (filter.path === '_id') {
        return typeof filter.value === 'string' && isUuid(filter.value) ? `id = ${bind(filter.value)}` : 'FALSE';
      }
      if (filter.path === 'membership_id') {
        return typeof filter.value === 'string' ? `membership_id = ${bind(filter.value)}` : 'FALSE';
      }
      const path = bind(pathArray(filter.path));
      return `(body #> ${path}::text[] = ${bind(JSON.stringify(filter.value))}::jsonb`
        + ` OR (jsonb_typeof(body #> ${path}::text[]) = 'array'`
        + ` AND body #> ${path}::text[] @> ${bind(JSON.stringify([filter.value]))}::jsonb))`;
    }

    case 'range': {
      const path = bind(pathArray(filter.path));
      const bounds: Array<[string, RangeBound | undefined]> = [
        ['>', filter.gt],
        ['>=', filter.gte],
        ['<', filter.lt],
        ['<=', filter.lte],
      ];
      const clauses = bounds
        .filter((entry): entry is [string, RangeBound] => entry[1] !== undefined)
        .map(([operator, bound]) =>
          typeof bound === 'number'
            ? `(body #>> ${path}::text[])::numeric ${operator} ${bind(bound)}`
            : `body #>> ${path}::text[] ${operator} ${bind(bound)}`,
        );
      return clauses.length > 0 ? `(${clauses.join(' AND ')})` : 'FALSE';
    }

    case 'text': {
      const config = bind(textSearchConfig(filter.language));
      const searched = filter.ignore.length > 0 ? `(body - ${bind(filter.ignore)}::text[])` : 'body';
      return `to_tsvector(${config}::regconfig, ${searched}::text) @@ plainto_tsquery(${config}::regconfig, ${bind(filter.keyword)})`;
    }

    case 'and':
      return filter.filters.length === 0
        ? 'TRUE'
        : `(${filter.filters.map((f) => compileFilter(f, params)).join(' AND ')})`;

    case 'or':
      return filter.filters.length === 0
        ? 'FALSE'
        : `(${filter.filters.map((f) => compileFilter(f, params)).join(' OR ')})`;
  }
}

function compileSort(sort: SortOptions | undefined, params: unknown[]): string {
  if (!sort) return 'ORDER BY created_at ASC';
  const direction = sort.direction === 'desc' ? 'DESC' : 'ASC';
  if (sort.field === '_id') return `ORDER BY id ${direction}`;
  params.push(pathArray(sort.field));
  return `ORDER BY body #> $${params.length}::text[] ${direction} NULLS LAST`;
}

// ── Unique indexes ─────────────────────────────────────────────────────

function scopeKey(scope: UniqueScope | undefined): string {
  return scope ? `${scope.path}=${[...scope.values].sort().join(',')}` : '';
}

/** Index name, kept under Postgres' 63-character identifier limit */
export function uniqueIndexName(collection: string, path: string, scope?: UniqueScope): string {
  const suffix = scope ? `_s${createHash('sha256').update(scopeKey(scope)).digest('hex').slice(0, 8)}` : '';
  const readable = `uq_${collection}_${pathArray(path).join('__')}${suffix}`;
  if (readable.length <= 63) return readable;
  const digest = createHash('sha256').update(`${collection}:${path}:${scopeKey(scope)}`).digest('hex').slice(0, 16);
  return `uq_${collection.slice(0, 40)}_${digest}`;
}

function isIndexablePath(segments: string[]): boolean {
  return segments.length > 0 && segments.every((s) => PATH_SEGMENT.test(s));
}

function isUniqueViolation(err: unknown): err is { code: string; constraint?: string } {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';
}

// ── Adapter ────────────────────────────────────────────────────────────

export class PgDocumentStore implements DocumentStore {
  readonly name = 'postgres';

  /** index name → path, to report which path a violation hit */
  private readonly indexedPaths = new Map<string, string>();

  constructor(private readonly db: Queryable) {}

  private toDocument(row: QueryResultRow): DocumentObject {
    const body = asDocumentObject(row.body);
    if (!body || typeof row.id !== 'string') {
      throw new Error(`[Store] Malformed document row ${String(row.id)}`);
    }
    return { ...body, _id: row.id };
  }

  private translate(collection: string, err: unknown): unknown {
    if (isUniqueViolation(err)) {
      const path = err.constraint ? this.indexedPaths.get(err.constraint) ?? null : null;
      return new DuplicateKeyError(collection, path);
    }
    return err;
  }

  async findOne(collection: string, filter: Filter): Promise<DocumentObject | null> {
    const params: unknown[] = [collection];
    const where = compileFilter(filter, params);
    const result = await this.db.query(
      `SELECT id, body FROM documents
       WHERE collection = $1 AND ${where}
       ORDER BY created_at ASC
       LIMIT 1`,
      params,
    );
    return result.rows.length > 0 ? this.toDocument(result.rows[0]) : null;
  }

  async find(
    collection: string,
    filter: Filter,
    options: PageOptions = {},
  ): Promise<PaginatedResult<DocumentObject>> {
    const params: unknown[] = [collection];
    const where = compileFilter(filter, params);
    const countParams = [...params];
    const orderBy = compileSort(options.sort, params);

    let paging = '';
    if (options.limit !== undefined) {
      params.push(options.limit);
      paging += ` LIMIT $${params.length}`;
    }
    if (options.skip) {
      params.push(options.skip);
      paging += ` OFFSET $${params.length}`;
    }

    const result = await this.db.query(
      `SELECT id, body FROM documents
       WHERE collection = $1 AND ${where}
       ${orderBy}${paging}`,
      params,
    );

    let count: number | null = null;
    if (options.withCount) {
      const countResult = await this.db.query(
        `SELECT count(*)::int AS count FROM documents WHERE collection = $1 AND ${where}`,
        countParams,
      );
      count = Number(countResult.rows[0]?.count ?? 0);
    }

    return {
      items: result.rows.map((row) => projectFields(this.toDocument(row), options.fields)),
      count,
    };
  }

  async count(collection: string, filter: Filter): Promise<number> {
    const params: unknown[] = [collection];
    const where = compileFilter(filter, params);
    const result = await this.db.query(
      `SELECT count(*)::int AS count FROM documents WHERE collection = $1 AND ${where}`,
      params,
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async insert(collection: string, document: DocumentObject): Promise<string> {
    const id = uuidv4();
    const membershipId = typeof document.membership_id === 'string' ? document.membership_id : null;
    try {
      await this.db.query(
        `INSERT INTO documents (id, collection, membership_id, body)
         VALUES ($1, $2, $3, $4::jsonb)`,
        [id, collection, membershipId, JSON.stringify(omitFields(document, ['_id']))],
      );
    } catch (err) {
      throw this.translate(collection, err);
    }
    return id;
  }

  async replace(collection: string, id: string, document: DocumentObject): Promise<boolean> {
    if (!isUuid(id)) return false;
    const membershipId = typeof document.membership_id === 'string' ? document.membership_id : null;
    try {
      const result = await this.db.query(
        `UPDATE documents
         SET body = $3::jsonb, membership_id = $4, updated_at = now()
         WHERE collection = $1 AND id = $2`,
        [collection, id, JSON.stringify(omitFields(document, ['_id'])), membershipId],
      );
      return (result.rowCount ?? 0) > 0;
    } catch (err) {
      throw this.translate(collection, err);
    }
  }

  async delete(collection: string, id: string): Promise<boolean> {
    if (!isUuid(id)) return false;
    const result = await this.db.query(
      `DELETE FROM documents WHERE collection = $1 AND id = $2`,
      [collection, id],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async ensureUniqueIndex(collection: string, path: string, scope?: UniqueScope): Promise<void> {
    const segments = pathArray(path);
    if (!IDENTIFIER.test(collection) || !isIndexablePath(segments)) {
      throw new Error(`[Store] Can not index '${collection}.${path}': unsupported identifier`);
    }
    const scopeSegments = scope ? pathArray(scope.path) : [];
    if (scope && (!isIndexablePath(scopeSegments) || scope.values.length === 0 || !scope.values.every((v) => SCOPE_VALUE.test(v)))) {
      throw new Error(`[Store] Can not scope index '${collection}.${path}' by '${scope.path}': unsupported value`);
    }

    const name = uniqueIndexName(collection, path, scope);
    if (this.indexedPaths.has(name)) return;

    // DDL does not take bind parameters; identifiers and scope values are validated above.
    const scoped = scope
      ? ` AND body #>> '{${scopeSegments.join(',')}}' IN (${[...scope.values].sort().map((v) => `'${v}'`).join(', ')})`
      : '';
    await this.db.query(
      `CREATE UNIQUE INDEX IF NOT EXISTS ${name}
       ON documents (membership_id, (body #>> '{${segments.join(',')}}'))
       WHERE collection = '${collection}'${scoped}`,
    );
    this.indexedPaths.set(name, path);
  }
}
