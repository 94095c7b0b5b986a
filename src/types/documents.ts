// =============================================================================
// WARDEN — Dynamic Document Types
//
// Tenant-defined documents (users) have no fixed shape. They are held as a
// plain JSON tree; schema and reference logic only ever works against this
// generic representation, addressed by dotted paths ("address.city").
// =============================================================================

/** Any value a stored document can hold */
export type DocumentValue =
  | null
  | boolean
  | number
  | string
  | DocumentValue[]
  | DocumentObject;

/** Ordered key/value tree (insertion order is preserved by JS objects) */
export type DocumentObject = { [key: string]: DocumentValue };

/**
 * Audit stamp attached to every entity.
 * Timestamps are ISO-8601 strings so the stamp round-trips through JSON.
 */
export type SysMetadata = {
  created_at: string;
  created_by: string;
  modified_at: string | null;
  modified_by: string | null;
};

export type SortDirection = 'asc' | 'desc';

export interface SortOptions {
  field: string;
  direction: SortDirection;
}

/** Paging, sorting and projection for list/query/search reads */
export interface PageOptions {
  skip?: number;
  limit?: number;
  withCount?: boolean;
  sort?: SortOptions;
  /** Projection: { email_address: true } includes, { sys: false } excludes */
  fields?: Record<string, boolean>;
}

export interface PaginatedResult<T> {
  items: T[];
  /** Total matches ignoring skip/limit; null unless withCount was requested */
  count: number | null;
}

/** Accepted by every operation of the core */
export interface OperationOptions {
  /**
   * Honoured up to the moment a persistence write starts. Once the write
   * has been issued the operation runs to completion, event included.
   */
  signal?: AbortSignal;
}
