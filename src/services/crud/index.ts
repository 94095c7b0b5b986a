// =============================================================================
// WARDEN — Membership-Bound CRUD Engine
//
// Generic document pipeline shared by roles, users and user types.
//
//   create: resolve membership → strip managed fields → stamp membership_id
//           → beforeValidate → validate → afterValidate → stamp sys
//           → [abort check] → insert → emit created → handlers
//   update: resolve membership → load current (NotFound) → strip → merge
//           → beforeValidate → identical check → validate (prior given)
//           → afterValidate → stamp sys → [abort check] → replace
//           → emit updated → handlers
//   delete: resolve membership → load current (NotFound) → [abort check]
//           → delete → emit deleted (removed document) → handlers
//
// Every read and write is scoped by membership_id equality. Cancellation
// is honoured until the store write is issued; after that the operation
// completes, event and handlers included. Handlers run once the write is
// committed even when a sink rejects the event; the rejection still fails
// the call.
// =============================================================================

import {
  AlreadyExistsError,
  IdenticalDocumentError,
  NotFoundError,
} from '../../errors';
import { Utilizer, utilizerId, utilizerName } from '../../types/auth';
import {
  DocumentObject,
  DocumentValue,
  OperationOptions,
  PaginatedResult,
  PageOptions,
  SysMetadata,
} from '../../types/documents';
import { IdentityEvent, ResourceEventTypes } from '../../types/events';
import { Membership } from '../../types/membership';
import { DocumentStore, Filter } from '../../types/store';
import { cloneDocument, deepEqual, isDocumentObject, mergeDocuments, omitFields } from '../../utils/dynamic-object';
import { EmitInput, EventEmitter } from '../events';
import { MembershipService } from '../memberships';
import { DuplicateKeyError } from '../store/duplicate-key';
import { and, eq, text, withMembership } from '../store/filters';

export type CrudOperation = 'create' | 'update';

/** State shared by the hooks of one create or update */
export interface WriteContext {
  operation: CrudOperation;
  membership: Membership;
  utilizer: Utilizer;
  /** Caller payload as received, managed fields included */
  payload: DocumentObject;
  /** Candidate document; hooks and validators may rewrite it in place */
  document: DocumentObject;
  /** Persisted document on update, null on create */
  prior: DocumentObject | null;
  /** Id of the document being updated, null on create */
  id: string | null;
}

export type BulkDeleteOutcome = 'all_succeeded' | 'all_failed' | 'partial';

export interface BulkDeleteResult {
  outcome: BulkDeleteOutcome;
  succeededIds: string[];
  failedIds: string[];
}

export type MutationHandler = (event: IdentityEvent) => Promise<void> | void;

export interface CrudDependencies {
  store: DocumentStore;
  memberships: MembershipService;
  events: EventEmitter;
  clock?: () => Date;
}

/** Text-search language of a membership; 'none' disables stemming */
function searchLanguage(membership: Membership): string | null {
  const language = membership.default_language;
  return language && language !== 'none' ? language : null;
}

export abstract class MembershipBoundCrudService<T> {
  protected abstract readonly collection: string;
  protected abstract readonly resourceName: string;
  protected abstract readonly eventTypes: ResourceEventTypes;

  /** Stripped from every caller payload */
  protected readonly managedFields: readonly string[] = ['_id', 'membership_id', 'sys'];

  /** Removed from every returned document and event payload */
  protected readonly hiddenFields: readonly string[] = ['password_hash'];

  /** Reject an update that leaves the document unchanged */
  protected readonly rejectIdenticalUpdates: boolean = false;

  protected readonly store: DocumentStore;
  protected readonly memberships: MembershipService;
  protected readonly events: EventEmitter;
  protected readonly clock: () => Date;

  private readonly handlers: Record<'created' | 'updated' | 'deleted', MutationHandler[]> = {
    created: [],
    updated: [],
    deleted: [],
  };

  constructor(deps: CrudDependencies) {
    this.store = deps.store;
    this.memberships = deps.memberships;
    this.events = deps.events;
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Map a stored (already hidden-stripped) document onto the returned model */
  protected abstract toModel(doc: DocumentObject): T;

  /** Validate the candidate in ctx.document. Throws on failure. */
  protected abstract validate(ctx: WriteContext): Promise<void>;

  protected async beforeValidate(_ctx: WriteContext): Promise<void> {}

  protected async afterValidate(_ctx: WriteContext): Promise<void> {}

  // ── Post-mutation handlers ─────────────────────────────────────────

  onCreated(handler: MutationHandler): void {
    this.handlers.created.push(handler);
  }

  onUpdated(handler: MutationHandler): void {
    this.handlers.updated.push(handler);
  }

  onDeleted(handler: MutationHandler): void {
    this.handlers.deleted.push(handler);
  }

  // ── Reads ──────────────────────────────────────────────────────────

  async get(membershipId: string, id: string, options: OperationOptions = {}): Promise<T | null> {
    await this.requireMembership(membershipId, options);
    const doc = await this.store.findOne(this.collection, and(eq('membership_id', membershipId), eq('_id', id)));
    return doc ? this.toModel(this.hide(doc)) : null;
  }

  async list(membershipId: string, page: PageOptions = {}, options: OperationOptions = {}): Promise<PaginatedResult<T>> {
    await this.requireMembership(membershipId, options);
    return this.findPage(withMembership(membershipId), page);
  }

  async query(
    membershipId: string,
    filter: Filter,
    page: PageOptions = {},
    options: OperationOptions = {},
  ): Promise<PaginatedResult<T>> {
    await this.requireMembership(membershipId, options);
    return this.findPage(withMembership(membershipId, filter), page);
  }

  async search(
    membershipId: string,
    keyword: string,
    page: PageOptions = {},
    options: OperationOptions = {},
  ): Promise<PaginatedResult<T>> {
    const membership = await this.requireMembership(membershipId, options);
    const keywords = text(keyword, searchLanguage(membership), this.hiddenFields);
    return this.findPage(withMembership(membershipId, keywords), page);
  }

  private async findPage(filter: Filter, page: PageOptions): Promise<PaginatedResult<T>> {
    const { items, count } = await this.store.find(this.collection, filter, page);
    return { items: items.map((doc) => this.toModel(this.hide(doc))), count };
  }

  // ── Writes ─────────────────────────────────────────────────────────

  async create(
    utilizer: Utilizer,
    membershipId: string,
    payload: DocumentObject,
    options: OperationOptions = {},
  ): Promise<T> {
    const membership = await this.requireMembership(membershipId, options);

    const document = this.strip(payload);
    document.membership_id = membershipId;

    const ctx: WriteContext = { operation: 'create', membership, utilizer, payload, document, prior: null, id: null };
    await this.beforeValidate(ctx);
    await this.validate(ctx);
    await this.afterValidate(ctx);

    ctx.document.sys = this.stampCreated(utilizer);

    const stored = await this.insertDocument(ctx.document, options);
    return this.completeWrite('created', utilizer, membershipId, stored, null);
  }

  async update(
    utilizer: Utilizer,
    membershipId: string,
    id: string,
    partial: DocumentObject,
    options: OperationOptions = {},
  ): Promise<T> {
    const membership = await this.requireMembership(membershipId, options);
    const current = await this.requireDocument(membershipId, id);

    const document = mergeDocuments(current, this.strip(partial));
    document.membership_id = membershipId;

    const ctx: WriteContext = { operation: 'update', membership, utilizer, payload: partial, document, prior: current, id };
    await this.beforeValidate(ctx);

    if (this.rejectIdenticalUpdates && this.isIdentical(ctx.document, current)) {
      throw new IdenticalDocumentError();
    }

    await this.validate(ctx);
    await this.afterValidate(ctx);

    ctx.document.sys = this.stampModified(utilizer, current.sys);

    const stored = await this.replaceDocument(id, ctx.document, options);
    return this.completeWrite('updated', utilizer, membershipId, stored, current);
  }

  async delete(utilizer: Utilizer, membershipId: string, id: string, options: OperationOptions = {}): Promise<boolean> {
    await this.requireMembership(membershipId, options);
    const current = await this.requireDocument(membershipId, id);

    options.signal?.throwIfAborted();
    const deleted = await this.store.delete(this.collection, id);
    if (!deleted) return false;

    const removed = this.hide(current);
    await this.publish('deleted', {
      membershipId,
      eventType: this.eventTypes.deleted,
      utilizerId: utilizerId(utilizer),
      document: removed,
      prior: removed,
    });
    return true;
  }

  /** Deletes each id independently; missing ids are reported as failed */
  async bulkDelete(
    utilizer: Utilizer,
    membershipId: string,
    ids: readonly string[],
    options: OperationOptions = {},
  ): Promise<BulkDeleteResult> {
    await this.requireMembership(membershipId, options);

    const succeededIds: string[] = [];
    const failedIds: string[] = [];
    for (const id of ids) {
      let deleted: boolean;
      try {
        deleted = await this.delete(utilizer, membershipId, id, options);
      } catch (err) {
        if (!(err instanceof NotFoundError)) throw err;
        deleted = false;
      }
      (deleted ? succeededIds : failedIds).push(id);
    }

    const outcome: BulkDeleteOutcome =
      failedIds.length === 0 ? 'all_succeeded' : succeededIds.length === 0 ? 'all_failed' : 'partial';
    return { outcome, succeededIds, failedIds };
  }

  // ── Shared steps ───────────────────────────────────────────────────

  protected async requireMembership(membershipId: string, options: OperationOptions = {}): Promise<Membership> {
    options.signal?.throwIfAborted();
    return this.memberships.require(membershipId);
  }

  /** Current document with hidden fields intact, or NotFoundError */
  protected async requireDocument(membershipId: string, id: string): Promise<DocumentObject> {
    const current = await this.store.findOne(this.collection, and(eq('membership_id', membershipId), eq('_id', id)));
    if (!current) throw new NotFoundError(this.resourceName, id);
    return current;
  }

  protected strip(payload: DocumentObject): DocumentObject {
    return omitFields(cloneDocument(payload), this.managedFields);
  }

  protected hide(doc: DocumentObject): DocumentObject {
    return omitFields(doc, this.hiddenFields);
  }

  protected stampCreated(utilizer: Utilizer): SysMetadata {
    const now = this.clock().toISOString();
    const actor = utilizerName(utilizer);
    return { created_at: now, created_by: actor, modified_at: null, modified_by: null };
  }

  /** Keeps the creation stamp of the prior document when it has one */
  protected stampModified(utilizer: Utilizer, priorSys: DocumentValue | undefined): SysMetadata {
    const now = this.clock().toISOString();
    const actor = utilizerName(utilizer);
    if (isDocumentObject(priorSys) && typeof priorSys.created_at === 'string' && typeof priorSys.created_by === 'string') {
      return { created_at: priorSys.created_at, created_by: priorSys.created_by, modified_at: now, modified_by: actor };
    }
    return { created_at: now, created_by: actor, modified_at: now, modified_by: actor };
  }

  /** Structural equality ignoring the id and the audit stamp */
  protected isIdentical(candidate: DocumentObject, current: DocumentObject): boolean {
    const ignored = ['_id', 'sys'];
    return deepEqual(omitFields(candidate, ignored), omitFields(current, ignored));
  }

  protected async insertDocument(document: DocumentObject, options: OperationOptions): Promise<DocumentObject> {
    options.signal?.throwIfAborted();
    try {
      const id = await this.store.insert(this.collection, document);
      return { ...document, _id: id };
    } catch (err) {
      throw this.translateStoreError(err);
    }
  }

  protected async replaceDocument(id: string, document: DocumentObject, options: OperationOptions): Promise<DocumentObject> {
    options.signal?.throwIfAborted();
    let replaced: boolean;
    try {
      replaced = await this.store.replace(this.collection, id, document);
    } catch (err) {
      throw this.translateStoreError(err);
    }
    if (!replaced) throw new NotFoundError(this.resourceName, id);
    return { ...document, _id: id };
  }

  /** Store-level unique violations surface exactly like the pre-check */
  protected translateStoreError(err: unknown): unknown {
    if (err instanceof DuplicateKeyError) {
      const field = err.path ?? 'document';
      console.warn(`[${this.resourceName}] Store rejected duplicate value at '${field}' in ${err.collection}`);
      return new AlreadyExistsError([
        { field, reason: 'unique', message: `${this.resourceName} with the same ${field} already exists` },
      ]);
    }
    return err;
  }

  protected async completeWrite(
    kind: 'created' | 'updated',
    utilizer: Utilizer,
    membershipId: string,
    stored: DocumentObject,
    prior: DocumentObject | null,
  ): Promise<T> {
    const visible = this.hide(stored);
    await this.publish(kind, {
      membershipId,
      eventType: this.eventTypes[kind],
      utilizerId: utilizerId(utilizer),
      document: visible,
      prior: prior ? this.hide(prior) : null,
    });
    return this.toModel(visible);
  }

  /** Deliver the event, then run the handlers whether or not a sink failed */
  private async publish(kind: 'created' | 'updated' | 'deleted', input: EmitInput): Promise<void> {
    const event = this.events.build(input);
    try {
      await this.events.deliver(event);
    } finally {
      await this.runHandlers(kind, event);
    }
  }

  private async runHandlers(kind: 'created' | 'updated' | 'deleted', event: IdentityEvent): Promise<void> {
    for (const handler of this.handlers[kind]) {
      await handler(event);
    }
  }
}
