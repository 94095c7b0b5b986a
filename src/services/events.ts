// =============================================================================
// WARDEN — Event Emitter
//
// Every mutation produces one IdentityEvent after its persistence write.
// The emitter hands it to each registered sink in order and awaits each;
// a failing sink fails the emit, and with it the calling operation, after
// the write has already been committed.
//
// Sinks:
//   PgEventSink        append-only identity_events table, SHA-512 hashed
//   InMemoryEventSink  keeps events in process (tests, embedding)
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { DocumentObject } from '../types/documents';
import { EventSink, IdentityEvent, IdentityEventType } from '../types/events';
import { sha512 } from './crypto/encryption';
import { Queryable } from './store/postgres';

export interface EmitInput {
  membershipId: string;
  eventType: IdentityEventType;
  utilizerId: string;
  document: DocumentObject | null;
  prior: DocumentObject | null;
}

export class EventEmitter {
  private readonly sinks: EventSink[];
  private readonly clock: () => Date;

  constructor(sinks: EventSink[] = [], clock: () => Date = () => new Date()) {
    this.sinks = [...sinks];
    this.clock = clock;
  }

  register(sink: EventSink): void {
    this.sinks.push(sink);
  }

  /** Stamp an event without delivering it */
  build(input: EmitInput): IdentityEvent {
    return {
      event_id: uuidv4(),
      membership_id: input.membershipId,
      event_type: input.eventType,
      utilizer_id: input.utilizerId,
      document: input.document,
      prior: input.prior,
      event_time: this.clock().toISOString(),
    };
  }

  async deliver(event: IdentityEvent): Promise<void> {
    for (const sink of this.sinks) {
      await sink.deliver(event);
    }
  }

  async emit(input: EmitInput): Promise<IdentityEvent> {
    const event = this.build(input);
    await this.deliver(event);
    return event;
  }
}

export class InMemoryEventSink implements EventSink {
  readonly name = 'in-memory';
  readonly events: IdentityEvent[] = [];

  async deliver(event: IdentityEvent): Promise<void> {
    this.events.push(event);
  }

  ofType(eventType: IdentityEventType): IdentityEvent[] {
    return this.events.filter((e) => e.event_type === eventType);
  }

  clear(): void {
    this.events.length = 0;
  }
}

/** SHA-512 over the serialized event, for integrity verification */
export function eventHash(event: IdentityEvent): string {
  return sha512(JSON.stringify({
    id: event.event_id,
    timestamp: event.event_time,
    membershipId: event.membership_id,
    eventType: event.event_type,
    utilizerId: event.utilizer_id,
    document: event.document,
    prior: event.prior,
  }));
}

/**
 * Append events to identity_events. Append-only: a database trigger
 * rejects any UPDATE or DELETE on the table.
 */
export class PgEventSink implements EventSink {
  readonly name = 'postgres';

  constructor(private readonly db: Queryable) {}

  async deliver(event: IdentityEvent): Promise<void> {
    await this.db.query(
      `INSERT INTO identity_events
         (id, membership_id, event_type, utilizer_id, document, prior, event_time, event_hash)
       VALUES ($1, $2, $3, $4, $5::jsonb, $6::jsonb, $7, $8)`,
      [
        event.event_id,
        event.membership_id,
        event.event_type,
        event.utilizer_id,
        event.document ? JSON.stringify(event.document) : null,
        event.prior ? JSON.stringify(event.prior) : null,
        event.event_time,
        eventHash(event),
      ],
    );
  }
}
