// =============================================================================
// WARDEN — Event Descriptions
//
// Every mutation produces one typed event after its persistence write.
// Delivery (webhooks, mail, audit storage) belongs to the registered sinks.
// =============================================================================

import { DocumentObject } from './documents';

export type IdentityEventType =
  | 'user_created'
  | 'user_updated'
  | 'user_deleted'
  | 'user_password_changed'
  | 'user_password_reset'
  | 'role_created'
  | 'role_updated'
  | 'role_deleted'
  | 'user_type_created'
  | 'user_type_updated'
  | 'user_type_deleted';

export interface IdentityEvent {
  event_id: string;
  membership_id: string;
  event_type: IdentityEventType;
  /** Acting identity ('system' for system utilizers) */
  utilizer_id: string;
  /** Resulting document; for deletions, the removed document */
  document: DocumentObject | null;
  /** Document before the mutation; null for creations */
  prior: DocumentObject | null;
  event_time: string;
}

/** A delivery target. Sinks are awaited in registration order. */
export interface EventSink {
  readonly name: string;
  deliver(event: IdentityEvent): Promise<void>;
}

/** Event types emitted by one CRUD resource */
export interface ResourceEventTypes {
  created: IdentityEventType;
  updated: IdentityEventType;
  deleted: IdentityEventType;
}
