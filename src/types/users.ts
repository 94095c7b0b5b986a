// =============================================================================
// WARDEN — User Types & User Documents
//
// A user type is a tenant-defined schema. Users are dynamic documents
// validated against the effective schema of their type (own properties
// merged over those inherited through base_type).
// =============================================================================

import { DocumentObject, SysMetadata } from './documents';

export const PROPERTY_TYPES = [
  'string',
  'integer',
  'float',
  'boolean',
  'object',
  'array',
  'date',
  'email',
  'reference',
] as const;

export type PropertyType = (typeof PROPERTY_TYPES)[number];

export type ReferenceCardinality = 'single' | 'multiple';

export type ReferenceDefinition = {
  cardinality: ReferenceCardinality;
  /** User type slug the referenced documents must be (or inherit from) */
  content_type: string | null;
};

export type PropertyDefinition = {
  /** Dotted path inside the document */
  path: string;
  type: PropertyType;
  unique: boolean;
  /** Only for type 'reference' */
  reference: ReferenceDefinition | null;
  description: string | null;
};

export type UserType = {
  _id: string;
  membership_id: string;
  name: string;
  slug: string;
  description: string | null;
  is_abstract: boolean;
  /** Slug of the parent type; null only for the origin type */
  base_type: string | null;
  properties: PropertyDefinition[];
  /** Paths that must be present and non-null */
  required: string[];
  sys: SysMetadata | null;
};

/** Type with inherited properties and required paths folded in */
export interface EffectiveSchema {
  name: string;
  slug: string;
  is_abstract: boolean;
  properties: PropertyDefinition[];
  required: string[];
}

/** Slug of the synthesized root type every user type inherits from */
export const ORIGIN_USER_TYPE_SLUG = 'base-user';

/** Where a user account originates; only 'local' accounts carry a password */
export const SOURCE_PROVIDERS = ['local', 'google', 'facebook', 'microsoft', 'apple', 'github'] as const;

export type SourceProvider = (typeof SOURCE_PROVIDERS)[number];

/** User documents are schema-free beyond a handful of well-known keys */
export type UserDocument = DocumentObject;

/** Returned by password reset; the token itself is a signed JWT */
export type ResetPasswordToken = {
  reset_token: string;
  /** Lifetime in seconds */
  expires_in: number;
  created_at: string;
};

/** Where the redemption link should point */
export interface ResetPasswordServerContext {
  /** Public URL of the identity API, forwarded to the set-password page */
  serverUrl: string;
  /** Host serving the set-password page */
  host: string;
}
