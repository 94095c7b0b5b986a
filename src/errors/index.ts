// =============================================================================
// WARDEN — Error Taxonomy
//
// One class per failure kind. Validation failures are cumulative: a caller
// receives every field problem of a payload in one error. Everything else
// fails fast. Passwords and password hashes never appear in an error.
// =============================================================================

import { DocumentValue } from '../types/documents';

export type IdentityErrorCode =
  | 'not_found'
  | 'membership_not_found'
  | 'validation_failed'
  | 'conflicting_patterns'
  | 'already_exists'
  | 'password_required'
  | 'password_too_short'
  | 'identical_document'
  | 'reserved_name_violation'
  | 'access_denied'
  | 'invalid_token'
  | 'token_expired'
  | 'immutable'
  | 'malformed_pattern';

export type FieldErrorReason =
  | 'required'
  | 'type'
  | 'format'
  | 'unique'
  | 'reference'
  | 'content_type'
  | 'conflict'
  | 'malformed'
  | 'not_found'
  | 'abstract';

/** A single field-scoped problem */
export interface FieldError {
  field: string;
  reason: FieldErrorReason;
  message: string;
  /** Offending value, only where it is safe to echo back */
  value?: DocumentValue;
}

export class IdentityError extends Error {
  constructor(
    public readonly code: IdentityErrorCode,
    message: string,
    /** Status the HTTP layer should answer with */
    public readonly status: number,
  ) {
    super(message);
    this.name = 'IdentityError';
  }

  toJSON(): Record<string, unknown> {
    return { error: this.message, code: this.code };
  }
}

// ── Lookups ────────────────────────────────────────────────────────────

export class NotFoundError extends IdentityError {
  constructor(
    public readonly resource: string,
    public readonly key: string,
    public readonly field: string = '_id',
    code: IdentityErrorCode = 'not_found',
  ) {
    super(code, `${resource} not found (${field}: '${key}')`, 404);
    this.name = 'NotFoundError';
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), resource: this.resource, field: this.field };
  }
}

export class MembershipNotFoundError extends NotFoundError {
  constructor(membershipId: string) {
    super('Membership', membershipId, '_id', 'membership_not_found');
    this.name = 'MembershipNotFoundError';
  }
}

// ── Validation ─────────────────────────────────────────────────────────

export class ValidationFailedError extends IdentityError {
  constructor(
    public readonly errors: FieldError[],
    message = 'Validation failed',
    code: IdentityErrorCode = 'validation_failed',
    status = 400,
  ) {
    super(code, message, status);
    this.name = 'ValidationFailedError';
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), errors: this.errors };
  }
}

export class ConflictingPatternsError extends ValidationFailedError {
  constructor(errors: FieldError[]) {
    super(errors, errors[0]?.message ?? 'Permitted and forbidden sets are conflicted', 'conflicting_patterns');
    this.name = 'ConflictingPatternsError';
  }
}

/** Duplicate slug or unique value, whether caught by a pre-check or by the store */
export class AlreadyExistsError extends ValidationFailedError {
  constructor(errors: FieldError[]) {
    super(errors, errors[0]?.message ?? 'Already exists', 'already_exists', 409);
    this.name = 'AlreadyExistsError';
  }
}

export class PasswordRequiredError extends ValidationFailedError {
  constructor() {
    super(
      [{ field: 'password', reason: 'required', message: 'Password is required' }],
      'Password is required',
      'password_required',
    );
    this.name = 'PasswordRequiredError';
  }
}

export class PasswordTooShortError extends ValidationFailedError {
  constructor(public readonly minLength: number) {
    super(
      [{ field: 'password', reason: 'format', message: `Password must be at least ${minLength} characters` }],
      `Password must be at least ${minLength} characters`,
      'password_too_short',
    );
    this.name = 'PasswordTooShortError';
  }
}

/**
 * Raise the accumulated field errors, if any, as one failure.
 * Uniqueness-only and conflict-only sets get their dedicated classes so
 * callers see one taxonomy whichever layer caught the problem.
 */
export function raiseFieldErrors(errors: FieldError[]): void {
  if (errors.length === 0) return;

  if (errors.every((e) => e.reason === 'unique')) {
    throw new AlreadyExistsError(errors);
  }
  if (errors.every((e) => e.reason === 'conflict')) {
    throw new ConflictingPatternsError(errors);
  }
  throw new ValidationFailedError(errors);
}

// ── Mutation rules ─────────────────────────────────────────────────────

export class IdenticalDocumentError extends IdentityError {
  constructor() {
    super('identical_document', 'No changes: the document is identical to the current one', 409);
    this.name = 'IdenticalDocumentError';
  }
}

export class ReservedNameViolationError extends IdentityError {
  constructor(public readonly reservedName: string) {
    super('reserved_name_violation', `'${reservedName}' is a reserved name`, 403);
    this.name = 'ReservedNameViolationError';
  }
}

export class ImmutableError extends IdentityError {
  constructor(public readonly field: string) {
    super('immutable', `The '${field}' field can not be changed`, 409);
    this.name = 'ImmutableError';
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), field: this.field };
  }
}

// ── Access & tokens ────────────────────────────────────────────────────

export class AccessDeniedError extends IdentityError {
  constructor(message = 'Unauthorized access') {
    super('access_denied', message, 403);
    this.name = 'AccessDeniedError';
  }
}

export class InvalidTokenError extends IdentityError {
  constructor() {
    super('invalid_token', 'Token could not be decoded', 401);
    this.name = 'InvalidTokenError';
  }
}

export class TokenExpiredError extends IdentityError {
  constructor() {
    super('token_expired', 'Token was expired', 401);
    this.name = 'TokenExpiredError';
  }
}

// ── Patterns ───────────────────────────────────────────────────────────

export class MalformedPatternError extends IdentityError {
  constructor(
    public readonly pattern: string,
    reason: string,
  ) {
    super('malformed_pattern', `Malformed access pattern '${pattern}': ${reason}`, 400);
    this.name = 'MalformedPatternError';
  }
}
