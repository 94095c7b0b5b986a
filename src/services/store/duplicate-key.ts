// =============================================================================
// WARDEN — Store-Level Duplicate Key Failure
//
// Raised by adapters when a unique index rejects a write. Services never let
// it escape: it is translated into AlreadyExistsError.
// =============================================================================

export class DuplicateKeyError extends Error {
  constructor(
    public readonly collection: string,
    /** Offending path, when the adapter can tell */
    public readonly path: string | null,
  ) {
    super(`Duplicate key in '${collection}'${path ? ` at '${path}'` : ''}`);
    this.name = 'DuplicateKeyError';
  }
}
