// =============================================================================
// WARDEN — TTL Cache
//
// Process-local key/value cache with a per-entry absolute expiry. Entries
// are replaced whole (remove, then set); values are never mutated in place,
// so a reader holds either the previous or the next snapshot.
// =============================================================================

interface Entry<T> {
  value: T;
  expiresAt: number;
}

export class TtlCache<T> {
  private readonly entries = new Map<string, Entry<T>>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.clock().getTime()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T, ttlSeconds: number): void {
    this.entries.set(key, { value, expiresAt: this.clock().getTime() + ttlSeconds * 1000 });
  }

  remove(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Swap the entry for a fresh one with a new TTL */
  replace(key: string, value: T, ttlSeconds: number): void {
    this.remove(key);
    this.set(key, value, ttlSeconds);
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }
}
