// src/infra/kv/kv-store.ts

/**
 * The only state shared between connections.
 *
 * Every method is synchronous: a call owns the whole mapping until it
 * returns and can never be interleaved with another caller at an `await`.
 */
export interface KvStore {
  get(key: string): Buffer | null;
  set(key: string, value: Buffer): void;
  size(): number;
}

export class MemoryStore implements KvStore {
  private readonly entries = new Map<string, Buffer>();

  get(key: string): Buffer | null {
    return this.entries.get(key) ?? null;
  }

  set(key: string, value: Buffer): void {
    this.entries.set(key, value);
  }

  size(): number {
    return this.entries.size;
  }
}
