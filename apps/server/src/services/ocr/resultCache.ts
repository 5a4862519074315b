import { createHash } from "node:crypto";

export const DEFAULT_CACHE_CAPACITY = 128;

export function digestOf(bytes: Buffer): string {
  return createHash("sha256").update(bytes).digest("hex");
}

/**
 * Bounded digest → value map. Eviction follows insertion order (FIFO):
 * reading an entry does not refresh it, and overwriting a key keeps its slot.
 */
export class ResultCache<V> {
  private readonly entries = new Map<string, V>();
  readonly capacity: number;

  constructor(capacity = DEFAULT_CACHE_CAPACITY) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  get size(): number {
    return this.entries.size;
  }

  get(digest: string): V | undefined {
    return this.entries.get(digest);
  }

  has(digest: string): boolean {
    return this.entries.has(digest);
  }

  put(digest: string, value: V): void {
    if (this.entries.has(digest)) {
      this.entries.set(digest, value);
      return;
    }
    this.entries.set(digest, value);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}
