/**
 * Bounded set of recently seen keys. Insertion-ordered; the oldest key is
 * evicted once capacity is reached.
 */
export class RecentKeySet {
  private keys: Set<string> = new Set();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`RecentKeySet capacity must be a positive integer, got ${capacity}`);
    }
  }

  has(key: string): boolean {
    return this.keys.has(key);
  }

  /** Returns false when the key was already present. */
  add(key: string): boolean {
    if (this.keys.has(key)) {
      return false;
    }
    if (this.keys.size >= this.capacity) {
      const oldest = this.keys.values().next();
      if (!oldest.done) {
        this.keys.delete(oldest.value);
      }
    }
    this.keys.add(key);
    return true;
  }

  get size(): number {
    return this.keys.size;
  }

  clear(): void {
    this.keys.clear();
  }
}
