import type { CompositeKey } from "./types.ts";

export interface VolatileRecord<T> {
  readonly value: T;
  readonly generatedAt: string;
}

/** Session-scoped in-memory tier keyed by exact (subject, purpose). */
export class VolatileCache<T> {
  private readonly entries = new Map<string, VolatileRecord<T>>();

  static keyOf(key: CompositeKey): string {
    return `${key.subject}\u0000${key.purpose}`;
  }

  get(key: CompositeKey): VolatileRecord<T> | undefined {
    return this.entries.get(VolatileCache.keyOf(key));
  }

  set(key: CompositeKey, record: VolatileRecord<T>): void {
    this.entries.set(VolatileCache.keyOf(key), record);
  }

  has(key: CompositeKey): boolean {
    return this.entries.has(VolatileCache.keyOf(key));
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
