// ── Composite Key ───────────────────────────────────────────────────────────

export interface CompositeKey {
  /** Subject identifier, e.g. the company name. */
  readonly subject: string;
  /** Purpose label, e.g. "research" or "marketing". */
  readonly purpose: string;
}

export const CACHE_PURPOSES = ["research", "marketing"] as const;
export type CachePurpose = (typeof CACHE_PURPOSES)[number];

// ── Cache Entry ─────────────────────────────────────────────────────────────

export type Provenance = "volatile-hit" | "persistent-hit" | "freshly-generated";

export interface CacheHit<T> {
  readonly status: "ok";
  readonly key: CompositeKey;
  readonly value: T;
  readonly provenance: Provenance;
  readonly generatedAt: string;
}

/** The generator succeeded but produced nothing usable; nothing was cached. */
export interface CacheEmpty<T> {
  readonly status: "empty";
  readonly key: CompositeKey;
  readonly value: T;
  readonly provenance: "freshly-generated";
  readonly generatedAt: string;
}

export interface CacheFailure {
  readonly status: "failed";
  readonly key: CompositeKey;
  readonly error: Error;
  readonly failedAt: string;
}

export type CacheEntry<T> = CacheHit<T> | CacheEmpty<T> | CacheFailure;

// ── Codec ───────────────────────────────────────────────────────────────────

/** Converts cached values to and from the persistent tier's text documents. */
export interface CacheCodec<T> {
  encode(value: T): string;
  /** Returns null when a stored document cannot be read back as T. */
  decode(document: string): T | null;
  isEmpty?(value: T): boolean;
}

export const TEXT_CODEC: CacheCodec<string> = {
  encode: (value) => value,
  decode: (document) => document,
  isEmpty: (value) => value.trim().length === 0,
};

export function jsonCodec<T>(
  guard: (value: unknown) => value is T,
  isEmpty?: (value: T) => boolean,
): CacheCodec<T> {
  return {
    encode: (value) => JSON.stringify(value),
    decode: (document) => {
      try {
        const parsed: unknown = JSON.parse(document);
        return guard(parsed) ? parsed : null;
      } catch {
        return null;
      }
    },
    isEmpty,
  };
}
