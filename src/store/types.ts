// ── Metadata ────────────────────────────────────────────────────────────────

/** Flat string metadata stored beside every document. */
export type StoreMetadata = Readonly<Record<string, string>>;

/** Exact-equality predicate: every listed field must match verbatim. */
export type MetadataFilter = Readonly<Record<string, string>>;

export interface StoredDocument {
  readonly id: string;
  readonly document: string;
  readonly metadata: StoreMetadata;
}

export interface StoreMatch extends StoredDocument {
  /** Always 0 for exact-match lookups; kept for interface parity with vector stores. */
  readonly distance: number;
}

// ── Persistent Store ────────────────────────────────────────────────────────

/**
 * Durable, append-only document store queried by exact metadata equality.
 * `add` stamps `timestamp` and `session_id` into each metadata record.
 * `query` returns matches newest first.
 */
export interface PersistentStore {
  add(
    texts: readonly string[],
    metadatas: readonly StoreMetadata[],
    sessionId: string,
  ): Promise<string[]>;
  query(filter: MetadataFilter, limit: number): Promise<StoreMatch[]>;
  close(): Promise<void>;
}

export const STORE_BACKENDS = ["file", "redis"] as const;
export type StoreBackend = (typeof STORE_BACKENDS)[number];

// ── Helpers shared by backends ──────────────────────────────────────────────

export function matchesFilter(metadata: StoreMetadata, filter: MetadataFilter): boolean {
  return Object.entries(filter).every(([key, value]) => metadata[key] === value);
}

export function stampMetadata(
  metadata: StoreMetadata | undefined,
  sessionId: string,
  now: Date,
): StoreMetadata {
  return {
    ...metadata,
    timestamp: now.toISOString(),
    session_id: sessionId,
  };
}

/** Newest first; equal timestamps keep reverse insertion order. */
export function newestFirst(docs: readonly StoredDocument[]): StoredDocument[] {
  return docs
    .map((doc, index) => ({ doc, index }))
    .sort((a, b) => {
      const ta = a.doc.metadata["timestamp"] ?? "";
      const tb = b.doc.metadata["timestamp"] ?? "";
      if (ta !== tb) return ta < tb ? 1 : -1;
      return b.index - a.index;
    })
    .map(({ doc }) => doc);
}

export function isStoredDocument(value: unknown): value is StoredDocument {
  if (typeof value !== "object" || value === null) return false;
  if (!("id" in value) || typeof value.id !== "string") return false;
  if (!("document" in value) || typeof value.document !== "string") return false;
  if (!("metadata" in value)) return false;
  const metadata = value.metadata;
  if (typeof metadata !== "object" || metadata === null) return false;
  return Object.values(metadata).every((m) => typeof m === "string");
}
