import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import { StoreError } from "./errors.ts";
import { documentId, isValidSessionId } from "./id.ts";
import type {
  MetadataFilter,
  PersistentStore,
  StoreMatch,
  StoreMetadata,
  StoredDocument,
} from "./types.ts";
import { isStoredDocument, matchesFilter, newestFirst, stampMetadata } from "./types.ts";

// ── Redis Client Interface ──────────────────────────────────────────────────
// The subset of ioredis the store needs, so tests can pass an in-memory fake.

export interface RedisStoreClient {
  incrby(key: string, increment: number): Promise<number>;
  rpush(key: string, ...values: string[]): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  quit(): Promise<string>;
  disconnect(): void;
}

export interface RedisConfig {
  readonly host: string;
  readonly port: number;
  readonly password: string | undefined;
  readonly keyPrefix?: string;
}

const DEFAULT_KEY_PREFIX = "campaign-forge";

// ── Redis Implementation ────────────────────────────────────────────────────
// Documents live in one append-only list; each session keeps a counter
// that hands out document ids.

export class RedisPersistentStore implements PersistentStore {
  private readonly logger: Logger;
  private readonly prefix: string;
  private readonly now: () => Date;

  constructor(
    private readonly client: RedisStoreClient,
    options?: { keyPrefix?: string; logger?: Logger; now?: () => Date },
  ) {
    this.prefix = options?.keyPrefix ?? DEFAULT_KEY_PREFIX;
    this.logger = (options?.logger ?? NULL_LOGGER).child({ module: "redis-store" });
    this.now = options?.now ?? (() => new Date());
  }

  get documentsKey(): string {
    return `${this.prefix}:documents`;
  }

  sequenceKey(sessionId: string): string {
    return `${this.prefix}:seq:${sessionId}`;
  }

  async add(
    texts: readonly string[],
    metadatas: readonly StoreMetadata[],
    sessionId: string,
  ): Promise<string[]> {
    if (!isValidSessionId(sessionId)) {
      throw new StoreError(`Invalid session id: "${sessionId}"`, "INVALID_ARGUMENT");
    }
    if (metadatas.length > 0 && metadatas.length !== texts.length) {
      throw new StoreError(
        `Expected ${texts.length} metadata records, got ${metadatas.length}`,
        "INVALID_ARGUMENT",
      );
    }
    if (texts.length === 0) return [];

    try {
      // INCRBY reserves a contiguous id range for this batch
      const last = await this.client.incrby(this.sequenceKey(sessionId), texts.length);
      const first = last - texts.length;
      const now = this.now();
      const docs: StoredDocument[] = texts.map((document, i) => ({
        id: documentId(sessionId, first + i),
        document,
        metadata: stampMetadata(metadatas[i], sessionId, now),
      }));

      await this.client.rpush(this.documentsKey, ...docs.map((d) => JSON.stringify(d)));
      this.logger.debug("store_documents_added", { sessionId, count: docs.length });
      return docs.map((d) => d.id);
    } catch (err: unknown) {
      throw new StoreError(
        `Redis write failed: ${err instanceof Error ? err.message : String(err)}`,
        "WRITE_FAILED",
      );
    }
  }

  async query(filter: MetadataFilter, limit: number): Promise<StoreMatch[]> {
    if (limit < 1) return [];

    let raw: string[];
    try {
      raw = await this.client.lrange(this.documentsKey, 0, -1);
    } catch (err: unknown) {
      throw new StoreError(
        `Redis read failed: ${err instanceof Error ? err.message : String(err)}`,
        "UNAVAILABLE",
      );
    }

    const matches: StoredDocument[] = [];
    for (const entry of raw) {
      const doc = parseDocument(entry);
      if (doc === null) {
        this.logger.warn("store_document_skipped", { reason: "unparseable entry" });
        continue;
      }
      if (matchesFilter(doc.metadata, filter)) matches.push(doc);
    }

    return newestFirst(matches)
      .slice(0, limit)
      .map((doc) => ({ ...doc, distance: 0 }));
  }

  async close(): Promise<void> {
    try {
      await this.client.quit();
    } catch (err: unknown) {
      this.logger.warn("redis_quit_failed", {
        error: err instanceof Error ? err.message : String(err),
      });
      this.client.disconnect();
    }
  }
}

function parseDocument(entry: string): StoredDocument | null {
  try {
    const parsed: unknown = JSON.parse(entry);
    return isStoredDocument(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

// ── Factory ─────────────────────────────────────────────────────────────────

/**
 * Connect to Redis with ioredis and wrap the client in a store.
 * ioredis is imported lazily so the file backend never loads it.
 */
export async function createRedisStore(
  config: RedisConfig,
  logger?: Logger,
): Promise<RedisPersistentStore> {
  const { default: Redis } = await import("ioredis");
  const client = new Redis({
    host: config.host,
    port: config.port,
    password: config.password,
    lazyConnect: true,
    maxRetriesPerRequest: 3,
  }) as unknown as RedisStoreClient;

  return new RedisPersistentStore(client, { keyPrefix: config.keyPrefix, logger });
}
