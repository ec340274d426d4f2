import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import type { PersistentStore, StoreMatch } from "../store/types.ts";
import type { CacheCodec, CacheEntry, CompositeKey } from "./types.ts";
import { VolatileCache } from "./volatile-cache.ts";

// ── Metadata Fields ─────────────────────────────────────────────────────────

export const SUBJECT_FIELD = "subject";
export const PURPOSE_FIELD = "content_type";
export const GENERATED_AT_FIELD = "generated_at";

// ── Config ──────────────────────────────────────────────────────────────────

export interface TieredCacheConfig<T> {
  readonly store: PersistentStore;
  readonly sessionId: string;
  readonly codec: CacheCodec<T>;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

export interface GetOrGenerateOptions {
  /** Skip both tiers and always call the generator. */
  readonly forceFresh?: boolean;
}

// ── Tiered Cache Manager ────────────────────────────────────────────────────

/**
 * Get-or-generate over a volatile (session) tier and a persistent
 * exact-match tier. Each call invokes the generator at most once and never
 * retries it; wrap the generator in a retry policy for that.
 *
 * The persistent tier is append-only from here: a fresh result adds a new
 * document, and reads take the newest match.
 */
export class TieredCacheManager<T> {
  private readonly volatile = new VolatileCache<T>();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly config: TieredCacheConfig<T>) {
    this.logger = (config.logger ?? NULL_LOGGER).child({ module: "tiered-cache" });
    this.now = config.now ?? (() => new Date());
  }

  get sessionId(): string {
    return this.config.sessionId;
  }

  async getOrGenerate(
    key: CompositeKey,
    generator: () => Promise<T>,
    options?: GetOrGenerateOptions,
  ): Promise<CacheEntry<T>> {
    if (!options?.forceFresh) {
      const cached = this.volatile.get(key);
      if (cached) {
        this.logger.debug("cache_volatile_hit", { ...key });
        return { status: "ok", key, provenance: "volatile-hit", ...cached };
      }

      const persisted = await this.lookupPersistent(key);
      if (persisted) {
        this.volatile.set(key, persisted);
        this.logger.info("cache_persistent_hit", { ...key });
        return { status: "ok", key, provenance: "persistent-hit", ...persisted };
      }
    }

    return this.generate(key, generator);
  }

  /** Drop the session tier; the persistent tier is untouched. */
  clearSession(): void {
    this.volatile.clear();
  }

  // ── Tiers ───────────────────────────────────────────────────────────────

  private async lookupPersistent(
    key: CompositeKey,
  ): Promise<{ value: T; generatedAt: string } | null> {
    let matches: StoreMatch[];
    try {
      matches = await this.config.store.query(
        { [SUBJECT_FIELD]: key.subject, [PURPOSE_FIELD]: key.purpose },
        1,
      );
    } catch (err: unknown) {
      // An unavailable store counts as a miss
      this.logger.warn("cache_persistent_unavailable", {
        ...key,
        error: errorMessage(err),
      });
      return null;
    }

    const match = matches[0];
    if (!match) return null;

    const value = this.config.codec.decode(match.document);
    if (value === null) {
      this.logger.warn("cache_persistent_undecodable", { ...key, id: match.id });
      return null;
    }

    return {
      value,
      generatedAt:
        match.metadata[GENERATED_AT_FIELD] ?? match.metadata["timestamp"] ?? "",
    };
  }

  private async generate(
    key: CompositeKey,
    generator: () => Promise<T>,
  ): Promise<CacheEntry<T>> {
    let value: T;
    try {
      value = await generator();
    } catch (err: unknown) {
      this.logger.error("cache_generation_failed", { ...key, error: errorMessage(err) });
      return {
        status: "failed",
        key,
        error: err instanceof Error ? err : new Error(String(err)),
        failedAt: this.now().toISOString(),
      };
    }

    const generatedAt = this.now().toISOString();

    if (this.config.codec.isEmpty?.(value)) {
      this.logger.warn("cache_generation_empty", { ...key });
      return { status: "empty", key, provenance: "freshly-generated", value, generatedAt };
    }

    this.volatile.set(key, { value, generatedAt });
    await this.persist(key, value, generatedAt);
    this.logger.info("cache_freshly_generated", { ...key });
    return { status: "ok", key, provenance: "freshly-generated", value, generatedAt };
  }

  private async persist(key: CompositeKey, value: T, generatedAt: string): Promise<void> {
    try {
      await this.config.store.add(
        [this.config.codec.encode(value)],
        [
          {
            [SUBJECT_FIELD]: key.subject,
            [PURPOSE_FIELD]: key.purpose,
            [GENERATED_AT_FIELD]: generatedAt,
          },
        ],
        this.config.sessionId,
      );
    } catch (err: unknown) {
      // The session still has the value in its volatile tier
      this.logger.warn("cache_persist_failed", { ...key, error: errorMessage(err) });
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
