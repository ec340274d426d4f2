export {
  TieredCacheManager,
  SUBJECT_FIELD,
  PURPOSE_FIELD,
  GENERATED_AT_FIELD,
  type TieredCacheConfig,
  type GetOrGenerateOptions,
} from "./tiered-cache.ts";

export { VolatileCache, type VolatileRecord } from "./volatile-cache.ts";

export {
  TEXT_CODEC,
  jsonCodec,
  CACHE_PURPOSES,
  type CacheCodec,
  type CacheEntry,
  type CacheHit,
  type CacheEmpty,
  type CacheFailure,
  type CachePurpose,
  type CompositeKey,
  type Provenance,
} from "./types.ts";
