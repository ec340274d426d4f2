export { FileSystemPersistentStore, type FileStoreConfig } from "./file-store.ts";

export {
  RedisPersistentStore,
  createRedisStore,
  type RedisStoreClient,
  type RedisConfig,
} from "./redis-store.ts";

export { StoreError, type StoreErrorCode } from "./errors.ts";

export { generateSessionId, documentId, isValidSessionId, compactTimestamp } from "./id.ts";

export { acquireLock, lockPathFor, type FileLock, type LockOptions } from "./lock.ts";

export {
  matchesFilter,
  stampMetadata,
  newestFirst,
  isStoredDocument,
  STORE_BACKENDS,
  type PersistentStore,
  type StoreBackend,
  type StoreMatch,
  type StoreMetadata,
  type StoredDocument,
  type MetadataFilter,
} from "./types.ts";
