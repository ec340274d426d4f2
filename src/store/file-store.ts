import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import { StoreError } from "./errors.ts";
import { documentId, isValidSessionId } from "./id.ts";
import { acquireLock, isErrnoException } from "./lock.ts";
import type { LockOptions } from "./lock.ts";
import type {
  MetadataFilter,
  PersistentStore,
  StoreMatch,
  StoreMetadata,
  StoredDocument,
} from "./types.ts";
import { isStoredDocument, matchesFilter, newestFirst, stampMetadata } from "./types.ts";

// ── Config ──────────────────────────────────────────────────────────────────

export interface FileStoreConfig {
  readonly rootDir: string;
  readonly lock?: LockOptions;
  readonly now?: () => Date;
}

// ── FileSystem Implementation ───────────────────────────────────────────────
// One JSON array of documents per session: {rootDir}/{sessionId}.json

export class FileSystemPersistentStore implements PersistentStore {
  private readonly rootDir: string;
  private readonly logger: Logger;
  private initialized = false;

  constructor(
    private readonly config: FileStoreConfig,
    logger?: Logger,
  ) {
    this.rootDir = resolve(config.rootDir);
    this.logger = (logger ?? NULL_LOGGER).child({ module: "file-store" });
  }

  sessionFile(sessionId: string): string {
    return resolve(this.rootDir, `${sessionId}.json`);
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

    await this.ensureDir();
    const filePath = this.sessionFile(sessionId);
    const lock = await acquireLock(filePath, this.config.lock);
    try {
      const existing = await this.readSession(filePath);
      const now = (this.config.now ?? (() => new Date()))();
      const added: StoredDocument[] = texts.map((document, i) => ({
        id: documentId(sessionId, existing.length + i),
        document,
        metadata: stampMetadata(metadatas[i], sessionId, now),
      }));

      try {
        await writeFile(filePath, JSON.stringify([...existing, ...added], null, 2), "utf-8");
      } catch (err: unknown) {
        throw new StoreError(
          `Failed to write session file: ${err instanceof Error ? err.message : String(err)}`,
          "WRITE_FAILED",
          filePath,
        );
      }

      this.logger.debug("store_documents_added", { sessionId, count: added.length });
      return added.map((d) => d.id);
    } finally {
      await lock.release();
    }
  }

  async query(filter: MetadataFilter, limit: number): Promise<StoreMatch[]> {
    if (limit < 1) return [];
    await this.ensureDir();

    const files = (await readdir(this.rootDir)).filter((f) => f.endsWith(".json"));
    const matches: StoredDocument[] = [];
    for (const file of files) {
      let docs: StoredDocument[];
      try {
        docs = await this.readSession(resolve(this.rootDir, file));
      } catch (err: unknown) {
        // One unreadable session must not hide the others
        this.logger.warn("store_session_skipped", {
          file,
          error: err instanceof Error ? err.message : String(err),
        });
        continue;
      }
      matches.push(...docs.filter((d) => matchesFilter(d.metadata, filter)));
    }

    return newestFirst(matches)
      .slice(0, limit)
      .map((doc) => ({ ...doc, distance: 0 }));
  }

  async close(): Promise<void> {
    // Nothing held open between calls
  }

  private async readSession(filePath: string): Promise<StoredDocument[]> {
    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === "ENOENT") return [];
      throw new StoreError(`Failed to read: ${filePath}`, "READ_FAILED", filePath);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      throw new StoreError(`Corrupt session file: ${filePath}`, "PARSE_ERROR", filePath);
    }
    if (!Array.isArray(parsed) || !parsed.every(isStoredDocument)) {
      throw new StoreError(`Unexpected session file shape: ${filePath}`, "PARSE_ERROR", filePath);
    }
    return parsed;
  }

  private async ensureDir(): Promise<void> {
    if (!this.initialized) {
      await mkdir(this.rootDir, { recursive: true });
      this.initialized = true;
    }
  }
}
