import { mkdir, rmdir, stat } from "node:fs/promises";
import { StoreError } from "./errors.ts";

// ── Session File Lock ───────────────────────────────────────────────────────
// `<file>.lock` is a directory: mkdir either creates it or fails with EEXIST,
// so only one writer at a time gets past acquisition.

export interface FileLock {
  release(): Promise<void>;
}

export interface LockOptions {
  readonly timeoutMs?: number;
  /** A lock directory older than this is considered abandoned. */
  readonly staleAfterMs?: number;
  readonly pollIntervalMs?: number;
}

const LOCK_DEFAULTS = {
  timeoutMs: 5_000,
  staleAfterMs: 60_000,
  pollIntervalMs: 50,
} as const;

export function lockPathFor(filePath: string): string {
  return `${filePath}.lock`;
}

/**
 * Take the write lock for a session file, waiting up to `timeoutMs` for a
 * current holder. Throws StoreError LOCK_TIMEOUT when the wait runs out.
 */
export async function acquireLock(filePath: string, options: LockOptions = {}): Promise<FileLock> {
  const timeoutMs = options.timeoutMs ?? LOCK_DEFAULTS.timeoutMs;
  const staleAfterMs = options.staleAfterMs ?? LOCK_DEFAULTS.staleAfterMs;
  const pollIntervalMs = options.pollIntervalMs ?? LOCK_DEFAULTS.pollIntervalMs;
  const lockPath = lockPathFor(filePath);
  const deadline = Date.now() + timeoutMs;

  while (!(await tryCreate(lockPath))) {
    if (await isStale(lockPath, staleAfterMs)) {
      await removeLockDir(lockPath);
      continue;
    }
    if (Date.now() > deadline) {
      throw new StoreError(
        `Lock timeout after ${timeoutMs}ms on ${filePath}`,
        "LOCK_TIMEOUT",
        filePath,
      );
    }
    await new Promise((resolve) => setTimeout(resolve, pollIntervalMs));
  }

  return { release: () => removeLockDir(lockPath) };
}

async function tryCreate(lockPath: string): Promise<boolean> {
  try {
    await mkdir(lockPath);
    return true;
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === "EEXIST") return false;
    throw err;
  }
}

async function isStale(lockPath: string, staleAfterMs: number): Promise<boolean> {
  try {
    const { mtimeMs } = await stat(lockPath);
    return Date.now() - mtimeMs > staleAfterMs;
  } catch (err: unknown) {
    // Released between mkdir and stat; the next mkdir will tell
    if (isErrnoException(err) && err.code === "ENOENT") return false;
    throw err;
  }
}

async function removeLockDir(lockPath: string): Promise<void> {
  try {
    await rmdir(lockPath);
  } catch (err: unknown) {
    if (!isErrnoException(err) || err.code !== "ENOENT") throw err;
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
