// ── Store Error Codes ───────────────────────────────────────────────────────

export type StoreErrorCode =
  | "READ_FAILED"
  | "WRITE_FAILED"
  | "PARSE_ERROR"
  | "LOCK_TIMEOUT"
  | "INVALID_ARGUMENT"
  | "UNAVAILABLE";

// ── Store Error ─────────────────────────────────────────────────────────────

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly code: StoreErrorCode,
    public readonly path?: string,
  ) {
    super(message);
    this.name = "StoreError";
  }
}
