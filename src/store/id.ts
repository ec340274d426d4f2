import { randomBytes } from "node:crypto";

/** UTC timestamp as {YYYYMMDD}_{HHMMSS}, e.g. "20260219_143005". */
export function compactTimestamp(now: Date = new Date()): string {
  const iso = now.toISOString();
  const date = iso.slice(0, 10).replace(/-/g, "");
  const time = iso.slice(11, 19).replace(/:/g, "");
  return `${date}_${time}`;
}

/**
 * Generate a session ID: {YYYYMMDD}_{HHMMSS}_{6-char-hex}
 * Example: "20260219_143005_a1b2c3"
 */
export function generateSessionId(now: Date = new Date()): string {
  return `${compactTimestamp(now)}_${randomBytes(3).toString("hex")}`;
}

/** Document ID within a session: "{sessionId}_{n}" */
export function documentId(sessionId: string, index: number): string {
  return `${sessionId}_${index}`;
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export function isValidSessionId(sessionId: string): boolean {
  return SESSION_ID_PATTERN.test(sessionId);
}
