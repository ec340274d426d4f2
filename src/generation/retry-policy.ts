import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import { GenerationError } from "./types.ts";

// ── Retry Options ───────────────────────────────────────────────────────────

export interface RetryOptions {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 4_000,
  maxDelayMs: 10_000,
};

export interface RetryContext {
  readonly label?: string;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
  /** Replaceable for tests; defaults to a cancellable setTimeout sleep. */
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Delay before retry number `attempt` (1-based): base · 2^(attempt-1), capped. */
export function backoffDelay(attempt: number, options: RetryOptions): number {
  return Math.min(options.baseDelayMs * Math.pow(2, attempt - 1), options.maxDelayMs);
}

/**
 * Sleep for the given duration, but reject immediately if the abort signal fires.
 */
export function cancellableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new GenerationError("Aborted", "ABORTED", false));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new GenerationError("Aborted", "ABORTED", false));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// ── withRetry ───────────────────────────────────────────────────────────────

/**
 * Run `operation` up to `maxAttempts` times with exponential backoff between
 * attempts. Every failure is retried; once the attempts are used up the
 * last error is rethrown as-is. Only an aborted signal stops early.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = DEFAULT_RETRY_OPTIONS,
  context?: RetryContext,
): Promise<T> {
  const logger = context?.logger ?? NULL_LOGGER;
  const sleep = context?.sleep ?? cancellableSleep;
  const attempts = Math.max(1, Math.floor(options.maxAttempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (context?.signal?.aborted) {
      throw new GenerationError("Aborted before attempt", "ABORTED", false);
    }

    try {
      return await operation(attempt);
    } catch (err: unknown) {
      lastError = err;

      if (attempt === attempts) break;

      const delayMs = backoffDelay(attempt, options);
      logger.warn("retry_scheduled", {
        label: context?.label,
        attempt,
        maxAttempts: attempts,
        delayMs,
        error: err instanceof Error ? err.message : String(err),
      });
      await sleep(delayMs, context?.signal);
    }
  }

  logger.error("retry_exhausted", { label: context?.label, attempts });
  throw lastError;
}

// ── RetryPolicy ─────────────────────────────────────────────────────────────

/** A reusable retry configuration bound to a logger. */
export class RetryPolicy {
  constructor(
    readonly options: RetryOptions = DEFAULT_RETRY_OPTIONS,
    private readonly logger: Logger = NULL_LOGGER,
    private readonly sleep?: RetryContext["sleep"],
  ) {}

  run<T>(
    operation: (attempt: number) => Promise<T>,
    context?: { label?: string; signal?: AbortSignal },
  ): Promise<T> {
    return withRetry(operation, this.options, {
      label: context?.label,
      signal: context?.signal,
      logger: this.logger,
      sleep: this.sleep,
    });
  }
}
