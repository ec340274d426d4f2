import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { LOG_LEVELS, LOG_FORMATS } from "./observability/logger.ts";
import type { LogLevel, LogFormat } from "./observability/logger.ts";
import { STORE_BACKENDS } from "./store/types.ts";
import type { StoreBackend } from "./store/types.ts";
import { MAX_CAMPAIGNS, MIN_CAMPAIGNS } from "./campaign/types.ts";
import { DEFAULT_MODEL } from "./generation/claude-client.ts";
import { DEFAULT_RETRY_OPTIONS } from "./generation/retry-policy.ts";
import type { RetryOptions } from "./generation/retry-policy.ts";

// ── Runtime Configuration ──────────────────────────────────────────────────

export interface RuntimeConfig {
  readonly anthropicApiKey: string;
  readonly model: string;
  readonly tavilyApiKey: string | undefined;
  readonly stabilityApiKey: string | undefined;
  readonly store: {
    readonly backend: StoreBackend;
    readonly dir: string;
  };
  readonly redis: {
    readonly host: string;
    readonly port: number;
    readonly password: string | undefined;
  };
  readonly outputDir: string;
  readonly numCampaigns: number;
  readonly retry: RetryOptions;
  readonly projectRoot: string;
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
}

// ── Config Error ───────────────────────────────────────────────────────────

export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(
    message: string,
    readonly field: string,
  ) {
    super(message);
  }
}

// ── Helpers ────────────────────────────────────────────────────────────────

type EnvReader = (key: string) => string | undefined;

function optional(env: EnvReader, key: string): string | undefined {
  const value = env(key)?.trim();
  return value ? value : undefined;
}

function integer(
  env: EnvReader,
  key: string,
  fallback: number,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER,
): number {
  const raw = env(key)?.trim();
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
    throw new ConfigError(`${key} must be an integer ${range}, got "${raw}".`, key);
  }
  return value;
}

function oneOf<T extends string>(
  env: EnvReader,
  key: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const raw = (env(key) || fallback).trim();
  const match = allowed.find((candidate) => candidate === raw);
  if (match === undefined) {
    throw new ConfigError(
      `${key} must be one of: ${allowed.join(", ")}. Got "${raw}".`,
      key,
    );
  }
  return match;
}

// ── Load Config ────────────────────────────────────────────────────────────

/**
 * Load runtime configuration from environment variables.
 *
 * @param envOverrides Optional env-var-style overrides for testing.
 *   Keys are env var names (e.g. "ANTHROPIC_API_KEY"), values are strings.
 * @returns Frozen RuntimeConfig object.
 * @throws ConfigError if required fields are missing or invalid.
 */
export function loadConfig(
  envOverrides?: Record<string, string | undefined>,
): RuntimeConfig {
  const env: EnvReader = (key) => envOverrides?.[key] ?? process.env[key];

  // ── Required: ANTHROPIC_API_KEY ────────────────────────────────────────
  const anthropicApiKey = env("ANTHROPIC_API_KEY")?.trim();
  if (!anthropicApiKey) {
    throw new ConfigError(
      "ANTHROPIC_API_KEY is required. Set it in .env or as an environment variable.",
      "ANTHROPIC_API_KEY",
    );
  }

  const model = optional(env, "ANTHROPIC_MODEL") ?? DEFAULT_MODEL;

  // ── Optional providers ─────────────────────────────────────────────────
  const tavilyApiKey = optional(env, "TAVILY_API_KEY");
  const stabilityApiKey = optional(env, "STABILITY_API_KEY");

  // ── Store ──────────────────────────────────────────────────────────────
  const backend = oneOf(env, "STORE_BACKEND", STORE_BACKENDS, "file");
  const storeDir = resolve(process.cwd(), optional(env, "STORE_DIR") ?? "./.campaign-store");

  // ── Redis ──────────────────────────────────────────────────────────────
  const redisHost = optional(env, "REDIS_HOST") ?? "localhost";
  const redisPort = integer(env, "REDIS_PORT", 6379, 1, 65_535);
  const redisPasswordRaw = env("REDIS_PASSWORD");
  const redisPassword =
    redisPasswordRaw !== undefined && redisPasswordRaw !== ""
      ? redisPasswordRaw
      : undefined;

  // ── Output ─────────────────────────────────────────────────────────────
  const outputDir = resolve(process.cwd(), optional(env, "OUTPUT_DIR") ?? "./Outputs");
  const numCampaigns = integer(env, "NUM_CAMPAIGNS", 5, MIN_CAMPAIGNS, MAX_CAMPAIGNS);

  // ── Retry ──────────────────────────────────────────────────────────────
  const maxAttempts = integer(env, "RETRY_MAX_ATTEMPTS", DEFAULT_RETRY_OPTIONS.maxAttempts, 1);
  const baseDelayMs = integer(env, "RETRY_BASE_DELAY_MS", DEFAULT_RETRY_OPTIONS.baseDelayMs, 0);
  const maxDelayMs = integer(env, "RETRY_MAX_DELAY_MS", DEFAULT_RETRY_OPTIONS.maxDelayMs, 0);
  if (baseDelayMs > maxDelayMs) {
    throw new ConfigError(
      `RETRY_BASE_DELAY_MS (${baseDelayMs}) must not exceed RETRY_MAX_DELAY_MS (${maxDelayMs}).`,
      "RETRY_BASE_DELAY_MS",
    );
  }

  // ── Project Root ───────────────────────────────────────────────────────
  const projectRootRaw = optional(env, "PROJECT_ROOT");
  const projectRoot = projectRootRaw
    ? resolve(process.cwd(), projectRootRaw)
    : fileURLToPath(new URL("..", import.meta.url));

  // ── Logging ────────────────────────────────────────────────────────────
  const logLevel = oneOf(env, "LOG_LEVEL", LOG_LEVELS, "info");
  const logFormat = oneOf(env, "LOG_FORMAT", LOG_FORMATS, "pretty");

  // ── Build and freeze ──────────────────────────────────────────────────
  return Object.freeze({
    anthropicApiKey,
    model,
    tavilyApiKey,
    stabilityApiKey,
    store: Object.freeze({ backend, dir: storeDir }),
    redis: Object.freeze({
      host: redisHost,
      port: redisPort,
      password: redisPassword,
    }),
    outputDir,
    numCampaigns,
    retry: Object.freeze({ maxAttempts, baseDelayMs, maxDelayMs }),
    projectRoot,
    logging: Object.freeze({ level: logLevel, format: logFormat }),
  });
}
