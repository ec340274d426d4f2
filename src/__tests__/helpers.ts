import { join } from "node:path";
import { loadConfig } from "../config.ts";
import type { RuntimeConfig } from "../config.ts";

/**
 * Every variable loadConfig reads, blanked, so values from the surrounding
 * environment never leak into a test. Blank values fall back to defaults.
 */
export const BLANK_ENV: Readonly<Record<string, string>> = {
  ANTHROPIC_API_KEY: "",
  ANTHROPIC_MODEL: "",
  TAVILY_API_KEY: "",
  STABILITY_API_KEY: "",
  STORE_BACKEND: "",
  STORE_DIR: "",
  REDIS_HOST: "",
  REDIS_PORT: "",
  REDIS_PASSWORD: "",
  OUTPUT_DIR: "",
  NUM_CAMPAIGNS: "",
  RETRY_MAX_ATTEMPTS: "",
  RETRY_BASE_DELAY_MS: "",
  RETRY_MAX_DELAY_MS: "",
  PROJECT_ROOT: "",
  LOG_LEVEL: "",
  LOG_FORMAT: "",
};

export function testEnv(overrides?: Record<string, string>): Record<string, string> {
  return { ...BLANK_ENV, ANTHROPIC_API_KEY: "test-secret", ...overrides };
}

/** Config writing its store and outputs under `dir`. */
export function testConfig(dir: string, overrides?: Record<string, string>): RuntimeConfig {
  return loadConfig(
    testEnv({
      STORE_DIR: join(dir, "store"),
      OUTPUT_DIR: join(dir, "outputs"),
      LOG_LEVEL: "silent",
      LOG_FORMAT: "json",
      ...overrides,
    }),
  );
}
