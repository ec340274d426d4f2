import { describe, expect, it } from "vitest";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { loadConfig, ConfigError } from "../config.ts";
import { DEFAULT_MODEL } from "../generation/claude-client.ts";
import { testEnv } from "./helpers.ts";

function configError(env: Record<string, string>): ConfigError {
  try {
    loadConfig(env);
  } catch (err: unknown) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("expected loadConfig to throw");
}

describe("loadConfig", () => {
  // ── Required Field: ANTHROPIC_API_KEY ──────────────────────────────────

  it("throws ConfigError when ANTHROPIC_API_KEY is missing", () => {
    const err = configError(testEnv({ ANTHROPIC_API_KEY: "" }));
    expect(err.field).toBe("ANTHROPIC_API_KEY");
    expect(err.message).toBe(
      "ANTHROPIC_API_KEY is required. Set it in .env or as an environment variable.",
    );
  });

  it("throws ConfigError when ANTHROPIC_API_KEY is whitespace only", () => {
    expect(() => loadConfig(testEnv({ ANTHROPIC_API_KEY: "   " }))).toThrow(ConfigError);
  });

  // ── Defaults ───────────────────────────────────────────────────────────

  it("applies defaults", () => {
    const config = loadConfig(testEnv());

    expect(config.anthropicApiKey).toBe("test-secret");
    expect(config.model).toBe(DEFAULT_MODEL);
    expect(config.tavilyApiKey).toBeUndefined();
    expect(config.stabilityApiKey).toBeUndefined();
    expect(config.store).toEqual({
      backend: "file",
      dir: resolve(process.cwd(), "./.campaign-store"),
    });
    expect(config.redis).toEqual({ host: "localhost", port: 6379, password: undefined });
    expect(config.outputDir).toBe(resolve(process.cwd(), "./Outputs"));
    expect(config.numCampaigns).toBe(5);
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 4_000, maxDelayMs: 10_000 });
    expect(config.logging).toEqual({ level: "info", format: "pretty" });
  });

  it("defaults the project root to the directory holding .agents/", () => {
    const config = loadConfig(testEnv());
    expect(resolve(config.projectRoot)).toBe(
      resolve(fileURLToPath(new URL("../..", import.meta.url))),
    );
  });

  // ── Valid Configuration ────────────────────────────────────────────────

  it("reads every variable", () => {
    const config = loadConfig(
      testEnv({
        ANTHROPIC_MODEL: "test-model",
        TAVILY_API_KEY: "test-tavily",
        STABILITY_API_KEY: "test-stability",
        STORE_BACKEND: "redis",
        STORE_DIR: "/tmp/store",
        REDIS_HOST: "redis.internal",
        REDIS_PORT: "6380",
        REDIS_PASSWORD: "test-password",
        OUTPUT_DIR: "/tmp/out",
        NUM_CAMPAIGNS: "3",
        RETRY_MAX_ATTEMPTS: "5",
        RETRY_BASE_DELAY_MS: "100",
        RETRY_MAX_DELAY_MS: "1000",
        PROJECT_ROOT: "/tmp/project",
        LOG_LEVEL: "debug",
        LOG_FORMAT: "json",
      }),
    );

    expect(config.model).toBe("test-model");
    expect(config.tavilyApiKey).toBe("test-tavily");
    expect(config.stabilityApiKey).toBe("test-stability");
    expect(config.store).toEqual({ backend: "redis", dir: "/tmp/store" });
    expect(config.redis).toEqual({ host: "redis.internal", port: 6380, password: "test-password" });
    expect(config.outputDir).toBe("/tmp/out");
    expect(config.numCampaigns).toBe(3);
    expect(config.retry).toEqual({ maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 1000 });
    expect(config.projectRoot).toBe("/tmp/project");
    expect(config.logging).toEqual({ level: "debug", format: "json" });
  });

  it("returns a frozen config", () => {
    const config = loadConfig(testEnv());
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.store)).toBe(true);
    expect(Object.isFrozen(config.retry)).toBe(true);
  });

  // ── Validation ─────────────────────────────────────────────────────────

  it("rejects an unknown store backend", () => {
    const err = configError(testEnv({ STORE_BACKEND: "chroma" }));
    expect(err.field).toBe("STORE_BACKEND");
    expect(err.message).toBe('STORE_BACKEND must be one of: file, redis. Got "chroma".');
  });

  it("rejects a campaign count outside 1..10", () => {
    expect(configError(testEnv({ NUM_CAMPAIGNS: "11" })).message).toBe(
      'NUM_CAMPAIGNS must be an integer between 1 and 10, got "11".',
    );
    expect(configError(testEnv({ NUM_CAMPAIGNS: "2.5" })).field).toBe("NUM_CAMPAIGNS");
  });

  it("rejects an invalid redis port", () => {
    expect(configError(testEnv({ REDIS_PORT: "0" })).field).toBe("REDIS_PORT");
    expect(configError(testEnv({ REDIS_PORT: "abc" })).field).toBe("REDIS_PORT");
  });

  it("rejects a zero attempt budget", () => {
    expect(configError(testEnv({ RETRY_MAX_ATTEMPTS: "0" })).message).toBe(
      'RETRY_MAX_ATTEMPTS must be an integer >= 1, got "0".',
    );
  });

  it("rejects a base delay above the maximum delay", () => {
    const err = configError(testEnv({ RETRY_BASE_DELAY_MS: "5000", RETRY_MAX_DELAY_MS: "1000" }));
    expect(err.field).toBe("RETRY_BASE_DELAY_MS");
    expect(err.message).toBe("RETRY_BASE_DELAY_MS (5000) must not exceed RETRY_MAX_DELAY_MS (1000).");
  });

  it("rejects an unknown log level", () => {
    expect(configError(testEnv({ LOG_LEVEL: "verbose" })).field).toBe("LOG_LEVEL");
  });
});
