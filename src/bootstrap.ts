import Anthropic from "@anthropic-ai/sdk";
import { resolve } from "node:path";
import type { RuntimeConfig } from "./config.ts";
import { createLogger } from "./observability/logger.ts";
import type { Logger } from "./observability/logger.ts";
import { PromptRegistry } from "./prompts/prompt-registry.ts";
import { AnthropicTextGenerator } from "./generation/claude-client.ts";
import { StabilityImageGenerator } from "./generation/image-generator.ts";
import { TavilySearchClient } from "./generation/search-client.ts";
import { RetryPolicy } from "./generation/retry-policy.ts";
import type { RetryContext } from "./generation/retry-policy.ts";
import type { ImageGenerator, SearchClient, TextGenerator } from "./generation/types.ts";
import { FileSystemPersistentStore } from "./store/file-store.ts";
import { createRedisStore } from "./store/redis-store.ts";
import { generateSessionId } from "./store/id.ts";
import type { PersistentStore } from "./store/types.ts";
import { TieredCacheManager } from "./cache/tiered-cache.ts";
import { TEXT_CODEC, jsonCodec } from "./cache/types.ts";
import { PromptRunner } from "./agents/prompt-runner.ts";
import { ResearchAgent } from "./agents/research-agent.ts";
import { MarketingAgent, isMarketingResult } from "./agents/marketing-agent.ts";
import type { MarketingResult } from "./agents/marketing-agent.ts";
import { CreativeAgent } from "./agents/creative-agent.ts";
import { AssetOrchestrator } from "./assets/asset-orchestrator.ts";

// ── Application Interface ──────────────────────────────────────────────────

export interface Application {
  readonly config: RuntimeConfig;
  readonly logger: Logger;
  readonly sessionId: string;
  readonly prompts: PromptRegistry;
  readonly store: PersistentStore;
  readonly retry: RetryPolicy;
  readonly research: ResearchAgent;
  readonly marketing: MarketingAgent;
  readonly creative: CreativeAgent;
  readonly assets: AssetOrchestrator;
  readonly researchCache: TieredCacheManager<string>;
  readonly marketingCache: TieredCacheManager<MarketingResult>;

  shutdown(): Promise<void>;
}

/**
 * Replacements for the external collaborators. Anything left out is built
 * from the config.
 */
export interface BootstrapOverrides {
  readonly logger?: Logger;
  readonly generator?: TextGenerator;
  /** Null disables web search. */
  readonly search?: SearchClient | null;
  /** Null disables image generation. */
  readonly images?: ImageGenerator | null;
  readonly store?: PersistentStore;
  readonly sessionId?: string;
  readonly sleep?: RetryContext["sleep"];
}

// ── Bootstrap ──────────────────────────────────────────────────────────────

/**
 * Wire all modules together with real implementations. This is the
 * composition root: the one place where dependencies are injected.
 *
 * @param config Runtime configuration (from loadConfig()).
 * @returns Fully wired Application for one session.
 */
export async function bootstrap(
  config: RuntimeConfig,
  overrides: BootstrapOverrides = {},
): Promise<Application> {
  // 1. Logger first, so every later module can log
  const logger =
    overrides.logger ??
    createLogger({
      level: config.logging.level,
      format: config.logging.format,
      base: { module: "bootstrap" },
    });

  const sessionId = overrides.sessionId ?? generateSessionId();
  logger.info("Bootstrapping application", {
    sessionId,
    storeBackend: config.store.backend,
    outputDir: config.outputDir,
    model: config.model,
  });

  // 2. Prompt registry from .agents/prompts.yaml
  const prompts = await PromptRegistry.fromYaml(
    resolve(config.projectRoot, ".agents/prompts.yaml"),
  );
  logger.info("Prompt registry loaded", { prompts: prompts.names.length });

  // 3. Persistent store
  let store: PersistentStore;
  if (overrides.store) {
    store = overrides.store;
  } else if (config.store.backend === "redis") {
    // Lazy connect: no TCP until the first command
    store = await createRedisStore(
      {
        host: config.redis.host,
        port: config.redis.port,
        password: config.redis.password,
      },
      logger,
    );
  } else {
    store = new FileSystemPersistentStore({ rootDir: config.store.dir }, logger);
  }

  // 4. Generation collaborators
  const generator =
    overrides.generator ??
    new AnthropicTextGenerator(
      { model: config.model },
      new Anthropic({ apiKey: config.anthropicApiKey }),
      logger,
    );

  let search: SearchClient | null;
  if (overrides.search !== undefined) {
    search = overrides.search;
  } else {
    search = config.tavilyApiKey
      ? new TavilySearchClient({ apiKey: config.tavilyApiKey }, logger)
      : null;
  }
  if (search === null) logger.warn("Web search disabled: TAVILY_API_KEY not set");

  let images: ImageGenerator | null;
  if (overrides.images !== undefined) {
    images = overrides.images;
  } else {
    images = config.stabilityApiKey
      ? new StabilityImageGenerator({ apiKey: config.stabilityApiKey }, logger)
      : null;
  }
  if (images === null) logger.warn("Image generation disabled: STABILITY_API_KEY not set");

  const retry = new RetryPolicy(config.retry, logger.child({ module: "retry" }), overrides.sleep);
  const runner = new PromptRunner(generator, prompts, retry);

  // 5. Agents
  const research = new ResearchAgent(runner, search, logger);
  const marketing = new MarketingAgent({
    runner,
    store,
    sessionId,
    numCampaigns: config.numCampaigns,
    logger,
  });
  const creative = new CreativeAgent(runner, logger);
  const assets = new AssetOrchestrator({
    creative,
    images,
    outputDir: config.outputDir,
    logger,
  });

  // 6. Caches, one per value type, sharing the session and the store
  const researchCache = new TieredCacheManager<string>({
    store,
    sessionId,
    codec: TEXT_CODEC,
    logger,
  });
  const marketingCache = new TieredCacheManager<MarketingResult>({
    store,
    sessionId,
    codec: jsonCodec(isMarketingResult, (result) => result.campaigns.length === 0),
    logger,
  });

  let shuttingDown = false;

  return {
    config,
    logger,
    sessionId,
    prompts,
    store,
    retry,
    research,
    marketing,
    creative,
    assets,
    researchCache,
    marketingCache,

    async shutdown(): Promise<void> {
      if (shuttingDown) return;
      shuttingDown = true;

      researchCache.clearSession();
      marketingCache.clearSession();

      try {
        await store.close();
        logger.info("Store closed");
      } catch (err: unknown) {
        logger.error("Error closing store", {
          error: err instanceof Error ? err.message : String(err),
        });
      }
      logger.info("Shutdown complete", { sessionId });
    },
  };
}
