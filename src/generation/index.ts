export {
  AnthropicTextGenerator,
  MockTextGenerator,
  toGenerationError,
  DEFAULT_MODEL,
  type ClaudeGeneratorConfig,
  type GeneratedMessage,
  type MessagesClient,
} from "./claude-client.ts";

export {
  StabilityImageGenerator,
  STABILITY_API_HOST,
  STABILITY_ENGINE_ID,
  STABILITY_PARAMS,
  type StabilityConfig,
} from "./image-generator.ts";

export {
  TavilySearchClient,
  formatSearchResults,
  TAVILY_API_URL,
  type TavilyConfig,
} from "./search-client.ts";

export {
  withRetry,
  backoffDelay,
  cancellableSleep,
  RetryPolicy,
  DEFAULT_RETRY_OPTIONS,
  type RetryOptions,
  type RetryContext,
} from "./retry-policy.ts";

export {
  GenerationError,
  type GenerationErrorCode,
  type TextGenerationRequest,
  type TextGenerator,
  type ImageGenerator,
  type SearchClient,
  type SearchResult,
} from "./types.ts";
