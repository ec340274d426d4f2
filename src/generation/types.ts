// ── Text Generation ─────────────────────────────────────────────────────────

export interface TextGenerationRequest {
  readonly system: string;
  readonly prompt: string;
  readonly maxTokens?: number;
  readonly temperature?: number;
  readonly signal?: AbortSignal;
}

export interface TextGenerator {
  generate(request: TextGenerationRequest): Promise<string>;
}

// ── Image Generation ────────────────────────────────────────────────────────

export interface ImageGenerator {
  /** Render one image for the prompt into `outputDir`; resolves to its path. */
  generate(prompt: string, outputDir: string): Promise<string>;
}

// ── Search ──────────────────────────────────────────────────────────────────

export interface SearchResult {
  readonly title: string;
  readonly content: string;
  readonly url: string;
}

export interface SearchClient {
  search(query: string): Promise<SearchResult[]>;
}

// ── Generation Errors ───────────────────────────────────────────────────────

export type GenerationErrorCode =
  | "API_ERROR"
  | "RATE_LIMITED"
  | "API_OVERLOADED"
  | "TIMEOUT"
  | "RESPONSE_EMPTY"
  | "RESPONSE_MALFORMED"
  | "IMAGE_FAILED"
  | "SEARCH_FAILED"
  | "ABORTED"
  | "UNKNOWN";

export class GenerationError extends Error {
  override readonly name = "GenerationError";

  constructor(
    message: string,
    readonly code: GenerationErrorCode,
    readonly retryable: boolean,
    override readonly cause?: Error,
  ) {
    super(message);
  }
}
