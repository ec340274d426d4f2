import Anthropic from "@anthropic-ai/sdk";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import type { TextGenerationRequest, TextGenerator } from "./types.ts";
import { GenerationError } from "./types.ts";

// ── Config ──────────────────────────────────────────────────────────────────

export interface ClaudeGeneratorConfig {
  readonly model: string;
  readonly defaultMaxTokens?: number;
  readonly defaultTemperature?: number;
  readonly timeoutMs?: number;
}

export const DEFAULT_MODEL = "claude-sonnet-4-5-20250929";
const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_TIMEOUT_MS = 120_000;

// ── Messages Client ─────────────────────────────────────────────────────────
// The part of the Anthropic SDK the generator calls; an Anthropic instance
// satisfies it, and tests pass a plain object.

export interface GeneratedMessage {
  readonly model: string;
  readonly content: ReadonlyArray<{ readonly type: string; readonly text?: string }>;
  readonly stop_reason: string | null;
  readonly usage: { readonly input_tokens: number; readonly output_tokens: number };
}

export interface MessagesClient {
  readonly messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
      options?: { timeout?: number; signal?: AbortSignal },
    ): PromiseLike<GeneratedMessage>;
  };
}

// ── Anthropic SDK Generator ─────────────────────────────────────────────────

/**
 * Text generation over the Anthropic Messages API. Makes exactly one API
 * call per `generate`; retrying is left to the caller's retry policy.
 */
export class AnthropicTextGenerator implements TextGenerator {
  private readonly anthropic: MessagesClient;
  private readonly logger: Logger;

  /**
   * @param anthropicInstance Optional pre-configured SDK instance. Without
   *   one, the SDK reads ANTHROPIC_API_KEY from the environment.
   */
  constructor(
    private readonly config: ClaudeGeneratorConfig,
    anthropicInstance?: MessagesClient,
    logger?: Logger,
  ) {
    this.anthropic = anthropicInstance ?? new Anthropic();
    this.logger = (logger ?? NULL_LOGGER).child({ module: "claude-client" });
  }

  async generate(request: TextGenerationRequest): Promise<string> {
    if (request.signal?.aborted) {
      throw new GenerationError("Request aborted before API call", "ABORTED", false);
    }

    const startTime = Date.now();
    let response: GeneratedMessage;
    try {
      response = await this.anthropic.messages.create(
        {
          model: this.config.model,
          max_tokens: request.maxTokens ?? this.config.defaultMaxTokens ?? DEFAULT_MAX_TOKENS,
          temperature:
            request.temperature ?? this.config.defaultTemperature ?? DEFAULT_TEMPERATURE,
          system: request.system,
          messages: [{ role: "user", content: request.prompt }],
        },
        {
          timeout: this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
          ...(request.signal ? { signal: request.signal } : {}),
        },
      );
    } catch (err: unknown) {
      const error = toGenerationError(err);
      this.logger.error("claude_request_failed", {
        code: error.code,
        model: this.config.model,
        error: error.message,
      });
      throw error;
    }

    const content = response.content
      .flatMap((block) => (block.type === "text" && block.text !== undefined ? [block.text] : []))
      .join("\n\n");

    this.logger.info("claude_request_completed", {
      model: response.model,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      stopReason: response.stop_reason ?? "unknown",
      durationMs: Date.now() - startTime,
    });

    if (content.trim().length === 0) {
      throw new GenerationError("Claude returned no text content", "RESPONSE_EMPTY", true);
    }
    return content;
  }
}

// ── Error Classification ────────────────────────────────────────────────────

export function toGenerationError(err: unknown): GenerationError {
  if (err instanceof GenerationError) return err;
  const cause = err instanceof Error ? err : undefined;
  const message = err instanceof Error ? err.message : String(err);

  // Timeout and abort subclasses extend APIError, so check them first
  if (err instanceof Anthropic.APIUserAbortError) {
    return new GenerationError(`Request aborted: ${message}`, "ABORTED", false, cause);
  }
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return new GenerationError(`Request timed out: ${message}`, "TIMEOUT", true, cause);
  }
  if (err instanceof Anthropic.APIConnectionError) {
    return new GenerationError(`Connection failed: ${message}`, "TIMEOUT", true, cause);
  }
  if (err instanceof Anthropic.APIError) {
    const status = err.status ?? 0;
    if (status === 429) {
      return new GenerationError(`Rate limited (429): ${message}`, "RATE_LIMITED", true, cause);
    }
    if (status === 529) {
      return new GenerationError(`API overloaded (529): ${message}`, "API_OVERLOADED", true, cause);
    }
    return new GenerationError(
      `API error (${status}): ${message}`,
      "API_ERROR",
      status >= 500,
      cause,
    );
  }
  if (err instanceof Error && err.name === "AbortError") {
    return new GenerationError(`Request aborted: ${message}`, "ABORTED", false, cause);
  }
  return new GenerationError(`Unexpected error: ${message}`, "UNKNOWN", false, cause);
}

// ── Mock Implementation ─────────────────────────────────────────────────────

export class MockTextGenerator implements TextGenerator {
  readonly calls: TextGenerationRequest[] = [];
  private responder: ((request: TextGenerationRequest) => string) | null;
  private readonly queuedErrors: Error[] = [];

  constructor(responder?: (request: TextGenerationRequest) => string) {
    this.responder = responder ?? null;
  }

  setResponder(responder: (request: TextGenerationRequest) => string): void {
    this.responder = responder;
  }

  /** Fail the next `times` calls with `error`. */
  failNext(error: Error, times = 1): void {
    for (let i = 0; i < times; i++) this.queuedErrors.push(error);
  }

  async generate(request: TextGenerationRequest): Promise<string> {
    if (request.signal?.aborted) {
      throw new GenerationError("Aborted", "ABORTED", false);
    }

    this.calls.push(request);

    const error = this.queuedErrors.shift();
    if (error) throw error;

    return this.responder ? this.responder(request) : "Mock generated text";
  }
}
