import type { PromptRegistry, PromptVariables } from "../prompts/prompt-registry.ts";
import type { RetryPolicy } from "../generation/retry-policy.ts";
import type { TextGenerator } from "../generation/types.ts";

export interface CompletionOptions {
  readonly signal?: AbortSignal;
  readonly maxTokens?: number;
  readonly temperature?: number;
}

/** Renders a named prompt and sends it to the text generator. */
export class PromptRunner {
  constructor(
    private readonly generator: TextGenerator,
    private readonly prompts: PromptRegistry,
    readonly retry: RetryPolicy,
  ) {}

  /** One generation call, no retries. */
  async complete(
    name: string,
    vars: PromptVariables,
    options?: CompletionOptions,
  ): Promise<string> {
    const { system, user } = this.prompts.render(name, vars);
    const text = await this.generator.generate({
      system,
      prompt: user,
      maxTokens: options?.maxTokens,
      temperature: options?.temperature,
      signal: options?.signal,
    });
    return text.trim();
  }

  /** `complete` wrapped by the retry policy. */
  run(name: string, vars: PromptVariables, options?: CompletionOptions): Promise<string> {
    return this.retry.run(() => this.complete(name, vars, options), {
      label: name,
      signal: options?.signal,
    });
  }
}
