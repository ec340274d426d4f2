import { MockTextGenerator } from "../../generation/claude-client.ts";
import { DEFAULT_RETRY_OPTIONS, RetryPolicy } from "../../generation/retry-policy.ts";
import type { TextGenerationRequest } from "../../generation/types.ts";
import { NULL_LOGGER } from "../../observability/logger.ts";
import { PromptRegistry } from "../../prompts/prompt-registry.ts";
import { PromptRunner } from "../prompt-runner.ts";

/**
 * Compact templates whose system text names the prompt, so a responder can
 * tell the calls apart.
 */
export const TEST_PROMPTS = PromptRegistry.fromData({
  prompts: {
    research_questions: { system: "questions", user: "Q {company_name}" },
    research: { system: "research", user: "R {input} :: {search_results}" },
    research_analysis: { system: "analysis", user: "A {collected_data}" },
    brand_analysis: { system: "brand", user: "B {research_data}" },
    audience_mapping: { system: "audience", user: "U {research_data}" },
    market_position: { system: "market", user: "M {research_data}" },
    campaign_ideas: {
      system: "campaigns",
      user: "C {num_campaigns} | {company_info} | {target_audience} | {brand_values}",
    },
    tagline: { system: "tagline", user: "T {core_message} | {visual_theme} | {emotional_appeal}" },
    narrative: { system: "narrative", user: "N {core_message}" },
    image_prompt: {
      system: "image",
      user: "I {campaign_name} | {product_prompt} | {brand_prompt} | {social_prompt}",
    },
  },
});

export type Responder = (request: TextGenerationRequest) => string;

export function testRunner(responder: Responder): {
  runner: PromptRunner;
  generator: MockTextGenerator;
} {
  const generator = new MockTextGenerator(responder);
  const retry = new RetryPolicy(DEFAULT_RETRY_OPTIONS, NULL_LOGGER, async () => {});
  return { runner: new PromptRunner(generator, TEST_PROMPTS, retry), generator };
}

export function callsFor(generator: MockTextGenerator, system: string): TextGenerationRequest[] {
  return generator.calls.filter((call) => call.system === system);
}

export const CAMPAIGN_TEXT = [
  "Campaign 1: Launch Day",
  "1. Core Message: Save energy",
  "2. Visual Theme Description:",
  "- Color Palette: green",
  "- Mood: hopeful",
  "",
  "Campaign 2: Half Done",
  "1. Core Message: Incomplete",
].join("\n");
