import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import { renderEmotionalAppeal, renderVisualTheme } from "../campaign/prompt-suggestions.ts";
import type { CampaignIdea } from "../campaign/types.ts";
import type { PromptRunner } from "./prompt-runner.ts";

export interface CreativeAssets {
  readonly tagline: string;
  readonly story: string;
  readonly imagePrompt: string;
}

/** Writes the tagline, story and image prompt for one campaign. */
export class CreativeAgent {
  private readonly logger: Logger;

  constructor(
    private readonly runner: PromptRunner,
    logger?: Logger,
  ) {
    this.logger = (logger ?? NULL_LOGGER).child({ module: "creative-agent" });
  }

  async generateAssets(campaign: CampaignIdea, signal?: AbortSignal): Promise<CreativeAssets> {
    const { record, promptSuggestions } = campaign;
    const campaignName = scalar(record["campaign_name"]);
    const copyVars = {
      core_message: scalar(record["core_message"]),
      visual_theme: renderVisualTheme(record["visual_theme_description"]),
      emotional_appeal: renderEmotionalAppeal(record["key_emotional_appeal"]),
    };

    const tagline = await this.runner.run("tagline", copyVars, { signal });
    const story = await this.runner.run("narrative", copyVars, { signal });
    const imagePrompt = await this.runner.run(
      "image_prompt",
      {
        campaign_name: campaignName,
        product_prompt: promptSuggestions.product_focused,
        brand_prompt: promptSuggestions.brand_focused,
        social_prompt: promptSuggestions.social_media,
      },
      { signal },
    );

    this.logger.debug("creative_assets_generated", { campaign: campaignName });
    return { tagline, story, imagePrompt };
  }
}

function scalar(value: unknown): string {
  return typeof value === "string" ? value : "";
}
