import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import type { CreativeAgent, CreativeAssets } from "../agents/creative-agent.ts";
import type { CampaignIdea } from "../campaign/types.ts";
import type { ImageGenerator } from "../generation/types.ts";
import { compactTimestamp } from "../store/id.ts";

// ── Types ───────────────────────────────────────────────────────────────────

export interface AssetOrchestratorConfig {
  readonly creative: CreativeAgent;
  /** Null skips image generation; text assets are still written. */
  readonly images: ImageGenerator | null;
  readonly outputDir: string;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

export interface CampaignAssetFiles {
  readonly tagline: string;
  readonly story: string;
  readonly image: string | null;
  readonly details: string;
}

export interface CampaignAssetResult {
  readonly campaignName: string;
  readonly campaignDir: string;
  readonly assets: CreativeAssets;
  readonly files: CampaignAssetFiles;
}

export interface FailedCampaignAssets {
  readonly campaignName: string;
  readonly error: string;
}

export interface AssetRunResult {
  readonly generated: readonly CampaignAssetResult[];
  readonly failed: readonly FailedCampaignAssets[];
}

// ── File Naming ─────────────────────────────────────────────────────────────

/** Replace every non-alphanumeric character with "_" and trim underscores. */
export function sanitizeFilename(name: string): string {
  return name.replace(/[^\p{L}\p{N}]/gu, "_").replace(/^_+|_+$/g, "");
}

// ── Asset Orchestrator ──────────────────────────────────────────────────────

/**
 * Writes each campaign's creative assets into its own directory under the
 * output root: `tagline.txt`, `story.txt`, the generated image and
 * `campaign_details.json`.
 */
export class AssetOrchestrator {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly config: AssetOrchestratorConfig) {
    this.logger = (config.logger ?? NULL_LOGGER).child({ module: "asset-orchestrator" });
    this.now = config.now ?? (() => new Date());
  }

  /** Process campaigns in order; a failing campaign is logged and skipped. */
  async generate(
    campaigns: readonly CampaignIdea[],
    signal?: AbortSignal,
  ): Promise<AssetRunResult> {
    await mkdir(this.config.outputDir, { recursive: true });

    const generated: CampaignAssetResult[] = [];
    const failed: FailedCampaignAssets[] = [];
    for (const campaign of campaigns) {
      const campaignName = campaignNameOf(campaign);
      try {
        generated.push(await this.generateOne(campaign, signal));
      } catch (err: unknown) {
        if (signal?.aborted) throw err;
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error("campaign_assets_failed", { campaign: campaignName, error: message });
        failed.push({ campaignName, error: message });
      }
    }

    this.logger.info("asset_generation_completed", {
      generated: generated.length,
      failed: failed.length,
    });
    return { generated, failed };
  }

  async generateOne(campaign: CampaignIdea, signal?: AbortSignal): Promise<CampaignAssetResult> {
    const campaignName = campaignNameOf(campaign);
    const dirName = `${sanitizeFilename(campaignName) || "campaign"}_${compactTimestamp(this.now())}`;
    const campaignDir = join(this.config.outputDir, dirName);
    await mkdir(campaignDir, { recursive: true });

    const assets = await this.config.creative.generateAssets(campaign, signal);
    const taglinePath = await saveText(campaignDir, "tagline.txt", assets.tagline);
    const storyPath = await saveText(campaignDir, "story.txt", assets.story);
    const imagePath = await this.renderImage(campaignName, assets.imagePrompt, campaignDir, signal);

    const details = {
      ...campaign.record,
      prompt_suggestions: campaign.promptSuggestions,
      generated_assets: {
        tagline_path: taglinePath,
        story_path: storyPath,
        image_path: imagePath,
        tagline: assets.tagline,
        story: assets.story,
        image_prompt: assets.imagePrompt,
      },
    };
    const detailsPath = await saveText(
      campaignDir,
      "campaign_details.json",
      JSON.stringify(details, null, 2),
    );

    this.logger.info("campaign_assets_written", { campaign: campaignName, dir: campaignDir });
    return {
      campaignName,
      campaignDir,
      assets,
      files: { tagline: taglinePath, story: storyPath, image: imagePath, details: detailsPath },
    };
  }

  /** Image failures leave the text assets in place and yield null. */
  private async renderImage(
    campaignName: string,
    prompt: string,
    campaignDir: string,
    signal?: AbortSignal,
  ): Promise<string | null> {
    const images = this.config.images;
    if (images === null) {
      this.logger.debug("image_generation_skipped", { campaign: campaignName });
      return null;
    }
    try {
      return await images.generate(prompt, campaignDir);
    } catch (err: unknown) {
      if (signal?.aborted) throw err;
      this.logger.warn("image_generation_failed", {
        campaign: campaignName,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }
}

function campaignNameOf(campaign: CampaignIdea): string {
  const name = campaign.record["campaign_name"];
  return typeof name === "string" ? name : "";
}

async function saveText(dir: string, filename: string, content: string): Promise<string> {
  const filePath = join(dir, filename);
  await writeFile(filePath, content, "utf-8");
  return filePath;
}
