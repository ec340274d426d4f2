import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import { clampCampaignCount, parseCampaigns } from "../campaign/record-builder.ts";
import { derivePrompts } from "../campaign/prompt-suggestions.ts";
import { validateCampaign } from "../campaign/validation.ts";
import { REQUIRED_CAMPAIGN_FIELDS } from "../campaign/types.ts";
import type { CampaignIdea, CampaignRecord, RequiredCampaignField } from "../campaign/types.ts";
import { GenerationError } from "../generation/types.ts";
import type { PersistentStore } from "../store/types.ts";
import type { PromptRunner } from "./prompt-runner.ts";

// ── Result Types ────────────────────────────────────────────────────────────

export const ANALYSIS_TYPES = {
  brand_analysis: "voice_and_personality",
  audience_analysis: "profiles_and_segments",
  market_analysis: "position_and_competition",
} as const;

export type AnalysisKind = keyof typeof ANALYSIS_TYPES;

export type MarketingAnalyses = Readonly<Record<AnalysisKind, string>>;

export interface RejectedCampaign {
  readonly record: CampaignRecord;
  readonly campaignName: string;
  readonly missing: readonly RequiredCampaignField[];
  readonly reason: string;
}

export interface MarketingResult {
  readonly analyses: MarketingAnalyses;
  readonly campaigns: readonly CampaignIdea[];
  readonly rejected: readonly RejectedCampaign[];
}

export interface MarketingAgentConfig {
  readonly runner: PromptRunner;
  /** Analyses are recorded here when set; recording is best-effort. */
  readonly store?: PersistentStore | null;
  readonly sessionId: string;
  readonly numCampaigns: number;
  readonly logger?: Logger;
}

// ── Marketing Agent ─────────────────────────────────────────────────────────

/**
 * Turns a research report into brand, audience and market analyses and a
 * set of validated campaign ideas with image prompt suggestions.
 */
export class MarketingAgent {
  private readonly logger: Logger;
  readonly numCampaigns: number;

  constructor(private readonly config: MarketingAgentConfig) {
    this.logger = (config.logger ?? NULL_LOGGER).child({ module: "marketing-agent" });
    this.numCampaigns = clampCampaignCount(config.numCampaigns);
  }

  async run(
    researchReport: string,
    subject: string,
    options?: { count?: number; signal?: AbortSignal },
  ): Promise<MarketingResult> {
    const signal = options?.signal;
    const research = { research_data: researchReport };

    const brand = await this.config.runner.run("brand_analysis", research, { signal });
    await this.record(brand, "brand_analysis", subject);
    const audience = await this.config.runner.run("audience_mapping", research, { signal });
    await this.record(audience, "audience_analysis", subject);
    const market = await this.config.runner.run("market_position", research, { signal });
    await this.record(market, "market_analysis", subject);

    const analyses: MarketingAnalyses = {
      brand_analysis: brand,
      audience_analysis: audience,
      market_analysis: market,
    };

    const count = clampCampaignCount(options?.count ?? this.numCampaigns);
    const records = await this.generateCampaignRecords(analyses, count, signal);

    const campaigns: CampaignIdea[] = [];
    const rejected: RejectedCampaign[] = [];
    for (const record of records) {
      const result = validateCampaign(record);
      if (result.valid) {
        campaigns.push({ record, promptSuggestions: derivePrompts(record) });
      } else {
        this.logger.warn("campaign_rejected", {
          campaign: result.error.campaignName,
          missing: result.error.missing,
        });
        rejected.push({
          record,
          campaignName: result.error.campaignName,
          missing: result.error.missing,
          reason: result.error.message,
        });
      }
    }

    this.logger.info("marketing_completed", {
      subject,
      campaigns: campaigns.length,
      rejected: rejected.length,
    });
    return { analyses, campaigns, rejected };
  }

  /**
   * Generate and parse campaign ideas. A response with no parseable
   * campaign counts as a failed attempt and goes through the retry policy.
   */
  async generateCampaignRecords(
    analyses: MarketingAnalyses,
    count: number,
    signal?: AbortSignal,
  ): Promise<CampaignRecord[]> {
    const runner = this.config.runner;
    const vars = {
      num_campaigns: count,
      company_info: analyses.market_analysis,
      target_audience: analyses.audience_analysis,
      brand_values: analyses.brand_analysis,
    };

    return runner.retry.run(
      async (attempt) => {
        const text = await runner.complete("campaign_ideas", vars, { signal });
        const records = parseCampaigns(text, count);
        if (records.length === 0) {
          this.logger.warn("campaign_parse_empty", { attempt, length: text.length });
          throw new GenerationError(
            "Campaign response contained no parseable campaigns",
            "RESPONSE_MALFORMED",
            true,
          );
        }
        return records;
      },
      { label: "campaign_ideas", signal },
    );
  }

  private async record(text: string, kind: AnalysisKind, subject: string): Promise<void> {
    const store = this.config.store;
    if (!store) return;
    try {
      await store.add(
        [text],
        [{ content_type: kind, analysis_type: ANALYSIS_TYPES[kind], subject }],
        this.config.sessionId,
      );
    } catch (err: unknown) {
      this.logger.warn("analysis_record_failed", {
        kind,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

// ── Cache Guard ─────────────────────────────────────────────────────────────

function isPlainObject(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringMap(value: unknown): boolean {
  return isPlainObject(value) && Object.values(value).every((v) => typeof v === "string");
}

function isCampaignRecord(value: unknown): boolean {
  return (
    isPlainObject(value) &&
    Object.values(value).every((v) => typeof v === "string" || isStringMap(v))
  );
}

function isCampaignIdea(value: unknown): boolean {
  if (!isPlainObject(value) || !("record" in value) || !("promptSuggestions" in value)) {
    return false;
  }
  const prompts = value.promptSuggestions;
  return (
    isCampaignRecord(value.record) &&
    isPlainObject(prompts) &&
    "product_focused" in prompts &&
    typeof prompts.product_focused === "string" &&
    "brand_focused" in prompts &&
    typeof prompts.brand_focused === "string" &&
    "social_media" in prompts &&
    typeof prompts.social_media === "string"
  );
}

function isRejectedCampaign(value: unknown): boolean {
  if (!isPlainObject(value)) return false;
  if (!("record" in value) || !isCampaignRecord(value.record)) return false;
  if (!("campaignName" in value) || typeof value.campaignName !== "string") return false;
  if (!("reason" in value) || typeof value.reason !== "string") return false;
  if (!("missing" in value) || !Array.isArray(value.missing)) return false;
  return value.missing.every((field: unknown) =>
    REQUIRED_CAMPAIGN_FIELDS.some((required) => required === field),
  );
}

/** Shape check for a marketing result read back from the persistent tier. */
export function isMarketingResult(value: unknown): value is MarketingResult {
  if (!isPlainObject(value)) return false;
  if (!("analyses" in value)) return false;
  const analyses = value.analyses;
  if (!isPlainObject(analyses) || !isStringMap(analyses)) return false;
  if (!Object.keys(ANALYSIS_TYPES).every((kind) => kind in analyses)) return false;
  if (!("campaigns" in value) || !Array.isArray(value.campaigns)) return false;
  if (!("rejected" in value) || !Array.isArray(value.rejected)) return false;
  return value.campaigns.every(isCampaignIdea) && value.rejected.every(isRejectedCampaign);
}
