import type { Application } from "../bootstrap.ts";
import type { MarketingResult } from "../agents/marketing-agent.ts";
import type { AssetRunResult } from "../assets/asset-orchestrator.ts";
import type { CacheEntry, Provenance } from "../cache/types.ts";
import { clampCampaignCount } from "../campaign/record-builder.ts";

// ── Types ────────────────────────────────────────────────────────────────────

export type WorkflowStage = "research" | "marketing" | "assets";

export class WorkflowError extends Error {
  override readonly name = "WorkflowError";

  constructor(
    message: string,
    readonly stage: WorkflowStage,
    override readonly cause?: Error,
  ) {
    super(message);
  }
}

export interface ResearchOptions {
  readonly company: string;
  readonly audience: string;
  readonly followUp?: string;
  readonly forceFresh?: boolean;
  readonly signal?: AbortSignal;
}

export interface ResearchOutcome {
  readonly report: string;
  /** Null for follow-up research, which never goes through the cache. */
  readonly provenance: Provenance | null;
}

export interface WorkflowOptions extends ResearchOptions {
  readonly count?: number;
  /** Defaults to true. */
  readonly generateAssets?: boolean;
}

export interface WorkflowResult {
  readonly sessionId: string;
  readonly research: ResearchOutcome;
  readonly marketing: {
    readonly result: MarketingResult;
    readonly provenance: Provenance;
  };
  readonly assets: AssetRunResult | null;
  readonly durationMs: number;
}

// ── Stage Helpers ────────────────────────────────────────────────────────────

/** Unwrap a cache entry, turning failed and empty outcomes into WorkflowErrors. */
function unwrap<T>(entry: CacheEntry<T>, stage: WorkflowStage): { value: T; provenance: Provenance } {
  switch (entry.status) {
    case "ok":
      return { value: entry.value, provenance: entry.provenance };
    case "empty":
      throw new WorkflowError(`${stage} produced no usable content`, stage);
    case "failed":
      throw new WorkflowError(`${stage} failed: ${entry.error.message}`, stage, entry.error);
  }
}

function validateSubject(options: ResearchOptions): void {
  if (options.company.trim().length === 0) {
    throw new WorkflowError("Company name must not be empty", "research");
  }
  if (options.audience.trim().length === 0) {
    throw new WorkflowError("Target audience must not be empty", "research");
  }
}

// ── Research ─────────────────────────────────────────────────────────────────

/**
 * Research a company through the cache under (company, "research").
 * A follow-up question goes straight to the research agent.
 */
export async function runResearch(
  app: Application,
  options: ResearchOptions,
): Promise<ResearchOutcome> {
  validateSubject(options);
  const company = options.company.trim();
  const audience = options.audience.trim();

  if (options.followUp !== undefined) {
    try {
      const report = await app.research.run(company, audience, {
        followUp: options.followUp,
        signal: options.signal,
      });
      return { report, provenance: null };
    } catch (err: unknown) {
      const cause = err instanceof Error ? err : new Error(String(err));
      throw new WorkflowError(`research failed: ${cause.message}`, "research", cause);
    }
  }

  const entry = await app.researchCache.getOrGenerate(
    { subject: company, purpose: "research" },
    () => app.research.run(company, audience, { signal: options.signal }),
    { forceFresh: options.forceFresh },
  );
  const { value, provenance } = unwrap(entry, "research");
  return { report: value, provenance };
}

// ── Full Workflow ────────────────────────────────────────────────────────────

/**
 * Research → marketing analysis and campaign ideas → creative assets.
 * Research and marketing results are served from the tiered cache when
 * present; assets are always produced fresh.
 */
export async function runCampaignWorkflow(
  app: Application,
  options: WorkflowOptions,
): Promise<WorkflowResult> {
  const startTime = Date.now();
  const company = options.company.trim();
  const count = clampCampaignCount(options.count ?? app.config.numCampaigns);

  // 1. Research
  const research = await runResearch(app, options);

  // 2. Marketing
  const entry = await app.marketingCache.getOrGenerate(
    { subject: company, purpose: "marketing" },
    () => app.marketing.run(research.report, company, { count, signal: options.signal }),
    { forceFresh: options.forceFresh },
  );
  const marketing = unwrap(entry, "marketing");
  // A cached result may hold more campaigns than this run asked for
  const result: MarketingResult = {
    ...marketing.value,
    campaigns: marketing.value.campaigns.slice(0, count),
  };
  if (result.campaigns.length < count) {
    app.logger.warn("marketing_campaigns_short", {
      company,
      provenance: marketing.provenance,
      requested: count,
      available: result.campaigns.length,
    });
  }
  app.logger.info("marketing_stage_completed", {
    company,
    provenance: marketing.provenance,
    campaigns: result.campaigns.length,
    rejected: result.rejected.length,
  });

  // 3. Assets
  let assets: AssetRunResult | null = null;
  if (options.generateAssets !== false) {
    try {
      assets = await app.assets.generate(result.campaigns, options.signal);
    } catch (err: unknown) {
      const cause = err instanceof Error ? err : new Error(String(err));
      throw new WorkflowError(`assets failed: ${cause.message}`, "assets", cause);
    }
  }

  return {
    sessionId: app.sessionId,
    research,
    marketing: { result, provenance: marketing.provenance },
    assets,
    durationMs: Date.now() - startTime,
  };
}
