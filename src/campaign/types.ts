// ── Campaign Record ─────────────────────────────────────────────────────────

/** Sub-key → text mapping collected from the bullet lines under a section. */
export type Subsection = Readonly<Record<string, string>>;

export type SectionValue = string | Subsection;

/**
 * One campaign assembled from a model response. Keys are derived from the
 * generated header phrases ("Core Message" → "core_message") and keep their
 * insertion order.
 */
export type CampaignRecord = Readonly<Record<string, SectionValue>>;

export const REQUIRED_CAMPAIGN_FIELDS = [
  "campaign_name",
  "core_message",
  "visual_theme_description",
] as const;

export type RequiredCampaignField = (typeof REQUIRED_CAMPAIGN_FIELDS)[number];

// ── Prompt Suggestions ──────────────────────────────────────────────────────

export interface PromptSuggestions {
  readonly product_focused: string;
  readonly brand_focused: string;
  readonly social_media: string;
}

/** A validated record together with the image prompts derived from it. */
export interface CampaignIdea {
  readonly record: CampaignRecord;
  readonly promptSuggestions: PromptSuggestions;
}

// ── Parser Limits ───────────────────────────────────────────────────────────

export const MIN_CAMPAIGNS = 1;
export const MAX_CAMPAIGNS = 10;

export function isSubsection(value: SectionValue | undefined): value is Subsection {
  return typeof value === "object" && value !== null;
}
