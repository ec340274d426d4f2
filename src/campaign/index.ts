export {
  tokenize,
  tokenizeLine,
  toSectionKey,
  CAMPAIGN_MARKER,
  TOKEN_KINDS,
  type Token,
  type TokenKind,
} from "./tokenizer.ts";

export {
  CampaignRecordBuilder,
  parseCampaigns,
  clampCampaignCount,
  type BuilderState,
} from "./record-builder.ts";

export {
  derivePrompts,
  renderVisualTheme,
  renderEmotionalAppeal,
} from "./prompt-suggestions.ts";

export {
  validateCampaign,
  CampaignValidationError,
  type CampaignValidationResult,
} from "./validation.ts";

export {
  REQUIRED_CAMPAIGN_FIELDS,
  MIN_CAMPAIGNS,
  MAX_CAMPAIGNS,
  isSubsection,
  type CampaignRecord,
  type CampaignIdea,
  type PromptSuggestions,
  type SectionValue,
  type Subsection,
  type RequiredCampaignField,
} from "./types.ts";
