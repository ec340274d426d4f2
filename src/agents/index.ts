export { PromptRunner, type CompletionOptions } from "./prompt-runner.ts";

export {
  ResearchAgent,
  researchTask,
  formatResearchReport,
  type ResearchRunOptions,
  type ResearchReportParts,
} from "./research-agent.ts";

export {
  MarketingAgent,
  isMarketingResult,
  ANALYSIS_TYPES,
  type AnalysisKind,
  type MarketingAnalyses,
  type MarketingAgentConfig,
  type MarketingResult,
  type RejectedCampaign,
} from "./marketing-agent.ts";

export { CreativeAgent, type CreativeAssets } from "./creative-agent.ts";
