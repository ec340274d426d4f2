export {
  runCampaignWorkflow,
  runResearch,
  WorkflowError,
  type WorkflowStage,
  type WorkflowOptions,
  type WorkflowResult,
  type ResearchOptions,
  type ResearchOutcome,
} from "./run-campaigns.ts";
