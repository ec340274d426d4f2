export {
  AssetOrchestrator,
  sanitizeFilename,
  type AssetOrchestratorConfig,
  type AssetRunResult,
  type CampaignAssetFiles,
  type CampaignAssetResult,
  type FailedCampaignAssets,
} from "./asset-orchestrator.ts";
