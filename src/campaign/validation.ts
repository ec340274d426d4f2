import type { CampaignRecord, RequiredCampaignField } from "./types.ts";
import { REQUIRED_CAMPAIGN_FIELDS, isSubsection } from "./types.ts";

// ── Validation Error ────────────────────────────────────────────────────────

export class CampaignValidationError extends Error {
  override readonly name = "CampaignValidationError";

  constructor(
    message: string,
    readonly campaignName: string,
    readonly missing: readonly RequiredCampaignField[],
  ) {
    super(message);
  }
}

// ── Validation Result ───────────────────────────────────────────────────────

export type CampaignValidationResult =
  | { readonly valid: true; readonly record: CampaignRecord }
  | { readonly valid: false; readonly record: CampaignRecord; readonly error: CampaignValidationError };

function isPresent(record: CampaignRecord, field: RequiredCampaignField): boolean {
  const value = record[field];
  if (value === undefined) return false;
  if (isSubsection(value)) return Object.keys(value).length > 0;
  return value.trim().length > 0;
}

/**
 * Check that a parsed record carries every required field. Only structure
 * is checked; the wording of the content is not.
 */
export function validateCampaign(record: CampaignRecord): CampaignValidationResult {
  const missing = REQUIRED_CAMPAIGN_FIELDS.filter((f) => !isPresent(record, f));
  if (missing.length === 0) {
    return { valid: true, record };
  }

  const name = record["campaign_name"];
  const campaignName = typeof name === "string" && name.trim().length > 0 ? name : "(unnamed)";
  return {
    valid: false,
    record,
    error: new CampaignValidationError(
      `Campaign data incomplete. Missing: ${missing.join(", ")}`,
      campaignName,
      missing,
    ),
  };
}
