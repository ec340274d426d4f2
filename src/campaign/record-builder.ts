import type { CampaignRecord, SectionValue } from "./types.ts";
import { MAX_CAMPAIGNS, MIN_CAMPAIGNS } from "./types.ts";
import { tokenize } from "./tokenizer.ts";
import type { Token } from "./tokenizer.ts";

// ── Parser State ────────────────────────────────────────────────────────────

export type BuilderState = "NO_CAMPAIGN" | "IN_CAMPAIGN";

/**
 * Incremental state machine that assembles campaign records from tokens.
 *
 * At most one record is open at a time. A section header either carries an
 * inline value or opens a subsection accumulator; the accumulator is only
 * ever attached to the section that opened it, and dropped when empty.
 * Records are sealed (frozen) in the order their campaign-start tokens
 * arrive.
 */
export class CampaignRecordBuilder {
  private readonly sealed: CampaignRecord[] = [];
  private current: Record<string, SectionValue> | null = null;
  private currentSection: string | null = null;
  private subsection: Record<string, string> | null = null;

  get state(): BuilderState {
    return this.current === null ? "NO_CAMPAIGN" : "IN_CAMPAIGN";
  }

  get records(): readonly CampaignRecord[] {
    return this.sealed;
  }

  consume(token: Token): void {
    switch (token.kind) {
      case "BLANK":
        return;

      case "CAMPAIGN_START":
        this.seal();
        this.current = { campaign_name: token.name };
        return;

      case "SECTION_HEADER": {
        if (this.current === null) return;
        this.flushSubsection();
        this.currentSection = token.key;
        if (token.value !== null) {
          this.current[token.key] = token.value;
        } else {
          this.subsection = {};
        }
        return;
      }

      case "SUBSECTION_LINE":
        if (this.current === null || this.subsection === null) return;
        this.subsection[token.key] = token.value;
        return;

      case "KEY_VALUE_LINE":
        if (this.current === null || token.value === null) return;
        // Top-level even while a subsection is open; the subsection stays open
        this.current[token.key] = token.value;
        return;
    }
  }

  /** Flush and seal whatever is open; returns every sealed record. */
  finish(): readonly CampaignRecord[] {
    this.seal();
    return this.sealed;
  }

  private flushSubsection(): void {
    if (
      this.current !== null &&
      this.currentSection !== null &&
      this.subsection !== null &&
      Object.keys(this.subsection).length > 0
    ) {
      this.current[this.currentSection] = Object.freeze({ ...this.subsection });
    }
    this.subsection = null;
  }

  private seal(): void {
    if (this.current === null) return;
    this.flushSubsection();
    this.sealed.push(Object.freeze(this.current));
    this.current = null;
    this.currentSection = null;
  }
}

// ── parseCampaigns ──────────────────────────────────────────────────────────

export function clampCampaignCount(maxCount: number): number {
  if (!Number.isFinite(maxCount)) return MAX_CAMPAIGNS;
  return Math.min(MAX_CAMPAIGNS, Math.max(MIN_CAMPAIGNS, Math.floor(maxCount)));
}

/**
 * Parse one free-form model response into campaign records, in input
 * order, keeping at most `maxCount` (clamped to 1–10). Text with no
 * campaign-start line yields an empty array.
 */
export function parseCampaigns(
  rawText: string,
  maxCount: number,
): CampaignRecord[] {
  const limit = clampCampaignCount(maxCount);
  const builder = new CampaignRecordBuilder();

  for (const token of tokenize(rawText)) {
    builder.consume(token);
    // Once the cap is sealed the remaining campaigns are discarded unread
    if (builder.records.length >= limit) break;
  }

  return builder.finish().slice(0, limit);
}
