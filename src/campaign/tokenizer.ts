// ── Token Kinds ─────────────────────────────────────────────────────────────

export const TOKEN_KINDS = [
  "CAMPAIGN_START",
  "SECTION_HEADER",
  "SUBSECTION_LINE",
  "KEY_VALUE_LINE",
  "BLANK",
] as const;

export type TokenKind = (typeof TOKEN_KINDS)[number];

export interface CampaignStartToken {
  readonly kind: "CAMPAIGN_START";
  /** Text after the first colon, or the whole line when there is none. */
  readonly name: string;
}

export interface SectionHeaderToken {
  readonly kind: "SECTION_HEADER";
  readonly key: string;
  /** Inline value after the colon; null when the header opens a subsection. */
  readonly value: string | null;
}

export interface SubsectionLineToken {
  readonly kind: "SUBSECTION_LINE";
  readonly key: string;
  readonly value: string;
}

export interface KeyValueLineToken {
  readonly kind: "KEY_VALUE_LINE";
  readonly key: string;
  /** null when the line carries no colon separator. */
  readonly value: string | null;
}

export interface BlankToken {
  readonly kind: "BLANK";
}

export type Token =
  | CampaignStartToken
  | SectionHeaderToken
  | SubsectionLineToken
  | KeyValueLineToken
  | BlankToken;

// ── Markers ─────────────────────────────────────────────────────────────────

export const CAMPAIGN_MARKER = "Campaign";

const SECTION_HEADER_PATTERN = /^[1-9]\./;
const BULLET_MARKERS = ["-", "•", "*"] as const;
const LEADING_BULLETS = /^[-•*\s]+/;

// ── Key Derivation ──────────────────────────────────────────────────────────

/** "Visual Theme Description" → "visual_theme_description" */
export function toSectionKey(phrase: string): string {
  return phrase.trim().toLowerCase().replace(/ /g, "_");
}

function splitAtColon(text: string): { head: string; tail: string | null } {
  const idx = text.indexOf(":");
  if (idx === -1) {
    return { head: text, tail: null };
  }
  return { head: text.slice(0, idx), tail: text.slice(idx + 1).trim() };
}

// ── Tokenizer ───────────────────────────────────────────────────────────────

/**
 * Classify one trimmed line. Classification depends on the line alone;
 * any non-blank line that is not a campaign start, section header or
 * bullet falls back to KEY_VALUE_LINE.
 */
export function tokenizeLine(line: string): Token {
  if (line.length === 0) {
    return { kind: "BLANK" };
  }

  if (line.startsWith(CAMPAIGN_MARKER)) {
    const { tail } = splitAtColon(line);
    return { kind: "CAMPAIGN_START", name: tail ?? line };
  }

  if (SECTION_HEADER_PATTERN.test(line)) {
    const { head, tail } = splitAtColon(line.slice(2));
    return {
      kind: "SECTION_HEADER",
      key: toSectionKey(head),
      value: tail !== null && tail.length > 0 ? tail : null,
    };
  }

  if (BULLET_MARKERS.some((marker) => line.startsWith(marker))) {
    const body = line.replace(LEADING_BULLETS, "");
    const { head, tail } = splitAtColon(body);
    return {
      kind: "SUBSECTION_LINE",
      key: toSectionKey(head),
      value: tail ?? body.trim(),
    };
  }

  const { head, tail } = splitAtColon(line);
  return { kind: "KEY_VALUE_LINE", key: toSectionKey(head), value: tail };
}

/** Split a response into lines, trim each and classify it. */
export function tokenize(text: string): Token[] {
  return text.split(/\r?\n/).map((line) => tokenizeLine(line.trim()));
}
