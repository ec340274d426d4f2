import type { CampaignRecord, PromptSuggestions, SectionValue, Subsection } from "./types.ts";
import { isSubsection } from "./types.ts";

// ── Field Lookup ────────────────────────────────────────────────────────────
// Models word the bullet labels loosely ("Color palette suggestions",
// "Color Palette"), so each rendered field accepts a few sub-keys.

interface FieldSpec {
  readonly keys: readonly string[];
  readonly placeholder: string;
}

const VISUAL_FIELDS = {
  colorPalette: {
    keys: ["color_palette", "color_palette_suggestions", "colors"],
    placeholder: "professional",
  },
  style: {
    keys: [
      "style",
      "photography_illustration_style",
      "photography/illustration_style",
      "photography_style",
      "illustration_style",
    ],
    placeholder: "modern",
  },
  elements: {
    keys: ["elements", "key_visual_elements", "visual_elements"],
    placeholder: "clean and minimal",
  },
  mood: {
    keys: ["mood", "mood_and_atmosphere", "atmosphere"],
    placeholder: "professional",
  },
} as const satisfies Record<string, FieldSpec>;

const EMOTION_FIELDS = {
  primary: { keys: ["primary_emotion", "emotion"], placeholder: "professional" },
  triggers: {
    keys: [
      "supporting_psychological_triggers",
      "psychological_triggers",
      "triggers",
    ],
    placeholder: "trust and reliability",
  },
} as const satisfies Record<string, FieldSpec>;

const SOCIAL_FIELDS = {
  platforms: {
    keys: ["primary_platforms", "platforms"],
    placeholder: "social media",
  },
  format: {
    keys: ["content_format_recommendations", "content_format", "format"],
    placeholder: "engaging social media content",
  },
} as const satisfies Record<string, FieldSpec>;

const MISSING_CORE_MESSAGE = "the brand's core value";
const MISSING_THEME = "Professional, modern visual style";
const MISSING_EMOTION = "professional mood with trust and reliability";

function pick(subsection: Subsection, field: FieldSpec): string {
  for (const key of field.keys) {
    const value = subsection[key];
    if (value !== undefined && value.trim().length > 0) return value;
  }
  return field.placeholder;
}

function scalarOr(value: SectionValue | undefined, placeholder: string): string {
  return typeof value === "string" && value.trim().length > 0 ? value : placeholder;
}

// ── Renderers ───────────────────────────────────────────────────────────────

export function renderVisualTheme(value: SectionValue | undefined): string {
  if (!isSubsection(value)) {
    return scalarOr(value, MISSING_THEME);
  }
  return (
    `Color palette: ${pick(value, VISUAL_FIELDS.colorPalette)}. ` +
    `Style: ${pick(value, VISUAL_FIELDS.style)}. ` +
    `Elements: ${pick(value, VISUAL_FIELDS.elements)}. ` +
    `Mood: ${pick(value, VISUAL_FIELDS.mood)}`
  );
}

export function renderEmotionalAppeal(value: SectionValue | undefined): string {
  if (!isSubsection(value)) {
    return scalarOr(value, MISSING_EMOTION);
  }
  return `${pick(value, EMOTION_FIELDS.primary)} mood with ${pick(value, EMOTION_FIELDS.triggers)}`;
}

function socialFocus(value: SectionValue | undefined): {
  platforms: string;
  format: string;
} {
  if (isSubsection(value)) {
    return {
      platforms: pick(value, SOCIAL_FIELDS.platforms),
      format: pick(value, SOCIAL_FIELDS.format),
    };
  }
  return {
    platforms: scalarOr(value, SOCIAL_FIELDS.platforms.placeholder),
    format: SOCIAL_FIELDS.format.placeholder,
  };
}

// ── derivePrompts ───────────────────────────────────────────────────────────

/**
 * Compose the three image-prompt suggestions for a sealed campaign record.
 * Pure: missing or malformed sections render as placeholders.
 */
export function derivePrompts(record: CampaignRecord): PromptSuggestions {
  const theme = renderVisualTheme(record["visual_theme_description"]);
  const emotion = renderEmotionalAppeal(record["key_emotional_appeal"]);
  const coreMessage = scalarOr(record["core_message"], MISSING_CORE_MESSAGE);
  const social = socialFocus(record["social_media_focus"]);

  return {
    product_focused:
      `${theme}. Focus on ${coreMessage}. ` +
      `Style: Professional photography, ${emotion}, ` +
      "photorealistic quality, advertisement composition, " +
      "product-centric, commercial lighting",
    brand_focused:
      `Scene capturing ${emotion} through ${theme}. ` +
      `Emphasizing: ${coreMessage}. ` +
      "Style: Cinematic lighting, emotional depth, photorealistic quality, " +
      "lifestyle photography, brand storytelling",
    social_media:
      `Social media content for ${social.platforms}. ${theme}. ` +
      `Format: ${social.format}. ` +
      `Style: ${emotion}, ` +
      "high engagement, platform-optimized, scroll-stopping visuals",
  };
}
