/**
 * campaign-forge
 *
 * Researches a company, turns model output into structured marketing
 * campaigns behind a tiered get-or-generate cache, and writes the
 * campaign assets (tagline, story, image).
 */
export const VERSION = "0.1.0";

export * from "./src/index.ts";
