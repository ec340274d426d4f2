import type { TextGenerationRequest } from "../generation/types.ts";

export const TWO_CAMPAIGNS = [
  "Campaign 1: Launch Day",
  "1. Core Message: Save energy",
  "2. Visual Theme Description:",
  "- Color Palette: green",
  "",
  "Campaign 2: Night Ride",
  "1. Core Message: Ride safe",
  "2. Visual Theme Description:",
  "- Mood: calm",
].join("\n");

/** Answers each prompt in .agents/prompts.yaml by the opening of its user text. */
export function workflowResponder(request: TextGenerationRequest): string {
  const prompt = request.prompt;
  if (prompt.startsWith("Generate research questions")) return "Research questions";
  if (prompt.startsWith("Analyze the following company data")) return "Research analysis";
  if (prompt.startsWith("Analyze the brand elements")) return "Brand voice";
  if (prompt.startsWith("Create audience profiles")) return "Audience profiles";
  if (prompt.startsWith("Analyze market position")) return "Market position";
  if (prompt.includes("advertising campaign ideas")) return TWO_CAMPAIGNS;
  if (prompt.startsWith("Create a memorable")) return "Tagline";
  if (prompt.startsWith("Create a compelling narrative")) return "Story";
  if (prompt.startsWith("Create a detailed image")) return "Image prompt";
  // The research prompt opens with the research task itself
  return "Research findings";
}
