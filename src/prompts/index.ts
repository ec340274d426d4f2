export {
  PromptRegistry,
  PromptRegistryError,
  PROMPT_NAMES,
  type PromptName,
  type PromptRegistryData,
  type PromptTemplateData,
  type PromptVariables,
  type RenderedPrompt,
} from "./prompt-registry.ts";
