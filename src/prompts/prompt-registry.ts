import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";

// ── YAML Config Schema ──────────────────────────────────────────────────────

export interface PromptTemplateData {
  readonly description?: string;
  readonly system?: string;
  readonly user: string;
}

export interface PromptRegistryData {
  readonly prompts: Record<string, PromptTemplateData>;
}

export interface RenderedPrompt {
  readonly system: string;
  readonly user: string;
}

export type PromptVariables = Readonly<Record<string, string | number>>;

/** Templates the research, marketing and creative agents render. */
export const PROMPT_NAMES = [
  "research_questions",
  "research",
  "research_analysis",
  "brand_analysis",
  "audience_mapping",
  "market_position",
  "campaign_ideas",
  "tagline",
  "narrative",
  "image_prompt",
] as const;

export type PromptName = (typeof PROMPT_NAMES)[number];

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

// ── Validation Error ────────────────────────────────────────────────────────

export class PromptRegistryError extends Error {
  constructor(
    message: string,
    public readonly errors: readonly string[],
  ) {
    super(message);
    this.name = "PromptRegistryError";
  }
}

// ── Prompt Registry ─────────────────────────────────────────────────────────

/**
 * Prompt templates loaded from `.agents/prompts.yaml`.
 *
 * Each template has an optional system text and a user text with `{name}`
 * placeholders. Rendering fails when a placeholder has no value.
 */
export class PromptRegistry {
  readonly names: readonly string[];
  private readonly templates: ReadonlyMap<string, PromptTemplateData>;

  private constructor(data: PromptRegistryData) {
    this.templates = new Map(Object.entries(data.prompts));
    this.names = Object.freeze([...this.templates.keys()]);
  }

  /**
   * Load the registry from a YAML file and check that every name in
   * `required` is defined.
   */
  static async fromYaml(
    yamlPath: string,
    required: readonly string[] = PROMPT_NAMES,
  ): Promise<PromptRegistry> {
    let content: string;
    try {
      content = await readFile(yamlPath, "utf-8");
    } catch (err: unknown) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        throw new PromptRegistryError(`Prompt registry file not found: ${yamlPath}`, [
          `File not found: ${yamlPath}`,
        ]);
      }
      throw new PromptRegistryError(`Failed to read prompt registry: ${yamlPath}`, [
        err instanceof Error ? err.message : String(err),
      ]);
    }

    let raw: unknown;
    try {
      raw = parseYaml(content);
    } catch (err: unknown) {
      throw new PromptRegistryError(`Invalid YAML in ${yamlPath}`, [
        err instanceof Error ? err.message : String(err),
      ]);
    }
    return PromptRegistry.fromData(toRegistryData(raw), required);
  }

  /** Create a registry from in-memory data (useful for tests). */
  static fromData(
    data: PromptRegistryData,
    required: readonly string[] = [],
  ): PromptRegistry {
    const registry = new PromptRegistry(data);
    registry.validate(required);
    return registry;
  }

  // ── Query Methods ───────────────────────────────────────────────────────

  has(name: string): boolean {
    return this.templates.has(name);
  }

  /** Placeholder names used by a template, in order of first appearance. */
  variables(name: string): string[] {
    const template = this.get(name);
    const seen = new Set<string>();
    for (const text of [template.system ?? "", template.user]) {
      for (const match of text.matchAll(PLACEHOLDER)) {
        const variable = match[1];
        if (variable !== undefined) seen.add(variable);
      }
    }
    return [...seen];
  }

  render(name: string, vars: PromptVariables): RenderedPrompt {
    const template = this.get(name);
    const missing = this.variables(name).filter((v) => !(v in vars));
    if (missing.length > 0) {
      throw new PromptRegistryError(
        `Prompt "${name}" is missing variables: ${missing.join(", ")}`,
        missing.map((v) => `Missing variable: ${v}`),
      );
    }

    const fill = (text: string): string =>
      text.replace(PLACEHOLDER, (_whole, variable: string) => String(vars[variable] ?? ""));

    return {
      system: fill(template.system ?? "").trim(),
      user: fill(template.user).trim(),
    };
  }

  // ── Validation ──────────────────────────────────────────────────────────

  private get(name: string): PromptTemplateData {
    const template = this.templates.get(name);
    if (!template) {
      throw new PromptRegistryError(`Unknown prompt: "${name}"`, [`Unknown prompt: ${name}`]);
    }
    return template;
  }

  private validate(required: readonly string[]): void {
    const errors: string[] = [];

    for (const name of required) {
      if (!this.templates.has(name)) errors.push(`Required prompt "${name}" is not defined`);
    }
    for (const [name, template] of this.templates) {
      if (template.user.trim().length === 0) errors.push(`Prompt "${name}" has an empty user text`);
    }

    if (errors.length > 0) {
      throw new PromptRegistryError(
        `Prompt registry validation failed with ${errors.length} error(s):\n${errors.map((e) => `  - ${e}`).join("\n")}`,
        errors,
      );
    }
  }
}

/**
 * Check the raw YAML shape and copy it into registry data.
 * Collects every problem before throwing.
 */
function toRegistryData(raw: unknown): PromptRegistryData {
  if (typeof raw !== "object" || raw === null || !("prompts" in raw)) {
    throw new PromptRegistryError("Invalid YAML: expected a 'prompts' map at root", [
      "Missing 'prompts' key",
    ]);
  }
  const promptsRaw = raw.prompts;
  if (typeof promptsRaw !== "object" || promptsRaw === null || Array.isArray(promptsRaw)) {
    throw new PromptRegistryError("Invalid YAML: 'prompts' must be a map", [
      "'prompts' is not a map",
    ]);
  }

  const errors: string[] = [];
  const prompts: Record<string, PromptTemplateData> = {};
  for (const [name, entry] of Object.entries(promptsRaw)) {
    const value: unknown = entry;
    if (typeof value !== "object" || value === null) {
      errors.push(`Prompt "${name}" must be a map`);
      continue;
    }
    const user = "user" in value ? value.user : undefined;
    const system = "system" in value ? value.system : undefined;
    const description = "description" in value ? value.description : undefined;
    if (typeof user !== "string") {
      errors.push(`Prompt "${name}" needs a 'user' string`);
      continue;
    }
    if (system !== undefined && typeof system !== "string") {
      errors.push(`Prompt "${name}" has a non-string 'system'`);
      continue;
    }
    prompts[name] = {
      user,
      ...(typeof system === "string" ? { system } : {}),
      ...(typeof description === "string" ? { description } : {}),
    };
  }

  if (errors.length > 0) {
    throw new PromptRegistryError(`Invalid YAML schema: ${errors.length} error(s)`, errors);
  }
  return { prompts };
}
