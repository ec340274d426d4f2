import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import { formatSearchResults } from "../generation/search-client.ts";
import type { SearchClient } from "../generation/types.ts";
import type { PromptRunner } from "./prompt-runner.ts";

// ── Research Task ───────────────────────────────────────────────────────────

export interface ResearchRunOptions {
  /** A follow-up question about the same company and audience. */
  readonly followUp?: string;
  readonly signal?: AbortSignal;
}

export function researchTask(company: string, audience: string, followUp?: string): string {
  if (followUp !== undefined && followUp.trim().length > 0) {
    return `Given the target company ${company} and target audience ${audience}, ${followUp.trim()}`;
  }
  return (
    `Research market opportunities and strategies for ${company} targeting ${audience}. ` +
    "Focus on market size, customer needs, and potential strategies."
  );
}

export interface ResearchReportParts {
  readonly questions: string;
  readonly findings: string;
  readonly analysis: string;
}

export function formatResearchReport(parts: ResearchReportParts): string {
  return (
    `Research Questions:\n${parts.questions}\n\n` +
    `Raw Findings:\n${parts.findings}\n\n` +
    `Analysis:\n${parts.analysis}`
  );
}

// ── Research Agent ──────────────────────────────────────────────────────────

/**
 * Produces a research report for a company and audience: research
 * questions, findings grounded in web search, and an analysis of those
 * findings. Without a search client the findings rest on the model alone.
 */
export class ResearchAgent {
  private readonly logger: Logger;

  constructor(
    private readonly runner: PromptRunner,
    private readonly search: SearchClient | null,
    logger?: Logger,
  ) {
    this.logger = (logger ?? NULL_LOGGER).child({ module: "research-agent" });
  }

  async run(company: string, audience: string, options?: ResearchRunOptions): Promise<string> {
    const task = researchTask(company, audience, options?.followUp);
    const signal = options?.signal;
    this.logger.info("research_started", { company, followUp: options?.followUp !== undefined });

    const questions = await this.runner.run("research_questions", { company_name: task }, { signal });
    const searchResults = await this.searchWeb(task, signal);
    const findings = await this.runner.run(
      "research",
      { input: task, search_results: searchResults },
      { signal },
    );
    const analysis = await this.runner.run(
      "research_analysis",
      { collected_data: findings },
      { signal },
    );

    this.logger.info("research_completed", { company });
    return formatResearchReport({ questions, findings, analysis });
  }

  /** Search results as prompt text; a failed or absent search becomes a note. */
  private async searchWeb(query: string, signal?: AbortSignal): Promise<string> {
    const search = this.search;
    if (search === null) {
      return "Web search unavailable: no search client configured.";
    }

    try {
      const results = await this.runner.retry.run(() => search.search(query), {
        label: "web_search",
        signal,
      });
      if (results.length === 0) return "No web search results found.";
      return formatSearchResults(results);
    } catch (err: unknown) {
      if (signal?.aborted) throw err;
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn("research_search_failed", { error: message });
      return `Web search failed: ${message}`;
    }
  }
}
