import axios from "axios";
import type { AxiosAdapter, AxiosInstance } from "axios";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import type { SearchClient, SearchResult } from "./types.ts";
import { GenerationError } from "./types.ts";

export const TAVILY_API_URL = "https://api.tavily.com";
const MISSING_CONTENT = "No content available";

export interface TavilyConfig {
  readonly apiKey: string;
  readonly baseUrl?: string;
  /** Results kept from each response. */
  readonly maxResults?: number;
  readonly timeoutMs?: number;
  readonly adapter?: AxiosAdapter;
}

/** Web search over the Tavily REST API. */
export class TavilySearchClient implements SearchClient {
  private readonly client: AxiosInstance;
  private readonly logger: Logger;

  constructor(
    private readonly config: TavilyConfig,
    logger?: Logger,
  ) {
    this.client = axios.create({
      baseURL: config.baseUrl ?? TAVILY_API_URL,
      timeout: config.timeoutMs ?? 30_000,
      headers: {
        Authorization: `Bearer ${config.apiKey}`,
        "Content-Type": "application/json",
      },
      ...(config.adapter ? { adapter: config.adapter } : {}),
    });
    this.logger = (logger ?? NULL_LOGGER).child({ module: "search-client" });
  }

  async search(query: string): Promise<SearchResult[]> {
    let data: unknown;
    try {
      const response = await this.client.post<unknown>("/search", {
        query,
        num_results: 10,
        search_depth: "advanced",
      });
      data = response.data;
    } catch (err: unknown) {
      const status = axios.isAxiosError(err) ? err.response?.status : undefined;
      const message = err instanceof Error ? err.message : String(err);
      throw new GenerationError(
        `Tavily search failed${status === undefined ? "" : ` (${status})`}: ${message}`,
        "SEARCH_FAILED",
        true,
        err instanceof Error ? err : undefined,
      );
    }

    const results = parseResults(data).slice(0, this.config.maxResults ?? 5);
    this.logger.debug("search_completed", { query, results: results.length });
    return results;
  }
}

function parseResults(data: unknown): SearchResult[] {
  if (typeof data !== "object" || data === null || !("results" in data)) {
    throw new GenerationError("Tavily response has no results", "RESPONSE_MALFORMED", true);
  }
  const raw = data.results;
  if (!Array.isArray(raw)) {
    throw new GenerationError("Tavily results is not a list", "RESPONSE_MALFORMED", true);
  }

  const results: SearchResult[] = [];
  for (const item of raw) {
    const entry: unknown = item;
    if (typeof entry !== "object" || entry === null) continue;
    const title = "title" in entry && typeof entry.title === "string" ? entry.title : "";
    const url = "url" in entry && typeof entry.url === "string" ? entry.url : "";
    const content =
      "content" in entry && typeof entry.content === "string" ? entry.content : MISSING_CONTENT;
    results.push({ title, content, url });
  }
  return results;
}

/** Render results as "Title/Content/URL" blocks separated by blank lines. */
export function formatSearchResults(results: readonly SearchResult[]): string {
  return results
    .map((r) => `Title: ${r.title}\nContent: ${r.content}\nURL: ${r.url}\n`)
    .join("\n\n");
}
