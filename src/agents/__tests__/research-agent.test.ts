import { describe, it, expect } from "vitest";
import { ResearchAgent, formatResearchReport, researchTask } from "../research-agent.ts";
import type { SearchClient, SearchResult } from "../../generation/types.ts";
import { BufferLogger } from "../../observability/logger.ts";
import { callsFor, testRunner } from "./helpers.ts";
import type { Responder } from "./helpers.ts";

const TASK =
  "Research market opportunities and strategies for Acme targeting cyclists. " +
  "Focus on market size, customer needs, and potential strategies.";

const respond: Responder = (request) => {
  switch (request.system) {
    case "questions":
      return "1. Who buys?";
    case "research":
      return "Findings about Acme";
    case "analysis":
      return `Profile from: ${request.prompt}`;
    default:
      return "";
  }
};

class StubSearch implements SearchClient {
  calls = 0;
  constructor(private readonly reply: SearchResult[] | Error) {}
  async search(): Promise<SearchResult[]> {
    this.calls++;
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

describe("researchTask", () => {
  it("describes the default research task", () => {
    expect(researchTask("Acme", "cyclists")).toBe(TASK);
  });

  it("frames a follow-up question", () => {
    expect(researchTask("Acme", "cyclists", "  who are the rivals?  ")).toBe(
      "Given the target company Acme and target audience cyclists, who are the rivals?",
    );
  });

  it("ignores a blank follow-up", () => {
    expect(researchTask("Acme", "cyclists", "   ")).toBe(TASK);
  });
});

describe("ResearchAgent", () => {
  it("chains questions, findings and analysis into a report", async () => {
    const { runner, generator } = testRunner(respond);
    const agent = new ResearchAgent(runner, null);

    const report = await agent.run("Acme", "cyclists");

    expect(report).toBe(
      formatResearchReport({
        questions: "1. Who buys?",
        findings: "Findings about Acme",
        analysis: "Profile from: A Findings about Acme",
      }),
    );
    expect(generator.calls.map((c) => c.system)).toEqual(["questions", "research", "analysis"]);
    expect(callsFor(generator, "questions")[0]?.prompt).toBe(`Q ${TASK}`);
    expect(callsFor(generator, "research")[0]?.prompt).toBe(
      `R ${TASK} :: Web search unavailable: no search client configured.`,
    );
  });

  it("grounds findings in search results", async () => {
    const { runner, generator } = testRunner(respond);
    const search = new StubSearch([{ title: "Bikes", content: "Growing market", url: "https://example.com" }]);

    await new ResearchAgent(runner, search).run("Acme", "cyclists");

    expect(callsFor(generator, "research")[0]?.prompt).toBe(
      `R ${TASK} :: Title: Bikes\nContent: Growing market\nURL: https://example.com`,
    );
  });

  it("notes an empty search", async () => {
    const { runner, generator } = testRunner(respond);
    await new ResearchAgent(runner, new StubSearch([])).run("Acme", "cyclists");
    expect(callsFor(generator, "research")[0]?.prompt).toBe(`R ${TASK} :: No web search results found.`);
  });

  it("retries a failing search, then carries on with a note", async () => {
    const logger = new BufferLogger();
    const { runner, generator } = testRunner(respond);
    const search = new StubSearch(new Error("offline"));

    await new ResearchAgent(runner, search, logger).run("Acme", "cyclists");

    expect(search.calls).toBe(3);
    expect(callsFor(generator, "research")[0]?.prompt).toBe(`R ${TASK} :: Web search failed: offline`);
    expect(logger.find("research_search_failed")?.data).toEqual({
      module: "research-agent",
      error: "offline",
    });
  });

  it("uses the follow-up as the task", async () => {
    const { runner, generator } = testRunner(respond);
    await new ResearchAgent(runner, null).run("Acme", "cyclists", { followUp: "What about pricing?" });
    expect(callsFor(generator, "questions")[0]?.prompt).toBe(
      "Q Given the target company Acme and target audience cyclists, What about pricing?",
    );
  });

  it("stops when aborted", async () => {
    const { runner, generator } = testRunner(respond);
    const controller = new AbortController();
    controller.abort();
    await expect(
      new ResearchAgent(runner, null).run("Acme", "cyclists", { signal: controller.signal }),
    ).rejects.toMatchObject({ code: "ABORTED" });
    expect(generator.calls).toHaveLength(0);
  });
});
