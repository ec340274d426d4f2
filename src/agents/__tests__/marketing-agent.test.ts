import { describe, it, expect, beforeEach } from "vitest";
import { MarketingAgent, isMarketingResult } from "../marketing-agent.ts";
import { derivePrompts } from "../../campaign/prompt-suggestions.ts";
import { RedisPersistentStore } from "../../store/redis-store.ts";
import { FakeRedis } from "../../store/__tests__/helpers.ts";
import { BufferLogger } from "../../observability/logger.ts";
import { CAMPAIGN_TEXT, callsFor, testRunner } from "./helpers.ts";
import type { Responder } from "./helpers.ts";

const SESSION = "20260301_120000_abcdef";

function responder(campaignReplies: string[]): Responder {
  return (request) => {
    switch (request.system) {
      case "brand":
        return "brand voice";
      case "audience":
        return "audience map";
      case "market":
        return "market position";
      case "campaigns":
        return campaignReplies.shift() ?? "";
      default:
        return "";
    }
  };
}

const LAUNCH_DAY = {
  campaign_name: "Launch Day",
  core_message: "Save energy",
  visual_theme_description: { color_palette: "green", mood: "hopeful" },
};

describe("MarketingAgent", () => {
  let redis: FakeRedis;
  let store: RedisPersistentStore;
  let logger: BufferLogger;

  beforeEach(() => {
    redis = new FakeRedis();
    store = new RedisPersistentStore(redis);
    logger = new BufferLogger();
  });

  it("produces analyses, validated campaigns and rejections", async () => {
    const { runner, generator } = testRunner(responder([CAMPAIGN_TEXT]));
    const agent = new MarketingAgent({ runner, store, sessionId: SESSION, numCampaigns: 5, logger });

    const result = await agent.run("the report", "Acme");

    expect(result.analyses).toEqual({
      brand_analysis: "brand voice",
      audience_analysis: "audience map",
      market_analysis: "market position",
    });
    expect(result.campaigns).toEqual([
      { record: LAUNCH_DAY, promptSuggestions: derivePrompts(LAUNCH_DAY) },
    ]);
    expect(result.rejected).toEqual([
      {
        record: { campaign_name: "Half Done", core_message: "Incomplete" },
        campaignName: "Half Done",
        missing: ["visual_theme_description"],
        reason: "Campaign data incomplete. Missing: visual_theme_description",
      },
    ]);

    expect(callsFor(generator, "brand")[0]?.prompt).toBe("B the report");
    expect(callsFor(generator, "campaigns")[0]?.prompt).toBe(
      "C 5 | market position | audience map | brand voice",
    );
    expect(logger.messages()).toContain("campaign_rejected");
  });

  it("records each analysis in the store", async () => {
    const { runner } = testRunner(responder([CAMPAIGN_TEXT]));
    await new MarketingAgent({ runner, store, sessionId: SESSION, numCampaigns: 5 }).run(
      "the report",
      "Acme",
    );

    const [brand] = await store.query({ content_type: "brand_analysis", subject: "Acme" }, 1);
    expect(brand?.document).toBe("brand voice");
    expect(brand?.metadata["analysis_type"]).toBe("voice_and_personality");
    const [market] = await store.query({ content_type: "market_analysis" }, 1);
    expect(market?.metadata["analysis_type"]).toBe("position_and_competition");
  });

  it("keeps going when the store rejects a record", async () => {
    redis.failWith = new Error("offline");
    const { runner } = testRunner(responder([CAMPAIGN_TEXT]));
    const agent = new MarketingAgent({ runner, store, sessionId: SESSION, numCampaigns: 5, logger });

    const result = await agent.run("the report", "Acme");

    expect(result.campaigns).toHaveLength(1);
    expect(logger.count("analysis_record_failed")).toBe(3);
  });

  it("asks again when a response has no parseable campaign", async () => {
    const { runner, generator } = testRunner(responder(["Here are some thoughts.", CAMPAIGN_TEXT]));
    const agent = new MarketingAgent({ runner, sessionId: SESSION, numCampaigns: 5, logger });

    const result = await agent.run("the report", "Acme");

    expect(callsFor(generator, "campaigns")).toHaveLength(2);
    expect(result.campaigns).toHaveLength(1);
    expect(logger.find("campaign_parse_empty")?.data).toMatchObject({
      attempt: 1,
    });
  });

  it("gives up after the retry budget", async () => {
    const { runner } = testRunner(responder(["nothing", "still nothing", "no"]));
    const agent = new MarketingAgent({ runner, sessionId: SESSION, numCampaigns: 5 });
    await expect(agent.run("the report", "Acme")).rejects.toMatchObject({
      code: "RESPONSE_MALFORMED",
    });
  });

  it("caps campaigns at the requested count", async () => {
    const { runner, generator } = testRunner(responder([CAMPAIGN_TEXT]));
    const agent = new MarketingAgent({ runner, sessionId: SESSION, numCampaigns: 5 });

    const result = await agent.run("the report", "Acme", { count: 1 });

    expect(callsFor(generator, "campaigns")[0]?.prompt.startsWith("C 1 |")).toBe(true);
    expect(result.campaigns).toHaveLength(1);
    expect(result.rejected).toHaveLength(0);
  });

  it("clamps the configured campaign count", () => {
    const { runner } = testRunner(responder([]));
    expect(new MarketingAgent({ runner, sessionId: SESSION, numCampaigns: 40 }).numCampaigns).toBe(10);
  });
});

describe("isMarketingResult", () => {
  it("accepts a result read back from JSON", async () => {
    const { runner } = testRunner(responder([CAMPAIGN_TEXT]));
    const result = await new MarketingAgent({ runner, sessionId: SESSION, numCampaigns: 5 }).run(
      "the report",
      "Acme",
    );
    const parsed: unknown = JSON.parse(JSON.stringify(result));
    expect(isMarketingResult(parsed)).toBe(true);
  });

  it("rejects incomplete shapes", () => {
    expect(isMarketingResult(null)).toBe(false);
    expect(isMarketingResult({ analyses: {}, campaigns: [], rejected: [] })).toBe(false);
    expect(
      isMarketingResult({
        analyses: { brand_analysis: "b", audience_analysis: "a", market_analysis: "m" },
        campaigns: [{ record: LAUNCH_DAY }],
        rejected: [],
      }),
    ).toBe(false);
    expect(
      isMarketingResult({
        analyses: { brand_analysis: "b", audience_analysis: "a", market_analysis: "m" },
        campaigns: [],
        rejected: [{ record: {}, campaignName: "x", reason: "r", missing: ["budget"] }],
      }),
    ).toBe(false);
  });
});
