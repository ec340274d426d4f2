import "dotenv/config";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { loadConfig, ConfigError } from "./config.ts";
import type { RuntimeConfig } from "./config.ts";
import { bootstrap } from "./bootstrap.ts";
import { runCampaignWorkflow, runResearch, WorkflowError } from "./runtime/run-campaigns.ts";
import { MAX_CAMPAIGNS, MIN_CAMPAIGNS } from "./campaign/types.ts";

// ── Parsed CLI Arguments ───────────────────────────────────────────────────

export const COMMANDS = ["research", "campaigns"] as const;
export type Command = (typeof COMMANDS)[number];

export interface ParsedArgs {
  command: Command | null;
  company: string | null;
  audience: string | null;
  followUp: string | null;
  count: number | null;
  fresh: boolean;
  assets: boolean;
  help: boolean;
}

// ── Argument Parser ────────────────────────────────────────────────────────

function flagValue(argv: readonly string[], i: number, flag: string): string {
  const value = argv[i + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new Error(`${flag} requires a value`);
  }
  return value;
}

/**
 * Parse CLI arguments into a structured ParsedArgs object.
 *
 * @param argv Arguments after the script name (e.g. process.argv.slice(2))
 * @throws Error if arguments are invalid
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: null,
    company: null,
    audience: null,
    followUp: null,
    count: null,
    fresh: false,
    assets: true,
    help: false,
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i] ?? "";

    if (arg === "--help" || arg === "-h") {
      result.help = true;
      i++;
    } else if (arg === "--fresh") {
      result.fresh = true;
      i++;
    } else if (arg === "--no-assets") {
      result.assets = false;
      i++;
    } else if (arg === "--audience") {
      result.audience = flagValue(argv, i, "--audience");
      i += 2;
    } else if (arg === "--follow-up") {
      result.followUp = flagValue(argv, i, "--follow-up");
      i += 2;
    } else if (arg === "--count") {
      const raw = flagValue(argv, i, "--count");
      const count = Number(raw);
      if (!Number.isInteger(count) || count < MIN_CAMPAIGNS || count > MAX_CAMPAIGNS) {
        throw new Error(`--count must be an integer between ${MIN_CAMPAIGNS} and ${MAX_CAMPAIGNS}`);
      }
      result.count = count;
      i += 2;
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown flag: ${arg}`);
    } else if (result.command === null) {
      const command = COMMANDS.find((c) => c === arg);
      if (command === undefined) {
        throw new Error(`Unknown command: ${arg}. Expected one of: ${COMMANDS.join(", ")}`);
      }
      result.command = command;
      i++;
    } else if (result.company === null) {
      result.company = arg;
      i++;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  if (result.followUp !== null && result.command === "campaigns") {
    throw new Error("--follow-up is only valid with the research command");
  }
  if (result.count !== null && result.command === "research") {
    throw new Error("--count is only valid with the campaigns command");
  }

  return result;
}

// ── Help Text ──────────────────────────────────────────────────────────────

export const HELP_TEXT = `
campaign-forge: research a company and generate marketing campaigns

Usage:
  npm start -- research <company> --audience <text> [--follow-up <question>] [--fresh]
  npm start -- campaigns <company> --audience <text> [--count N] [--fresh] [--no-assets]

Options:
  --audience <text>         Target audience (required)
  --follow-up <question>    Ask a follow-up research question (bypasses the cache)
  --count N                 Number of campaigns, ${MIN_CAMPAIGNS}-${MAX_CAMPAIGNS} (default: NUM_CAMPAIGNS or 5)
  --fresh                   Ignore cached research and marketing results
  --no-assets               Skip taglines, stories and images
  --help, -h                Show this help message

Examples:
  npm start -- research "Acme Bikes" --audience "urban commuters"
  npm start -- campaigns "Acme Bikes" --audience "urban commuters" --count 3
`.trim();

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err: unknown) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error("Run with --help for usage information.");
    return 1;
  }

  if (args.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  if (args.command === null || args.company === null || args.audience === null) {
    console.error("Error: Provide a command, a company name and --audience");
    console.error(HELP_TEXT);
    return 1;
  }

  let config: RuntimeConfig;
  try {
    config = loadConfig();
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
    } else {
      console.error(`Failed to load config: ${err instanceof Error ? err.message : String(err)}`);
    }
    return 1;
  }

  const app = await bootstrap(config);
  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    // ── Research Mode ────────────────────────────────────────────────────
    if (args.command === "research") {
      const outcome = await runResearch(app, {
        company: args.company,
        audience: args.audience,
        followUp: args.followUp ?? undefined,
        forceFresh: args.fresh,
        signal: controller.signal,
      });
      app.logger.info("Research completed", { provenance: outcome.provenance ?? "follow-up" });
      console.log(outcome.report);
      return 0;
    }

    // ── Campaigns Mode ───────────────────────────────────────────────────
    const result = await runCampaignWorkflow(app, {
      company: args.company,
      audience: args.audience,
      count: args.count ?? undefined,
      forceFresh: args.fresh,
      generateAssets: args.assets,
      signal: controller.signal,
    });

    console.log("\n=== Campaign Result ===");
    console.log(`Session:    ${result.sessionId}`);
    console.log(`Research:   ${result.research.provenance ?? "follow-up"}`);
    console.log(`Marketing:  ${result.marketing.provenance}`);
    for (const campaign of result.marketing.result.campaigns) {
      const name = campaign.record["campaign_name"];
      console.log(`  - ${typeof name === "string" ? name : "(unnamed)"}`);
    }
    for (const rejected of result.marketing.result.rejected) {
      console.log(`  ! ${rejected.campaignName}: ${rejected.reason}`);
    }
    if (result.assets) {
      for (const generated of result.assets.generated) {
        console.log(`Assets:     ${generated.campaignDir}`);
      }
      for (const failed of result.assets.failed) {
        console.log(`Failed:     ${failed.campaignName}: ${failed.error}`);
      }
    }
    console.log(`Duration:   ${(result.durationMs / 1000).toFixed(1)}s`);
    return 0;
  } catch (err: unknown) {
    if (err instanceof WorkflowError) {
      app.logger.error("Workflow failed", { stage: err.stage, error: err.message });
    } else {
      app.logger.error("Unhandled error", {
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
    }
    return 1;
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
    await app.shutdown();
  }
}

// Run only when executed as the entry point (not when imported for testing)
const entryPath = process.argv[1];
if (entryPath !== undefined && resolve(entryPath) === fileURLToPath(import.meta.url)) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(
        "Fatal: Failed to start:",
        err instanceof Error ? err.message : String(err),
      );
      process.exitCode = 1;
    },
  );
}
