import axios from "axios";
import type { AxiosAdapter, AxiosInstance } from "axios";
import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import { compactTimestamp } from "../store/id.ts";
import type { ImageGenerator } from "./types.ts";
import { GenerationError } from "./types.ts";

// ── Config ──────────────────────────────────────────────────────────────────

export const STABILITY_API_HOST = "https://api.stability.ai";
export const STABILITY_ENGINE_ID = "stable-diffusion-xl-1024-v1-0";

export interface StabilityConfig {
  readonly apiKey: string;
  readonly apiHost?: string;
  readonly engineId?: string;
  readonly timeoutMs?: number;
  /** Request adapter handed to axios; tests serve responses in-process with it. */
  readonly adapter?: AxiosAdapter;
  readonly now?: () => Date;
}

/** Fixed generation parameters for the SDXL text-to-image endpoint. */
export const STABILITY_PARAMS = {
  cfg_scale: 7.5,
  steps: 10,
  width: 1024,
  height: 1024,
  samples: 1,
} as const;

// ── Stability Image Generator ───────────────────────────────────────────────

export class StabilityImageGenerator implements ImageGenerator {
  private readonly client: AxiosInstance;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly config: StabilityConfig,
    logger?: Logger,
  ) {
    this.client = axios.create({
      baseURL: config.apiHost ?? STABILITY_API_HOST,
      timeout: config.timeoutMs ?? 120_000,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        Authorization: `Bearer ${config.apiKey}`,
      },
      ...(config.adapter ? { adapter: config.adapter } : {}),
    });
    this.logger = (logger ?? NULL_LOGGER).child({ module: "image-generator" });
    this.now = config.now ?? (() => new Date());
  }

  async generate(prompt: string, outputDir: string): Promise<string> {
    const engineId = this.config.engineId ?? STABILITY_ENGINE_ID;

    let data: unknown;
    try {
      const response = await this.client.post<unknown>(
        `/v1/generation/${engineId}/text-to-image`,
        { text_prompts: [{ text: prompt }], ...STABILITY_PARAMS },
      );
      data = response.data;
    } catch (err: unknown) {
      throw toImageError(err);
    }

    const base64 = firstArtifact(data);
    if (base64 === null) {
      throw new GenerationError(
        "Stability response contained no image artifact",
        "RESPONSE_MALFORMED",
        true,
      );
    }

    const imagePath = join(outputDir, `sdxl_${compactTimestamp(this.now())}.png`);
    try {
      await mkdir(outputDir, { recursive: true });
      await writeFile(imagePath, Buffer.from(base64, "base64"));
    } catch (err: unknown) {
      throw new GenerationError(
        `Failed to write image ${imagePath}: ${err instanceof Error ? err.message : String(err)}`,
        "IMAGE_FAILED",
        false,
        err instanceof Error ? err : undefined,
      );
    }

    this.logger.info("image_generated", { path: imagePath, engineId });
    return imagePath;
  }
}

// ── Response Handling ───────────────────────────────────────────────────────

function firstArtifact(data: unknown): string | null {
  if (typeof data !== "object" || data === null || !("artifacts" in data)) return null;
  const artifacts = data.artifacts;
  if (!Array.isArray(artifacts)) return null;
  const first: unknown = artifacts[0];
  if (
    typeof first === "object" &&
    first !== null &&
    "base64" in first &&
    typeof first.base64 === "string" &&
    first.base64.length > 0
  ) {
    return first.base64;
  }
  return null;
}

function toImageError(err: unknown): GenerationError {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const detail = status === undefined ? err.message : `Non-200 response (${status})`;
    return new GenerationError(
      `Stability request failed: ${detail}`,
      status === 429 ? "RATE_LIMITED" : "IMAGE_FAILED",
      status === undefined || status === 429 || status >= 500,
      err,
    );
  }
  const message = err instanceof Error ? err.message : String(err);
  return new GenerationError(
    `Stability request failed: ${message}`,
    "IMAGE_FAILED",
    false,
    err instanceof Error ? err : undefined,
  );
}
