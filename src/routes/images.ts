import { Hono } from "hono";
import { streamSSE } from "hono/streaming";
import type { GenerationOrchestrator, GenerationResult } from "../generation/orchestrator.js";
import { ApiError, failureToApiError } from "../middleware/error-handler.js";
import {
  ImageGenerationRequestSchema,
  type ImageData,
  type ImageGenerationResponse,
} from "../types/openai.js";
import { log } from "../utils/logger.js";
import { readJsonBody } from "./shared/request.js";

const SIZE_TO_ASPECT_RATIO: Record<string, string> = {
  "1024x1024": "1:1",
  "512x512": "1:1",
  "256x256": "1:1",
  "1024x1536": "2:3",
  "1536x1024": "3:2",
};

export interface GenerationRouteSettings {
  baseUrl: string;
  defaultVariants: number;
  maxVariants: number;
  defaultAspectRatio: string;
}

export function sizeToAspectRatio(size: string | undefined, fallback: string): string {
  if (!size) return fallback;
  return SIZE_TO_ASPECT_RATIO[size] ?? fallback;
}

export function resolveVariants(n: number | undefined, settings: GenerationRouteSettings): number {
  const variants = n ?? settings.defaultVariants;
  if (variants > settings.maxVariants) {
    throw new ApiError(400, `n must be between 1 and ${settings.maxVariants}`, "invalid_request");
  }
  return variants;
}

export function toImageData(
  result: Extract<GenerationResult, { ok: true }>,
  format: "url" | "b64_json",
  baseUrl: string,
): ImageData[] {
  return result.artifacts.map((a) =>
    format === "b64_json" ? { b64_json: a.bytes.toString("base64") } : { url: baseUrl + a.locator },
  );
}

export function createImageRoutes(
  orchestrator: Pick<GenerationOrchestrator, "generate">,
  settings: GenerationRouteSettings,
): Hono {
  const app = new Hono();

  app.post("/v1/images/generations", async (c) => {
    const parsed = ImageGenerationRequestSchema.safeParse(await readJsonBody(c));
    if (!parsed.success) {
      throw new ApiError(400, `Invalid request: ${parsed.error.message}`, "invalid_request");
    }
    const req = parsed.data;
    const variants = resolveVariants(req.n, settings);
    const aspectRatio = sizeToAspectRatio(req.size, settings.defaultAspectRatio);
    log.info("[Images] Generation request", { variants, aspectRatio, stream: req.stream });

    if (!req.stream) {
      const result = await orchestrator.generate({ prompt: req.prompt, variants, aspectRatio });
      if (!result.ok) throw failureToApiError(result.failure, result.message);
      const response: ImageGenerationResponse = {
        created: Math.floor(Date.now() / 1000),
        data: toImageData(result, req.response_format, settings.baseUrl),
      };
      return c.json(response);
    }

    return streamSSE(c, async (stream) => {
      let pending: Promise<void> = Promise.resolve();
      const result = await orchestrator.generate({
        prompt: req.prompt,
        variants,
        aspectRatio,
        onProgress: (p) => {
          pending = pending.then(() =>
            stream.writeSSE({
              event: "progress",
              data: JSON.stringify({
                image_id: p.imageId,
                stage: p.stage,
                is_final: p.stage === "final",
                completed: p.completed,
                total: p.total,
                progress: `${p.completed}/${p.total}`,
              }),
            }),
          );
        },
      });
      await pending;

      if (result.ok) {
        const response: ImageGenerationResponse = {
          created: Math.floor(Date.now() / 1000),
          data: toImageData(result, req.response_format, settings.baseUrl),
        };
        await stream.writeSSE({ event: "complete", data: JSON.stringify(response) });
      } else {
        const error = failureToApiError(result.failure, result.message);
        await stream.writeSSE({
          event: "error",
          data: JSON.stringify({ error: result.message, code: error.code }),
        });
      }
    });
  });

  return app;
}
