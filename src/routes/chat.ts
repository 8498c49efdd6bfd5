import { Hono } from "hono";
import { stream } from "hono/streaming";
import { randomUUID } from "crypto";
import type { GenerationOrchestrator, GenerationResult } from "../generation/orchestrator.js";
import { ApiError, failureToApiError } from "../middleware/error-handler.js";
import {
  ChatCompletionRequestSchema,
  type ChatCompletionChunk,
  type ChatCompletionChunkDelta,
  type ChatCompletionResponse,
  type ChatMessage,
} from "../types/openai.js";
import type { ImageStage } from "../upstream/types.js";
import { log } from "../utils/logger.js";
import { resolveVariants, sizeToAspectRatio, type GenerationRouteSettings } from "./images.js";
import { readJsonBody } from "./shared/request.js";

const STAGE_PERCENT: Record<ImageStage, number> = {
  preview: 33,
  medium: 66,
  final: 99,
};

function messageText(message: ChatMessage): string {
  if (typeof message.content === "string") return message.content;
  return message.content
    .filter((part) => part.type === "text" && part.text)
    .map((part) => part.text ?? "")
    .join("\n");
}

/** The prompt is the last user message with any text in it. */
export function extractPrompt(messages: ChatMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (!message || message.role !== "user") continue;
    const text = messageText(message).trim();
    if (text) return text;
  }
  return "";
}

export function imageMarkdown(urls: string[]): string {
  return "Here are your images:\n\n" + urls.map((url, i) => `![image ${i + 1}](${url})`).join("\n\n");
}

function sseChunk(
  id: string,
  model: string,
  delta: ChatCompletionChunkDelta,
  finishReason: "stop" | null = null,
): string {
  const chunk: ChatCompletionChunk = {
    id,
    object: "chat.completion.chunk",
    created: Math.floor(Date.now() / 1000),
    model,
    choices: [{ index: 0, delta, finish_reason: finishReason }],
  };
  return `data: ${JSON.stringify(chunk)}\n\n`;
}

function resultUrls(result: Extract<GenerationResult, { ok: true }>, baseUrl: string): string[] {
  return result.artifacts.map((a) => baseUrl + a.locator);
}

export function createChatRoutes(
  orchestrator: Pick<GenerationOrchestrator, "generate">,
  settings: GenerationRouteSettings,
): Hono {
  const app = new Hono();

  app.post("/v1/chat/completions", async (c) => {
    const parsed = ChatCompletionRequestSchema.safeParse(await readJsonBody(c));
    if (!parsed.success) {
      throw new ApiError(400, `Invalid request: ${parsed.error.message}`, "invalid_request");
    }
    const req = parsed.data;
    const prompt = extractPrompt(req.messages);
    if (!prompt) throw new ApiError(400, "No prompt found in messages", "invalid_request");

    const variants = resolveVariants(req.n, settings);
    const aspectRatio = sizeToAspectRatio(req.size, settings.defaultAspectRatio);
    const id = `chatcmpl-${randomUUID().replace(/-/g, "").slice(0, 24)}`;
    log.info("[Chat] Generation request", { variants, aspectRatio, stream: req.stream });

    if (!req.stream) {
      const result = await orchestrator.generate({ prompt, variants, aspectRatio });
      if (!result.ok) throw failureToApiError(result.failure, result.message);
      const content = imageMarkdown(resultUrls(result, settings.baseUrl));
      const response: ChatCompletionResponse = {
        id,
        object: "chat.completion",
        created: Math.floor(Date.now() / 1000),
        model: req.model,
        choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
        usage: {
          prompt_tokens: prompt.length,
          completion_tokens: content.length,
          total_tokens: prompt.length + content.length,
        },
      };
      return c.json(response);
    }

    c.header("Content-Type", "text/event-stream");
    c.header("Cache-Control", "no-cache");
    c.header("Connection", "keep-alive");

    return stream(c, async (s) => {
      await s.write(
        sseChunk(id, req.model, {
          role: "assistant",
          reasoning_content: `Generating ${variants} image(s): ${prompt.slice(0, 50)}\n`,
          progress: 0,
        }),
      );

      // Only report stage changes, one line per image
      const stages = new Map<string, ImageStage>();
      let pending: Promise<void> = Promise.resolve();
      const result = await orchestrator.generate({
        prompt,
        variants,
        aspectRatio,
        onProgress: (p) => {
          if (stages.get(p.imageId) === p.stage) return;
          stages.set(p.imageId, p.stage);
          const line = `Image ${stages.size}/${p.total}: ${p.stage} (${STAGE_PERCENT[p.stage]}%)\n`;
          pending = pending.then(async () => {
            await s.write(sseChunk(id, req.model, { reasoning_content: line, progress: STAGE_PERCENT[p.stage] }));
          });
        },
      });
      await pending;

      if (result.ok) {
        const urls = resultUrls(result, settings.baseUrl);
        await s.write(
          sseChunk(id, req.model, { reasoning_content: `Done: ${urls.length} image(s)\n`, progress: 100 }),
        );
        await s.write(sseChunk(id, req.model, { content: imageMarkdown(urls) }));
      } else {
        await s.write(sseChunk(id, req.model, { content: `Generation failed: ${result.message}` }));
      }
      await s.write(sseChunk(id, req.model, {}, "stop"));
      await s.write("data: [DONE]\n\n");
    });
  });

  return app;
}
