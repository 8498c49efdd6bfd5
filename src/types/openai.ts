/**
 * OpenAI API types for /v1/images/generations and /v1/chat/completions compatibility
 */
import { z } from "zod";

export const IMAGE_MODEL_ID = "grok-imagine";

// --- Images: request ---

export const ImageGenerationRequestSchema = z.object({
  prompt: z.string().trim().min(1),
  model: z.string().optional(),
  n: z.number().int().min(1).optional(),
  size: z.string().optional(),
  response_format: z.enum(["url", "b64_json"]).optional().default("url"),
  stream: z.boolean().optional().default(false),
  user: z.string().optional(),
});

// --- Images: response ---

export interface ImageData {
  url?: string;
  b64_json?: string;
}

export interface ImageGenerationResponse {
  created: number;
  data: ImageData[];
}

// --- Chat: request ---

const ContentPartSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
}).passthrough();

export const ChatMessageSchema = z.object({
  role: z.enum(["system", "developer", "user", "assistant"]),
  content: z.union([z.string(), z.array(ContentPartSchema)]),
  name: z.string().optional(),
});

export const ChatCompletionRequestSchema = z.object({
  model: z.string().optional().default(IMAGE_MODEL_ID),
  messages: z.array(ChatMessageSchema).min(1),
  stream: z.boolean().optional().default(false),
  n: z.number().int().min(1).optional(),
  size: z.string().optional(),
  temperature: z.number().optional(),
  max_tokens: z.number().optional(),
  user: z.string().optional(),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

// --- Chat: response (non-streaming) ---

export interface ChatCompletionChoice {
  index: number;
  message: {
    role: "assistant";
    content: string;
  };
  finish_reason: "stop" | "length" | null;
}

export interface ChatCompletionUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatCompletionResponse {
  id: string;
  object: "chat.completion";
  created: number;
  model: string;
  choices: ChatCompletionChoice[];
  usage: ChatCompletionUsage;
}

// --- Chat: response (streaming) ---

export interface ChatCompletionChunkDelta {
  role?: "assistant";
  content?: string;
  /** Generation progress narration, shown by clients that render reasoning. */
  reasoning_content?: string;
  /** 0–100 */
  progress?: number;
}

export interface ChatCompletionChunkChoice {
  index: number;
  delta: ChatCompletionChunkDelta;
  finish_reason: "stop" | "length" | null;
}

export interface ChatCompletionChunk {
  id: string;
  object: "chat.completion.chunk";
  created: number;
  model: string;
  choices: ChatCompletionChunkChoice[];
}

// --- Error ---

export interface OpenAIErrorBody {
  error: {
    message: string;
    type: string;
    param: string | null;
    code: string | null;
  };
}

// --- Models ---

export interface OpenAIModel {
  id: string;
  object: "model";
  created: number;
  owned_by: string;
}

export interface OpenAIModelList {
  object: "list";
  data: OpenAIModel[];
}
