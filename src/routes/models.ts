import { Hono } from "hono";
import { IMAGE_MODEL_ID, type OpenAIModel, type OpenAIModelList } from "../types/openai.js";

/** Stable timestamp used for the model's `created` field (2023-11-14T22:13:20Z). */
const MODEL_CREATED_TIMESTAMP = 1700000000;

const IMAGE_MODEL: OpenAIModel = {
  id: IMAGE_MODEL_ID,
  object: "model",
  created: MODEL_CREATED_TIMESTAMP,
  owned_by: "xai",
};

export function createModelRoutes(): Hono {
  const app = new Hono();

  app.get("/v1/models", (c) => {
    const response: OpenAIModelList = { object: "list", data: [IMAGE_MODEL] };
    return c.json(response);
  });

  app.get("/v1/models/:modelId", (c) => {
    const modelId = c.req.param("modelId");
    if (modelId === IMAGE_MODEL_ID) return c.json(IMAGE_MODEL);

    return c.json(
      {
        error: {
          message: `Model '${modelId}' not found`,
          type: "invalid_request_error",
          param: "model",
          code: "model_not_found",
        },
      },
      404,
    );
  });

  return app;
}
