import type { Context } from "hono";
import { MODELS } from "../../../shared/index.js";

export async function listModels(c: Context) {
  const created = Math.floor(Date.now() / 1000) - 86400; // Yesterday

  const models = MODELS.map((model) => ({
    id: model.id,
    object: "model" as const,
    created,
    owned_by: model.vendor,
    // Extended info: which slots of the model selection this model may fill
    roles: model.roles,
    capabilities: {
      streaming: true,
      vision: model.vision ?? false,
    },
  }));

  return c.json({
    object: "list",
    data: models,
  });
}
