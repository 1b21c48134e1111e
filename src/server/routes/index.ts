import { Hono } from "hono";
import type { BridgeService } from "../services/BridgeService.js";
import type { CredentialStatus } from "../services/credentialManager.js";
import { VERSION } from "../../shared/constants.js";
import { chatCompletions } from "./v1/chat.js";
import { listModels } from "./v1/models.js";
import { getUsage } from "./v1/usage.js";

export interface RouteServices {
  bridge: BridgeService;
  credentialStatus?: () => CredentialStatus;
}

export function setupRoutes(app: Hono, services: RouteServices) {
  const v1 = new Hono();

  // OpenAI Chat Completions API
  v1.post("/chat/completions", chatCompletions(services.bridge));

  // Models API
  v1.get("/models", listModels);

  // Upstream quota
  v1.get("/usage", getUsage(services.bridge));

  app.route("/v1", v1);

  // Health check
  app.get("/health", (c) =>
    c.json({
      status: "ok",
      version: VERSION,
      ...(services.credentialStatus && { credential: services.credentialStatus() }),
    })
  );
}
