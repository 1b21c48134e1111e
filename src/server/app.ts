import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { prettyJSON } from "hono/pretty-json";

import { logger } from "../shared/logger.js";
import { errorMessage } from "../shared/utils.js";
import { CREDENTIALS_FILE } from "../shared/constants.js";
import type { AppConfig } from "../shared/types.js";
import { setupRoutes, type RouteServices } from "./routes/index.js";
import { errorHandler } from "./middleware/error.js";
import { authMiddleware } from "./middleware/auth.js";
import { BridgeService } from "./services/BridgeService.js";
import { CredentialAcquirer } from "./services/credentialAcquirer.js";
import { CredentialManager } from "./services/credentialManager.js";
import { CredentialStore } from "./services/credentialStore.js";
import { SessionStore } from "./services/sessionStore.js";
import { HttpUpstreamTransport } from "./services/UpstreamClient.js";
import { createUsageFetcher, UsageTracker } from "./services/usageTracker.js";

export interface AppOptions extends RouteServices {
  apiKey?: string;
}

export function createApp(options: AppOptions): Hono {
  const app = new Hono();

  // Global Middleware
  app.use("*", prettyJSON());
  app.use("*", cors());

  // Caller authentication (separate from upstream credentials)
  const apiKey = options.apiKey || process.env.API_KEY;
  if (apiKey) {
    app.use("/v1/*", authMiddleware(apiKey));
  }

  // Routes
  setupRoutes(app, options);

  // Error Handling
  app.onError(errorHandler);

  return app;
}

export interface BridgeRuntime {
  bridge: BridgeService;
  credentials: CredentialManager;
  usage: UsageTracker;
  sessions: SessionStore;
}

/**
 * Wire the engine components from configuration
 */
export function createRuntime(config: AppConfig): BridgeRuntime {
  const store = new CredentialStore({ filePath: CREDENTIALS_FILE, persist: config.credentials.persist });
  const acquirer = new CredentialAcquirer({ upstream: config.upstream, credentials: config.credentials });
  const credentials = new CredentialManager({
    acquirer,
    store,
    refreshBufferMs: config.credentials.refreshBufferMs,
    backgroundRefreshBufferMs: config.credentials.backgroundRefreshBufferMs,
    backgroundRefreshIntervalMs: config.credentials.backgroundRefreshIntervalMs,
  });
  const usage = new UsageTracker({
    fetchUsage: createUsageFetcher(config.upstream, credentials),
    stalenessMs: config.usage.stalenessMs,
    chatThreshold: config.usage.chatThreshold,
    backgroundThreshold: config.usage.backgroundThreshold,
  });
  const sessions = new SessionStore();
  const bridge = new BridgeService({
    config,
    credentials,
    usage,
    sessions,
    transport: new HttpUpstreamTransport(config.upstream),
  });

  return { bridge, credentials, usage, sessions };
}

export async function startServer(config: AppConfig): Promise<void> {
  const { host, port, apiKey } = config.server;
  const runtime = createRuntime(config);

  const app = createApp({
    bridge: runtime.bridge,
    credentialStatus: () => runtime.credentials.status(),
    apiKey,
  });

  // Warm up the credential so the first request does not pay for acquisition
  try {
    await runtime.credentials.acquire();
  } catch (error) {
    logger.warn(`Initial credential acquisition failed, will retry on first request: ${errorMessage(error)}`);
  }
  runtime.credentials.startBackgroundRefresh();
  runtime.sessions.startCleanup();

  // Start server
  logger.info(`Starting chat-bridge server...`);
  logger.info(`Listening on http://${host}:${port}`);
  logger.info(`Upstream codec: ${config.upstream.codecUrl}`);

  if (apiKey || process.env.API_KEY) {
    logger.info(`API Key authentication: enabled`);
  }

  const server = serve({
    fetch: app.fetch,
    port,
    hostname: host,
  });

  // Handle graceful shutdown on Ctrl+C (SIGINT) and SIGTERM
  const shutdown = () => {
    logger.info("\nShutting down server gracefully...");
    runtime.credentials.stopBackgroundRefresh();
    runtime.sessions.stopCleanup();
    server.close(() => {
      logger.info("Server closed");
      process.exit(0);
    });

    // Force exit after 5 seconds if graceful shutdown fails
    setTimeout(() => {
      logger.warn("Forcing shutdown after timeout");
      process.exit(1);
    }, 5000).unref();
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

export default startServer;
