import { logger, loadConfig, mergeConfig } from "../../shared/index.js";
import { startServer } from "../../server/app.js";

interface StartOptions {
  port?: number | string;
  host?: string;
  apiKey?: string;
  codecUrl?: string;
}

export async function startCommand(options: StartOptions): Promise<void> {
  const loaded = loadConfig();

  // Override config with CLI options
  const port = options.port !== undefined ? Number(options.port) : loaded.server.port;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    logger.error("Port must be a number between 1 and 65535");
    process.exit(1);
  }

  const config = mergeConfig(loaded, {
    server: {
      host: options.host || loaded.server.host,
      port,
      apiKey: options.apiKey || loaded.server.apiKey,
    },
    upstream: options.codecUrl ? { codecUrl: options.codecUrl } : undefined,
  });

  try {
    await startServer(config);
  } catch (error) {
    logger.error("Failed to start server:", error);
    process.exit(1);
  }
}
