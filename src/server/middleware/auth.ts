import type { Context, MiddlewareHandler, Next } from "hono";
import { HTTPException } from "hono/http-exception";

/**
 * Caller key from `Authorization: Bearer`, `X-API-Key` or the `api_key` query parameter
 */
export function extractApiKey(c: Context): string | undefined {
  const authHeader = c.req.header("Authorization");
  if (authHeader?.startsWith("Bearer ")) {
    return authHeader.slice("Bearer ".length).trim();
  }
  return c.req.header("x-api-key") || c.req.query("api_key") || undefined;
}

export function authMiddleware(apiKey: string | undefined): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    // Simple API Key check if configured
    if (apiKey && extractApiKey(c) !== apiKey) {
      throw new HTTPException(401, { message: "Invalid API Key" });
    }

    await next();
  };
}
