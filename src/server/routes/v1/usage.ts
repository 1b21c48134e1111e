import type { Context } from "hono";
import type { BridgeService } from "../../services/BridgeService.js";

/**
 * GET /v1/usage
 */
export function getUsage(bridge: BridgeService) {
  return async (c: Context) => {
    const snapshot = await bridge.usage();
    return c.json({
      object: "usage",
      window_limit: snapshot.windowLimit,
      window_used: snapshot.windowUsed,
      resets_at: new Date(snapshot.resetsAt).toISOString(),
      is_unlimited: snapshot.isUnlimited,
      fetched_at: new Date(snapshot.fetchedAt).toISOString(),
      stale: snapshot.stale,
    });
  };
}
