import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { isBridgeError, toOpenAIError } from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";

export function errorHandler(err: Error, c: Context) {
    if (isBridgeError(err)) {
        if (err.status >= 500) {
            logger.error(`[${err.code}] ${err.message}`);
        } else {
            logger.warn(`[${err.code}] ${err.message}`);
        }
        if (err.retryAfterMs !== undefined) {
            c.header("Retry-After", String(Math.ceil(err.retryAfterMs / 1000)));
        }
        return c.json(toOpenAIError(err), err.status);
    }

    if (err instanceof HTTPException) {
        return c.json({
            error: {
                message: err.message,
                type: err.status === 401 ? "authentication_error" : "http_exception",
                code: String(err.status),
            },
        }, err.status);
    }

    logger.error("Global error handler caught exception:", err.message);

    return c.json({
        error: {
            message: "Internal Server Error",
            type: "server_error",
            code: "internal_error",
        },
    }, 500);
}
