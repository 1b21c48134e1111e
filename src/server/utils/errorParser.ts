import { isRecord } from "../../shared/utils.js";

/**
 * Parse retry delay from error response
 */
export function parseRetryDelay(errorBody: string): number | undefined {
    let json: unknown;
    try {
        json = JSON.parse(errorBody);
    } catch {
        json = undefined;
    }

    if (isRecord(json)) {
        const error = json.error;

        if (isRecord(error)) {
            const details = error.details;
            if (Array.isArray(details)) {
                for (const detail of details) {
                    if (!isRecord(detail)) continue;

                    // RetryInfo-style detail
                    const retryDelay = detail.retryDelay;
                    if (typeof retryDelay === "string") {
                        const parsed = parseDurationString(retryDelay);
                        if (parsed !== undefined) return parsed;
                    }
                }
            }

            // OpenAI style retry_after
            if (typeof error.retry_after === "number") {
                return error.retry_after * 1000;
            }
        }

        if (typeof json.retry_after === "number") {
            return json.retry_after * 1000;
        }
    }

    // Regex fallback patterns
    const patterns = [
        /try again in (\d+)m\s*(\d+)s/i,
        /(?:try again in|backoff for|wait)\s*(\d+)s/i,
        /retry after (\d+) second/i,
    ];

    for (const pattern of patterns) {
        const match = errorBody.match(pattern);
        if (match) {
            if (match.length >= 3) {
                // pattern 1: m and s
                const m = parseInt(match[1], 10);
                const s = parseInt(match[2], 10);
                return (m * 60 + s) * 1000;
            }
            // other patterns: only s
            return parseInt(match[1], 10) * 1000;
        }
    }

    return undefined;
}

/**
 * Parse a Retry-After header: delta-seconds or an HTTP date
 */
export function parseRetryAfterHeader(
    value: string | null | undefined,
    now: number = Date.now()
): number | undefined {
    if (!value) return undefined;
    const trimmed = value.trim();

    if (/^\d+(\.\d+)?$/.test(trimmed)) {
        return Math.ceil(parseFloat(trimmed) * 1000);
    }

    const date = Date.parse(trimmed);
    if (Number.isNaN(date)) return undefined;
    return Math.max(0, date - now);
}

/**
 * Parse duration string like "2h1m30s", "42s", "500ms"
 */
function parseDurationString(s: string): number | undefined {
    const regex = /^(?:(\d+)h)?(?:(\d+)m(?!s))?(?:(\d+(?:\.\d+)?)s)?(?:(\d+)ms)?$/;
    const match = s.match(regex);
    if (!match) return undefined;

    const hours = parseInt(match[1] || "0", 10);
    const minutes = parseInt(match[2] || "0", 10);
    const seconds = parseFloat(match[3] || "0");
    const milliseconds = parseInt(match[4] || "0", 10);

    const totalMs =
        (hours * 3600 + minutes * 60 + Math.ceil(seconds)) * 1000 + milliseconds;
    return totalMs > 0 ? totalMs : undefined;
}

/**
 * Whether an upstream rejection means the anonymous quota is used up
 */
export function isQuotaExhausted(status: number, body: string, markers: readonly string[]): boolean {
    return status === 429 && markers.some((marker) => body.includes(marker));
}
