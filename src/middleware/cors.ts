import { cors } from "hono/cors";
import type { AppConfig } from "../env";

const ALLOWED_METHODS = ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"];
const ALLOWED_HEADERS = ["Content-Type", "X-Admin-Secret", "X-Request-ID"];
const EXPOSED_HEADERS = [
    "X-RateLimit-Limit",
    "X-RateLimit-Remaining",
    "X-RateLimit-Reset",
    "Retry-After",
    "X-Request-ID",
];
const MAX_AGE = 86400;

export function createCorsMiddleware(config: AppConfig) {
    const wildcard = config.allowedOrigins.includes("*");
    return cors({
        origin: wildcard
            ? "*"
            : (origin) => config.allowedOrigins.includes(origin) ? origin : null,
        allowMethods: ALLOWED_METHODS,
        allowHeaders: ALLOWED_HEADERS,
        exposeHeaders: EXPOSED_HEADERS,
        maxAge: MAX_AGE,
        // Browsers reject credentials with a wildcard origin
        credentials: !wildcard,
    });
}
