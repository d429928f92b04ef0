import { createMiddleware } from "hono/factory";
import type { AppEnv } from "../env";
import { maskLicensePath } from "../services/shared";

/**
 * Request logger middleware with structured JSON logging.
 *
 * - Creates a child logger carrying the request id, method and path
 *   (license keys in the path are masked)
 * - Logs request completion with status and duration
 */
export const requestLogger = createMiddleware<AppEnv>(async (c, next) => {
    const start = Date.now();

    const logger = c.get("services").logger.child({
        requestId: c.get("requestId"),
        method: c.req.method,
        path: maskLicensePath(c.req.path),
    });
    c.set("logger", logger);

    logger.debug("Request started");

    try {
        await next();
    } catch (error) {
        logger.error("Request failed with exception", error, { duration: Date.now() - start });
        throw error;
    }

    const duration = Date.now() - start;
    const status = c.res.status;

    if (status >= 500) {
        logger.error("Request completed with server error", undefined, { status, duration });
    } else if (status >= 400) {
        logger.warn("Request completed with client error", { status, duration });
    } else {
        logger.info("Request completed", { status, duration });
    }
});
