import { createMiddleware } from "hono/factory";
import { HTTPException } from "hono/http-exception";
import { ERROR_MESSAGES } from "../constants/errors";
import { HTTP_STATUS } from "../constants/http";
import type { AppEnv } from "../env";
import { hashSHA256 } from "../services/shared";
import { getClientIp } from "./client-ip";

// Both sides are digested first so the comparison always runs over equal lengths.
async function secretsMatch(provided: string, expected: string): Promise<boolean> {
    const [a, b] = await Promise.all([hashSHA256(provided), hashSHA256(expected)]);
    let diff = 0;
    for (let i = 0; i < a.length; i++) {
        diff |= a.charCodeAt(i) ^ b.charCodeAt(i);
    }
    return diff === 0;
}

/**
 * Admin routes require the shared X-Admin-Secret header.
 * Failures are recorded as security events.
 */
export const requireAdmin = createMiddleware<AppEnv>(async (c, next) => {
    const expected = c.get("config").adminSecret;
    const provided = c.req.header("X-Admin-Secret");

    if (!expected || !provided || !(await secretsMatch(provided, expected))) {
        await c.get("services").audit.logSecurityEvent("admin_auth_failed", {
            reason: provided ? "invalid_secret" : "missing_secret",
            ip_address: getClientIp(c),
            path: c.req.path,
        }, { requestId: c.get("requestId") });

        throw new HTTPException(HTTP_STATUS.UNAUTHORIZED, { message: ERROR_MESSAGES.GENERIC.UNAUTHORIZED });
    }

    await next();
});
