import type { Context } from "hono";
import type { AppEnv } from "../env";

const UNKNOWN_IP = "unknown";

// X-Forwarded-For is only honoured behind a trusted proxy; otherwise the
// socket address is the client.
export function getClientIp(c: Context<AppEnv>): string {
    if (c.get("config").trustProxy) {
        const forwarded = c.req.header("X-Forwarded-For")?.split(",")[0]?.trim();
        if (forwarded) {
            return forwarded;
        }
        const realIp = c.req.header("X-Real-IP")?.trim();
        if (realIp) {
            return realIp;
        }
    }

    return c.env?.incoming?.socket.remoteAddress ?? UNKNOWN_IP;
}
