import type { Context } from 'hono';
import { statusForError } from '../../constants/http';
import type { AppEnv } from '../../env';
import { getClientIp } from '../../middleware/client-ip';
import type { ApiResult, ClientContext } from '../../services/license-api';
import type { RateLimitResult } from '../../types';

export interface RateLimitView {
    limit: number;
    remaining: number;
    reset_at: string;
}

export function clientContext(c: Context<AppEnv>): ClientContext {
    return {
        ipAddress: getClientIp(c),
        userAgent: c.req.header('User-Agent') ?? null,
        requestId: c.get('requestId'),
    };
}

function rateLimitView(rateLimit: RateLimitResult | undefined): RateLimitView | undefined {
    if (!rateLimit) return undefined;
    return {
        limit: rateLimit.limit,
        remaining: rateLimit.remaining,
        reset_at: new Date(rateLimit.resetAt).toISOString(),
    };
}

function applyRateLimitHeaders(c: Context<AppEnv>, rateLimit: RateLimitResult | undefined): void {
    if (!rateLimit) return;
    c.header('X-RateLimit-Limit', String(rateLimit.limit));
    c.header('X-RateLimit-Remaining', String(rateLimit.remaining));
    c.header('X-RateLimit-Reset', String(Math.ceil(rateLimit.resetAt / 1000)));
    if (!rateLimit.allowed && rateLimit.retryAfter !== undefined) {
        c.header('Retry-After', String(rateLimit.retryAfter));
    }
}

/**
 * Writes a license API result. Validation endpoints also carry `valid` on
 * failures so clients can branch on one field.
 */
export function sendApiResult<T extends object>(
    c: Context<AppEnv>,
    result: ApiResult<T>,
    options: { validation?: boolean } = {}
): Response {
    applyRateLimitHeaders(c, result.rateLimit);
    const rate_limit = rateLimitView(result.rateLimit);

    if (result.success && result.data) {
        return c.json({ success: true, ...result.data, rate_limit, timestamp: result.timestamp });
    }

    return c.json({
        success: false,
        ...(options.validation ? { valid: false } : {}),
        error: result.error,
        code: result.code,
        rate_limit,
        timestamp: result.timestamp,
    }, statusForError(result.code));
}
