import type { LicenseRepository } from '../../repositories';
import type { RateLimitResult } from '../../types';
import type { RateLimitFailMode, RateLimitSubject } from '../../constants/rate-limit';
import type { Logger } from '../../utils/logger';
import { nowMs } from '../shared';

interface CounterRow {
    [key: string]: unknown;
    requests: number;
}

export interface RateLimitCheck {
    subjectType: RateLimitSubject;
    subjectValue: string;
    endpoint: string;
    maxRequests: number;
    windowSeconds: number;
}

export interface RateLimitOutcome extends RateLimitResult {
    // Set when the store failed and the configured fail mode decided.
    degraded?: boolean;
}

// RateLimitService - fixed-window counters keyed by (subject, endpoint).
// One atomic upsert per call increments and returns the window count; denied
// calls are counted too, so hammering a limited key keeps it limited.
export class RateLimitService {
    constructor(
        private repository: LicenseRepository,
        private logger: Logger,
        private failMode: RateLimitFailMode = 'open'
    ) {}

    static windowStart(now: number, windowSeconds: number): number {
        const windowMs = windowSeconds * 1000;
        return Math.floor(now / windowMs) * windowMs;
    }

    async check(input: RateLimitCheck): Promise<RateLimitOutcome> {
        const now = nowMs();
        const windowMs = input.windowSeconds * 1000;
        const windowStart = RateLimitService.windowStart(now, input.windowSeconds);
        const resetAt = windowStart + windowMs;

        try {
            const row = await this.repository.rawFirst<CounterRow>(
                `INSERT INTO rate_limits (key_type, key_value, endpoint, window_start, requests, expires_at)
                 VALUES (?, ?, ?, ?, 1, ?)
                 ON CONFLICT(key_type, key_value, endpoint, window_start)
                 DO UPDATE SET requests = requests + 1
                 RETURNING requests`,
                [input.subjectType, input.subjectValue, input.endpoint, windowStart, resetAt]
            );
            const count = row?.requests ?? 1;

            if (count === 1) {
                // First hit in a new window: drop this subject's stale windows.
                await this.repository.rawRun(
                    `DELETE FROM rate_limits
                     WHERE key_type = ? AND key_value = ? AND endpoint = ? AND window_start < ?`,
                    [input.subjectType, input.subjectValue, input.endpoint, windowStart]
                );
            }

            if (count > input.maxRequests) {
                return {
                    allowed: false,
                    limit: input.maxRequests,
                    remaining: 0,
                    resetAt,
                    retryAfter: Math.max(1, Math.ceil((resetAt - now) / 1000)),
                };
            }

            return {
                allowed: true,
                limit: input.maxRequests,
                remaining: input.maxRequests - count,
                resetAt,
            };
        } catch (error) {
            this.logger.warn('Rate limiter store unavailable', {
                failMode: this.failMode,
                endpoint: input.endpoint,
                subjectType: input.subjectType,
                error: error instanceof Error ? error.message : String(error),
            });

            const allowed = this.failMode === 'open';
            return {
                allowed,
                limit: input.maxRequests,
                remaining: allowed ? input.maxRequests : 0,
                resetAt,
                retryAfter: allowed ? undefined : input.windowSeconds,
                degraded: true,
            };
        }
    }

    async pruneExpired(now: number = nowMs()): Promise<number> {
        const meta = await this.repository.rawRun('DELETE FROM rate_limits WHERE expires_at <= ?', [now]);
        return meta.changes;
    }
}
