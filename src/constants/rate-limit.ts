/**
 * Rate Limit Constants
 * Per-endpoint thresholds for the public license API (requests per window).
 */

export type RateLimitEndpoint =
    | 'validate'
    | 'validate_jwt'
    | 'activate'
    | 'deactivate'
    | 'status'
    | 'batch';

export type RateLimitSubject = 'ip' | 'license';

export interface EndpointRateLimit {
    ip: number;
    license: number | null;
    windowSeconds: number;
}

export type RateLimitPolicy = Record<RateLimitEndpoint, EndpointRateLimit>;

export const DEFAULT_RATE_LIMITS: RateLimitPolicy = {
    validate: { ip: 100, license: 60, windowSeconds: 60 },
    status: { ip: 100, license: 60, windowSeconds: 60 },
    validate_jwt: { ip: 50, license: 30, windowSeconds: 60 },
    activate: { ip: 50, license: 30, windowSeconds: 60 },
    deactivate: { ip: 50, license: 30, windowSeconds: 60 },
    batch: { ip: 10, license: null, windowSeconds: 60 },
};

export type RateLimitFailMode = 'open' | 'closed';
