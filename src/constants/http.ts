import { ERROR_CATEGORIES, type ErrorCode } from './errors';

export const HTTP_STATUS = {
    OK: 200,
    CREATED: 201,
    BAD_REQUEST: 400,
    UNAUTHORIZED: 401,
    NOT_FOUND: 404,
    TOO_MANY_REQUESTS: 429,
    INTERNAL_SERVER_ERROR: 500,
    SERVICE_UNAVAILABLE: 503,
} as const;

export type ErrorStatus = 400 | 404 | 429 | 500;

// Rate limiting is the only LimitExceeded case surfaced as 429.
export function statusForError(code: ErrorCode | undefined): ErrorStatus {
    if (!code) {
        return HTTP_STATUS.INTERNAL_SERVER_ERROR;
    }
    if (code === 'RateLimitExceeded') {
        return HTTP_STATUS.TOO_MANY_REQUESTS;
    }

    switch (ERROR_CATEGORIES[code]) {
        case 'NotFound':
            return HTTP_STATUS.NOT_FOUND;
        case 'InternalError':
            return HTTP_STATUS.INTERNAL_SERVER_ERROR;
        default:
            return HTTP_STATUS.BAD_REQUEST;
    }
}
