import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../env';
import { generateId } from '../services/shared';

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Request ID Middleware
 * Reuses the caller's X-Request-ID when it looks sane, otherwise generates one
 */
export const requestIdMiddleware = createMiddleware<AppEnv>(async (c, next) => {
    const incoming = c.req.header('X-Request-ID');
    const requestId = incoming && incoming.length <= MAX_REQUEST_ID_LENGTH && /^[\w.:-]+$/.test(incoming)
        ? incoming
        : generateId('req');

    c.set('requestId', requestId);
    c.header('X-Request-ID', requestId);

    await next();
});
