import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../env';

/**
 * Security Headers Middleware
 * Adds security-related HTTP headers to all responses
 */
export const securityHeadersMiddleware = createMiddleware<AppEnv>(async (c, next) => {
    await next();

    c.header('X-Frame-Options', 'DENY');
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('Referrer-Policy', 'no-referrer');
    c.header('Permissions-Policy', 'geolocation=(), microphone=(), camera=()');

    // JSON only; nothing here should ever be rendered as a document
    c.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    c.header('Cache-Control', 'no-store');

    if (c.get('config').isProduction) {
        c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
});
