import { Hono } from 'hono';
import type { AppEnv } from '../env';
import { HTTP_STATUS } from '../constants/http';

const SERVICE_NAME = 'license-server';

const healthRoutes = new Hono<AppEnv>();

/**
 * GET /health
 * Liveness: the process is up and the database answers
 */
healthRoutes.get('/', async (c) => {
    try {
        await c.get('services').repository.ping();

        return c.json({
            status: 'healthy',
            timestamp: new Date().toISOString(),
            service: SERVICE_NAME,
        }, HTTP_STATUS.OK);
    } catch (error) {
        c.get('logger').error('Health check failed', error);
        return c.json({
            status: 'unhealthy',
            timestamp: new Date().toISOString(),
            service: SERVICE_NAME,
        }, HTTP_STATUS.SERVICE_UNAVAILABLE);
    }
});

/**
 * GET /health/ready
 * Readiness: database reachable and required secrets present
 */
healthRoutes.get('/ready', async (c) => {
    const config = c.get('config');
    const checks = {
        database: false,
        secrets: Boolean(config.jwtSecret && config.machineHashSalt && config.adminSecret),
    };

    try {
        checks.database = await c.get('services').repository.ping();
    } catch (error) {
        c.get('logger').error('Readiness database check failed', error);
    }

    const ready = Object.values(checks).every(Boolean);

    return c.json({
        status: ready ? 'ready' : 'not_ready',
        timestamp: new Date().toISOString(),
        checks,
        providers: {
            stripe: Boolean(config.stripeSecretKey && config.stripeWebhookSecret),
            paypal: Boolean(config.paypalClientId && config.paypalClientSecret && config.paypalWebhookId),
        },
    }, ready ? HTTP_STATUS.OK : HTTP_STATUS.SERVICE_UNAVAILABLE);
});

export default healthRoutes;
