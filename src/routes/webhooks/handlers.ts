import { Hono, type Context } from 'hono';
import { statusForError } from '../../constants/http';
import type { AppEnv } from '../../env';
import { getClientIp } from '../../middleware/client-ip';
import type { WebhookReceipt, WebhookRequestContext } from '../../services/webhook';
import type { ServiceResult } from '../../types';

const handlersRouter = new Hono<AppEnv>();

function requestContext(c: Context<AppEnv>): WebhookRequestContext {
    return { requestId: c.get('requestId'), ipAddress: getClientIp(c) };
}

// Providers retry any non-2xx response.
function sendReceipt(c: Context<AppEnv>, result: ServiceResult<WebhookReceipt>): Response {
    const timestamp = new Date().toISOString();
    if (result.success && result.data) {
        const receipt = result.data;
        return c.json({
            received: true,
            status: receipt.status,
            event_id: receipt.eventId,
            event_type: receipt.eventType,
            action: receipt.action,
            timestamp,
        });
    }

    return c.json({
        received: false,
        error: result.error,
        code: result.code,
        timestamp,
    }, statusForError(result.code));
}

/**
 * POST /api/webhooks/stripe
 * The raw body is verified against the Stripe-Signature header before parsing.
 */
handlersRouter.post('/stripe', async (c) => {
    const payload = await c.req.text();
    const result = await c.get('services').webhooks.handleStripe(
        payload,
        c.req.header('Stripe-Signature'),
        requestContext(c)
    );
    return sendReceipt(c, result);
});

/**
 * POST /api/webhooks/paypal
 * Verified through PayPal's verify-webhook-signature API.
 */
handlersRouter.post('/paypal', async (c) => {
    const payload = await c.req.text();
    const result = await c.get('services').webhooks.handlePaypal(
        payload,
        {
            transmissionId: c.req.header('PAYPAL-TRANSMISSION-ID'),
            transmissionTime: c.req.header('PAYPAL-TRANSMISSION-TIME'),
            transmissionSig: c.req.header('PAYPAL-TRANSMISSION-SIG'),
            certUrl: c.req.header('PAYPAL-CERT-URL'),
            authAlgo: c.req.header('PAYPAL-AUTH-ALGO'),
        },
        requestContext(c)
    );
    return sendReceipt(c, result);
});

export default handlersRouter;
