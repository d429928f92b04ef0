import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AppEnv } from '../../env';
import { validationHook } from '../validation';
import { auditAdminAction, sendFailure } from './respond';
import { CreateOrderSchema, CreateProductSchema } from './schemas';
import { toIssuedView, toOrderView, toProductView } from './views';

const catalogRouter = new Hono<AppEnv>();

catalogRouter.post('/products', zValidator('json', CreateProductSchema, validationHook), async (c) => {
    const input = c.req.valid('json');
    const result = await c.get('services').catalog.createProduct({
        name: input.name,
        maxActivations: input.max_activations,
        licenseDurationDays: input.license_duration_days,
        subscription: input.subscription,
        requiresMachineId: input.requires_machine_id,
    });

    if (!result.success || !result.data) {
        return sendFailure(c, result);
    }
    return c.json({ success: true, data: toProductView(result.data) }, 201);
});

catalogRouter.get('/products/:id', async (c) => {
    const result = await c.get('services').catalog.getProduct(c.req.param('id'));
    if (!result.success || !result.data) {
        return sendFailure(c, result);
    }
    return c.json({ success: true, data: toProductView(result.data) });
});

catalogRouter.post('/orders', zValidator('json', CreateOrderSchema, validationHook), async (c) => {
    const input = c.req.valid('json');
    const result = await c.get('services').catalog.createOrder({
        productId: input.product_id,
        email: input.email,
        customerName: input.customer_name,
        provider: input.provider,
        paymentReference: input.payment_reference,
        transactionId: input.transaction_id,
    });

    if (!result.success || !result.data) {
        return sendFailure(c, result);
    }
    return c.json({ success: true, data: toOrderView(result.data) }, 201);
});

catalogRouter.get('/orders/:id', async (c) => {
    const result = await c.get('services').catalog.getOrder(c.req.param('id'));
    if (!result.success || !result.data) {
        return sendFailure(c, result);
    }
    return c.json({ success: true, data: toOrderView(result.data) });
});

/**
 * POST /api/admin/orders/:id/complete
 * Completes the order and issues its license. Repeating it returns the
 * existing license without the key.
 */
catalogRouter.post('/orders/:id/complete', async (c) => {
    const id = c.req.param('id');
    const result = await c.get('services').license.issueForOrder(id);

    if (!result.success || !result.data) {
        return sendFailure(c, result);
    }

    if (result.data.created) {
        await auditAdminAction(c, 'complete_order', result.data.license.id, { order_id: id });
    }
    return c.json({ success: true, data: toIssuedView(result.data) }, result.data.created ? 201 : 200);
});

export default catalogRouter;
