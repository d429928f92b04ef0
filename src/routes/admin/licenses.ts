import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AppEnv } from '../../env';
import { toIso } from '../../services/shared';
import { validationHook } from '../validation';
import { auditAdminAction, sendFailure } from './respond';
import {
    ExtendLicenseSchema,
    HistoryQuerySchema,
    IssueLicenseSchema,
    ReactivateLicenseSchema,
    RevokeActivationsSchema,
    RevokeLicenseSchema,
    SuspendLicenseSchema,
} from './schemas';
import { toAdminLicenseView, toIssuedView, toTransitionView } from './views';

const licensesRouter = new Hono<AppEnv>();

/**
 * POST /api/admin/licenses
 * Issues a license outside any payment flow. The key is returned once.
 */
licensesRouter.post('/', zValidator('json', IssueLicenseSchema, validationHook), async (c) => {
    const input = c.req.valid('json');
    const result = await c.get('services').license.issueManual({
        productId: input.product_id,
        email: input.email,
        customerName: input.customer_name,
    });

    if (!result.success || !result.data) {
        return sendFailure(c, result);
    }

    await auditAdminAction(c, 'issue', result.data.license.id, { product_id: input.product_id });
    return c.json({ success: true, data: toIssuedView(result.data) }, 201);
});

licensesRouter.get('/:id', async (c) => {
    const { license } = c.get('services');
    const result = await license.getLicense(c.req.param('id'));

    if (!result.success || !result.data) {
        return sendFailure(c, result);
    }

    const summary = license.summarize(result.data);
    return c.json({
        success: true,
        data: {
            ...toAdminLicenseView(result.data),
            effective_status: summary.status,
            activations_remaining: summary.activationsRemaining,
        },
    });
});

licensesRouter.post('/:id/suspend', zValidator('json', SuspendLicenseSchema, validationHook), async (c) => {
    const id = c.req.param('id');
    const { reason } = c.req.valid('json');
    const result = await c.get('services').license.suspend(id, reason);

    if (!result.success || !result.data) {
        return sendFailure(c, result);
    }

    await auditAdminAction(c, 'suspend', id, { reason, changed: result.data.changed });
    return c.json({ success: true, data: toTransitionView(result.data) });
});

/**
 * POST /api/admin/licenses/:id/reactivate
 * `override: true` is the only way back from revoked.
 */
licensesRouter.post('/:id/reactivate', zValidator('json', ReactivateLicenseSchema, validationHook), async (c) => {
    const id = c.req.param('id');
    const { override } = c.req.valid('json');
    const result = await c.get('services').license.reactivate(id, { adminOverride: override });

    if (!result.success || !result.data) {
        return sendFailure(c, result);
    }

    await auditAdminAction(c, 'reactivate', id, { override, changed: result.data.changed });
    return c.json({ success: true, data: toTransitionView(result.data) });
});

licensesRouter.post('/:id/revoke', zValidator('json', RevokeLicenseSchema, validationHook), async (c) => {
    const id = c.req.param('id');
    const { reason } = c.req.valid('json');
    const result = await c.get('services').license.revoke(id, reason);

    if (!result.success || !result.data) {
        return sendFailure(c, result);
    }

    await auditAdminAction(c, 'revoke', id, {
        reason,
        changed: result.data.changed,
        activations_revoked: result.data.activationsRevoked,
    });
    return c.json({ success: true, data: toTransitionView(result.data) });
});

licensesRouter.post('/:id/extend', zValidator('json', ExtendLicenseSchema, validationHook), async (c) => {
    const id = c.req.param('id');
    const { days } = c.req.valid('json');
    const result = await c.get('services').license.extend(id, days);

    if (!result.success || !result.data) {
        return sendFailure(c, result);
    }

    await auditAdminAction(c, 'extend', id, { days, expires_at: toIso(result.data.license.expiresAt) });
    return c.json({ success: true, data: toTransitionView(result.data) });
});

/**
 * GET /api/admin/licenses/:id/activations
 * The most recent activations, machine data masked.
 */
licensesRouter.get('/:id/activations', zValidator('query', HistoryQuerySchema, validationHook), async (c) => {
    const { limit } = c.req.valid('query');
    const result = await c.get('services').license.activationHistory(c.req.param('id'), limit);

    if (!result.success || !result.data) {
        return sendFailure(c, result);
    }

    return c.json({
        success: true,
        data: result.data.map((entry) => ({
            id: entry.id,
            machine_fingerprint: entry.machineFingerprint,
            machine_id: entry.machineId,
            active: entry.active,
            revoked: entry.revoked,
            revoked_reason: entry.revokedReason,
            ip_address: entry.ipAddress,
            activated_at: toIso(entry.activatedAt),
            deactivated_at: toIso(entry.deactivatedAt),
            revoked_at: toIso(entry.revokedAt),
        })),
    });
});

/**
 * POST /api/admin/licenses/:id/activations/revoke
 * Without identifiers every live activation is revoked.
 */
licensesRouter.post(
    '/:id/activations/revoke',
    zValidator('json', RevokeActivationsSchema, validationHook),
    async (c) => {
        const id = c.req.param('id');
        const input = c.req.valid('json');
        const result = await c.get('services').license.revokeActivations(
            id,
            { fingerprint: input.machine_fingerprint, machineId: input.machine_id },
            input.reason
        );

        if (!result.success || !result.data) {
            return sendFailure(c, result);
        }

        await auditAdminAction(c, 'revoke_activations', id, {
            reason: input.reason,
            machine_fingerprint: input.machine_fingerprint,
            machine_id: input.machine_id,
            revoked: result.data.deactivated,
        });
        return c.json({
            success: true,
            data: {
                revoked: result.data.deactivated,
                license: toAdminLicenseView(result.data.license),
            },
        });
    }
);

export default licensesRouter;
