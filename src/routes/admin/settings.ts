import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AppEnv } from '../../env';
import { validationHook } from '../validation';
import { auditAdminAction } from './respond';
import { AuditQuerySchema, SettingsQuerySchema, UpdateSettingSchema } from './schemas';

const settingsRouter = new Hono<AppEnv>();

settingsRouter.get('/settings', zValidator('query', SettingsQuerySchema, validationHook), async (c) => {
    const { prefix } = c.req.valid('query');
    const settings = await c.get('services').settings.list(prefix);
    return c.json({ success: true, data: settings });
});

/**
 * PUT /api/admin/settings/:key
 * e.g. webhooks.stripe.charge_refunded = "false" turns that handler off.
 */
settingsRouter.put('/settings/:key', zValidator('json', UpdateSettingSchema, validationHook), async (c) => {
    const key = c.req.param('key');
    const { value } = c.req.valid('json');
    await c.get('services').settings.set(key, value);
    await auditAdminAction(c, 'update_setting', null, { setting: key, value });
    return c.json({ success: true, data: { key, value } });
});

settingsRouter.get('/audit', zValidator('query', AuditQuerySchema, validationHook), async (c) => {
    const { category, limit } = c.req.valid('query');
    const entries = await c.get('services').audit.listRecent(category, limit);
    return c.json({
        success: true,
        data: entries.map((entry) => ({
            id: entry.id,
            category: entry.category,
            event_type: entry.eventType,
            severity: entry.severity,
            license_id: entry.licenseId,
            request_id: entry.requestId,
            details: entry.details,
            created_at: new Date(entry.createdAt).toISOString(),
        })),
    });
});

export default settingsRouter;
