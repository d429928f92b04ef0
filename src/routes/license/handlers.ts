import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AppEnv } from '../../env';
import { validationHook } from '../validation';
import { clientContext, sendApiResult } from './respond';
import { BatchRequestSchema, MachineBodySchema, MachineQuerySchema } from './schemas';

const handlersRouter = new Hono<AppEnv>();

handlersRouter.post(
    '/licenses/batch',
    zValidator('json', BatchRequestSchema, validationHook),
    async (c) => {
        const { operations } = c.req.valid('json');
        const result = await c.get('services').licenseApi.batch(
            operations.map((op) => ({
                type: op.type,
                licenseKey: op.license_key,
                fingerprint: op.machine_fingerprint,
                machineId: op.machine_id,
            })),
            clientContext(c)
        );
        return sendApiResult(c, result);
    }
);

handlersRouter.get(
    '/:key/validate',
    zValidator('query', MachineQuerySchema, validationHook),
    async (c) => {
        const query = c.req.valid('query');
        const result = await c.get('services').licenseApi.validate(
            c.req.param('key'),
            { fingerprint: query.machine_fingerprint, machineId: query.machine_id },
            clientContext(c)
        );
        return sendApiResult(c, result, { validation: true });
    }
);

handlersRouter.get(
    '/:key/validate/jwt',
    zValidator('query', MachineQuerySchema, validationHook),
    async (c) => {
        const query = c.req.valid('query');
        const result = await c.get('services').licenseApi.validateJwt(
            c.req.param('key'),
            { fingerprint: query.machine_fingerprint, machineId: query.machine_id },
            clientContext(c)
        );
        return sendApiResult(c, result, { validation: true });
    }
);

handlersRouter.post(
    '/:key/activate',
    zValidator('json', MachineBodySchema, validationHook),
    async (c) => {
        const body = c.req.valid('json');
        const result = await c.get('services').licenseApi.activate(
            c.req.param('key'),
            { fingerprint: body.machine_fingerprint, machineId: body.machine_id },
            clientContext(c)
        );
        return sendApiResult(c, result);
    }
);

handlersRouter.post(
    '/:key/deactivate',
    zValidator('json', MachineBodySchema, validationHook),
    async (c) => {
        const body = c.req.valid('json');
        const result = await c.get('services').licenseApi.deactivate(
            c.req.param('key'),
            { fingerprint: body.machine_fingerprint, machineId: body.machine_id },
            clientContext(c)
        );
        return sendApiResult(c, result);
    }
);

handlersRouter.get('/:key/status', async (c) => {
    const result = await c.get('services').licenseApi.status(c.req.param('key'), clientContext(c));
    return sendApiResult(c, result);
});

export default handlersRouter;
