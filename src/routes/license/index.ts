import { Hono } from 'hono';
import type { AppEnv } from '../../env';
import handlersRouter from './handlers';

const licenseRoutes = new Hono<AppEnv>();

licenseRoutes.route('/', handlersRouter);

export default licenseRoutes;

export * from './schemas';
