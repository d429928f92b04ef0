import { Hono } from 'hono';
import type { AppEnv } from '../../env';
import { requireAdmin } from '../../middleware/admin-auth';
import catalogRouter from './catalog';
import licensesRouter from './licenses';
import settingsRouter from './settings';

const adminRoutes = new Hono<AppEnv>();

adminRoutes.use('*', requireAdmin);
adminRoutes.route('/licenses', licensesRouter);
adminRoutes.route('/', catalogRouter);
adminRoutes.route('/', settingsRouter);

export default adminRoutes;

export * from './schemas';
