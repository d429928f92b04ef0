import { Hono } from "hono";
import type { AppEnv } from "../env";
import adminRoutes from "./admin";
import licenseRoutes from "./license";
import webhookRoutes from "./webhooks";

export function createAPIRouter() {
    const api = new Hono<AppEnv>();

    api.route("/v1", licenseRoutes);
    api.route("/webhooks", webhookRoutes);
    api.route("/admin", adminRoutes);

    return api;
}
