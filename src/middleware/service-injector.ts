import { createMiddleware } from "hono/factory";
import type { AppConfig, AppEnv } from "../env";
import type { AppServices } from "../services";

// The service graph is built once at startup and shared by every request.
export function injectServices(config: AppConfig, services: AppServices) {
    return createMiddleware<AppEnv>(async (c, next) => {
        c.set("config", config);
        c.set("services", services);
        await next();
    });
}
