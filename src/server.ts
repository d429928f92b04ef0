import { Hono } from "hono";
import type { AppConfig, AppEnv } from "./env";
import type { AppServices } from "./services";
import { createAPIRouter } from "./routes";
import healthRoutes from "./routes/health";
import { errorHandler } from "./middleware/error-handler";
import { createCorsMiddleware } from "./middleware/cors";
import { requestLogger } from "./middleware/logger";
import { injectServices } from "./middleware/service-injector";
import { requestIdMiddleware } from "./middleware/request-id";
import { securityHeadersMiddleware } from "./middleware/security-headers";

export function createApp(config: AppConfig, services: AppServices) {
    const app = new Hono<AppEnv>();

    app.onError(errorHandler);
    app.use("*", requestIdMiddleware);
    app.use("*", injectServices(config, services));
    app.use("*", securityHeadersMiddleware);
    app.use("*", requestLogger);
    app.use("*", createCorsMiddleware(config));

    app.get("/", (c) => c.json({
        name: "License Server",
        version: "1.0.0",
        status: "operational",
        endpoints: {
            health: "/health",
            healthReady: "/health/ready",
            licenses: "/api/v1/:key/{validate,activate,deactivate,status}",
            batch: "/api/v1/licenses/batch",
            webhooks: "/api/webhooks/{stripe,paypal}",
            admin: "/api/admin",
        },
    }));

    app.route("/health", healthRoutes);
    app.route("/api", createAPIRouter());

    app.notFound((c) => c.json({
        success: false,
        error: "Not found",
        code: "NotFound",
        timestamp: new Date().toISOString(),
    }, 404));

    return app;
}
