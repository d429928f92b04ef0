import { serve } from "@hono/node-server";
import { loadConfig, validateEnv } from "./env";
import { createServices } from "./services";
import { createApp } from "./server";
import { scheduleMaintenance } from "./scheduled/maintenance";
import { applyMigrations, createLicenseDB, openDatabase } from "./utils/db";
import { logger } from "./utils/logger";

const SHUTDOWN_DRAIN_MS = 10_000;

function main(): void {
    const validation = validateEnv(process.env);
    if (!validation.valid) {
        process.exit(1);
    }

    const config = loadConfig(process.env);
    logger.setLevel(config.logLevel);

    const sqlite = openDatabase(config.databasePath);
    const applied = applyMigrations(sqlite);
    if (applied.length > 0) {
        logger.info("Applied migrations", { migrations: applied });
    }

    const db = createLicenseDB(sqlite);
    const services = createServices(config, db);
    const app = createApp(config, services);
    const maintenance = scheduleMaintenance(services, config);

    const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
        logger.info("License server listening", { port: info.port, environment: config.environment });
    });

    let shuttingDown = false;
    const shutdown = (signal: string) => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info("Shutting down", { signal });

        maintenance.stop();
        server.close(() => {
            services.tasks.drain(SHUTDOWN_DRAIN_MS)
                .catch((error: unknown) => logger.error("Background tasks did not drain", error))
                .finally(() => {
                    db.close();
                    process.exit(0);
                });
        });
    };

    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main();
