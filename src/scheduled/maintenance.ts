import cron, { type ScheduledTask } from 'node-cron';
import { DAY_MS } from '../constants/license';
import type { AppConfig } from '../env';
import type { AppServices } from '../services';
import { nowMs } from '../services/shared';

/**
 * Every fifteen minutes.
 */
export const MAINTENANCE_SCHEDULE = '*/15 * * * *';

/**
 * Result of one maintenance pass.
 */
export interface MaintenanceResult {
    rateLimitWindowsPruned: number;
    webhookMarkersPruned: number;
    duration: number;
    errors: string[];
}

/**
 * Prune expired rate-limit windows and webhook markers older than the
 * configured retention. Each step runs even if the other fails.
 */
export async function performMaintenance(
    services: Pick<AppServices, 'rateLimit' | 'repository' | 'logger'>,
    config: Pick<AppConfig, 'webhookMarkerRetentionDays'>,
    now: number = nowMs()
): Promise<MaintenanceResult> {
    const startTime = Date.now();
    const errors: string[] = [];
    let rateLimitWindowsPruned = 0;
    let webhookMarkersPruned = 0;

    try {
        rateLimitWindowsPruned = await services.rateLimit.pruneExpired(now);
    } catch (error) {
        services.logger.error('Failed to prune rate limit windows', error);
        errors.push(`rate_limits: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }

    try {
        const cutoff = now - config.webhookMarkerRetentionDays * DAY_MS;
        webhookMarkersPruned = await services.repository.pruneProcessedEvents(cutoff);
    } catch (error) {
        services.logger.error('Failed to prune webhook markers', error);
        errors.push(`webhook_markers: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }

    const duration = Date.now() - startTime;
    services.logger.info('Maintenance completed', { rateLimitWindowsPruned, webhookMarkersPruned, duration });

    return { rateLimitWindowsPruned, webhookMarkersPruned, duration, errors };
}

/**
 * Registers the maintenance job with node-cron. The caller stops the
 * returned task on shutdown.
 */
export function scheduleMaintenance(services: AppServices, config: AppConfig): ScheduledTask {
    return cron.schedule(MAINTENANCE_SCHEDULE, () => {
        performMaintenance(services, config).catch((error: unknown) => {
            services.logger.error('Maintenance run failed', error);
        });
    });
}
