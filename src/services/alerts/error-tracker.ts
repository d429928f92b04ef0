import type { BackgroundTasks } from '../tasks/background-tasks';
import type { Logger } from '../../utils/logger';
import { sanitizeDetails } from '../shared';

export interface ErrorTracker {
    capture(error: unknown, context?: Record<string, unknown>): void;
}

// Reports unexpected faults to an external collector as JSON.
export class HttpErrorTracker implements ErrorTracker {
    constructor(
        private tasks: BackgroundTasks,
        private logger: Logger,
        private url?: string,
        private environment: string = 'production'
    ) {}

    capture(error: unknown, context: Record<string, unknown> = {}): void {
        const payload = {
            name: error instanceof Error ? error.name : 'Unknown',
            message: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined,
            environment: this.environment,
            context: sanitizeDetails(context),
            timestamp: new Date().toISOString(),
        };

        this.logger.error('Captured error', error, payload.context);

        const url = this.url;
        if (!url) {
            return;
        }

        this.tasks.run('error-tracking', async (signal) => {
            const response = await fetch(url, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(payload),
                signal,
            });
            if (!response.ok) {
                throw new Error(`Error tracker responded with ${response.status}`);
            }
        });
    }
}
