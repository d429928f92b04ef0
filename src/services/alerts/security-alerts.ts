import type { SecuritySeverity } from '../../types';
import type { BackgroundTasks } from '../tasks/background-tasks';
import type { Logger } from '../../utils/logger';

export interface SecurityAlert {
    eventType: string;
    severity: SecuritySeverity;
    details: Record<string, unknown>;
    requestId?: string;
    occurredAt: string;
}

export interface AlertSink {
    alert(alert: SecurityAlert): void;
}

// Posts already-sanitized alerts to an outbound webhook. Without a
// configured URL the alert is only logged.
export class WebhookAlertSink implements AlertSink {
    constructor(
        private tasks: BackgroundTasks,
        private logger: Logger,
        private url?: string
    ) {}

    alert(alert: SecurityAlert): void {
        const url = this.url;
        if (!url) {
            this.logger.warn('Security alert (no alert webhook configured)', {
                event: alert.eventType,
                severity: alert.severity,
            });
            return;
        }

        this.tasks.run(`alert:${alert.eventType}`, async (signal) => {
            const response = await fetch(url, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({
                    text: `[${alert.severity.toUpperCase()}] ${alert.eventType}`,
                    ...alert,
                }),
                signal,
            });
            if (!response.ok) {
                throw new Error(`Alert webhook responded with ${response.status}`);
            }
        });
    }
}
