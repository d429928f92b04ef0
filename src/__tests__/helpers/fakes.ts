/**
 * Test Doubles
 *
 * Recording stand-ins for the collaborators that reach outside the process.
 * They are plain classes rather than vi.fn() so the config's mockReset does
 * not wipe their behavior between tests.
 */

import type { ErrorTracker } from '@/services/alerts/error-tracker';
import type { AlertSink, SecurityAlert } from '@/services/alerts/security-alerts';
import type {
    LicenseNotification,
    LicenseNotificationKind,
    Notifier,
} from '@/services/notification/notification.service';
import type { PaypalClient, PaypalTransmissionHeaders } from '@/services/webhook';

export class RecordingNotifier implements Notifier {
    readonly sent: LicenseNotification[] = [];

    notify(notification: LicenseNotification): void {
        this.sent.push(notification);
    }

    kinds(): LicenseNotificationKind[] {
        return this.sent.map((n) => n.kind);
    }
}

export class RecordingErrorTracker implements ErrorTracker {
    readonly captured: { error: unknown; context?: Record<string, unknown> }[] = [];

    capture(error: unknown, context?: Record<string, unknown>): void {
        this.captured.push({ error, context });
    }
}

export class RecordingAlertSink implements AlertSink {
    readonly alerts: SecurityAlert[] = [];

    alert(alert: SecurityAlert): void {
        this.alerts.push(alert);
    }

    eventTypes(): string[] {
        return this.alerts.map((a) => a.eventType);
    }
}

export class FakePaypalClient implements PaypalClient {
    verified = true;
    readonly verifications: PaypalTransmissionHeaders[] = [];
    readonly canceled: { subscriptionId: string; reason: string }[] = [];

    async verifyWebhookSignature(headers: PaypalTransmissionHeaders, _event: unknown): Promise<boolean> {
        this.verifications.push(headers);
        return this.verified;
    }

    async cancelSubscription(subscriptionId: string, reason: string): Promise<void> {
        this.canceled.push({ subscriptionId, reason });
    }
}
