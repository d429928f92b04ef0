import type { EmailService, LicenseEmail } from '../email/email.service';
import type { BackgroundTasks } from '../tasks/background-tasks';
import { partialEmail } from '../shared';
import { toIso } from '../shared/time';

export type LicenseNotificationKind =
    | 'license_issued'
    | 'license_renewed'
    | 'license_suspended'
    | 'license_reactivated'
    | 'license_revoked'
    | 'payment_failed';

export interface LicenseNotification {
    kind: LicenseNotificationKind;
    licenseId: string;
    customerEmail: string;
    customerName?: string | null;
    licenseKey?: string;
    expiresAt?: number | null;
    reason?: string;
}

export interface Notifier {
    notify(notification: LicenseNotification): void;
}

export interface NotificationConfig {
    slackWebhookUrl?: string;
}

// Customer-facing copy per event; Slack gets a one-line summary of every event.
function buildEmail(n: LicenseNotification): LicenseEmail | null {
    const greeting = n.customerName ? `Hi ${n.customerName},` : 'Hi there,';
    const expiry = n.expiresAt ? `It is valid until ${toIso(n.expiresAt)}.` : 'It does not expire.';

    switch (n.kind) {
        case 'license_issued':
            return {
                to: n.customerEmail,
                subject: 'Your license key',
                heading: 'Thank you for your purchase',
                paragraphs: [greeting, 'Your license key is below. Keep it safe: it cannot be shown again.', expiry],
                licenseKey: n.licenseKey,
            };
        case 'license_renewed':
            return {
                to: n.customerEmail,
                subject: 'Your license has been renewed',
                heading: 'License renewed',
                paragraphs: [greeting, 'Your payment was received and your license has been renewed.', expiry],
            };
        case 'license_revoked':
            return {
                to: n.customerEmail,
                subject: 'Your license has been revoked',
                heading: 'License revoked',
                paragraphs: [greeting, 'Your license has been revoked and can no longer be activated.'],
            };
        case 'payment_failed':
            return {
                to: n.customerEmail,
                subject: 'Payment failed',
                heading: 'We could not process your payment',
                paragraphs: [greeting, 'Please update your payment method to keep your license active.'],
            };
        default:
            return null;
    }
}

export class NotificationService implements Notifier {
    constructor(
        private tasks: BackgroundTasks,
        private email: EmailService | null,
        private config: NotificationConfig
    ) {}

    notify(notification: LicenseNotification): void {
        const email = this.email ? buildEmail(notification) : null;
        if (this.email && email) {
            const sender = this.email;
            this.tasks.run(`email:${notification.kind}`, (signal) => sender.send(email, signal));
        }

        const slackUrl = this.config.slackWebhookUrl;
        if (slackUrl) {
            this.tasks.run(`slack:${notification.kind}`, (signal) => this.postSlack(slackUrl, notification, signal));
        }
    }

    private async postSlack(url: string, n: LicenseNotification, signal: AbortSignal): Promise<void> {
        const parts = [`*${n.kind.replace(/_/g, ' ')}*`, `license ${n.licenseId}`, partialEmail(n.customerEmail)];
        if (n.reason) {
            parts.push(`reason: ${n.reason}`);
        }

        const response = await fetch(url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({ text: parts.join(' | ') }),
            signal,
        });

        if (!response.ok) {
            throw new Error(`Slack notification failed with status ${response.status}`);
        }
    }
}
