// Email delivery through the Resend HTTP API.
export interface EmailConfig {
    resendApiKey: string;
    fromEmail: string;
}

export interface LicenseEmail {
    to: string;
    subject: string;
    heading: string;
    paragraphs: string[];
    licenseKey?: string;
}

const RESEND_ENDPOINT = 'https://api.resend.com/emails';

export class EmailService {
    private apiKey: string;
    private fromEmail: string;

    constructor(config: EmailConfig) {
        this.apiKey = config.resendApiKey;
        this.fromEmail = config.fromEmail;
    }

    async send(email: LicenseEmail, signal?: AbortSignal): Promise<void> {
        const response = await fetch(RESEND_ENDPOINT, {
            method: 'POST',
            headers: {
                'Authorization': `Bearer ${this.apiKey}`,
                'Content-Type': 'application/json',
            },
            body: JSON.stringify({
                from: this.fromEmail,
                to: email.to,
                subject: email.subject,
                html: this.render(email),
                text: this.renderText(email),
            }),
            signal,
        });

        if (!response.ok) {
            const error = await response.text();
            throw new Error(`Failed to send email: ${error}`);
        }
    }

    private render(email: LicenseEmail): string {
        const body = email.paragraphs
            .map((p) => `<p style="margin: 0 0 16px 0; font-size: 16px; color: #333333;">${this.escapeHtml(p)}</p>`)
            .join('\n');
        const key = email.licenseKey
            ? `<p style="font-family: monospace; font-size: 20px; letter-spacing: 2px;">${this.escapeHtml(email.licenseKey)}</p>`
            : '';

        return `
<!DOCTYPE html>
<html>
<body style="margin: 0; padding: 24px; font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Arial, sans-serif;">
    <h1 style="margin: 0 0 24px 0; font-size: 24px; color: #1a1a1a;">${this.escapeHtml(email.heading)}</h1>
    ${body}
    ${key}
</body>
</html>
        `.trim();
    }

    private renderText(email: LicenseEmail): string {
        return [email.heading, '', ...email.paragraphs, ...(email.licenseKey ? ['', email.licenseKey] : [])].join('\n');
    }

    private escapeHtml(text: string): string {
        const map: Record<string, string> = {
            '&': '&amp;',
            '<': '&lt;',
            '>': '&gt;',
            '"': '&quot;',
            "'": '&#039;'
        };
        return text.replace(/[&<>"']/g, (m) => map[m] || m);
    }
}
