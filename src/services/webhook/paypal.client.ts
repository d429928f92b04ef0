import { z } from 'zod';
import type { PaypalClient, PaypalTransmissionHeaders } from './types';

export interface PaypalClientConfig {
    clientId: string;
    clientSecret: string;
    webhookId: string;
    apiBase: string;
}

const tokenResponseSchema = z.object({
    access_token: z.string(),
    expires_in: z.number(),
});

const verificationResponseSchema = z.object({
    verification_status: z.string(),
});

// Refresh a minute before PayPal's expiry.
const TOKEN_REFRESH_MARGIN_MS = 60_000;

// PaypalRestClient - PayPal REST calls over fetch with a cached OAuth token.
export class PaypalRestClient implements PaypalClient {
    private token: { value: string; expiresAt: number } | null = null;

    constructor(private config: PaypalClientConfig) {}

    async verifyWebhookSignature(
        headers: PaypalTransmissionHeaders,
        event: unknown,
        signal?: AbortSignal
    ): Promise<boolean> {
        const response = await this.request('/v1/notifications/verify-webhook-signature', {
            transmission_id: headers.transmissionId,
            transmission_time: headers.transmissionTime,
            transmission_sig: headers.transmissionSig,
            cert_url: headers.certUrl,
            auth_algo: headers.authAlgo,
            webhook_id: this.config.webhookId,
            webhook_event: event,
        }, signal);

        const body = verificationResponseSchema.safeParse(await response.json());
        return body.success && body.data.verification_status === 'SUCCESS';
    }

    async cancelSubscription(subscriptionId: string, reason: string, signal?: AbortSignal): Promise<void> {
        await this.request(
            `/v1/billing/subscriptions/${encodeURIComponent(subscriptionId)}/cancel`,
            { reason },
            signal
        );
    }

    private async request(path: string, body: unknown, signal?: AbortSignal): Promise<Response> {
        const token = await this.accessToken(signal);
        const response = await fetch(`${this.config.apiBase}${path}`, {
            method: 'POST',
            headers: {
                'Authorization': `Bearer ${token}`,
                'Content-Type': 'application/json',
            },
            body: JSON.stringify(body),
            signal,
        });

        if (!response.ok) {
            throw new Error(`PayPal ${path} responded with ${response.status}`);
        }
        return response;
    }

    private async accessToken(signal?: AbortSignal): Promise<string> {
        if (this.token && this.token.expiresAt > Date.now()) {
            return this.token.value;
        }

        const credentials = Buffer.from(`${this.config.clientId}:${this.config.clientSecret}`).toString('base64');
        const response = await fetch(`${this.config.apiBase}/v1/oauth2/token`, {
            method: 'POST',
            headers: {
                'Authorization': `Basic ${credentials}`,
                'Content-Type': 'application/x-www-form-urlencoded',
            },
            body: 'grant_type=client_credentials',
            signal,
        });

        if (!response.ok) {
            throw new Error(`PayPal token request failed with ${response.status}`);
        }

        const parsed = tokenResponseSchema.parse(await response.json());
        this.token = {
            value: parsed.access_token,
            expiresAt: Date.now() + parsed.expires_in * 1000 - TOKEN_REFRESH_MARGIN_MS,
        };
        return parsed.access_token;
    }
}
