import Stripe from 'stripe';
import type { ProviderEvent } from './types';

// Wraps the Stripe SDK's signature check and reduces the event to a ProviderEvent.
export class StripeWebhookVerifier {
    constructor(
        private stripe: Stripe,
        private webhookSecret: string
    ) {}

    // Throws Stripe's signature error when the header does not match the payload.
    async verify(payload: string, signature: string): Promise<ProviderEvent> {
        const event = await this.stripe.webhooks.constructEventAsync(payload, signature, this.webhookSecret);
        return {
            provider: 'stripe',
            id: event.id,
            markerId: event.id,
            type: event.type,
            object: event.data.object,
        };
    }
}
