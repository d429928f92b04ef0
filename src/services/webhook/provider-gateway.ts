import type Stripe from 'stripe';
import type { PaymentProvider } from '../../types';
import type { Logger } from '../../utils/logger';
import type { SubscriptionCanceler } from '../license';
import type { BackgroundTasks } from '../tasks/background-tasks';
import type { PaypalClient } from './types';

export interface ProviderClients {
    stripe: Stripe | null;
    paypal: PaypalClient | null;
}

// Cancels external subscriptions at the provider on the background queue.
export class ProviderGateway implements SubscriptionCanceler {
    constructor(
        private tasks: BackgroundTasks,
        private logger: Logger,
        private clients: ProviderClients
    ) {}

    requestCancellation(provider: PaymentProvider, externalSubscriptionId: string, reason: string): void {
        const { stripe, paypal } = this.clients;

        if (provider === 'stripe' && stripe) {
            this.tasks.run('stripe:cancel-subscription', async () => {
                await stripe.subscriptions.cancel(externalSubscriptionId);
                this.logger.info('Provider subscription canceled', { provider, reason });
            });
            return;
        }

        if (provider === 'paypal' && paypal) {
            this.tasks.run('paypal:cancel-subscription', async (signal) => {
                await paypal.cancelSubscription(externalSubscriptionId, reason, signal);
                this.logger.info('Provider subscription canceled', { provider, reason });
            });
            return;
        }

        this.logger.warn('Provider subscription not canceled: provider not configured', { provider });
    }
}
