import type { LicenseRepository } from '../../repositories';
import type { License, Order, PaymentProvider } from '../../types';

export interface LicenseHints {
    // Our own order id, carried in provider metadata or custom fields.
    orderId?: string | null;
    // Provider payment ids recorded on the order (payment intent, sale, charge).
    paymentReferences?: ReadonlyArray<string | null | undefined>;
    email?: string | null;
    subscription?: { provider: PaymentProvider; externalId: string | null | undefined };
}

// Resolves the license an event refers to: order reference first, then the
// customer email, then the external subscription id.
export class LicenseFinder {
    constructor(private repository: LicenseRepository) {}

    async findOrder(hints: LicenseHints): Promise<Order | null> {
        if (hints.orderId) {
            const order = await this.repository.getOrderById(hints.orderId);
            if (order) {
                return order;
            }
        }

        for (const reference of hints.paymentReferences ?? []) {
            if (!reference) {
                continue;
            }
            const order = await this.repository.getOrderByPaymentReference(reference);
            if (order) {
                return order;
            }
        }

        return null;
    }

    async findLicense(hints: LicenseHints): Promise<License | null> {
        const order = await this.findOrder(hints);
        if (order) {
            const license = await this.repository.getLicenseByOrderId(order.id);
            if (license) {
                return license;
            }
        }

        if (hints.email) {
            const license = await this.repository.getLatestLicenseByEmail(hints.email);
            if (license) {
                return license;
            }
        }

        if (hints.subscription?.externalId) {
            return this.repository.getLicenseBySubscriptionId(
                hints.subscription.provider,
                hints.subscription.externalId
            );
        }

        return null;
    }

    async licenseForOrder(orderId: string): Promise<License | null> {
        return this.repository.getLicenseByOrderId(orderId);
    }
}
