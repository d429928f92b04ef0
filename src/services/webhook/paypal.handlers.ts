import type { ServiceResult } from '../../types';
import type { LicenseCommand } from '../license';
import type { LicenseHints } from './license-finder';
import {
    invalidPayload,
    isoToMs,
    parseResource,
    paymentSucceeded,
    withLicense,
} from './handler-utils';
import { paypalRefundSchema, paypalSaleSchema, paypalSubscriptionSchema, type PaypalSale } from './schemas';
import type { HandlerContext, ProviderEvent, WebhookHandler } from './types';

export const PAYPAL_EVENT_TYPES = [
    'PAYMENT.SALE.COMPLETED',
    'PAYMENT.SALE.DENIED',
    'PAYMENT.SALE.REFUNDED',
    'BILLING.SUBSCRIPTION.CREATED',
    'BILLING.SUBSCRIPTION.ACTIVATED',
    'BILLING.SUBSCRIPTION.SUSPENDED',
    'BILLING.SUBSCRIPTION.CANCELLED',
    'BILLING.SUBSCRIPTION.PAYMENT.FAILED',
] as const;

export type PaypalEventType = typeof PAYPAL_EVENT_TYPES[number];

type Result = Promise<ServiceResult<LicenseCommand>>;

function saleHints(sale: PaypalSale): LicenseHints {
    return {
        orderId: sale.custom,
        paymentReferences: [sale.parent_payment, sale.id],
        email: sale.payer?.payer_info?.email,
        subscription: { provider: 'paypal', externalId: sale.billing_agreement_id },
    };
}

async function saleCompleted(event: ProviderEvent, ctx: HandlerContext): Result {
    const sale = parseResource(paypalSaleSchema, event.object);
    if (!sale) {
        return invalidPayload();
    }
    // Sales under a billing agreement are subscription renewals.
    return paymentSucceeded(ctx, {
        provider: 'paypal',
        hints: saleHints(sale),
        externalSubscriptionId: sale.billing_agreement_id,
        renewExisting: Boolean(sale.billing_agreement_id),
    });
}

async function saleDenied(event: ProviderEvent, ctx: HandlerContext): Result {
    const sale = parseResource(paypalSaleSchema, event.object);
    if (!sale) {
        return invalidPayload();
    }
    return withLicense(ctx, saleHints(sale), (licenseId) => ({ kind: 'notify_payment_failed', licenseId }));
}

async function saleRefunded(event: ProviderEvent, ctx: HandlerContext): Result {
    const refund = parseResource(paypalRefundSchema, event.object);
    if (!refund) {
        return invalidPayload();
    }
    const hints: LicenseHints = {
        orderId: refund.custom,
        paymentReferences: [refund.sale_id, refund.parent_payment],
    };
    const order = await ctx.finder.findOrder(hints);
    return withLicense(ctx, hints, (licenseId) => ({
        kind: 'revoke',
        licenseId,
        reason: 'refund',
        refundOrderId: order?.id ?? null,
        cancelAtProvider: true,
    }));
}

// ============================================================================
// Subscriptions
// ============================================================================

function subscriptionHints(id: string, customId: string | null | undefined, email?: string | null): LicenseHints {
    return {
        orderId: customId,
        email,
        subscription: { provider: 'paypal', externalId: id },
    };
}

async function subscriptionCreated(event: ProviderEvent, ctx: HandlerContext): Result {
    const sub = parseResource(paypalSubscriptionSchema, event.object);
    if (!sub) {
        return invalidPayload();
    }
    const hints = subscriptionHints(sub.id, sub.custom_id, sub.subscriber?.email_address);
    return withLicense(ctx, hints, (licenseId) => ({
        kind: 'link_subscription',
        licenseId,
        provider: 'paypal',
        externalSubscriptionId: sub.id,
        periodEnd: isoToMs(sub.billing_info?.next_billing_time),
    }));
}

async function subscriptionActivated(event: ProviderEvent, ctx: HandlerContext): Result {
    const sub = parseResource(paypalSubscriptionSchema, event.object);
    if (!sub) {
        return invalidPayload();
    }
    return withLicense(ctx, subscriptionHints(sub.id, sub.custom_id), (licenseId) => ({
        kind: 'reactivate',
        licenseId,
        periodEnd: isoToMs(sub.billing_info?.next_billing_time),
    }));
}

async function subscriptionSuspended(event: ProviderEvent, ctx: HandlerContext): Result {
    const sub = parseResource(paypalSubscriptionSchema, event.object);
    if (!sub) {
        return invalidPayload();
    }
    return withLicense(ctx, subscriptionHints(sub.id, sub.custom_id), (licenseId) => ({
        kind: 'suspend',
        licenseId,
        reason: 'subscription_suspended',
    }));
}

async function subscriptionCancelled(event: ProviderEvent, ctx: HandlerContext): Result {
    const sub = parseResource(paypalSubscriptionSchema, event.object);
    if (!sub) {
        return invalidPayload();
    }
    return withLicense(ctx, subscriptionHints(sub.id, sub.custom_id), (licenseId) => ({
        kind: 'revoke',
        licenseId,
        reason: 'subscription_canceled',
        cancelAtProvider: false,
    }));
}

async function subscriptionPaymentFailed(event: ProviderEvent, ctx: HandlerContext): Result {
    const sub = parseResource(paypalSubscriptionSchema, event.object);
    if (!sub) {
        return invalidPayload();
    }
    return withLicense(ctx, subscriptionHints(sub.id, sub.custom_id), (licenseId) => ({
        kind: 'notify_payment_failed',
        licenseId,
    }));
}

export const paypalHandlers = {
    'PAYMENT.SALE.COMPLETED': saleCompleted,
    'PAYMENT.SALE.DENIED': saleDenied,
    'PAYMENT.SALE.REFUNDED': saleRefunded,
    'BILLING.SUBSCRIPTION.CREATED': subscriptionCreated,
    'BILLING.SUBSCRIPTION.ACTIVATED': subscriptionActivated,
    'BILLING.SUBSCRIPTION.SUSPENDED': subscriptionSuspended,
    'BILLING.SUBSCRIPTION.CANCELLED': subscriptionCancelled,
    'BILLING.SUBSCRIPTION.PAYMENT.FAILED': subscriptionPaymentFailed,
} satisfies Record<PaypalEventType, WebhookHandler>;
