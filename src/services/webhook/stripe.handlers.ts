import type { ServiceResult } from '../../types';
import type { LicenseCommand } from '../license';
import { ok } from '../shared';
import type { LicenseHints } from './license-finder';
import {
    invalidPayload,
    paymentSucceeded,
    parseResource,
    secondsToMs,
    withLicense,
} from './handler-utils';
import {
    stripeChargeSchema,
    stripeDisputeSchema,
    stripeInvoiceSchema,
    stripePaymentIntentSchema,
    stripeSubscriptionSchema,
    type StripeCharge,
    type StripeInvoice,
} from './schemas';
import type { HandlerContext, ProviderEvent, WebhookHandler } from './types';

export const STRIPE_EVENT_TYPES = [
    'charge.succeeded',
    'payment_intent.succeeded',
    'invoice.payment_succeeded',
    'charge.refunded',
    'charge.failed',
    'invoice.payment_failed',
    'customer.subscription.created',
    'customer.subscription.updated',
    'customer.subscription.paused',
    'customer.subscription.resumed',
    'customer.subscription.deleted',
    'charge.dispute.created',
    'charge.dispute.closed',
] as const;

export type StripeEventType = typeof STRIPE_EVENT_TYPES[number];

type Result = Promise<ServiceResult<LicenseCommand>>;

function chargeHints(charge: StripeCharge): LicenseHints {
    return {
        orderId: charge.metadata.order_id,
        paymentReferences: [charge.payment_intent, charge.id],
        email: charge.billing_details?.email ?? charge.receipt_email,
    };
}

function invoiceHints(invoice: StripeInvoice): LicenseHints {
    return {
        orderId: invoice.metadata.order_id,
        paymentReferences: [invoice.payment_intent, invoice.charge],
        email: invoice.customer_email,
        subscription: { provider: 'stripe', externalId: invoice.subscription },
    };
}

function subscriptionHints(id: string, metadata: Record<string, string>): LicenseHints {
    return {
        orderId: metadata.order_id,
        subscription: { provider: 'stripe', externalId: id },
    };
}

// The new billing period ends with the invoice line; period_end is the period just billed.
function invoicePeriodEnd(invoice: StripeInvoice): number | null {
    return secondsToMs(invoice.lines?.data[0]?.period?.end ?? invoice.period_end);
}

// ============================================================================
// Payments
// ============================================================================

async function chargeSucceeded(event: ProviderEvent, ctx: HandlerContext): Result {
    const charge = parseResource(stripeChargeSchema, event.object);
    if (!charge) {
        return invalidPayload();
    }
    return paymentSucceeded(ctx, { provider: 'stripe', hints: chargeHints(charge), renewExisting: false });
}

async function paymentIntentSucceeded(event: ProviderEvent, ctx: HandlerContext): Result {
    const intent = parseResource(stripePaymentIntentSchema, event.object);
    if (!intent) {
        return invalidPayload();
    }
    return paymentSucceeded(ctx, {
        provider: 'stripe',
        hints: {
            orderId: intent.metadata.order_id,
            paymentReferences: [intent.id],
            email: intent.receipt_email,
        },
        renewExisting: false,
    });
}

async function invoicePaymentSucceeded(event: ProviderEvent, ctx: HandlerContext): Result {
    const invoice = parseResource(stripeInvoiceSchema, event.object);
    if (!invoice) {
        return invalidPayload();
    }
    return paymentSucceeded(ctx, {
        provider: 'stripe',
        hints: invoiceHints(invoice),
        externalSubscriptionId: invoice.subscription,
        periodEnd: invoicePeriodEnd(invoice),
        renewExisting: true,
    });
}

async function chargeRefunded(event: ProviderEvent, ctx: HandlerContext): Result {
    const charge = parseResource(stripeChargeSchema, event.object);
    if (!charge) {
        return invalidPayload();
    }
    const hints = chargeHints(charge);
    const order = await ctx.finder.findOrder(hints);
    return withLicense(ctx, hints, (licenseId) => ({
        kind: 'revoke',
        licenseId,
        reason: 'refund',
        refundOrderId: order?.id ?? null,
        cancelAtProvider: true,
    }));
}

async function chargeFailed(event: ProviderEvent, ctx: HandlerContext): Result {
    const charge = parseResource(stripeChargeSchema, event.object);
    if (!charge) {
        return invalidPayload();
    }
    return withLicense(ctx, chargeHints(charge), (licenseId) => ({ kind: 'notify_payment_failed', licenseId }));
}

async function invoicePaymentFailed(event: ProviderEvent, ctx: HandlerContext): Result {
    const invoice = parseResource(stripeInvoiceSchema, event.object);
    if (!invoice) {
        return invalidPayload();
    }
    return withLicense(ctx, invoiceHints(invoice), (licenseId) => ({ kind: 'notify_payment_failed', licenseId }));
}

// ============================================================================
// Subscriptions
// ============================================================================

async function subscriptionCreated(event: ProviderEvent, ctx: HandlerContext): Result {
    const sub = parseResource(stripeSubscriptionSchema, event.object);
    if (!sub) {
        return invalidPayload();
    }
    const { id, metadata, current_period_end } = sub;
    return withLicense(ctx, subscriptionHints(id, metadata), (licenseId) => ({
        kind: 'link_subscription',
        licenseId,
        provider: 'stripe',
        externalSubscriptionId: id,
        periodEnd: secondsToMs(current_period_end),
    }));
}

async function subscriptionUpdated(event: ProviderEvent, ctx: HandlerContext): Result {
    const sub = parseResource(stripeSubscriptionSchema, event.object);
    if (!sub) {
        return invalidPayload();
    }
    const { id, status, metadata, current_period_end } = sub;
    const hints = subscriptionHints(id, metadata);

    switch (status) {
        case 'active':
        case 'trialing':
            return withLicense(ctx, hints, (licenseId) => ({
                kind: 'reactivate',
                licenseId,
                periodEnd: secondsToMs(current_period_end),
            }));
        case 'paused':
            return withLicense(ctx, hints, (licenseId) => ({ kind: 'suspend', licenseId, reason: 'subscription_paused' }));
        case 'past_due':
        case 'unpaid':
            return withLicense(ctx, hints, (licenseId) => ({ kind: 'notify_payment_failed', licenseId }));
        case 'canceled':
        case 'incomplete_expired':
            return withLicense(ctx, hints, (licenseId) => ({
                kind: 'revoke',
                licenseId,
                reason: 'subscription_canceled',
                cancelAtProvider: false,
            }));
        default:
            return ok({ kind: 'none', reason: `subscription_status_${status}` });
    }
}

async function subscriptionPaused(event: ProviderEvent, ctx: HandlerContext): Result {
    const sub = parseResource(stripeSubscriptionSchema, event.object);
    if (!sub) {
        return invalidPayload();
    }
    return withLicense(ctx, subscriptionHints(sub.id, sub.metadata), (licenseId) => ({
        kind: 'suspend',
        licenseId,
        reason: 'subscription_paused',
    }));
}

async function subscriptionResumed(event: ProviderEvent, ctx: HandlerContext): Result {
    const sub = parseResource(stripeSubscriptionSchema, event.object);
    if (!sub) {
        return invalidPayload();
    }
    const periodEnd = secondsToMs(sub.current_period_end);
    return withLicense(ctx, subscriptionHints(sub.id, sub.metadata), (licenseId) => ({
        kind: 'reactivate',
        licenseId,
        periodEnd,
    }));
}

async function subscriptionDeleted(event: ProviderEvent, ctx: HandlerContext): Result {
    const sub = parseResource(stripeSubscriptionSchema, event.object);
    if (!sub) {
        return invalidPayload();
    }
    return withLicense(ctx, subscriptionHints(sub.id, sub.metadata), (licenseId) => ({
        kind: 'revoke',
        licenseId,
        reason: 'subscription_canceled',
        cancelAtProvider: false,
    }));
}

// ============================================================================
// Disputes
// ============================================================================

async function disputeCreated(event: ProviderEvent, ctx: HandlerContext): Result {
    const dispute = parseResource(stripeDisputeSchema, event.object);
    if (!dispute) {
        return invalidPayload();
    }

    await ctx.audit.logSecurityEvent('payment_dispute_opened', {
        provider: 'stripe',
        dispute_id: dispute.id,
        charge_id: dispute.charge,
        reason: dispute.reason,
    }, { requestId: ctx.requestId });

    const hints = { paymentReferences: [dispute.payment_intent, dispute.charge] };
    return withLicense(ctx, hints, (licenseId) => ({ kind: 'suspend', licenseId, reason: 'payment_dispute' }));
}

async function disputeClosed(event: ProviderEvent, ctx: HandlerContext): Result {
    const dispute = parseResource(stripeDisputeSchema, event.object);
    if (!dispute) {
        return invalidPayload();
    }

    const hints = { paymentReferences: [dispute.payment_intent, dispute.charge] };
    switch (dispute.status) {
        case 'won':
            return withLicense(ctx, hints, (licenseId) => ({ kind: 'reactivate', licenseId }));
        case 'lost':
            return withLicense(ctx, hints, (licenseId) => ({
                kind: 'revoke',
                licenseId,
                reason: 'dispute_lost',
                cancelAtProvider: true,
            }));
        default:
            return ok({ kind: 'none', reason: `dispute_${dispute.status}` });
    }
}

export const stripeHandlers = {
    'charge.succeeded': chargeSucceeded,
    'payment_intent.succeeded': paymentIntentSucceeded,
    'invoice.payment_succeeded': invoicePaymentSucceeded,
    'charge.refunded': chargeRefunded,
    'charge.failed': chargeFailed,
    'invoice.payment_failed': invoicePaymentFailed,
    'customer.subscription.created': subscriptionCreated,
    'customer.subscription.updated': subscriptionUpdated,
    'customer.subscription.paused': subscriptionPaused,
    'customer.subscription.resumed': subscriptionResumed,
    'customer.subscription.deleted': subscriptionDeleted,
    'charge.dispute.created': disputeCreated,
    'charge.dispute.closed': disputeClosed,
} satisfies Record<StripeEventType, WebhookHandler>;
