import type { License, Order, Product, Subscription } from '../../types';
import { toIso } from '../../services/shared';
import type { IssuedLicense, TransitionOutcome } from '../../services/license';

export function toAdminLicenseView(license: License) {
    return {
        id: license.id,
        key: license.keyPrefix,
        order_id: license.orderId,
        product_id: license.productId,
        customer_email: license.customerEmail,
        customer_name: license.customerName,
        status: license.status,
        license_type: license.licenseType,
        requires_machine_id: license.requiresMachineId,
        max_activations: license.maxActivations,
        activation_count: license.activationCount,
        expires_at: toIso(license.expiresAt),
        revoked_at: toIso(license.revokedAt),
        revoked_reason: license.revokedReason,
        created_at: toIso(license.createdAt),
        updated_at: toIso(license.updatedAt),
    };
}

function toSubscriptionView(subscription: Subscription) {
    return {
        id: subscription.id,
        provider: subscription.provider,
        external_subscription_id: subscription.externalSubscriptionId,
        status: subscription.status,
        current_period_end: toIso(subscription.currentPeriodEnd),
        canceled_at: toIso(subscription.canceledAt),
    };
}

// The plaintext key appears here once, in the response that created it.
export function toIssuedView(issued: IssuedLicense) {
    return {
        license: toAdminLicenseView(issued.license),
        license_key: issued.licenseKey,
        created: issued.created,
    };
}

export function toTransitionView(outcome: TransitionOutcome) {
    return {
        license: toAdminLicenseView(outcome.license),
        changed: outcome.changed,
        activations_revoked: outcome.activationsRevoked,
        subscription: outcome.subscription ? toSubscriptionView(outcome.subscription) : null,
    };
}

export function toProductView(product: Product) {
    return {
        id: product.id,
        name: product.name,
        max_activations: product.maxActivations,
        license_duration_days: product.licenseDurationDays,
        subscription: product.subscription,
        requires_machine_id: product.requiresMachineId,
        created_at: toIso(product.createdAt),
    };
}

export function toOrderView(order: Order) {
    return {
        id: order.id,
        product_id: order.productId,
        email: order.email,
        customer_name: order.customerName,
        status: order.status,
        provider: order.provider,
        payment_reference: order.paymentReference,
        transaction_id: order.transactionId,
        created_at: toIso(order.createdAt),
        completed_at: toIso(order.completedAt),
    };
}
