/**
 * Row -> domain mappers. Enum columns are narrowed against the values the
 * schema CHECK constraints allow; anything else is a corrupted row.
 */

import type {
    Activation,
    AuditCategory,
    AuditEntry,
    License,
    LicenseStatus,
    LicenseType,
    Order,
    OrderProvider,
    OrderStatus,
    PaymentProvider,
    Product,
    SecuritySeverity,
    Subscription,
    SubscriptionStatus,
} from '../types';
import type {
    ActivationRow,
    AuditLogRow,
    LicenseRow,
    OrderRow,
    ProductRow,
    SubscriptionRow,
} from './row-types';

function oneOf<T extends string>(allowed: readonly T[], column: string) {
    return (value: string): T => {
        const match = allowed.find((candidate) => candidate === value);
        if (match === undefined) {
            throw new Error(`Unexpected ${column} value: ${value}`);
        }
        return match;
    };
}

function nullable<T>(parse: (value: string) => T) {
    return (value: string | null): T | null => (value === null ? null : parse(value));
}

const licenseStatus = oneOf<LicenseStatus>(['active', 'suspended', 'revoked'], 'licenses.status');
const licenseType = oneOf<LicenseType>(['perpetual', 'subscription'], 'licenses.license_type');
const subscriptionStatus = oneOf<SubscriptionStatus>(['active', 'suspended', 'canceled'], 'subscriptions.status');
const paymentProvider = nullable(oneOf<PaymentProvider>(['stripe', 'paypal'], 'subscriptions.provider'));
const orderStatus = oneOf<OrderStatus>(['pending', 'completed', 'refunded'], 'orders.status');
const orderProvider = nullable(oneOf<OrderProvider>(['stripe', 'paypal', 'manual'], 'orders.provider'));
const auditCategory = oneOf<AuditCategory>(['payment', 'webhook', 'license', 'security'], 'audit_logs.category');
const severity = nullable(oneOf<SecuritySeverity>(['critical', 'high', 'medium'], 'audit_logs.severity'));

export function mapLicense(row: LicenseRow): License {
    return {
        id: row.id,
        keyHash: row.key_hash,
        keyPrefix: row.key_prefix,
        orderId: row.order_id,
        productId: row.product_id,
        customerEmail: row.customer_email,
        customerName: row.customer_name,
        status: licenseStatus(row.status),
        licenseType: licenseType(row.license_type),
        requiresMachineId: row.requires_machine_id === 1,
        maxActivations: row.max_activations,
        activationCount: row.activation_count,
        expiresAt: row.expires_at,
        revokedAt: row.revoked_at,
        revokedReason: row.revoked_reason,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
}

export function mapActivation(row: ActivationRow): Activation {
    return {
        id: row.id,
        licenseId: row.license_id,
        fingerprintHash: row.machine_fingerprint_hash,
        machineIdHash: row.machine_id_hash,
        fingerprintPartial: row.machine_fingerprint_partial,
        machineIdPartial: row.machine_id_partial,
        active: row.active === 1,
        revoked: row.revoked === 1,
        revokedReason: row.revoked_reason,
        ipAddress: row.ip_address,
        userAgent: row.user_agent,
        activatedAt: row.activated_at,
        deactivatedAt: row.deactivated_at,
        revokedAt: row.revoked_at,
    };
}

export function mapSubscription(row: SubscriptionRow): Subscription {
    return {
        id: row.id,
        licenseId: row.license_id,
        provider: paymentProvider(row.provider),
        externalSubscriptionId: row.external_subscription_id,
        status: subscriptionStatus(row.status),
        autoRenew: row.auto_renew === 1,
        currentPeriodEnd: row.current_period_end,
        lastPaymentAt: row.last_payment_at,
        canceledAt: row.canceled_at,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
}

export function mapProduct(row: ProductRow): Product {
    return {
        id: row.id,
        name: row.name,
        maxActivations: row.max_activations,
        licenseDurationDays: row.license_duration_days,
        subscription: row.subscription === 1,
        requiresMachineId: row.requires_machine_id === 1,
        createdAt: row.created_at,
    };
}

export function mapOrder(row: OrderRow): Order {
    return {
        id: row.id,
        productId: row.product_id,
        email: row.email,
        customerName: row.customer_name,
        status: orderStatus(row.status),
        provider: orderProvider(row.provider),
        paymentReference: row.payment_reference,
        transactionId: row.transaction_id,
        createdAt: row.created_at,
        completedAt: row.completed_at,
    };
}

export function mapAuditEntry(row: AuditLogRow): AuditEntry {
    const details: unknown = JSON.parse(row.details);
    return {
        id: row.id,
        category: auditCategory(row.category),
        eventType: row.event_type,
        severity: severity(row.severity),
        licenseId: row.license_id,
        requestId: row.request_id,
        details: isRecord(details) ? details : {},
        createdAt: row.created_at,
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}
