/**
 * LicenseTransaction - synchronous, typed writes used inside
 * `LicenseRepository.transaction()`. Every method runs on the same
 * connection under the same write lock, so a read followed by a write here
 * cannot interleave with another request.
 */

import type { SqlExecutor } from '../utils/db';
import { UpdateBuilder, type FieldMapping } from '../utils/update-builder';
import type {
    ActivationRow,
    LicenseRow,
    OrderRow,
    ProductRow,
    SubscriptionRow,
} from '../db/row-types';
import { mapActivation, mapLicense, mapOrder, mapProduct, mapSubscription } from '../db/mappers';
import type {
    Activation,
    License,
    LicenseStatus,
    Order,
    PaymentProvider,
    Product,
    Subscription,
} from '../types';

export interface ProcessedEventMarker {
    provider: PaymentProvider;
    eventId: string;
    eventType: string;
}

export interface ActivationMatch {
    fingerprintHash?: string | null;
    machineIdHash?: string | null;
}

export type SubscriptionPatch = Partial<Pick<Subscription,
    | 'provider'
    | 'externalSubscriptionId'
    | 'status'
    | 'autoRenew'
    | 'currentPeriodEnd'
    | 'lastPaymentAt'
    | 'canceledAt'
>>;

const SUBSCRIPTION_FIELDS: FieldMapping<SubscriptionPatch>[] = [
    { key: 'provider', column: 'provider' },
    { key: 'externalSubscriptionId', column: 'external_subscription_id' },
    { key: 'status', column: 'status' },
    { key: 'autoRenew', column: 'auto_renew' },
    { key: 'currentPeriodEnd', column: 'current_period_end' },
    { key: 'lastPaymentAt', column: 'last_payment_at' },
    { key: 'canceledAt', column: 'canceled_at' },
];

export function liveActivationQuery(licenseId: string, match: ActivationMatch): { sql: string; params: string[] } {
    const conditions = ['license_id = ?', 'active = 1', 'revoked = 0'];
    const params: string[] = [licenseId];

    if (match.fingerprintHash) {
        conditions.push('machine_fingerprint_hash = ?');
        params.push(match.fingerprintHash);
    }
    if (match.machineIdHash) {
        conditions.push('machine_id_hash = ?');
        params.push(match.machineIdHash);
    }

    return {
        sql: `SELECT * FROM license_activations WHERE ${conditions.join(' AND ')} ORDER BY activated_at DESC`,
        params,
    };
}

/**
 * Thrown inside a transaction when the webhook marker already exists; the
 * surrounding unit of work is rolled back.
 */
export class DuplicateEventError extends Error {
    constructor(public readonly marker: ProcessedEventMarker) {
        super(`Event ${marker.provider}:${marker.eventId} already processed`);
        this.name = 'DuplicateEventError';
    }
}

export class LicenseTransaction {
    constructor(private tx: SqlExecutor) {}

    // ========================================================================
    // Licenses
    // ========================================================================

    getLicense(id: string): License | null {
        const row = this.tx.first<LicenseRow>('SELECT * FROM licenses WHERE id = ?', [id]);
        return row ? mapLicense(row) : null;
    }

    getLicenseByOrderId(orderId: string): License | null {
        const row = this.tx.first<LicenseRow>('SELECT * FROM licenses WHERE order_id = ?', [orderId]);
        return row ? mapLicense(row) : null;
    }

    insertLicense(license: License): void {
        this.tx.run(
            `INSERT INTO licenses (id, key_hash, key_prefix, order_id, product_id, customer_email, customer_name,
                status, license_type, requires_machine_id, max_activations, activation_count, expires_at,
                revoked_at, revoked_reason, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [
                license.id,
                license.keyHash,
                license.keyPrefix,
                license.orderId,
                license.productId,
                license.customerEmail,
                license.customerName,
                license.status,
                license.licenseType,
                license.requiresMachineId ? 1 : 0,
                license.maxActivations,
                license.activationCount,
                license.expiresAt,
                license.revokedAt,
                license.revokedReason,
                license.createdAt,
                license.updatedAt,
            ]
        );
    }

    setLicenseStatus(id: string, status: LicenseStatus, now: number, reason: string | null = null): void {
        if (status === 'revoked') {
            this.tx.run(
                'UPDATE licenses SET status = ?, revoked_at = ?, revoked_reason = ?, updated_at = ? WHERE id = ?',
                [status, now, reason, now, id]
            );
            return;
        }

        this.tx.run(
            'UPDATE licenses SET status = ?, revoked_at = NULL, revoked_reason = NULL, updated_at = ? WHERE id = ?',
            [status, now, id]
        );
    }

    setLicenseExpiry(id: string, expiresAt: number | null, now: number): void {
        this.tx.run(
            'UPDATE licenses SET expires_at = ?, updated_at = ? WHERE id = ?',
            [expiresAt, now, id]
        );
    }

    // Conditional increment: the only way an activation slot is ever taken.
    takeActivationSlot(id: string, now: number): boolean {
        const meta = this.tx.run(
            `UPDATE licenses SET activation_count = activation_count + 1, updated_at = ?
             WHERE id = ? AND activation_count < max_activations`,
            [now, id]
        );
        return meta.changes === 1;
    }

    releaseActivationSlot(id: string, now: number): void {
        this.tx.run(
            `UPDATE licenses SET activation_count = activation_count - 1, updated_at = ?
             WHERE id = ? AND activation_count > 0`,
            [now, id]
        );
    }

    // Recounts from the activation table after bulk revocation.
    syncActivationCount(id: string, now: number): void {
        this.tx.run(
            `UPDATE licenses SET updated_at = ?, activation_count = (
                SELECT COUNT(*) FROM license_activations
                WHERE license_id = ? AND active = 1 AND revoked = 0
             ) WHERE id = ?`,
            [now, id, id]
        );
    }

    // ========================================================================
    // Activations
    // ========================================================================

    getLiveActivation(licenseId: string, fingerprintHash: string, machineIdHash: string): Activation | null {
        const row = this.tx.first<ActivationRow>(
            `SELECT * FROM license_activations
             WHERE license_id = ? AND machine_fingerprint_hash = ? AND machine_id_hash = ?
               AND active = 1 AND revoked = 0`,
            [licenseId, fingerprintHash, machineIdHash]
        );
        return row ? mapActivation(row) : null;
    }

    findLiveActivations(licenseId: string, match: ActivationMatch): Activation[] {
        const query = liveActivationQuery(licenseId, match);
        return this.tx.all<ActivationRow>(query.sql, query.params).map(mapActivation);
    }

    insertActivation(activation: Activation): void {
        this.tx.run(
            `INSERT INTO license_activations (id, license_id, machine_fingerprint_hash, machine_id_hash,
                machine_fingerprint_partial, machine_id_partial, active, revoked, revoked_reason,
                ip_address, user_agent, activated_at, deactivated_at, revoked_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [
                activation.id,
                activation.licenseId,
                activation.fingerprintHash,
                activation.machineIdHash,
                activation.fingerprintPartial,
                activation.machineIdPartial,
                activation.active ? 1 : 0,
                activation.revoked ? 1 : 0,
                activation.revokedReason,
                activation.ipAddress,
                activation.userAgent,
                activation.activatedAt,
                activation.deactivatedAt,
                activation.revokedAt,
            ]
        );
    }

    deactivateActivation(id: string, now: number): boolean {
        const meta = this.tx.run(
            'UPDATE license_activations SET active = 0, deactivated_at = ? WHERE id = ? AND active = 1',
            [now, id]
        );
        return meta.changes === 1;
    }

    revokeActivation(id: string, reason: string, now: number): boolean {
        const meta = this.tx.run(
            `UPDATE license_activations SET active = 0, revoked = 1, revoked_reason = ?, revoked_at = ?
             WHERE id = ? AND revoked = 0`,
            [reason, now, id]
        );
        return meta.changes === 1;
    }

    revokeLiveActivations(licenseId: string, reason: string, now: number): number {
        const meta = this.tx.run(
            `UPDATE license_activations SET active = 0, revoked = 1, revoked_reason = ?, revoked_at = ?
             WHERE license_id = ? AND active = 1 AND revoked = 0`,
            [reason, now, licenseId]
        );
        return meta.changes;
    }

    // ========================================================================
    // Subscriptions
    // ========================================================================

    getSubscriptionByLicenseId(licenseId: string): Subscription | null {
        const row = this.tx.first<SubscriptionRow>(
            'SELECT * FROM subscriptions WHERE license_id = ?',
            [licenseId]
        );
        return row ? mapSubscription(row) : null;
    }

    insertSubscription(subscription: Subscription): void {
        this.tx.run(
            `INSERT INTO subscriptions (id, license_id, provider, external_subscription_id, status, auto_renew,
                current_period_end, last_payment_at, canceled_at, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [
                subscription.id,
                subscription.licenseId,
                subscription.provider,
                subscription.externalSubscriptionId,
                subscription.status,
                subscription.autoRenew ? 1 : 0,
                subscription.currentPeriodEnd,
                subscription.lastPaymentAt,
                subscription.canceledAt,
                subscription.createdAt,
                subscription.updatedAt,
            ]
        );
    }

    updateSubscription(licenseId: string, patch: SubscriptionPatch, now: number): boolean {
        const builder = new UpdateBuilder(patch, SUBSCRIPTION_FIELDS);
        if (!builder.hasUpdates()) {
            return false;
        }
        builder.addTimestamp('updated_at', now);
        const meta = this.tx.run(builder.toSql('subscriptions', 'license_id'), builder.getValues(licenseId));
        return meta.changes === 1;
    }

    // ========================================================================
    // Orders & Products
    // ========================================================================

    getOrder(id: string): Order | null {
        const row = this.tx.first<OrderRow>('SELECT * FROM orders WHERE id = ?', [id]);
        return row ? mapOrder(row) : null;
    }

    getProduct(id: string): Product | null {
        const row = this.tx.first<ProductRow>('SELECT * FROM products WHERE id = ?', [id]);
        return row ? mapProduct(row) : null;
    }

    completeOrder(id: string, now: number): void {
        this.tx.run(
            "UPDATE orders SET status = 'completed', completed_at = ? WHERE id = ? AND status = 'pending'",
            [now, id]
        );
    }

    refundOrder(id: string): void {
        this.tx.run("UPDATE orders SET status = 'refunded' WHERE id = ?", [id]);
    }

    // ========================================================================
    // Webhook markers
    // ========================================================================

    /**
     * Records the event as processed. Throws DuplicateEventError (rolling
     * back the caller's transaction) when the marker already exists.
     */
    markEventProcessed(marker: ProcessedEventMarker, now: number): void {
        const meta = this.tx.run(
            `INSERT INTO webhook_events (provider, event_id, event_type, processed_at)
             VALUES (?, ?, ?, ?)
             ON CONFLICT(provider, event_id) DO NOTHING`,
            [marker.provider, marker.eventId, marker.eventType, now]
        );
        if (meta.changes === 0) {
            throw new DuplicateEventError(marker);
        }
    }
}
