/**
 * LicenseRepository - Typed repository for license data.
 *
 * Reads are plain async queries. Anything that changes more than one row,
 * or reads-then-writes, goes through `transaction()` and the synchronous
 * LicenseTransaction API so the whole unit commits or rolls back together.
 *
 * Usage:
 *   const repo = new LicenseRepository(createLicenseDB(openDatabase(path)));
 *   const license = await repo.getLicenseByKeyHash(hash);
 */

import type { LicenseDB, QueryResult, Row, RunMeta, SqlValue } from '../utils/db';
import type {
    ActivationRow,
    CountRow,
    LicenseRow,
    OrderRow,
    ProductRow,
    SubscriptionRow,
} from '../db/row-types';
import { mapActivation, mapLicense, mapOrder, mapProduct, mapSubscription } from '../db/mappers';
import type { Activation, License, Order, PaymentProvider, Product, Subscription } from '../types';
import { LicenseTransaction, liveActivationQuery, type ActivationMatch } from './license.tx';

export class LicenseRepository {
    constructor(private db: LicenseDB) {}

    // ========================================================================
    // Transactions
    // ========================================================================

    async transaction<T>(work: (tx: LicenseTransaction) => T): Promise<T> {
        return this.db.transaction((executor) => work(new LicenseTransaction(executor)));
    }

    // ========================================================================
    // License Operations
    // ========================================================================

    async getLicenseById(id: string): Promise<License | null> {
        const row = await this.db.first<LicenseRow>('SELECT * FROM licenses WHERE id = ?', [id]);
        return row ? mapLicense(row) : null;
    }

    async getLicenseByKeyHash(keyHash: string): Promise<License | null> {
        const row = await this.db.first<LicenseRow>('SELECT * FROM licenses WHERE key_hash = ?', [keyHash]);
        return row ? mapLicense(row) : null;
    }

    async getLicenseByOrderId(orderId: string): Promise<License | null> {
        const row = await this.db.first<LicenseRow>('SELECT * FROM licenses WHERE order_id = ?', [orderId]);
        return row ? mapLicense(row) : null;
    }

    async getLatestLicenseByEmail(email: string): Promise<License | null> {
        const row = await this.db.first<LicenseRow>(
            'SELECT * FROM licenses WHERE customer_email = ? COLLATE NOCASE ORDER BY created_at DESC LIMIT 1',
            [email]
        );
        return row ? mapLicense(row) : null;
    }

    async getLicenseBySubscriptionId(provider: PaymentProvider, externalId: string): Promise<License | null> {
        const row = await this.db.first<LicenseRow>(
            `SELECT l.* FROM licenses l
             JOIN subscriptions s ON s.license_id = l.id
             WHERE s.external_subscription_id = ? AND (s.provider IS NULL OR s.provider = ?)`,
            [externalId, provider]
        );
        return row ? mapLicense(row) : null;
    }

    // ========================================================================
    // Activation Operations
    // ========================================================================

    async listActivations(licenseId: string, limit: number): Promise<Activation[]> {
        const result = await this.db.all<ActivationRow>(
            'SELECT * FROM license_activations WHERE license_id = ? ORDER BY activated_at DESC, rowid DESC LIMIT ?',
            [licenseId, limit]
        );
        return result.results.map(mapActivation);
    }

    async findLiveActivations(licenseId: string, match: ActivationMatch): Promise<Activation[]> {
        const query = liveActivationQuery(licenseId, match);
        const result = await this.db.all<ActivationRow>(query.sql, query.params);
        return result.results.map(mapActivation);
    }

    async countLiveActivations(licenseId: string): Promise<number> {
        const row = await this.db.first<CountRow>(
            'SELECT COUNT(*) AS count FROM license_activations WHERE license_id = ? AND active = 1 AND revoked = 0',
            [licenseId]
        );
        return row?.count ?? 0;
    }

    // ========================================================================
    // Subscription Operations
    // ========================================================================

    async getSubscriptionByLicenseId(licenseId: string): Promise<Subscription | null> {
        const row = await this.db.first<SubscriptionRow>(
            'SELECT * FROM subscriptions WHERE license_id = ?',
            [licenseId]
        );
        return row ? mapSubscription(row) : null;
    }

    // ========================================================================
    // Product & Order Operations
    // ========================================================================

    async getProductById(id: string): Promise<Product | null> {
        const row = await this.db.first<ProductRow>('SELECT * FROM products WHERE id = ?', [id]);
        return row ? mapProduct(row) : null;
    }

    async createProduct(product: Product): Promise<RunMeta> {
        return this.db.run(
            `INSERT INTO products (id, name, max_activations, license_duration_days, subscription, requires_machine_id, created_at)
             VALUES (?, ?, ?, ?, ?, ?, ?)`,
            [
                product.id,
                product.name,
                product.maxActivations,
                product.licenseDurationDays,
                product.subscription ? 1 : 0,
                product.requiresMachineId ? 1 : 0,
                product.createdAt,
            ]
        );
    }

    async getOrderById(id: string): Promise<Order | null> {
        const row = await this.db.first<OrderRow>('SELECT * FROM orders WHERE id = ?', [id]);
        return row ? mapOrder(row) : null;
    }

    async getOrderByPaymentReference(reference: string): Promise<Order | null> {
        const row = await this.db.first<OrderRow>(
            'SELECT * FROM orders WHERE payment_reference = ? OR transaction_id = ? ORDER BY created_at DESC LIMIT 1',
            [reference, reference]
        );
        return row ? mapOrder(row) : null;
    }

    async createOrder(order: Order): Promise<RunMeta> {
        return this.db.run(
            `INSERT INTO orders (id, product_id, email, customer_name, status, provider, payment_reference,
                transaction_id, created_at, completed_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [
                order.id,
                order.productId,
                order.email,
                order.customerName,
                order.status,
                order.provider,
                order.paymentReference,
                order.transactionId,
                order.createdAt,
                order.completedAt,
            ]
        );
    }

    // ========================================================================
    // Webhook Markers
    // ========================================================================

    async hasProcessedEvent(provider: PaymentProvider, eventId: string): Promise<boolean> {
        const row = await this.db.first<Row>(
            'SELECT 1 AS found FROM webhook_events WHERE provider = ? AND event_id = ?',
            [provider, eventId]
        );
        return row !== null;
    }

    async pruneProcessedEvents(olderThan: number): Promise<number> {
        const meta = await this.db.run('DELETE FROM webhook_events WHERE processed_at < ?', [olderThan]);
        return meta.changes;
    }

    // ========================================================================
    // Raw Query Operations (for services that own their tables)
    // ========================================================================

    async rawFirst<T extends Row>(sql: string, params?: SqlValue[]): Promise<T | null> {
        return this.db.first<T>(sql, params);
    }

    async rawAll<T extends Row>(sql: string, params?: SqlValue[]): Promise<QueryResult<T>> {
        return this.db.all<T>(sql, params);
    }

    async rawRun(sql: string, params?: SqlValue[]): Promise<RunMeta> {
        return this.db.run(sql, params);
    }

    async ping(): Promise<boolean> {
        const row = await this.db.first<Row>('SELECT 1 AS health');
        return row !== null;
    }
}
