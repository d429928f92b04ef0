/**
 * Test Fixtures
 *
 * A fully wired service graph over an in-memory database, plus seed helpers
 * for products, orders and licenses.
 */

import Stripe from 'stripe';
import { loadConfig, type AppConfig, type Bindings } from '@/env';
import { createServices, type AppServices } from '@/services';
import type { CreateOrderInput, CreateProductInput } from '@/services/catalog';
import type { License, Order, Product } from '@/types';
import { createMemoryDB, type LicenseDB } from '@/utils/db';
import { Logger } from '@/utils/logger';
import { FakePaypalClient, RecordingAlertSink, RecordingErrorTracker, RecordingNotifier } from './fakes';

export const TEST_SECRETS = {
    jwt: 'test-jwt-secret-test-jwt-secret-0000',
    admin: 'test-admin-secret-test-admin-secret-00',
    salt: 'test-machine-salt',
    stripeKey: 'sk_test_placeholder',
    stripeWebhook: 'whsec_test_secret',
};

export const TEST_BINDINGS: Bindings = {
    ENVIRONMENT: 'test',
    JWT_SECRET: TEST_SECRETS.jwt,
    ADMIN_SECRET: TEST_SECRETS.admin,
    MACHINE_HASH_SALT: TEST_SECRETS.salt,
    STRIPE_SECRET_KEY: TEST_SECRETS.stripeKey,
    STRIPE_WEBHOOK_SECRET: TEST_SECRETS.stripeWebhook,
    TRUST_PROXY: 'true',
    LOG_LEVEL: 'error',
};

export function createTestConfig(overrides: Bindings = {}): AppConfig {
    return loadConfig({ ...TEST_BINDINGS, ...overrides });
}

export interface TestContext {
    config: AppConfig;
    db: LicenseDB;
    services: AppServices;
    stripe: Stripe;
    notifier: RecordingNotifier;
    errors: RecordingErrorTracker;
    alerts: RecordingAlertSink;
    paypal: FakePaypalClient;
}

export function createTestContext(overrides: Bindings = {}): TestContext {
    const config = createTestConfig(overrides);
    const db = createMemoryDB();
    const stripe = new Stripe(TEST_SECRETS.stripeKey);
    const notifier = new RecordingNotifier();
    const errors = new RecordingErrorTracker();
    const alerts = new RecordingAlertSink();
    const paypal = new FakePaypalClient();

    const services = createServices(config, db, {
        logger: new Logger(config.logLevel),
        notifier,
        errorTracker: errors,
        alerts,
        stripe,
        paypal,
    });

    return { config, db, services, stripe, notifier, errors, alerts, paypal };
}

export async function seedProduct(ctx: TestContext, input: Partial<CreateProductInput> = {}): Promise<Product> {
    const result = await ctx.services.catalog.createProduct({
        name: 'Desktop Pro',
        maxActivations: 2,
        ...input,
    });
    if (!result.data) {
        throw new Error(`seedProduct failed: ${result.error}`);
    }
    return result.data;
}

export async function seedOrder(
    ctx: TestContext,
    productId: string,
    input: Partial<Omit<CreateOrderInput, 'productId'>> = {}
): Promise<Order> {
    const result = await ctx.services.catalog.createOrder({
        productId,
        email: 'buyer@example.com',
        customerName: 'Test Buyer',
        provider: 'stripe',
        ...input,
    });
    if (!result.data) {
        throw new Error(`seedOrder failed: ${result.error}`);
    }
    return result.data;
}

export interface SeededLicense {
    product: Product;
    order: Order;
    license: License;
    key: string;
}

export async function seedLicense(
    ctx: TestContext,
    product: Partial<CreateProductInput> = {},
    order: Partial<Omit<CreateOrderInput, 'productId'>> = {}
): Promise<SeededLicense> {
    const seededProduct = await seedProduct(ctx, product);
    const seededOrder = await seedOrder(ctx, seededProduct.id, order);
    const issued = await ctx.services.license.issueForOrder(seededOrder.id);
    if (!issued.data?.licenseKey) {
        throw new Error(`seedLicense failed: ${issued.error}`);
    }
    return {
        product: seededProduct,
        order: seededOrder,
        license: issued.data.license,
        key: issued.data.licenseKey,
    };
}

// Moves a license's expiry; tests use it to put a stored-active license in the past.
export async function setLicenseExpiry(ctx: TestContext, licenseId: string, expiresAt: number | null): Promise<void> {
    await ctx.services.repository.rawRun('UPDATE licenses SET expires_at = ? WHERE id = ?', [expiresAt, licenseId]);
}
