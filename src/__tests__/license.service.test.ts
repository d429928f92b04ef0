import { describe, it, expect, beforeEach } from 'vitest';
import { ERROR_CODES, ERROR_MESSAGES } from '../constants/errors';
import { DAY_MS } from '../constants/license';
import { hashMachineData, partialLicenseKey } from '../services/shared';
import {
    createTestContext,
    seedLicense,
    seedOrder,
    seedProduct,
    setLicenseExpiry,
    TEST_SECRETS,
    type TestContext,
} from './helpers/fixtures';

describe('LicenseService', () => {
    let ctx: TestContext;

    beforeEach(() => {
        ctx = createTestContext();
    });

    // ========================================================================
    // Issuance
    // ========================================================================

    describe('issueForOrder', () => {
        it('should issue an active perpetual license and complete the order', async () => {
            const product = await seedProduct(ctx, { maxActivations: 3 });
            const order = await seedOrder(ctx, product.id);

            const result = await ctx.services.license.issueForOrder(order.id);

            expect(result.success).toBe(true);
            const issued = result.data;
            expect(issued?.created).toBe(true);
            expect(issued?.licenseKey).toMatch(/^[A-HJ-NP-Z2-9]{4}(-[A-HJ-NP-Z2-9]{4}){3}$/);
            expect(issued?.license.keyPrefix).toBe(partialLicenseKey(issued?.licenseKey));
            expect(issued?.license.status).toBe('active');
            expect(issued?.license.licenseType).toBe('perpetual');
            expect(issued?.license.expiresAt).toBeNull();
            expect(issued?.license.maxActivations).toBe(3);
            expect(issued?.license.customerEmail).toBe('buyer@example.com');

            const stored = await ctx.services.catalog.getOrder(order.id);
            expect(stored.data?.status).toBe('completed');
        });

        it('should notify the customer with the plaintext key', async () => {
            const { key, license } = await seedLicense(ctx);

            expect(ctx.notifier.sent).toEqual([
                {
                    kind: 'license_issued',
                    licenseId: license.id,
                    customerEmail: 'buyer@example.com',
                    customerName: 'Test Buyer',
                    expiresAt: null,
                    licenseKey: key,
                },
            ]);
        });

        it('should return the existing license without a key on repeat issuance', async () => {
            const { order, license } = await seedLicense(ctx);

            const again = await ctx.services.license.issueForOrder(order.id);

            expect(again.data).toEqual({ license, licenseKey: null, created: false });
            expect(ctx.notifier.kinds()).toEqual(['license_issued']);
        });

        it('should set the expiry from the product duration', async () => {
            const { license } = await seedLicense(ctx, { licenseDurationDays: 30 });

            expect(license.expiresAt).toBe(license.createdAt + 30 * DAY_MS);
        });

        it('should create a subscription record for subscription products', async () => {
            const { license } = await seedLicense(ctx, { subscription: true, licenseDurationDays: 30 });

            const subscription = await ctx.services.repository.getSubscriptionByLicenseId(license.id);

            expect(license.licenseType).toBe('subscription');
            expect(subscription?.status).toBe('active');
            expect(subscription?.provider).toBe('stripe');
            expect(subscription?.currentPeriodEnd).toBe(license.expiresAt);
        });

        it('should fail for an unknown order', async () => {
            const result = await ctx.services.license.issueForOrder('ord_missing');

            expect(result.success).toBe(false);
            expect(result.code).toBe(ERROR_CODES.ORDER_NOT_FOUND);
        });
    });

    describe('issueManual', () => {
        it('should create a manual order and issue against it', async () => {
            const product = await seedProduct(ctx);

            const result = await ctx.services.license.issueManual({
                productId: product.id,
                email: 'support@example.com',
            });

            expect(result.data?.created).toBe(true);
            const orderId = result.data?.license.orderId ?? '';
            const order = await ctx.services.catalog.getOrder(orderId);
            expect(order.data?.provider).toBe('manual');
            expect(order.data?.status).toBe('completed');
        });

        it('should fail for an unknown product', async () => {
            const result = await ctx.services.license.issueManual({ productId: 'prod_missing', email: 'a@example.com' });

            expect(result.code).toBe(ERROR_CODES.PRODUCT_NOT_FOUND);
        });
    });

    // ========================================================================
    // Validation
    // ========================================================================

    describe('validate', () => {
        it('should report unknown keys as not found', async () => {
            const result = await ctx.services.license.validate('AAAA-BBBB-CCCC-DDDD');

            expect(result).toEqual({
                success: false,
                error: ERROR_MESSAGES.LICENSE.NOT_FOUND,
                code: ERROR_CODES.LICENSE_NOT_FOUND,
            });
        });

        it('should look keys up case-insensitively and ignore surrounding whitespace', async () => {
            const { key, license } = await seedLicense(ctx);

            const result = await ctx.services.license.validate(`  ${key.toLowerCase()} `);

            expect(result.data?.license.id).toBe(license.id);
            expect(result.data?.activation).toBeNull();
        });

        it('should report a stored-active license past its expiry as expired', async () => {
            const { key, license } = await seedLicense(ctx, { licenseDurationDays: 30 });
            await setLicenseExpiry(ctx, license.id, Date.now() - 1000);

            const result = await ctx.services.license.validate(key);
            const status = await ctx.services.license.status(key);

            expect(result.code).toBe(ERROR_CODES.LICENSE_EXPIRED);
            expect(status.data?.status).toBe('expired');
        });

        it('should require a fingerprint when the license is machine-bound', async () => {
            const { key } = await seedLicense(ctx, { requiresMachineId: true });

            const result = await ctx.services.license.validate(key);

            expect(result.code).toBe(ERROR_CODES.MACHINE_ID_REQUIRED);
        });

        it('should report an unknown machine as not activated', async () => {
            const { key } = await seedLicense(ctx);

            const result = await ctx.services.license.validate(key, { fingerprint: 'machine-unknown' });

            expect(result.code).toBe(ERROR_CODES.ACTIVATION_NOT_FOUND);
        });

        it('should return the live activation for an activated machine', async () => {
            const { key } = await seedLicense(ctx);
            const activated = await ctx.services.license.activate(key, { fingerprint: 'machine-a' });

            const result = await ctx.services.license.validate(key, { fingerprint: 'machine-a' });

            expect(result.data?.activation?.id).toBe(activated.data?.activation.id);
        });
    });

    // ========================================================================
    // Activation
    // ========================================================================

    describe('activate', () => {
        it('should require a machine fingerprint', async () => {
            const { key } = await seedLicense(ctx);

            const result = await ctx.services.license.activate(key, { fingerprint: '  ' });

            expect(result).toEqual({
                success: false,
                error: ERROR_MESSAGES.ACTIVATION.FINGERPRINT_REQUIRED,
                code: ERROR_CODES.VALIDATION_FAILED,
            });
        });

        it('should store only the salted hash and a partial of the fingerprint', async () => {
            const { key } = await seedLicense(ctx);

            const result = await ctx.services.license.activate(key, {
                fingerprint: 'machine-a-fingerprint',
                ipAddress: '203.0.113.5',
            });

            const activation = result.data?.activation;
            expect(result.data?.alreadyActive).toBe(false);
            expect(activation?.fingerprintHash).toBe(await hashMachineData('machine-a-fingerprint', TEST_SECRETS.salt));
            expect(activation?.fingerprintPartial).toBe('machin****');
            expect(activation?.machineIdHash).toBe('');
            expect(activation?.ipAddress).toBe('203.0.113.5');
            expect(result.data?.license.activationCount).toBe(1);
        });

        it('should be idempotent for a machine that is already active', async () => {
            const { key, license } = await seedLicense(ctx);
            const first = await ctx.services.license.activate(key, { fingerprint: 'machine-a' });

            const second = await ctx.services.license.activate(key, { fingerprint: 'machine-a' });

            expect(second.data?.alreadyActive).toBe(true);
            expect(second.data?.activation.id).toBe(first.data?.activation.id);
            const stored = await ctx.services.repository.getLicenseById(license.id);
            expect(stored?.activationCount).toBe(1);
        });

        it('should require a machine id for machine-bound licenses', async () => {
            const { key } = await seedLicense(ctx, { requiresMachineId: true });

            const missing = await ctx.services.license.activate(key, { fingerprint: 'machine-a' });
            const bound = await ctx.services.license.activate(key, { fingerprint: 'machine-a', machineId: 'serial-00042' });

            expect(missing.code).toBe(ERROR_CODES.MACHINE_ID_REQUIRED);
            expect(bound.success).toBe(true);
            expect(bound.data?.activation.machineIdPartial).toBe('serial****');
        });

        it('should refuse activations past the limit', async () => {
            const { key } = await seedLicense(ctx, { maxActivations: 2 });
            await ctx.services.license.activate(key, { fingerprint: 'machine-a' });
            await ctx.services.license.activate(key, { fingerprint: 'machine-b' });

            const third = await ctx.services.license.activate(key, { fingerprint: 'machine-c' });

            expect(third).toEqual({
                success: false,
                error: 'No activations remaining',
                code: ERROR_CODES.ACTIVATION_LIMIT_EXCEEDED,
            });
        });

        it('should grant exactly the available slots to concurrent activations', async () => {
            const { key, license } = await seedLicense(ctx, { maxActivations: 3 });
            const fingerprints = Array.from({ length: 8 }, (_, i) => `machine-${i}`);

            const results = await Promise.all(
                fingerprints.map((fingerprint) => ctx.services.license.activate(key, { fingerprint }))
            );

            const granted = results.filter((r) => r.success);
            const refused = results.filter((r) => r.code === ERROR_CODES.ACTIVATION_LIMIT_EXCEEDED);
            expect(granted).toHaveLength(3);
            expect(refused).toHaveLength(5);
            expect(await ctx.services.repository.countLiveActivations(license.id)).toBe(3);
            const stored = await ctx.services.repository.getLicenseById(license.id);
            expect(stored?.activationCount).toBe(3);
        });

        it('should bind concurrent activations of one machine once', async () => {
            const { key, license } = await seedLicense(ctx, { maxActivations: 2 });

            const results = await Promise.all(
                Array.from({ length: 5 }, () => ctx.services.license.activate(key, { fingerprint: 'machine-a' }))
            );

            expect(results.every((r) => r.success)).toBe(true);
            expect(results.filter((r) => r.data?.alreadyActive === false)).toHaveLength(1);
            const stored = await ctx.services.repository.getLicenseById(license.id);
            expect(stored?.activationCount).toBe(1);
        });

        it('should refuse activation of a suspended license', async () => {
            const { key, license } = await seedLicense(ctx);
            await ctx.services.license.suspend(license.id, 'admin_suspended');

            const result = await ctx.services.license.activate(key, { fingerprint: 'machine-a' });

            expect(result).toEqual({
                success: false,
                error: ERROR_MESSAGES.LICENSE.SUSPENDED,
                code: ERROR_CODES.LICENSE_INVALID_STATE,
            });
        });

        it('should refuse activation of an expired license', async () => {
            const { key, license } = await seedLicense(ctx, { licenseDurationDays: 30 });
            await setLicenseExpiry(ctx, license.id, Date.now() - 1000);

            const result = await ctx.services.license.activate(key, { fingerprint: 'machine-a' });

            expect(result.code).toBe(ERROR_CODES.LICENSE_INVALID_STATE);
            expect(result.error).toBe(ERROR_MESSAGES.LICENSE.EXPIRED);
        });
    });

    describe('deactivate', () => {
        it('should free a slot for another machine', async () => {
            const { key } = await seedLicense(ctx, { maxActivations: 2 });
            await ctx.services.license.activate(key, { fingerprint: 'machine-a' });
            await ctx.services.license.activate(key, { fingerprint: 'machine-b' });
            const blocked = await ctx.services.license.activate(key, { fingerprint: 'machine-c' });

            const released = await ctx.services.license.deactivate(key, { fingerprint: 'machine-a' });
            const admitted = await ctx.services.license.activate(key, { fingerprint: 'machine-c' });

            expect(blocked.code).toBe(ERROR_CODES.ACTIVATION_LIMIT_EXCEEDED);
            expect(released.data?.deactivated).toBe(1);
            expect(released.data?.license.activationCount).toBe(1);
            expect(admitted.success).toBe(true);
            expect(admitted.data?.license.activationCount).toBe(2);
        });

        it('should create a new binding when a deactivated machine returns', async () => {
            const { key } = await seedLicense(ctx);
            const first = await ctx.services.license.activate(key, { fingerprint: 'machine-a' });
            await ctx.services.license.deactivate(key, { fingerprint: 'machine-a' });

            const again = await ctx.services.license.activate(key, { fingerprint: 'machine-a' });

            expect(again.data?.alreadyActive).toBe(false);
            expect(again.data?.activation.id).not.toBe(first.data?.activation.id);
        });

        it('should report machines without a live activation', async () => {
            const { key } = await seedLicense(ctx);

            const result = await ctx.services.license.deactivate(key, { fingerprint: 'machine-z' });

            expect(result.code).toBe(ERROR_CODES.ACTIVATION_NOT_FOUND);
        });

        it('should require a fingerprint', async () => {
            const { key } = await seedLicense(ctx);

            const result = await ctx.services.license.deactivate(key, {});

            expect(result.code).toBe(ERROR_CODES.VALIDATION_FAILED);
        });
    });

    // ========================================================================
    // Lifecycle
    // ========================================================================

    describe('revoke', () => {
        it('should revoke the license and every live activation together', async () => {
            const { key, license } = await seedLicense(ctx, { maxActivations: 3 });
            await ctx.services.license.activate(key, { fingerprint: 'machine-a' });
            await ctx.services.license.activate(key, { fingerprint: 'machine-b' });

            const result = await ctx.services.license.revoke(license.id, 'chargeback');

            expect(result.data?.changed).toBe(true);
            expect(result.data?.activationsRevoked).toBe(2);
            expect(result.data?.license.status).toBe('revoked');
            expect(result.data?.license.activationCount).toBe(0);
            expect(result.data?.license.revokedReason).toBe('chargeback');
            expect(await ctx.services.repository.countLiveActivations(license.id)).toBe(0);

            const history = await ctx.services.license.activationHistory(license.id);
            expect(history.data?.map((a) => [a.revoked, a.revokedReason])).toEqual([
                [true, 'chargeback'],
                [true, 'chargeback'],
            ]);
        });

        it('should make validation fail with the revoked code', async () => {
            const { key, license } = await seedLicense(ctx);
            await ctx.services.license.activate(key, { fingerprint: 'machine-a' });
            await ctx.services.license.revoke(license.id, 'refund');

            const plain = await ctx.services.license.validate(key);
            const withMachine = await ctx.services.license.validate(key, { fingerprint: 'machine-a' });

            expect(plain.code).toBe(ERROR_CODES.LICENSE_REVOKED);
            expect(withMachine.code).toBe(ERROR_CODES.LICENSE_REVOKED);
        });

        it('should treat a second revocation as a no-op', async () => {
            const { license } = await seedLicense(ctx);
            await ctx.services.license.revoke(license.id, 'refund');

            const again = await ctx.services.license.revoke(license.id, 'refund');

            expect(again.data?.changed).toBe(false);
            expect(again.data?.activationsRevoked).toBe(0);
            expect(ctx.notifier.kinds()).toEqual(['license_issued', 'license_revoked']);
        });

        it('should cancel the subscription record', async () => {
            const { license } = await seedLicense(ctx, { subscription: true, licenseDurationDays: 30 });

            const result = await ctx.services.license.revoke(license.id, 'subscription_canceled');

            expect(result.data?.subscription?.status).toBe('canceled');
            expect(result.data?.subscription?.autoRenew).toBe(false);
        });

        it('should only come back with an admin override', async () => {
            const { key, license } = await seedLicense(ctx);
            await ctx.services.license.revoke(license.id, 'refund');

            const refused = await ctx.services.license.reactivate(license.id);
            const restored = await ctx.services.license.reactivate(license.id, { adminOverride: true });

            expect(refused.code).toBe(ERROR_CODES.LICENSE_INVALID_STATE);
            expect(restored.data?.license.status).toBe('active');
            expect((await ctx.services.license.validate(key)).success).toBe(true);
        });
    });

    describe('suspend and reactivate', () => {
        it('should block validation while suspended and restore it on reactivation', async () => {
            const { key, license } = await seedLicense(ctx);

            await ctx.services.license.suspend(license.id, 'payment_dispute');
            const suspended = await ctx.services.license.validate(key);
            await ctx.services.license.reactivate(license.id);
            const restored = await ctx.services.license.validate(key);

            expect(suspended.code).toBe(ERROR_CODES.LICENSE_SUSPENDED);
            expect(restored.success).toBe(true);
            expect(ctx.notifier.kinds()).toEqual(['license_issued', 'license_suspended', 'license_reactivated']);
        });

        it('should not notify twice for a repeated suspension', async () => {
            const { license } = await seedLicense(ctx);
            await ctx.services.license.suspend(license.id, 'payment_dispute');

            const again = await ctx.services.license.suspend(license.id, 'payment_dispute');

            expect(again.data?.changed).toBe(false);
            expect(ctx.notifier.kinds()).toEqual(['license_issued', 'license_suspended']);
        });
    });

    describe('extend', () => {
        it('should push a future expiry forward by the given days', async () => {
            const { license } = await seedLicense(ctx, { licenseDurationDays: 30 });

            const result = await ctx.services.license.extend(license.id, 10);

            expect(result.data?.license.expiresAt).toBe((license.expiresAt ?? 0) + 10 * DAY_MS);
        });

        it('should extend a lapsed license from now', async () => {
            const { license } = await seedLicense(ctx, { licenseDurationDays: 30 });
            await setLicenseExpiry(ctx, license.id, Date.now() - 5 * DAY_MS);
            const before = Date.now();

            const result = await ctx.services.license.extend(license.id, 10);

            expect(result.data?.license.expiresAt).toBeGreaterThanOrEqual(before + 10 * DAY_MS);
        });

        it('should refuse to extend a perpetual license', async () => {
            const { license } = await seedLicense(ctx);

            const result = await ctx.services.license.extend(license.id, 10);

            expect(result).toEqual({
                success: false,
                error: ERROR_MESSAGES.LICENSE.PERPETUAL,
                code: ERROR_CODES.LICENSE_INVALID_STATE,
            });
        });

        it('should reject non-positive day counts', async () => {
            const { license } = await seedLicense(ctx, { licenseDurationDays: 30 });

            const result = await ctx.services.license.extend(license.id, 0);

            expect(result.code).toBe(ERROR_CODES.VALIDATION_FAILED);
        });
    });

    describe('revokeActivations', () => {
        it('should revoke the matching machine and release its slot', async () => {
            const { key, license } = await seedLicense(ctx);
            await ctx.services.license.activate(key, { fingerprint: 'machine-a' });
            await ctx.services.license.activate(key, { fingerprint: 'machine-b' });

            const result = await ctx.services.license.revokeActivations(license.id, { fingerprint: 'machine-a' }, 'stolen_device');

            expect(result.data?.deactivated).toBe(1);
            expect(result.data?.license.activationCount).toBe(1);
            expect((await ctx.services.license.validate(key, { fingerprint: 'machine-a' })).code)
                .toBe(ERROR_CODES.ACTIVATION_NOT_FOUND);
        });

        it('should revoke every live activation when no machine is named', async () => {
            const { key, license } = await seedLicense(ctx);
            await ctx.services.license.activate(key, { fingerprint: 'machine-a' });
            await ctx.services.license.activate(key, { fingerprint: 'machine-b' });

            const result = await ctx.services.license.revokeActivations(license.id, {}, 'reset');

            expect(result.data?.deactivated).toBe(2);
            expect(result.data?.license.activationCount).toBe(0);
        });
    });

    describe('status', () => {
        it('should summarize the license under its masked key', async () => {
            const { key, license } = await seedLicense(ctx, { maxActivations: 3 });
            await ctx.services.license.activate(key, { fingerprint: 'machine-a' });

            const result = await ctx.services.license.status(key);

            expect(result.data).toEqual({
                id: license.id,
                key: partialLicenseKey(key),
                status: 'active',
                licenseType: 'perpetual',
                requiresMachineId: false,
                maxActivations: 3,
                activationCount: 1,
                activationsRemaining: 2,
                expiresAt: null,
                createdAt: license.createdAt,
            });
        });
    });
});
