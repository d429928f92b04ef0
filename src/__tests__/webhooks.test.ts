import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ERROR_CODES, ERROR_MESSAGES } from '../constants/errors';
import { DAY_MS } from '../constants/license';
import { webhookSettingKey } from '../services/settings';
import type { PaypalTransmissionHeaders } from '../services/webhook';
import { createTestContext, seedLicense, seedOrder, seedProduct, TEST_SECRETS, type TestContext } from './helpers/fixtures';

function stripePayload(id: string, type: string, object: Record<string, unknown>): string {
    return JSON.stringify({ id, object: 'event', type, data: { object } });
}

function paypalPayload(id: string, eventType: string, resource: Record<string, unknown>): string {
    return JSON.stringify({ id, event_type: eventType, resource });
}

function paypalHeaders(transmissionId: string): PaypalTransmissionHeaders {
    return {
        transmissionId,
        transmissionTime: '2026-03-01T12:00:00Z',
        transmissionSig: 'test-signature',
        certUrl: 'https://paypal.example.com/cert.pem',
        authAlgo: 'SHA256withRSA',
    };
}

describe('WebhookDispatcher', () => {
    let ctx: TestContext;

    beforeEach(() => {
        ctx = createTestContext();
    });

    function sign(payload: string): string {
        return ctx.stripe.webhooks.generateTestHeaderString({ payload, secret: TEST_SECRETS.stripeWebhook });
    }

    async function deliverStripe(payload: string) {
        return ctx.services.webhooks.handleStripe(payload, sign(payload), { requestId: 'req_webhook' });
    }

    async function licenseCount(): Promise<number> {
        const row = await ctx.services.repository.rawFirst<{ count: number }>('SELECT COUNT(*) AS count FROM licenses');
        return row?.count ?? 0;
    }

    // ========================================================================
    // Stripe
    // ========================================================================

    describe('Stripe signatures', () => {
        it('should reject a payload with a bad signature and raise an alert', async () => {
            const payload = stripePayload('evt_bad', 'charge.succeeded', { id: 'ch_1' });

            const result = await ctx.services.webhooks.handleStripe(payload, 't=1700000000,v1=deadbeef', {
                ipAddress: '198.51.100.9',
            });

            expect(result).toEqual({
                success: false,
                error: ERROR_MESSAGES.WEBHOOK.INVALID_SIGNATURE,
                code: ERROR_CODES.SIGNATURE_INVALID,
            });
            const [security] = await ctx.services.audit.listRecent('security', 1);
            expect(security?.eventType).toBe('invalid_webhook_signature');
            expect(security?.details.provider).toBe('stripe');
            expect(security?.details.ip_address).toBe('198.51.100.9');
            expect(ctx.alerts.eventTypes()).toEqual(['invalid_webhook_signature']);
        });

        it('should reject a payload without a signature', async () => {
            const result = await ctx.services.webhooks.handleStripe('{}', undefined);

            expect(result.error).toBe(ERROR_MESSAGES.WEBHOOK.MISSING_SIGNATURE);
            expect(result.code).toBe(ERROR_CODES.SIGNATURE_INVALID);
        });

        it('should reject a payload signed for a different body', async () => {
            const signature = sign(stripePayload('evt_1', 'charge.succeeded', { id: 'ch_1' }));

            const result = await ctx.services.webhooks.handleStripe(
                stripePayload('evt_1', 'charge.succeeded', { id: 'ch_2' }),
                signature
            );

            expect(result.code).toBe(ERROR_CODES.SIGNATURE_INVALID);
        });
    });

    describe('Stripe payments', () => {
        it('should issue a license for the order named in the charge metadata', async () => {
            const product = await seedProduct(ctx);
            const order = await seedOrder(ctx, product.id);

            const result = await deliverStripe(stripePayload('evt_issue', 'charge.succeeded', {
                id: 'ch_1',
                metadata: { order_id: order.id },
            }));

            const license = await ctx.services.repository.getLicenseByOrderId(order.id);
            expect(result.data).toEqual({
                provider: 'stripe',
                eventId: 'evt_issue',
                eventType: 'charge.succeeded',
                status: 'processed',
                action: 'issue',
                licenseId: license?.id,
                detail: undefined,
            });
            expect(ctx.notifier.kinds()).toEqual(['license_issued']);
            expect(await ctx.services.repository.hasProcessedEvent('stripe', 'evt_issue')).toBe(true);
        });

        it('should process a replayed event exactly once', async () => {
            const product = await seedProduct(ctx);
            const order = await seedOrder(ctx, product.id);
            const payload = stripePayload('evt_replay', 'charge.succeeded', {
                id: 'ch_1',
                metadata: { order_id: order.id },
            });

            const first = await deliverStripe(payload);
            const second = await deliverStripe(payload);

            expect(first.data?.status).toBe('processed');
            expect(second.data).toEqual({
                provider: 'stripe',
                eventId: 'evt_replay',
                eventType: 'charge.succeeded',
                status: 'already_processed',
            });
            expect(await licenseCount()).toBe(1);
            expect(ctx.notifier.kinds()).toEqual(['license_issued']);

            const [security] = await ctx.services.audit.listRecent('security', 1);
            expect(security?.eventType).toBe('webhook_replay_detected');
            expect(security?.severity).toBe('medium');
        });

        it('should find the order by its payment intent reference', async () => {
            const product = await seedProduct(ctx);
            const order = await seedOrder(ctx, product.id, { paymentReference: 'pi_ref_1' });

            const result = await deliverStripe(stripePayload('evt_pi', 'charge.succeeded', {
                id: 'ch_9',
                payment_intent: 'pi_ref_1',
            }));

            expect(result.data?.action).toBe('issue');
            expect(await ctx.services.repository.getLicenseByOrderId(order.id)).not.toBeNull();
        });

        it('should revoke the license and mark the order refunded on a refund', async () => {
            const { order, license, key } = await seedLicense(ctx, {}, { paymentReference: 'pi_ref_2' });
            await ctx.services.license.activate(key, { fingerprint: 'machine-a' });

            const result = await deliverStripe(stripePayload('evt_refund', 'charge.refunded', {
                id: 'ch_2',
                payment_intent: 'pi_ref_2',
            }));

            expect(result.data?.action).toBe('revoke');
            expect(result.data?.status).toBe('processed');
            const stored = await ctx.services.repository.getLicenseById(license.id);
            expect(stored?.status).toBe('revoked');
            expect(stored?.revokedReason).toBe('refund');
            expect(stored?.activationCount).toBe(0);
            expect((await ctx.services.catalog.getOrder(order.id)).data?.status).toBe('refunded');
        });

        it('should leave no marker when the license cannot be found yet', async () => {
            const result = await deliverStripe(stripePayload('evt_orphan', 'charge.refunded', {
                id: 'ch_unknown',
                payment_intent: 'pi_unknown',
            }));

            expect(result.success).toBe(false);
            expect(result.code).toBe(ERROR_CODES.LICENSE_NOT_FOUND);
            expect(await ctx.services.repository.hasProcessedEvent('stripe', 'evt_orphan')).toBe(false);

            const [entry] = await ctx.services.audit.listRecent('webhook', 1);
            expect(entry?.eventType).toBe('stripe.charge.refunded');
            expect(entry?.details.outcome).toBe('failed');
        });

        it('should reject a resource that does not match the event schema', async () => {
            const result = await deliverStripe(stripePayload('evt_malformed', 'charge.succeeded', { amount: 100 }));

            expect(result.code).toBe(ERROR_CODES.VALIDATION_FAILED);
            expect(await ctx.services.repository.hasProcessedEvent('stripe', 'evt_malformed')).toBe(false);
        });

        it('should renew a subscription license from the invoice period', async () => {
            const { order, license } = await seedLicense(ctx, { subscription: true, licenseDurationDays: 30 });
            const periodEndSeconds = Math.floor(((license.expiresAt ?? 0) + 30 * DAY_MS) / 1000);

            const result = await deliverStripe(stripePayload('evt_invoice', 'invoice.payment_succeeded', {
                id: 'in_1',
                subscription: 'sub_ext_1',
                metadata: { order_id: order.id },
                lines: { data: [{ period: { end: periodEndSeconds } }] },
            }));

            expect(result.data?.action).toBe('renew');
            const stored = await ctx.services.repository.getLicenseById(license.id);
            expect(stored?.expiresAt).toBe(periodEndSeconds * 1000);
            const subscription = await ctx.services.repository.getSubscriptionByLicenseId(license.id);
            expect(subscription?.externalSubscriptionId).toBe('sub_ext_1');
            expect(subscription?.currentPeriodEnd).toBe(periodEndSeconds * 1000);
            expect(ctx.notifier.kinds()).toEqual(['license_issued', 'license_renewed']);
        });
    });

    describe('Stripe disputes', () => {
        it('should suspend on a new dispute and restore when the dispute is won', async () => {
            const { license } = await seedLicense(ctx, {}, { paymentReference: 'pi_ref_3' });
            const dispute = { id: 'dp_1', charge: 'ch_3', payment_intent: 'pi_ref_3', reason: 'fraudulent' };

            const opened = await deliverStripe(stripePayload('evt_dp_open', 'charge.dispute.created', {
                ...dispute,
                status: 'needs_response',
            }));
            const suspended = await ctx.services.repository.getLicenseById(license.id);
            const won = await deliverStripe(stripePayload('evt_dp_won', 'charge.dispute.closed', {
                ...dispute,
                status: 'won',
            }));
            const restored = await ctx.services.repository.getLicenseById(license.id);

            expect(opened.data?.action).toBe('suspend');
            expect(suspended?.status).toBe('suspended');
            expect(won.data?.action).toBe('reactivate');
            expect(restored?.status).toBe('active');
            expect(ctx.alerts.eventTypes()).toEqual(['payment_dispute_opened']);
        });

        it('should revoke when the dispute is lost', async () => {
            const { license } = await seedLicense(ctx, {}, { paymentReference: 'pi_ref_4' });

            await deliverStripe(stripePayload('evt_dp_lost', 'charge.dispute.closed', {
                id: 'dp_2',
                charge: 'ch_4',
                payment_intent: 'pi_ref_4',
                status: 'lost',
            }));

            const stored = await ctx.services.repository.getLicenseById(license.id);
            expect(stored?.status).toBe('revoked');
            expect(stored?.revokedReason).toBe('dispute_lost');
        });

        it('should skip but mark a suspension the license state no longer allows', async () => {
            const { license } = await seedLicense(ctx, {}, { paymentReference: 'pi_ref_5' });
            await ctx.services.license.revoke(license.id, 'refund');

            const result = await deliverStripe(stripePayload('evt_dp_late', 'charge.dispute.created', {
                id: 'dp_3',
                charge: 'ch_5',
                payment_intent: 'pi_ref_5',
                status: 'needs_response',
            }));

            expect(result.data?.status).toBe('skipped');
            expect(result.data?.action).toBe('suspend');
            expect(result.data?.licenseId).toBe(license.id);
            expect(result.data?.detail).toBe('Cannot suspend a revoked license');
            expect(await ctx.services.repository.hasProcessedEvent('stripe', 'evt_dp_late')).toBe(true);
        });
    });

    describe('event routing', () => {
        it('should mark event types without a handler as unhandled', async () => {
            const result = await deliverStripe(stripePayload('evt_customer', 'customer.created', { id: 'cus_1' }));

            expect(result.data?.status).toBe('unhandled');
            expect(result.data?.action).toBe('none');
            expect(result.data?.detail).toBe('unhandled_event_type');
            expect(await ctx.services.repository.hasProcessedEvent('stripe', 'evt_customer')).toBe(true);
        });

        it('should mark but not apply event types disabled in settings', async () => {
            const product = await seedProduct(ctx);
            const order = await seedOrder(ctx, product.id);
            await ctx.services.settings.set(webhookSettingKey('stripe', 'charge.succeeded'), 'false');

            const result = await deliverStripe(stripePayload('evt_disabled', 'charge.succeeded', {
                id: 'ch_1',
                metadata: { order_id: order.id },
            }));

            expect(result.data?.status).toBe('disabled');
            expect(await licenseCount()).toBe(0);
            expect(await ctx.services.repository.hasProcessedEvent('stripe', 'evt_disabled')).toBe(true);
        });

        it('should report processing faults without marking the event', async () => {
            const product = await seedProduct(ctx);
            const order = await seedOrder(ctx, product.id);
            vi.spyOn(ctx.services.license, 'applyCommand').mockRejectedValue(new Error('database locked'));

            const result = await deliverStripe(stripePayload('evt_fault', 'charge.succeeded', {
                id: 'ch_1',
                metadata: { order_id: order.id },
            }));

            expect(result).toEqual({
                success: false,
                error: ERROR_MESSAGES.GENERIC.INTERNAL_ERROR,
                code: ERROR_CODES.INTERNAL_ERROR,
            });
            expect(ctx.errors.captured).toHaveLength(1);
            expect(ctx.errors.captured[0]?.context?.event_id).toBe('evt_fault');
            expect(await ctx.services.repository.hasProcessedEvent('stripe', 'evt_fault')).toBe(false);

            const [security] = await ctx.services.audit.listRecent('security', 1);
            expect(security?.eventType).toBe('webhook_processing_error');
            expect(security?.details.error_class).toBe('Error');
        });
    });

    // ========================================================================
    // PayPal
    // ========================================================================

    describe('PayPal', () => {
        it('should issue on a completed sale and key replays by transmission id', async () => {
            const product = await seedProduct(ctx);
            const order = await seedOrder(ctx, product.id, { provider: 'paypal' });
            const payload = paypalPayload('WH-1', 'PAYMENT.SALE.COMPLETED', { id: 'SALE-1', custom: order.id });

            const first = await ctx.services.webhooks.handlePaypal(payload, paypalHeaders('tx-1'));
            const replay = await ctx.services.webhooks.handlePaypal(payload, paypalHeaders('tx-1'));

            expect(first.data?.status).toBe('processed');
            expect(first.data?.eventId).toBe('WH-1');
            expect(first.data?.action).toBe('issue');
            expect(replay.data?.status).toBe('already_processed');
            expect(await ctx.services.repository.hasProcessedEvent('paypal', 'tx-1')).toBe(true);
            expect(ctx.paypal.verifications).toEqual([paypalHeaders('tx-1'), paypalHeaders('tx-1')]);
            expect(await licenseCount()).toBe(1);
        });

        it('should reject a delivery the PayPal API does not verify', async () => {
            ctx.paypal.verified = false;

            const result = await ctx.services.webhooks.handlePaypal(
                paypalPayload('WH-2', 'PAYMENT.SALE.COMPLETED', { id: 'SALE-2' }),
                paypalHeaders('tx-2')
            );

            expect(result.error).toBe(ERROR_MESSAGES.WEBHOOK.INVALID_SIGNATURE);
            expect(result.code).toBe(ERROR_CODES.SIGNATURE_INVALID);
        });

        it('should reject a delivery without transmission headers', async () => {
            const { transmissionSig: _omitted, ...partial } = paypalHeaders('tx-3');

            const result = await ctx.services.webhooks.handlePaypal(
                paypalPayload('WH-3', 'PAYMENT.SALE.COMPLETED', { id: 'SALE-3' }),
                partial
            );

            expect(result.error).toBe(ERROR_MESSAGES.WEBHOOK.MISSING_SIGNATURE);
            expect(ctx.paypal.verifications).toHaveLength(0);
        });

        it('should reject a body that is not JSON', async () => {
            const result = await ctx.services.webhooks.handlePaypal('not json', paypalHeaders('tx-4'));

            expect(result.error).toBe(ERROR_MESSAGES.WEBHOOK.INVALID_PAYLOAD);
            expect(result.code).toBe(ERROR_CODES.VALIDATION_FAILED);
        });

        it('should cancel the linked PayPal subscription when a refund revokes the license', async () => {
            const { order, license } = await seedLicense(
                ctx,
                { subscription: true, licenseDurationDays: 30 },
                { provider: 'paypal' }
            );

            const linked = await ctx.services.webhooks.handlePaypal(
                paypalPayload('WH-5', 'BILLING.SUBSCRIPTION.CREATED', { id: 'I-SUB1', custom_id: order.id }),
                paypalHeaders('tx-5')
            );
            const refunded = await ctx.services.webhooks.handlePaypal(
                paypalPayload('WH-6', 'PAYMENT.SALE.REFUNDED', { id: 'REF-1', sale_id: 'SALE-9', custom: order.id }),
                paypalHeaders('tx-6')
            );
            await ctx.services.tasks.drain(1000);

            expect(linked.data?.action).toBe('link_subscription');
            expect(refunded.data?.action).toBe('revoke');
            expect((await ctx.services.repository.getLicenseById(license.id))?.status).toBe('revoked');
            expect(ctx.paypal.canceled).toEqual([{ subscriptionId: 'I-SUB1', reason: 'refund' }]);
        });
    });
});
