import type { ZodType, ZodTypeDef } from 'zod';
import { ERROR_CODES, ERROR_MESSAGES } from '../../constants/errors';
import type { PaymentProvider, ServiceResult } from '../../types';
import type { LicenseCommand } from '../license';
import { err, ok } from '../shared';
import type { LicenseHints } from './license-finder';
import type { HandlerContext } from './types';

export function parseResource<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T | null {
    const parsed = schema.safeParse(value);
    return parsed.success ? parsed.data : null;
}

export function invalidPayload(): ServiceResult<LicenseCommand> {
    return err(ERROR_MESSAGES.WEBHOOK.INVALID_PAYLOAD, ERROR_CODES.VALIDATION_FAILED);
}

export function licenseNotFound(): ServiceResult<LicenseCommand> {
    return err(ERROR_MESSAGES.LICENSE.NOT_FOUND, ERROR_CODES.LICENSE_NOT_FOUND);
}

export function secondsToMs(seconds: number | null | undefined): number | null {
    return seconds ? seconds * 1000 : null;
}

export function isoToMs(value: string | null | undefined): number | null {
    if (!value) {
        return null;
    }
    const ms = Date.parse(value);
    return Number.isNaN(ms) ? null : ms;
}

/**
 * Applies a resolved-license command builder, or reports the license as
 * missing so the provider retries.
 */
export async function withLicense(
    ctx: HandlerContext,
    hints: LicenseHints,
    build: (licenseId: string) => LicenseCommand
): Promise<ServiceResult<LicenseCommand>> {
    const license = await ctx.finder.findLicense(hints);
    return license ? ok(build(license.id)) : licenseNotFound();
}

export interface PaymentSucceededInput {
    provider: PaymentProvider;
    hints: LicenseHints;
    externalSubscriptionId?: string | null;
    periodEnd?: number | null;
    // Recurring payments extend an existing license; one-off payments only issue.
    renewExisting: boolean;
}

/**
 * Payment received: issue the order's license if it has none yet, otherwise
 * renew (recurring) or lift a suspension (one-off).
 */
export async function paymentSucceeded(
    ctx: HandlerContext,
    input: PaymentSucceededInput
): Promise<ServiceResult<LicenseCommand>> {
    const order = await ctx.finder.findOrder(input.hints);
    const existing = order
        ? await ctx.finder.licenseForOrder(order.id)
        : await ctx.finder.findLicense(input.hints);

    if (order && !existing) {
        return ok({
            kind: 'issue',
            orderId: order.id,
            provider: input.provider,
            externalSubscriptionId: input.externalSubscriptionId,
            periodEnd: input.periodEnd,
        });
    }

    if (!existing) {
        return licenseNotFound();
    }

    if (input.renewExisting) {
        return ok({
            kind: 'renew',
            licenseId: existing.id,
            provider: input.provider,
            externalSubscriptionId: input.externalSubscriptionId,
            periodEnd: input.periodEnd,
        });
    }

    if (existing.status === 'suspended') {
        return ok({ kind: 'reactivate', licenseId: existing.id });
    }

    return ok({ kind: 'none', reason: 'license_already_issued' });
}
