import { z } from 'zod';

// Expandable Stripe references arrive as an id or, when expanded, an object with one.
const expandableId = z
    .union([z.string(), z.object({ id: z.string() })])
    .nullish()
    .transform((value) => (typeof value === 'string' ? value : value?.id ?? null));

const metadata = z.record(z.string()).nullish().transform((value) => value ?? {});

const unixSeconds = z.number().int().nullish();

// ============================================================================
// Stripe
// ============================================================================

export const stripeChargeSchema = z.object({
    id: z.string(),
    payment_intent: expandableId,
    customer: expandableId,
    invoice: expandableId,
    receipt_email: z.string().nullish(),
    billing_details: z.object({ email: z.string().nullish() }).nullish(),
    metadata,
    failure_message: z.string().nullish(),
    amount_refunded: z.number().nullish(),
});

export const stripePaymentIntentSchema = z.object({
    id: z.string(),
    customer: expandableId,
    invoice: expandableId,
    receipt_email: z.string().nullish(),
    metadata,
});

export const stripeInvoiceSchema = z.object({
    id: z.string(),
    subscription: expandableId,
    payment_intent: expandableId,
    charge: expandableId,
    customer_email: z.string().nullish(),
    period_end: unixSeconds,
    metadata,
    lines: z.object({
        data: z.array(z.object({ period: z.object({ end: z.number().int() }).nullish() })),
    }).nullish(),
});

export const stripeSubscriptionSchema = z.object({
    id: z.string(),
    status: z.string(),
    current_period_end: unixSeconds,
    metadata,
});

export const stripeDisputeSchema = z.object({
    id: z.string(),
    charge: expandableId,
    payment_intent: expandableId,
    status: z.string(),
    reason: z.string().nullish(),
});

// ============================================================================
// PayPal
// ============================================================================

export const paypalEnvelopeSchema = z.object({
    id: z.string().min(1),
    event_type: z.string().min(1),
    resource: z.unknown(),
});

export const paypalSaleSchema = z.object({
    id: z.string(),
    custom: z.string().nullish(),
    parent_payment: z.string().nullish(),
    billing_agreement_id: z.string().nullish(),
    reason_code: z.string().nullish(),
    payer: z.object({
        payer_info: z.object({ email: z.string().nullish() }).nullish(),
    }).nullish(),
});

export const paypalRefundSchema = z.object({
    id: z.string(),
    sale_id: z.string().nullish(),
    parent_payment: z.string().nullish(),
    custom: z.string().nullish(),
});

export const paypalSubscriptionSchema = z.object({
    id: z.string(),
    status: z.string().nullish(),
    custom_id: z.string().nullish(),
    subscriber: z.object({ email_address: z.string().nullish() }).nullish(),
    billing_info: z.object({ next_billing_time: z.string().nullish() }).nullish(),
});

export type StripeCharge = z.infer<typeof stripeChargeSchema>;
export type StripeInvoice = z.infer<typeof stripeInvoiceSchema>;
export type PaypalSale = z.infer<typeof paypalSaleSchema>;
