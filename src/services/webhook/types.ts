import type { PaymentProvider, ServiceResult } from '../../types';
import type { AuditLogger } from '../audit';
import type { LicenseCommand, LicenseCommandKind } from '../license';
import type { LicenseFinder } from './license-finder';

/**
 * A verified provider event, reduced to what the handlers need. `object`
 * is the provider's resource (Stripe `data.object`, PayPal `resource`) and
 * is parsed by each handler's schema.
 */
export interface ProviderEvent {
    provider: PaymentProvider;
    id: string;
    // Replay key: the Stripe event id, or the PayPal transmission id.
    markerId: string;
    type: string;
    object: unknown;
}

export interface HandlerContext {
    finder: LicenseFinder;
    audit: AuditLogger;
    requestId?: string;
}

export type WebhookHandler = (event: ProviderEvent, ctx: HandlerContext) => Promise<ServiceResult<LicenseCommand>>;

export type WebhookStatus = 'processed' | 'already_processed' | 'unhandled' | 'disabled' | 'skipped';

export interface WebhookReceipt {
    provider: PaymentProvider;
    eventId: string;
    eventType: string;
    status: WebhookStatus;
    action?: LicenseCommandKind;
    licenseId?: string | null;
    detail?: string;
}

export interface PaypalTransmissionHeaders {
    transmissionId: string;
    transmissionTime: string;
    transmissionSig: string;
    certUrl: string;
    authAlgo: string;
}

// PayPal REST collaborator: signature verification and subscription cancellation.
export interface PaypalClient {
    verifyWebhookSignature(headers: PaypalTransmissionHeaders, event: unknown, signal?: AbortSignal): Promise<boolean>;
    cancelSubscription(subscriptionId: string, reason: string, signal?: AbortSignal): Promise<void>;
}

export interface WebhookRequestContext {
    requestId?: string;
    ipAddress?: string | null;
}
