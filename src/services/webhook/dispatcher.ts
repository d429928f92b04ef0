import { ERROR_CODES, ERROR_MESSAGES } from '../../constants/errors';
import { DuplicateEventError, type LicenseRepository, type ProcessedEventMarker } from '../../repositories';
import type { PaymentProvider, ServiceResult } from '../../types';
import type { Logger } from '../../utils/logger';
import type { ErrorTracker } from '../alerts/error-tracker';
import type { AuditLogger } from '../audit';
import type { LicenseCommand, LicenseService } from '../license';
import type { SettingsService } from '../settings';
import { err, ok } from '../shared';
import type { LicenseFinder } from './license-finder';
import { paypalHandlers } from './paypal.handlers';
import { paypalEnvelopeSchema } from './schemas';
import { stripeHandlers } from './stripe.handlers';
import type { StripeWebhookVerifier } from './stripe.verifier';
import type {
    PaypalClient,
    PaypalTransmissionHeaders,
    ProviderEvent,
    WebhookHandler,
    WebhookReceipt,
    WebhookRequestContext,
} from './types';

export interface WebhookDispatcherDeps {
    repository: LicenseRepository;
    license: LicenseService;
    finder: LicenseFinder;
    settings: SettingsService;
    audit: AuditLogger;
    errorTracker: ErrorTracker;
    logger: Logger;
    stripe: StripeWebhookVerifier | null;
    paypal: PaypalClient | null;
    timeoutMs: number;
}

const HANDLERS: Record<PaymentProvider, ReadonlyMap<string, WebhookHandler>> = {
    stripe: new Map(Object.entries(stripeHandlers)),
    paypal: new Map(Object.entries(paypalHandlers)),
};

export class WebhookTimeoutError extends Error {
    constructor(timeoutMs: number) {
        super(`Webhook processing exceeded ${timeoutMs}ms`);
        this.name = 'WebhookTimeoutError';
    }
}

function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new WebhookTimeoutError(timeoutMs)), timeoutMs);
        timer.unref();
    });
    return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

/**
 * WebhookDispatcher - verified, replay-protected payment events.
 *
 * verify → replay check → settings gate → handler → command + marker in
 * one transaction. Missing licenses return an error and leave no marker so
 * the provider's retry can succeed later.
 */
export class WebhookDispatcher {
    constructor(private deps: WebhookDispatcherDeps) {}

    async handleStripe(
        payload: string,
        signature: string | undefined,
        context: WebhookRequestContext = {}
    ): Promise<ServiceResult<WebhookReceipt>> {
        const verifier = this.deps.stripe;
        if (!verifier) {
            return err(ERROR_MESSAGES.WEBHOOK.NOT_CONFIGURED, ERROR_CODES.SIGNATURE_INVALID);
        }
        if (!signature) {
            await this.rejectSignature('stripe', 'missing_signature', context);
            return err(ERROR_MESSAGES.WEBHOOK.MISSING_SIGNATURE, ERROR_CODES.SIGNATURE_INVALID);
        }

        let event: ProviderEvent;
        try {
            event = await verifier.verify(payload, signature);
        } catch (error) {
            await this.rejectSignature('stripe', error instanceof Error ? error.message : 'verification_failed', context);
            return err(ERROR_MESSAGES.WEBHOOK.INVALID_SIGNATURE, ERROR_CODES.SIGNATURE_INVALID);
        }

        return this.dispatch(event, context);
    }

    async handlePaypal(
        payload: string,
        headers: Partial<PaypalTransmissionHeaders>,
        context: WebhookRequestContext = {}
    ): Promise<ServiceResult<WebhookReceipt>> {
        const client = this.deps.paypal;
        if (!client) {
            return err(ERROR_MESSAGES.WEBHOOK.NOT_CONFIGURED, ERROR_CODES.SIGNATURE_INVALID);
        }

        const { transmissionId, transmissionTime, transmissionSig, certUrl, authAlgo } = headers;
        if (!transmissionId || !transmissionTime || !transmissionSig || !certUrl || !authAlgo) {
            await this.rejectSignature('paypal', 'missing_transmission_headers', context);
            return err(ERROR_MESSAGES.WEBHOOK.MISSING_SIGNATURE, ERROR_CODES.SIGNATURE_INVALID);
        }

        let body: unknown;
        try {
            body = JSON.parse(payload);
        } catch {
            return err(ERROR_MESSAGES.WEBHOOK.INVALID_PAYLOAD, ERROR_CODES.VALIDATION_FAILED);
        }

        const envelope = paypalEnvelopeSchema.safeParse(body);
        if (!envelope.success) {
            return err(ERROR_MESSAGES.WEBHOOK.INVALID_PAYLOAD, ERROR_CODES.VALIDATION_FAILED);
        }

        let verified: boolean;
        try {
            verified = await client.verifyWebhookSignature(
                { transmissionId, transmissionTime, transmissionSig, certUrl, authAlgo },
                body
            );
        } catch (error) {
            this.deps.logger.warn('PayPal signature verification failed', {
                error: error instanceof Error ? error.message : String(error),
            });
            verified = false;
        }

        if (!verified) {
            await this.rejectSignature('paypal', 'verification_failed', context);
            return err(ERROR_MESSAGES.WEBHOOK.INVALID_SIGNATURE, ERROR_CODES.SIGNATURE_INVALID);
        }

        return this.dispatch({
            provider: 'paypal',
            id: envelope.data.id,
            markerId: transmissionId,
            type: envelope.data.event_type,
            object: envelope.data.resource,
        }, context);
    }

    /** Runs a verified event. Exposed for tests and replays from the admin API. */
    async dispatch(event: ProviderEvent, context: WebhookRequestContext = {}): Promise<ServiceResult<WebhookReceipt>> {
        try {
            return await withTimeout(this.process(event, context), this.deps.timeoutMs);
        } catch (error) {
            if (error instanceof DuplicateEventError) {
                return this.alreadyProcessed(event, context);
            }

            this.deps.errorTracker.capture(error, {
                provider: event.provider,
                event_id: event.id,
                event_type: event.type,
                request_id: context.requestId,
            });
            await this.deps.audit.logSecurityEvent('webhook_processing_error', {
                provider: event.provider,
                event_id: event.id,
                event_type: event.type,
                error_class: error instanceof Error ? error.name : 'Unknown',
            }, { requestId: context.requestId });

            const message = error instanceof WebhookTimeoutError
                ? ERROR_MESSAGES.WEBHOOK.TIMEOUT
                : ERROR_MESSAGES.GENERIC.INTERNAL_ERROR;
            return err(message, ERROR_CODES.INTERNAL_ERROR);
        }
    }

    private async process(event: ProviderEvent, context: WebhookRequestContext): Promise<ServiceResult<WebhookReceipt>> {
        const { repository, settings, license, finder, audit } = this.deps;

        if (await repository.hasProcessedEvent(event.provider, event.markerId)) {
            return this.alreadyProcessed(event, context);
        }

        const marker: ProcessedEventMarker = {
            provider: event.provider,
            eventId: event.markerId,
            eventType: event.type,
        };

        const handler = HANDLERS[event.provider].get(event.type);
        if (!handler) {
            return this.finish(event, marker, { kind: 'none', reason: 'unhandled_event_type' }, 'unhandled', context);
        }

        if (!(await settings.isWebhookEventEnabled(event.provider, event.type))) {
            return this.finish(event, marker, { kind: 'none', reason: 'disabled' }, 'disabled', context);
        }

        const command = await handler(event, { finder, audit, requestId: context.requestId });
        if (!command.success || !command.data) {
            await audit.logWebhookEvent(event.provider, event.type, 'failed', {
                event_id: event.id,
                error: command.error,
                code: command.code,
            }, { requestId: context.requestId });
            return err(command.error ?? ERROR_MESSAGES.GENERIC.INTERNAL_ERROR, command.code);
        }

        return this.finish(event, marker, command.data, 'processed', context);
    }

    private async finish(
        event: ProviderEvent,
        marker: ProcessedEventMarker,
        command: LicenseCommand,
        status: 'processed' | 'unhandled' | 'disabled',
        context: WebhookRequestContext
    ): Promise<ServiceResult<WebhookReceipt>> {
        const applied = await this.deps.license.applyCommand(command, marker);
        if (!applied.success || !applied.data) {
            await this.deps.audit.logWebhookEvent(event.provider, event.type, 'failed', {
                event_id: event.id,
                action: command.kind,
                error: applied.error,
                code: applied.code,
            }, { requestId: context.requestId });
            return err(applied.error ?? ERROR_MESSAGES.GENERIC.INTERNAL_ERROR, applied.code);
        }

        const outcome = applied.data;
        const receipt: WebhookReceipt = {
            provider: event.provider,
            eventId: event.id,
            eventType: event.type,
            status: outcome.action === 'skipped' ? 'skipped' : status,
            action: command.kind,
            licenseId: outcome.licenseId,
            detail: outcome.detail,
        };

        await this.deps.audit.logWebhookEvent(event.provider, event.type, receipt.status, {
            event_id: event.id,
            action: command.kind,
            changed: outcome.changed,
            detail: outcome.detail,
        }, { requestId: context.requestId, licenseId: outcome.licenseId });

        return ok(receipt);
    }

    private async alreadyProcessed(event: ProviderEvent, context: WebhookRequestContext): Promise<ServiceResult<WebhookReceipt>> {
        await this.deps.audit.logSecurityEvent('webhook_replay_detected', {
            provider: event.provider,
            event_id: event.id,
            event_type: event.type,
        }, { requestId: context.requestId });

        return ok({
            provider: event.provider,
            eventId: event.id,
            eventType: event.type,
            status: 'already_processed',
        });
    }

    private async rejectSignature(provider: PaymentProvider, reason: string, context: WebhookRequestContext): Promise<void> {
        await this.deps.audit.logSecurityEvent('invalid_webhook_signature', {
            provider,
            reason,
            ip_address: context.ipAddress ?? undefined,
        }, { requestId: context.requestId });
    }
}
