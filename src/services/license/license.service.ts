import type { LicenseRepository, LicenseTransaction, ProcessedEventMarker } from '../../repositories';
import type {
    Activation,
    ActivationHistoryEntry,
    License,
    LicenseSummary,
    Order,
    PaymentProvider,
    ServiceResult,
    Subscription,
} from '../../types';
import { ERROR_CATEGORIES, ERROR_CODES, ERROR_MESSAGES } from '../../constants/errors';
import { ACTIVATION_HISTORY_LIMIT, DAY_MS } from '../../constants/license';
import type { Logger } from '../../utils/logger';
import type { LicenseNotificationKind, Notifier } from '../notification/notification.service';
import {
    err,
    generateId,
    generateLicenseKey,
    hashLicenseKey,
    hashMachineData,
    mapResult,
    normalizeLicenseKey,
    nowMs,
    ok,
    partialLicenseKey,
    partialMachineData,
} from '../shared';
import { activationBlock, checkTransition, effectiveState, validationBlock } from './state-machine';
import type {
    ActivationOutcome,
    ActivationRequest,
    CommandOutcome,
    DeactivationOutcome,
    IssuedLicense,
    LicenseCommand,
    MachineIdentifiers,
    ManualIssueInput,
    SubscriptionCanceler,
    TransitionOutcome,
    ValidationOutcome,
} from './types';

export interface LicenseServiceDeps {
    repository: LicenseRepository;
    notifier: Notifier;
    canceler?: SubscriptionCanceler | null;
    logger: Logger;
    machineHashSalt: string;
}

interface MarkerOption {
    marker?: ProcessedEventMarker;
}

export interface IssueOptions extends MarkerOption {
    provider?: PaymentProvider;
    externalSubscriptionId?: string | null;
    periodEnd?: number | null;
}

export interface ReactivateOptions extends MarkerOption {
    adminOverride?: boolean;
    periodEnd?: number | null;
}

export interface RevokeOptions extends MarkerOption {
    refundOrderId?: string | null;
    cancelAtProvider?: boolean;
}

interface CommandEffect {
    licenseId: string | null;
    changed: boolean;
}

function notFound<T>(): ServiceResult<T> {
    return err(ERROR_MESSAGES.LICENSE.NOT_FOUND, ERROR_CODES.LICENSE_NOT_FOUND);
}

function laterOf(a: number | null, b: number): number {
    return a === null ? b : Math.max(a, b);
}

/**
 * LicenseService - license lifecycle and machine activation accounting.
 *
 * Every mutation runs inside one repository transaction. Hashing and key
 * generation happen before the transaction opens, since the transaction body
 * is synchronous. Notifications and provider cancellations are handed off
 * after commit.
 */
export class LicenseService {
    private repository: LicenseRepository;
    private notifier: Notifier;
    private canceler: SubscriptionCanceler | null;
    private logger: Logger;
    private salt: string;

    constructor(deps: LicenseServiceDeps) {
        this.repository = deps.repository;
        this.notifier = deps.notifier;
        this.canceler = deps.canceler ?? null;
        this.logger = deps.logger;
        this.salt = deps.machineHashSalt;
    }

    // ========================================================================
    // Lookups
    // ========================================================================

    async findByKey(key: string): Promise<License | null> {
        if (!normalizeLicenseKey(key)) {
            return null;
        }
        return this.repository.getLicenseByKeyHash(await hashLicenseKey(key));
    }

    async getLicense(licenseId: string): Promise<ServiceResult<License>> {
        const license = await this.repository.getLicenseById(licenseId);
        return license ? ok(license) : notFound();
    }

    summarize(license: License, now: number = nowMs()): LicenseSummary {
        return {
            id: license.id,
            key: license.keyPrefix,
            status: effectiveState(license, now),
            licenseType: license.licenseType,
            requiresMachineId: license.requiresMachineId,
            maxActivations: license.maxActivations,
            activationCount: license.activationCount,
            activationsRemaining: Math.max(0, license.maxActivations - license.activationCount),
            expiresAt: license.expiresAt,
            createdAt: license.createdAt,
        };
    }

    // ========================================================================
    // Client Operations
    // ========================================================================

    async validate(key: string, identifiers: MachineIdentifiers = {}): Promise<ServiceResult<ValidationOutcome>> {
        const license = await this.findByKey(key);
        if (!license) {
            return notFound();
        }

        const block = validationBlock(effectiveState(license, nowMs()));
        if (block) {
            return err(block.error, block.code);
        }

        const fingerprintHash = await hashMachineData(identifiers.fingerprint, this.salt);
        const machineIdHash = await hashMachineData(identifiers.machineId, this.salt);

        if (license.requiresMachineId && !fingerprintHash) {
            return err(ERROR_MESSAGES.ACTIVATION.MACHINE_ID_REQUIRED, ERROR_CODES.MACHINE_ID_REQUIRED);
        }
        if (!fingerprintHash && !machineIdHash) {
            return ok({ license, activation: null });
        }

        const [activation] = await this.repository.findLiveActivations(license.id, { fingerprintHash, machineIdHash });
        if (!activation) {
            return err(ERROR_MESSAGES.ACTIVATION.NOT_FOUND, ERROR_CODES.ACTIVATION_NOT_FOUND);
        }

        return ok({ license, activation });
    }

    async activate(key: string, request: ActivationRequest): Promise<ServiceResult<ActivationOutcome>> {
        const fingerprintHash = await hashMachineData(request.fingerprint, this.salt);
        if (!fingerprintHash) {
            return err(ERROR_MESSAGES.ACTIVATION.FINGERPRINT_REQUIRED, ERROR_CODES.VALIDATION_FAILED);
        }

        const license = await this.findByKey(key);
        if (!license) {
            return notFound();
        }

        const machineId = request.machineId?.trim() || null;
        if (license.requiresMachineId && !machineId) {
            return err(ERROR_MESSAGES.ACTIVATION.MACHINE_ID_REQUIRED, ERROR_CODES.MACHINE_ID_REQUIRED);
        }

        // Absent machine ids bind as '' so the live-binding unique index still applies.
        const machineIdHash = (await hashMachineData(machineId, this.salt)) ?? '';
        const activationId = generateId('act');
        const now = nowMs();

        return this.repository.transaction((tx): ServiceResult<ActivationOutcome> => {
            const current = tx.getLicense(license.id);
            if (!current) {
                return notFound();
            }

            const block = activationBlock(effectiveState(current, now));
            if (block) {
                return err(block.error, block.code);
            }

            const existing = tx.getLiveActivation(current.id, fingerprintHash, machineIdHash);
            if (existing) {
                return ok({ license: current, activation: existing, alreadyActive: true });
            }

            if (!tx.takeActivationSlot(current.id, now)) {
                return err(ERROR_MESSAGES.ACTIVATION.LIMIT_EXCEEDED, ERROR_CODES.ACTIVATION_LIMIT_EXCEEDED);
            }

            const activation: Activation = {
                id: activationId,
                licenseId: current.id,
                fingerprintHash,
                machineIdHash,
                fingerprintPartial: partialMachineData(request.fingerprint?.trim()),
                machineIdPartial: machineId ? partialMachineData(machineId) : null,
                active: true,
                revoked: false,
                revokedReason: null,
                ipAddress: request.ipAddress ?? null,
                userAgent: request.userAgent ?? null,
                activatedAt: now,
                deactivatedAt: null,
                revokedAt: null,
            };
            tx.insertActivation(activation);

            return ok({
                license: { ...current, activationCount: current.activationCount + 1, updatedAt: now },
                activation,
                alreadyActive: false,
            });
        });
    }

    async deactivate(key: string, identifiers: MachineIdentifiers): Promise<ServiceResult<DeactivationOutcome>> {
        const fingerprintHash = await hashMachineData(identifiers.fingerprint, this.salt);
        if (!fingerprintHash) {
            return err(ERROR_MESSAGES.ACTIVATION.FINGERPRINT_REQUIRED, ERROR_CODES.VALIDATION_FAILED);
        }

        const license = await this.findByKey(key);
        if (!license) {
            return notFound();
        }

        const machineIdHash = await hashMachineData(identifiers.machineId, this.salt);
        const now = nowMs();

        return this.repository.transaction((tx): ServiceResult<DeactivationOutcome> => {
            const matches = tx.findLiveActivations(license.id, { fingerprintHash, machineIdHash });
            if (matches.length === 0) {
                return err(ERROR_MESSAGES.ACTIVATION.NOT_FOUND, ERROR_CODES.ACTIVATION_NOT_FOUND);
            }

            let deactivated = 0;
            for (const activation of matches) {
                if (tx.deactivateActivation(activation.id, now)) {
                    tx.releaseActivationSlot(license.id, now);
                    deactivated++;
                }
            }

            return ok({ license: tx.getLicense(license.id) ?? license, deactivated });
        });
    }

    async status(key: string): Promise<ServiceResult<LicenseSummary>> {
        const license = await this.findByKey(key);
        return license ? ok(this.summarize(license)) : notFound();
    }

    // ========================================================================
    // Issuance
    // ========================================================================

    async issueForOrder(orderId: string, options: IssueOptions = {}): Promise<ServiceResult<IssuedLicense>> {
        const licenseKey = generateLicenseKey();
        const keyHash = await hashLicenseKey(licenseKey);
        const licenseId = generateId('lic');
        const subscriptionId = generateId('sub');
        const now = nowMs();

        const result = await this.repository.transaction((tx): ServiceResult<IssuedLicense> => {
            const order = tx.getOrder(orderId);
            if (!order) {
                return err(ERROR_MESSAGES.ORDER.NOT_FOUND, ERROR_CODES.ORDER_NOT_FOUND);
            }
            if (order.status === 'refunded') {
                return err(ERROR_MESSAGES.ORDER.REFUNDED, ERROR_CODES.LICENSE_INVALID_STATE);
            }

            const existing = tx.getLicenseByOrderId(orderId);
            if (existing) {
                this.mark(tx, options.marker, now);
                return ok({ license: existing, licenseKey: null, created: false });
            }

            const product = tx.getProduct(order.productId);
            if (!product) {
                return err(ERROR_MESSAGES.ORDER.PRODUCT_NOT_FOUND, ERROR_CODES.PRODUCT_NOT_FOUND);
            }

            tx.completeOrder(orderId, now);

            const durationEnd = product.licenseDurationDays ? now + product.licenseDurationDays * DAY_MS : null;
            const license: License = {
                id: licenseId,
                keyHash,
                keyPrefix: partialLicenseKey(licenseKey),
                orderId,
                productId: product.id,
                customerEmail: order.email,
                customerName: order.customerName,
                status: 'active',
                licenseType: product.subscription ? 'subscription' : 'perpetual',
                requiresMachineId: product.requiresMachineId,
                maxActivations: product.maxActivations,
                activationCount: 0,
                expiresAt: options.periodEnd ?? durationEnd,
                revokedAt: null,
                revokedReason: null,
                createdAt: now,
                updatedAt: now,
            };
            tx.insertLicense(license);

            if (product.subscription) {
                tx.insertSubscription({
                    id: subscriptionId,
                    licenseId,
                    provider: options.provider ?? this.providerOf(order),
                    externalSubscriptionId: options.externalSubscriptionId ?? null,
                    status: 'active',
                    autoRenew: true,
                    currentPeriodEnd: license.expiresAt,
                    lastPaymentAt: now,
                    canceledAt: null,
                    createdAt: now,
                    updatedAt: now,
                });
            }

            this.mark(tx, options.marker, now);
            return ok({ license, licenseKey, created: true });
        });

        if (result.data?.created) {
            const { license } = result.data;
            this.logger.info('License issued', { licenseId: license.id, orderId, productId: license.productId });
            this.notify('license_issued', license, { licenseKey: result.data.licenseKey ?? undefined });
        }

        return result;
    }

    async issueManual(input: ManualIssueInput): Promise<ServiceResult<IssuedLicense>> {
        const product = await this.repository.getProductById(input.productId);
        if (!product) {
            return err(ERROR_MESSAGES.ORDER.PRODUCT_NOT_FOUND, ERROR_CODES.PRODUCT_NOT_FOUND);
        }

        const order: Order = {
            id: generateId('ord'),
            productId: product.id,
            email: input.email,
            customerName: input.customerName ?? null,
            status: 'pending',
            provider: 'manual',
            paymentReference: null,
            transactionId: null,
            createdAt: nowMs(),
            completedAt: null,
        };
        await this.repository.createOrder(order);

        return this.issueForOrder(order.id);
    }

    // ========================================================================
    // Lifecycle Transitions
    // ========================================================================

    async suspend(licenseId: string, reason: string, options: MarkerOption = {}): Promise<ServiceResult<TransitionOutcome>> {
        const now = nowMs();

        const result = await this.repository.transaction((tx): ServiceResult<TransitionOutcome> => {
            const current = tx.getLicense(licenseId);
            if (!current) {
                return notFound();
            }

            const check = checkTransition(current.status, 'suspend');
            if (!check.allowed) {
                return err(check.error, check.code);
            }

            if (check.changed) {
                tx.setLicenseStatus(licenseId, check.to, now);
                if (tx.getSubscriptionByLicenseId(licenseId)?.status === 'active') {
                    tx.updateSubscription(licenseId, { status: 'suspended' }, now);
                }
            }

            this.mark(tx, options.marker, now);
            return ok(this.outcome(tx, current, check.changed, 0));
        });

        if (result.data?.changed) {
            this.notify('license_suspended', result.data.license, { reason });
        }

        return result;
    }

    async reactivate(licenseId: string, options: ReactivateOptions = {}): Promise<ServiceResult<TransitionOutcome>> {
        const now = nowMs();

        const result = await this.repository.transaction((tx): ServiceResult<TransitionOutcome> => {
            const current = tx.getLicense(licenseId);
            if (!current) {
                return notFound();
            }

            const check = checkTransition(current.status, 'reactivate', { adminOverride: options.adminOverride });
            if (!check.allowed) {
                return err(check.error, check.code);
            }

            if (check.changed) {
                tx.setLicenseStatus(licenseId, check.to, now);
                if (tx.getSubscriptionByLicenseId(licenseId)?.status === 'suspended') {
                    tx.updateSubscription(licenseId, { status: 'active' }, now);
                }
            }

            const periodEnd = options.periodEnd;
            if (periodEnd && current.expiresAt !== null && periodEnd > current.expiresAt) {
                tx.setLicenseExpiry(licenseId, periodEnd, now);
                tx.updateSubscription(licenseId, { currentPeriodEnd: periodEnd }, now);
            }

            this.mark(tx, options.marker, now);
            return ok(this.outcome(tx, current, check.changed, 0));
        });

        if (result.data?.changed) {
            this.notify('license_reactivated', result.data.license);
        }

        return result;
    }

    /**
     * Revokes the license, every live activation and the subscription in
     * one transaction. Revoking a revoked license changes nothing.
     */
    async revoke(licenseId: string, reason: string, options: RevokeOptions = {}): Promise<ServiceResult<TransitionOutcome>> {
        const now = nowMs();

        const result = await this.repository.transaction((tx): ServiceResult<TransitionOutcome> => {
            const current = tx.getLicense(licenseId);
            if (!current) {
                return notFound();
            }

            const check = checkTransition(current.status, 'revoke');
            if (!check.allowed) {
                return err(check.error, check.code);
            }

            let activationsRevoked = 0;
            if (check.changed) {
                tx.setLicenseStatus(licenseId, check.to, now, reason);
                activationsRevoked = tx.revokeLiveActivations(licenseId, reason, now);
                tx.syncActivationCount(licenseId, now);

                const subscription = tx.getSubscriptionByLicenseId(licenseId);
                if (subscription && subscription.status !== 'canceled') {
                    tx.updateSubscription(licenseId, { status: 'canceled', autoRenew: false, canceledAt: now }, now);
                }
            }

            if (options.refundOrderId) {
                tx.refundOrder(options.refundOrderId);
            }

            this.mark(tx, options.marker, now);
            return ok(this.outcome(tx, current, check.changed, activationsRevoked));
        });

        if (result.data?.changed) {
            const { license, subscription, activationsRevoked } = result.data;
            this.logger.info('License revoked', { licenseId, reason, activationsRevoked });
            this.notify('license_revoked', license, { reason });

            if (options.cancelAtProvider) {
                this.cancelAtProvider(subscription, reason);
            }
        }

        return result;
    }

    async extend(licenseId: string, days: number): Promise<ServiceResult<TransitionOutcome>> {
        if (!Number.isInteger(days) || days <= 0) {
            return err(ERROR_MESSAGES.LICENSE.INVALID_EXTENSION, ERROR_CODES.VALIDATION_FAILED);
        }

        const now = nowMs();

        const result = await this.repository.transaction((tx): ServiceResult<TransitionOutcome> => {
            const current = tx.getLicense(licenseId);
            if (!current) {
                return notFound();
            }

            const check = checkTransition(current.status, 'extend');
            if (!check.allowed) {
                return err(check.error, check.code);
            }
            if (current.expiresAt === null) {
                return err(ERROR_MESSAGES.LICENSE.PERPETUAL, ERROR_CODES.LICENSE_INVALID_STATE);
            }

            const expiresAt = laterOf(current.expiresAt, now) + days * DAY_MS;
            tx.setLicenseExpiry(licenseId, expiresAt, now);
            tx.updateSubscription(licenseId, { currentPeriodEnd: expiresAt }, now);

            return ok(this.outcome(tx, current, true, 0));
        });

        if (result.data) {
            this.notify('license_renewed', result.data.license);
        }

        return result;
    }

    // ========================================================================
    // Activation Administration
    // ========================================================================

    async activationHistory(
        licenseId: string,
        limit: number = ACTIVATION_HISTORY_LIMIT
    ): Promise<ServiceResult<ActivationHistoryEntry[]>> {
        const license = await this.repository.getLicenseById(licenseId);
        if (!license) {
            return notFound();
        }

        const activations = await this.repository.listActivations(licenseId, Math.min(limit, ACTIVATION_HISTORY_LIMIT));
        return ok(activations.map((a) => ({
            id: a.id,
            machineFingerprint: a.fingerprintPartial,
            machineId: a.machineIdPartial,
            active: a.active,
            revoked: a.revoked,
            revokedReason: a.revokedReason,
            ipAddress: a.ipAddress,
            activatedAt: a.activatedAt,
            deactivatedAt: a.deactivatedAt,
            revokedAt: a.revokedAt,
        })));
    }

    // Revokes the live activations matching the identifiers, or all of them when none are given.
    async revokeActivations(
        licenseId: string,
        identifiers: MachineIdentifiers,
        reason: string
    ): Promise<ServiceResult<DeactivationOutcome>> {
        const fingerprintHash = await hashMachineData(identifiers.fingerprint, this.salt);
        const machineIdHash = await hashMachineData(identifiers.machineId, this.salt);
        const now = nowMs();

        return this.repository.transaction((tx): ServiceResult<DeactivationOutcome> => {
            const current = tx.getLicense(licenseId);
            if (!current) {
                return notFound();
            }

            const matches = tx.findLiveActivations(licenseId, { fingerprintHash, machineIdHash });
            if (matches.length === 0) {
                return err(ERROR_MESSAGES.ACTIVATION.NOT_FOUND, ERROR_CODES.ACTIVATION_NOT_FOUND);
            }

            let revoked = 0;
            for (const activation of matches) {
                if (tx.revokeActivation(activation.id, reason, now)) {
                    revoked++;
                }
            }
            tx.syncActivationCount(licenseId, now);

            return ok({ license: tx.getLicense(licenseId) ?? current, deactivated: revoked });
        });
    }

    // ========================================================================
    // Webhook Commands
    // ========================================================================

    /**
     * Applies a provider-event command and records the event marker in the
     * same transaction. A command the license's state does not allow is
     * skipped but still marked, since retrying it cannot succeed. Missing
     * licenses and orders are returned as errors without a marker.
     *
     * Throws DuplicateEventError when the marker already exists.
     */
    async applyCommand(command: LicenseCommand, marker: ProcessedEventMarker): Promise<ServiceResult<CommandOutcome>> {
        const result = await this.runCommand(command, marker);

        if (result.success && result.data) {
            return ok({
                action: command.kind,
                licenseId: result.data.licenseId,
                changed: result.data.changed,
                detail: command.kind === 'none' ? command.reason : undefined,
            });
        }

        if (result.code && ERROR_CATEGORIES[result.code] === 'InvalidState') {
            await this.repository.transaction((tx) => tx.markEventProcessed(marker, nowMs()));
            return ok({
                action: 'skipped',
                licenseId: 'licenseId' in command ? command.licenseId : null,
                changed: false,
                detail: result.error,
            });
        }

        return err(result.error ?? ERROR_MESSAGES.GENERIC.INTERNAL_ERROR, result.code);
    }

    private async runCommand(command: LicenseCommand, marker: ProcessedEventMarker): Promise<ServiceResult<CommandEffect>> {
        const toEffect = (outcome: TransitionOutcome): CommandEffect => ({
            licenseId: outcome.license.id,
            changed: outcome.changed,
        });

        switch (command.kind) {
            case 'issue':
                return mapResult(
                    await this.issueForOrder(command.orderId, {
                        marker,
                        provider: command.provider,
                        externalSubscriptionId: command.externalSubscriptionId,
                        periodEnd: command.periodEnd,
                    }),
                    (issued) => ({ licenseId: issued.license.id, changed: issued.created })
                );
            case 'renew':
                return mapResult(await this.renew(command, marker), toEffect);
            case 'link_subscription':
                return mapResult(await this.linkSubscription(command, marker), toEffect);
            case 'suspend':
                return mapResult(await this.suspend(command.licenseId, command.reason, { marker }), toEffect);
            case 'reactivate':
                return mapResult(
                    await this.reactivate(command.licenseId, { marker, periodEnd: command.periodEnd }),
                    toEffect
                );
            case 'revoke':
                return mapResult(
                    await this.revoke(command.licenseId, command.reason, {
                        marker,
                        refundOrderId: command.refundOrderId,
                        cancelAtProvider: command.cancelAtProvider,
                    }),
                    toEffect
                );
            case 'notify_payment_failed':
                return this.notifyPaymentFailed(command.licenseId, marker);
            case 'none':
                await this.repository.transaction((tx) => tx.markEventProcessed(marker, nowMs()));
                return ok({ licenseId: null, changed: false });
        }
    }

    // Payment received: lift a suspension, push the expiry forward and record the payment.
    private async renew(
        command: Extract<LicenseCommand, { kind: 'renew' }>,
        marker: ProcessedEventMarker
    ): Promise<ServiceResult<TransitionOutcome>> {
        const subscriptionId = generateId('sub');
        const now = nowMs();

        const result = await this.repository.transaction((tx): ServiceResult<TransitionOutcome> => {
            const current = tx.getLicense(command.licenseId);
            if (!current) {
                return notFound();
            }
            if (current.status === 'revoked') {
                return err(ERROR_MESSAGES.LICENSE.REVOKED, ERROR_CODES.LICENSE_REVOKED);
            }

            if (current.status === 'suspended') {
                tx.setLicenseStatus(current.id, 'active', now);
            }

            const expiresAt = this.renewedExpiry(tx, current, command.periodEnd ?? null, now);
            if (expiresAt !== current.expiresAt) {
                tx.setLicenseExpiry(current.id, expiresAt, now);
            }

            const subscription = tx.getSubscriptionByLicenseId(current.id);
            if (subscription) {
                tx.updateSubscription(current.id, {
                    status: 'active',
                    provider: command.provider,
                    externalSubscriptionId: command.externalSubscriptionId ?? undefined,
                    currentPeriodEnd: expiresAt,
                    lastPaymentAt: now,
                }, now);
            } else if (command.externalSubscriptionId) {
                tx.insertSubscription({
                    id: subscriptionId,
                    licenseId: current.id,
                    provider: command.provider,
                    externalSubscriptionId: command.externalSubscriptionId,
                    status: 'active',
                    autoRenew: true,
                    currentPeriodEnd: expiresAt,
                    lastPaymentAt: now,
                    canceledAt: null,
                    createdAt: now,
                    updatedAt: now,
                });
            }

            tx.markEventProcessed(marker, now);
            return ok(this.outcome(tx, current, true, 0));
        });

        if (result.data) {
            this.notify('license_renewed', result.data.license);
        }

        return result;
    }

    private renewedExpiry(tx: LicenseTransaction, license: License, periodEnd: number | null, now: number): number | null {
        if (license.expiresAt === null) {
            return null;
        }
        if (periodEnd !== null) {
            return Math.max(license.expiresAt, periodEnd);
        }
        const durationDays = tx.getProduct(license.productId)?.licenseDurationDays;
        return durationDays ? laterOf(license.expiresAt, now) + durationDays * DAY_MS : license.expiresAt;
    }

    private async linkSubscription(
        command: Extract<LicenseCommand, { kind: 'link_subscription' }>,
        marker: ProcessedEventMarker
    ): Promise<ServiceResult<TransitionOutcome>> {
        const subscriptionId = generateId('sub');
        const now = nowMs();

        return this.repository.transaction((tx): ServiceResult<TransitionOutcome> => {
            const current = tx.getLicense(command.licenseId);
            if (!current) {
                return notFound();
            }

            if (tx.getSubscriptionByLicenseId(current.id)) {
                tx.updateSubscription(current.id, {
                    provider: command.provider,
                    externalSubscriptionId: command.externalSubscriptionId,
                    currentPeriodEnd: command.periodEnd ?? undefined,
                }, now);
            } else {
                tx.insertSubscription({
                    id: subscriptionId,
                    licenseId: current.id,
                    provider: command.provider,
                    externalSubscriptionId: command.externalSubscriptionId,
                    status: current.status === 'revoked' ? 'canceled' : 'active',
                    autoRenew: current.status !== 'revoked',
                    currentPeriodEnd: command.periodEnd ?? current.expiresAt,
                    lastPaymentAt: null,
                    canceledAt: current.status === 'revoked' ? now : null,
                    createdAt: now,
                    updatedAt: now,
                });
            }

            tx.markEventProcessed(marker, now);
            return ok(this.outcome(tx, current, true, 0));
        });
    }

    private async notifyPaymentFailed(licenseId: string, marker: ProcessedEventMarker): Promise<ServiceResult<CommandEffect>> {
        const license = await this.repository.transaction((tx) => {
            const current = tx.getLicense(licenseId);
            if (current) {
                tx.markEventProcessed(marker, nowMs());
            }
            return current;
        });

        if (!license) {
            return notFound();
        }

        this.notify('payment_failed', license);
        return ok({ licenseId, changed: false });
    }

    // ========================================================================
    // Helpers
    // ========================================================================

    private mark(tx: LicenseTransaction, marker: ProcessedEventMarker | undefined, now: number): void {
        if (marker) {
            tx.markEventProcessed(marker, now);
        }
    }

    private outcome(tx: LicenseTransaction, before: License, changed: boolean, activationsRevoked: number): TransitionOutcome {
        return {
            license: tx.getLicense(before.id) ?? before,
            changed,
            activationsRevoked,
            subscription: tx.getSubscriptionByLicenseId(before.id),
        };
    }

    private providerOf(order: Order): PaymentProvider | null {
        return order.provider === 'stripe' || order.provider === 'paypal' ? order.provider : null;
    }

    private cancelAtProvider(subscription: Subscription | null, reason: string): void {
        if (!this.canceler || !subscription?.provider || !subscription.externalSubscriptionId) {
            return;
        }
        this.canceler.requestCancellation(subscription.provider, subscription.externalSubscriptionId, reason);
    }

    private notify(
        kind: LicenseNotificationKind,
        license: License,
        extra: { licenseKey?: string; reason?: string } = {}
    ): void {
        this.notifier.notify({
            kind,
            licenseId: license.id,
            customerEmail: license.customerEmail,
            customerName: license.customerName,
            expiresAt: license.expiresAt,
            ...extra,
        });
    }
}
