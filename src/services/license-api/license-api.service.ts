import { ERROR_CODES, ERROR_MESSAGES, type ErrorCode } from '../../constants/errors';
import { BATCH_OPERATION_TYPES, MAX_BATCH_OPERATIONS, type BatchOperationType } from '../../constants/license';
import type { RateLimitEndpoint, RateLimitPolicy } from '../../constants/rate-limit';
import type { RateLimitResult, ServiceResult } from '../../types';
import type { Logger } from '../../utils/logger';
import type { ErrorTracker } from '../alerts/error-tracker';
import type { AuditLogger } from '../audit';
import type { LicenseTokenService } from '../jwt';
import type { LicenseService, MachineIdentifiers } from '../license';
import type { RateLimitOutcome, RateLimitService } from '../ratelimit';
import { generateId, hashLicenseKey, partialLicenseKey } from '../shared';
import type {
    ApiResult,
    BatchOperation,
    BatchOperationResult,
    BatchResponse,
    ClientContext,
} from './types';
import {
    remainingActivations,
    toLicenseView,
    toStatusView,
    toValidationView,
    type ActivationView,
    type DeactivationView,
    type JwtValidationView,
    type StatusView,
    type ValidationView,
} from './views';

export interface LicenseApiServiceDeps {
    license: LicenseService;
    rateLimit: RateLimitService;
    tokens: LicenseTokenService;
    audit: AuditLogger;
    errorTracker: ErrorTracker;
    logger: Logger;
    limits: RateLimitPolicy;
}

interface Operation<T> {
    endpoint: RateLimitEndpoint;
    key: string;
    identifiers: MachineIdentifiers;
    // Batch members share the batch's IP check.
    skipIpLimit?: boolean;
    run: () => Promise<ServiceResult<T>>;
}

const BATCH_OPERATIONS: ReadonlySet<string> = new Set(BATCH_OPERATION_TYPES);

function isBatchOperationType(value: string): value is BatchOperationType {
    return BATCH_OPERATIONS.has(value);
}

// Of two windows, the one with fewer requests left.
function tighter(a: RateLimitResult, b: RateLimitResult): RateLimitResult {
    return b.remaining < a.remaining ? b : a;
}

function stripOutcome(outcome: RateLimitOutcome): RateLimitResult {
    return {
        allowed: outcome.allowed,
        limit: outcome.limit,
        remaining: outcome.remaining,
        resetAt: outcome.resetAt,
        retryAfter: outcome.retryAfter,
    };
}

/**
 * LicenseApiService - the public license endpoints.
 *
 * Every call runs the same pipeline: IP rate limit, license-key rate limit,
 * license state machine, audit entry, then rate-limit metadata on the result.
 */
export class LicenseApiService {
    constructor(private deps: LicenseApiServiceDeps) {}

    async validate(key: string, identifiers: MachineIdentifiers, client: ClientContext): Promise<ApiResult<ValidationView>> {
        return this.execute(client, {
            endpoint: 'validate',
            key,
            identifiers,
            run: () => this.runValidate(key, identifiers),
        });
    }

    async activate(key: string, identifiers: MachineIdentifiers, client: ClientContext): Promise<ApiResult<ActivationView>> {
        return this.execute(client, {
            endpoint: 'activate',
            key,
            identifiers,
            run: () => this.runActivate(key, identifiers, client),
        });
    }

    async deactivate(key: string, identifiers: MachineIdentifiers, client: ClientContext): Promise<ApiResult<DeactivationView>> {
        return this.execute(client, {
            endpoint: 'deactivate',
            key,
            identifiers,
            run: () => this.runDeactivate(key, identifiers),
        });
    }

    async status(key: string, client: ClientContext): Promise<ApiResult<StatusView>> {
        return this.execute(client, {
            endpoint: 'status',
            key,
            identifiers: {},
            run: () => this.runStatus(key),
        });
    }

    async validateJwt(key: string, identifiers: MachineIdentifiers, client: ClientContext): Promise<ApiResult<JwtValidationView>> {
        return this.execute(client, {
            endpoint: 'validate_jwt',
            key,
            identifiers,
            run: async () => {
                const validated = await this.deps.license.validate(key, identifiers);
                if (!validated.success || !validated.data) {
                    return { success: false, error: validated.error, code: validated.code };
                }

                const { license, activation } = validated.data;
                const summary = this.deps.license.summarize(license);
                const signed = await this.deps.tokens.signLicenseToken({
                    licenseId: license.id,
                    maskedKey: summary.key,
                    status: summary.status,
                    valid: true,
                    maxActivations: license.maxActivations,
                    activationCount: license.activationCount,
                    expiresAt: license.expiresAt,
                    activationId: activation?.id ?? null,
                });

                return {
                    success: true,
                    data: {
                        ...toValidationView(summary, activation),
                        jwt_token: signed.token,
                        token_expires_at: new Date(signed.expiresAt * 1000).toISOString(),
                    },
                };
            },
        });
    }

    async batch(operations: BatchOperation[], client: ClientContext): Promise<ApiResult<BatchResponse>> {
        const policy = this.deps.limits.batch;
        const ipLimit = await this.checkLimit('ip', client.ipAddress, 'batch', policy.ip, policy.windowSeconds, client);
        if (!ipLimit.allowed) {
            return this.rateLimited('batch', 'ip', ipLimit, client);
        }

        const rateLimit = stripOutcome(ipLimit);
        if (operations.length === 0) {
            return this.failure(ERROR_MESSAGES.BATCH.EMPTY, ERROR_CODES.BATCH_INVALID, rateLimit);
        }
        if (operations.length > MAX_BATCH_OPERATIONS) {
            return this.failure(ERROR_MESSAGES.BATCH.TOO_LARGE, ERROR_CODES.BATCH_INVALID, rateLimit);
        }

        const results: BatchOperationResult[] = [];
        for (const [index, operation] of operations.entries()) {
            results.push(await this.runBatchOperation(index, operation, client));
        }

        return {
            success: true,
            data: {
                batch_id: generateId('batch'),
                operations_count: operations.length,
                results,
            },
            rateLimit,
            timestamp: new Date().toISOString(),
        };
    }

    private async runBatchOperation(index: number, operation: BatchOperation, client: ClientContext): Promise<BatchOperationResult> {
        const base = { index, type: operation.type, license_key: partialLicenseKey(operation.licenseKey) };

        if (!isBatchOperationType(operation.type)) {
            return { ...base, success: false, error: ERROR_MESSAGES.BATCH.INVALID_OPERATION, code: ERROR_CODES.VALIDATION_FAILED };
        }

        const type = operation.type;
        const identifiers: MachineIdentifiers = {
            fingerprint: operation.fingerprint,
            machineId: operation.machineId,
        };
        const result = await this.execute<unknown>(client, {
            endpoint: operation.type,
            key: operation.licenseKey,
            identifiers,
            skipIpLimit: true,
            run: () => this.runBatchMember(type, operation.licenseKey, identifiers, client),
        });

        if (!result.success) {
            return { ...base, success: false, error: result.error, code: result.code };
        }
        return { ...base, success: true, data: result.data };
    }

    private runBatchMember(
        type: BatchOperationType,
        key: string,
        identifiers: MachineIdentifiers,
        client: ClientContext
    ): Promise<ServiceResult<unknown>> {
        switch (type) {
            case 'validate':
                return this.runValidate(key, identifiers);
            case 'activate':
                return this.runActivate(key, identifiers, client);
            case 'deactivate':
                return this.runDeactivate(key, identifiers);
            case 'status':
                return this.runStatus(key);
        }
    }

    private async runValidate(key: string, identifiers: MachineIdentifiers): Promise<ServiceResult<ValidationView>> {
        const result = await this.deps.license.validate(key, identifiers);
        if (!result.success || !result.data) {
            return { success: false, error: result.error, code: result.code };
        }
        const summary = this.deps.license.summarize(result.data.license);
        return { success: true, data: toValidationView(summary, result.data.activation) };
    }

    private async runActivate(
        key: string,
        identifiers: MachineIdentifiers,
        client: ClientContext
    ): Promise<ServiceResult<ActivationView>> {
        const result = await this.deps.license.activate(key, {
            ...identifiers,
            ipAddress: client.ipAddress,
            userAgent: client.userAgent ?? null,
        });
        if (!result.success || !result.data) {
            return { success: false, error: result.error, code: result.code };
        }

        const { license, activation, alreadyActive } = result.data;
        return {
            success: true,
            data: {
                activation_id: activation.id,
                already_active: alreadyActive,
                activations_remaining: remainingActivations(license),
                license: toLicenseView(this.deps.license.summarize(license)),
            },
        };
    }

    private async runDeactivate(key: string, identifiers: MachineIdentifiers): Promise<ServiceResult<DeactivationView>> {
        const result = await this.deps.license.deactivate(key, identifiers);
        if (!result.success || !result.data) {
            return { success: false, error: result.error, code: result.code };
        }
        return {
            success: true,
            data: {
                deactivated: result.data.deactivated,
                activations_remaining: remainingActivations(result.data.license),
            },
        };
    }

    private async runStatus(key: string): Promise<ServiceResult<StatusView>> {
        const result = await this.deps.license.status(key);
        if (!result.success || !result.data) {
            return { success: false, error: result.error, code: result.code };
        }
        return { success: true, data: toStatusView(result.data) };
    }

    private async execute<T>(client: ClientContext, op: Operation<T>): Promise<ApiResult<T>> {
        const policy = this.deps.limits[op.endpoint];

        let ipLimit: RateLimitOutcome | null = null;
        if (!op.skipIpLimit) {
            ipLimit = await this.checkLimit('ip', client.ipAddress, op.endpoint, policy.ip, policy.windowSeconds, client);
            if (!ipLimit.allowed) {
                return this.rateLimited(op.endpoint, 'ip', ipLimit, client);
            }
        }

        let keyLimit: RateLimitOutcome | null = null;
        if (policy.license !== null && op.key) {
            const subject = (await hashLicenseKey(op.key)).slice(0, 32);
            keyLimit = await this.checkLimit('license', subject, op.endpoint, policy.license, policy.windowSeconds, client);
            if (!keyLimit.allowed) {
                return this.rateLimited(op.endpoint, 'license', keyLimit, client);
            }
        }

        let result: ServiceResult<T>;
        let licenseId: string | null;
        try {
            result = await op.run();
            licenseId = (await this.deps.license.findByKey(op.key))?.id ?? null;
        } catch (error) {
            await this.reportFault(op.endpoint, error, op.key, client);
            return this.failure(ERROR_MESSAGES.GENERIC.INTERNAL_ERROR, ERROR_CODES.INTERNAL_ERROR, null);
        }

        await this.deps.audit.logLicenseOperation({
            action: op.endpoint,
            success: result.success,
            licenseId,
            licenseKey: op.key,
            machineFingerprint: op.identifiers.fingerprint,
            machineId: op.identifiers.machineId,
            ipAddress: client.ipAddress,
            userAgent: client.userAgent,
            failureCode: result.code,
        }, { requestId: client.requestId });

        const limits = [ipLimit, keyLimit].filter((limit): limit is RateLimitOutcome => limit !== null).map(stripOutcome);
        const rateLimit = limits.length > 0 ? limits.reduce(tighter) : undefined;

        return {
            ...result,
            rateLimit,
            timestamp: new Date().toISOString(),
        };
    }

    private async checkLimit(
        subjectType: 'ip' | 'license',
        subjectValue: string,
        endpoint: RateLimitEndpoint,
        maxRequests: number,
        windowSeconds: number,
        client: ClientContext
    ): Promise<RateLimitOutcome> {
        const outcome = await this.deps.rateLimit.check({ subjectType, subjectValue, endpoint, maxRequests, windowSeconds });
        if (outcome.degraded && outcome.allowed) {
            await this.deps.audit.logSecurityEvent('rate_limiter_unavailable', {
                endpoint,
                subject_type: subjectType,
            }, { requestId: client.requestId });
        }
        return outcome;
    }

    private async rateLimited<T>(
        endpoint: RateLimitEndpoint,
        subjectType: 'ip' | 'license',
        outcome: RateLimitOutcome,
        client: ClientContext
    ): Promise<ApiResult<T>> {
        await this.deps.audit.logSecurityEvent('rate_limit_exceeded', {
            endpoint,
            subject_type: subjectType,
            limit: outcome.limit,
            ip_address: client.ipAddress,
        }, { requestId: client.requestId });

        const message = outcome.degraded ? ERROR_MESSAGES.RATE_LIMIT.UNAVAILABLE : ERROR_MESSAGES.RATE_LIMIT.EXCEEDED;
        return this.failure(message, ERROR_CODES.RATE_LIMIT_EXCEEDED, stripOutcome(outcome));
    }

    private async reportFault(endpoint: RateLimitEndpoint, error: unknown, key: string, client: ClientContext): Promise<void> {
        this.deps.logger.error('License operation failed', error, { requestId: client.requestId, endpoint });
        this.deps.errorTracker.capture(error, {
            endpoint,
            request_id: client.requestId,
            license_key: key,
            ip_address: client.ipAddress,
        });
        await this.deps.audit.logSecurityEvent('license_operation_error', {
            endpoint,
            error_class: error instanceof Error ? error.name : 'Unknown',
            license_key: key,
            ip_address: client.ipAddress,
        }, { requestId: client.requestId });
    }

    private failure<T>(error: string, code: ErrorCode, rateLimit: RateLimitResult | null): ApiResult<T> {
        return {
            success: false,
            error,
            code,
            rateLimit: rateLimit ?? undefined,
            timestamp: new Date().toISOString(),
        };
    }
}
