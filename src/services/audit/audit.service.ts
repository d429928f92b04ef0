import type { LicenseRepository } from '../../repositories';
import type { AuditCategory, AuditEntry, PaymentProvider } from '../../types';
import type { AuditLogRow } from '../../db/row-types';
import { mapAuditEntry } from '../../db/mappers';
import type { Logger } from '../../utils/logger';
import type { AlertSink } from '../alerts/security-alerts';
import { generateId, nowMs, sanitizeDetails } from '../shared';
import { classifySecurityEvent, shouldAlert } from './severity';

export interface AuditContext {
    requestId?: string;
    licenseId?: string | null;
}

export interface LicenseOperationLog {
    action: string;
    success: boolean;
    licenseId?: string | null;
    licenseKey?: string | null;
    machineFingerprint?: string | null;
    machineId?: string | null;
    ipAddress?: string | null;
    userAgent?: string | null;
    failureCode?: string;
    metadata?: Record<string, unknown>;
}

// AuditLogger - structured audit trail for payment, webhook, license and
// security events. Details are sanitized before they reach the console or
// the audit_logs table. Critical and high security events raise an alert.
export class AuditLogger {
    constructor(
        private repository: LicenseRepository,
        private alerts: AlertSink,
        private logger: Logger
    ) {}

    async logEvent(
        category: AuditCategory,
        eventType: string,
        details: Record<string, unknown>,
        context: AuditContext = {}
    ): Promise<AuditEntry> {
        const severity = category === 'security' ? classifySecurityEvent(eventType) : null;
        const entry: AuditEntry = {
            id: generateId('aud'),
            category,
            eventType,
            severity,
            licenseId: context.licenseId ?? null,
            requestId: context.requestId ?? null,
            details: sanitizeDetails(details),
            createdAt: nowMs(),
        };

        this.writeConsole(entry);
        await this.persist(entry);

        if (severity && shouldAlert(severity)) {
            this.alerts.alert({
                eventType,
                severity,
                details: entry.details,
                requestId: entry.requestId ?? undefined,
                occurredAt: new Date(entry.createdAt).toISOString(),
            });
        }

        return entry;
    }

    async logSecurityEvent(
        eventType: string,
        details: Record<string, unknown>,
        context: AuditContext = {}
    ): Promise<AuditEntry> {
        return this.logEvent('security', eventType, details, context);
    }

    async logLicenseOperation(op: LicenseOperationLog, context: AuditContext = {}): Promise<AuditEntry> {
        return this.logEvent(
            'license',
            `license_${op.action}`,
            {
                success: op.success,
                failure_code: op.failureCode,
                license_key: op.licenseKey ?? undefined,
                machine_fingerprint: op.machineFingerprint ?? undefined,
                machine_id: op.machineId ?? undefined,
                ip_address: op.ipAddress ?? undefined,
                user_agent: op.userAgent ?? undefined,
                ...op.metadata,
            },
            { ...context, licenseId: op.licenseId ?? context.licenseId }
        );
    }

    async logWebhookEvent(
        provider: PaymentProvider,
        eventType: string,
        outcome: string,
        details: Record<string, unknown> = {},
        context: AuditContext = {}
    ): Promise<AuditEntry> {
        return this.logEvent('webhook', `${provider}.${eventType}`, { outcome, ...details }, context);
    }

    async logPaymentEvent(
        eventType: string,
        details: Record<string, unknown>,
        context: AuditContext = {}
    ): Promise<AuditEntry> {
        return this.logEvent('payment', eventType, details, context);
    }

    async listRecent(category: AuditCategory, limit = 50): Promise<AuditEntry[]> {
        const result = await this.repository.rawAll<AuditLogRow>(
            'SELECT * FROM audit_logs WHERE category = ? ORDER BY created_at DESC, rowid DESC LIMIT ?',
            [category, limit]
        );
        return result.results.map(mapAuditEntry);
    }

    private writeConsole(entry: AuditEntry): void {
        const context = {
            requestId: entry.requestId ?? undefined,
            category: entry.category,
            event: entry.eventType,
            severity: entry.severity ?? undefined,
            licenseId: entry.licenseId ?? undefined,
            ...entry.details,
        };

        if (entry.severity === 'critical') {
            this.logger.error('Security event', undefined, context);
        } else if (entry.severity === 'high' || entry.severity === 'medium') {
            this.logger.warn('Security event', context);
        } else {
            this.logger.info('Audit event', context);
        }
    }

    // A failed audit write is reported but never fails the audited operation.
    private async persist(entry: AuditEntry): Promise<void> {
        try {
            await this.repository.rawRun(
                `INSERT INTO audit_logs (id, category, event_type, severity, license_id, request_id, details, created_at)
                 VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
                [
                    entry.id,
                    entry.category,
                    entry.eventType,
                    entry.severity,
                    entry.licenseId,
                    entry.requestId,
                    JSON.stringify(entry.details),
                    entry.createdAt,
                ]
            );
        } catch (error) {
            this.logger.error('Failed to persist audit entry', error, {
                event: entry.eventType,
                category: entry.category,
            });
        }
    }
}
