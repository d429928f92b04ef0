import type { SecuritySeverity } from '../../types';

// Security event -> severity. Unlisted events are medium (log only).
export const SECURITY_EVENT_SEVERITY: ReadonlyMap<string, SecuritySeverity> = new Map(Object.entries({
    // critical
    admin_account_compromised: 'critical',
    payment_fraud_detected: 'critical',
    data_breach_detected: 'critical',
    unauthorized_admin_access: 'critical',

    // high
    rate_limit_exceeded: 'high',
    invalid_webhook_signature: 'high',
    suspicious_payment: 'high',
    admin_auth_failed: 'high',
    license_brute_force: 'high',
    payment_dispute_opened: 'high',
} satisfies Record<string, SecuritySeverity>));

export function classifySecurityEvent(eventType: string): SecuritySeverity {
    return SECURITY_EVENT_SEVERITY.get(eventType) ?? 'medium';
}

export function shouldAlert(severity: SecuritySeverity): boolean {
    return severity === 'critical' || severity === 'high';
}
