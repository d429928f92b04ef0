import type { ErrorCode } from "./constants/errors";

// License Types
export type LicenseStatus = "active" | "suspended" | "revoked";

// Stored status plus the read-time "expired" derivation.
export type LicenseState = LicenseStatus | "expired";

export type LicenseType = "perpetual" | "subscription";

export interface License {
    id: string;
    keyHash: string;
    keyPrefix: string;
    orderId: string | null;
    productId: string;
    customerEmail: string;
    customerName: string | null;
    status: LicenseStatus;
    licenseType: LicenseType;
    requiresMachineId: boolean;
    maxActivations: number;
    activationCount: number;
    expiresAt: number | null;
    revokedAt: number | null;
    revokedReason: string | null;
    createdAt: number;
    updatedAt: number;
}

export interface LicenseSummary {
    id: string;
    key: string;
    status: LicenseState;
    licenseType: LicenseType;
    requiresMachineId: boolean;
    maxActivations: number;
    activationCount: number;
    activationsRemaining: number;
    expiresAt: number | null;
    createdAt: number;
}

// Activation Types
export interface Activation {
    id: string;
    licenseId: string;
    fingerprintHash: string;
    machineIdHash: string;
    fingerprintPartial: string;
    machineIdPartial: string | null;
    active: boolean;
    revoked: boolean;
    revokedReason: string | null;
    ipAddress: string | null;
    userAgent: string | null;
    activatedAt: number;
    deactivatedAt: number | null;
    revokedAt: number | null;
}

export interface ActivationHistoryEntry {
    id: string;
    machineFingerprint: string;
    machineId: string | null;
    active: boolean;
    revoked: boolean;
    revokedReason: string | null;
    ipAddress: string | null;
    activatedAt: number;
    deactivatedAt: number | null;
    revokedAt: number | null;
}

// Subscription Types
export type SubscriptionStatus = "active" | "suspended" | "canceled";

export type PaymentProvider = "stripe" | "paypal";

export interface Subscription {
    id: string;
    licenseId: string;
    provider: PaymentProvider | null;
    externalSubscriptionId: string | null;
    status: SubscriptionStatus;
    autoRenew: boolean;
    currentPeriodEnd: number | null;
    lastPaymentAt: number | null;
    canceledAt: number | null;
    createdAt: number;
    updatedAt: number;
}

// Product & Order Types
export interface Product {
    id: string;
    name: string;
    maxActivations: number;
    licenseDurationDays: number | null;
    subscription: boolean;
    requiresMachineId: boolean;
    createdAt: number;
}

export type OrderStatus = "pending" | "completed" | "refunded";

export type OrderProvider = PaymentProvider | "manual";

export interface Order {
    id: string;
    productId: string;
    email: string;
    customerName: string | null;
    status: OrderStatus;
    provider: OrderProvider | null;
    paymentReference: string | null;
    transactionId: string | null;
    createdAt: number;
    completedAt: number | null;
}

// Rate Limit Types
export interface RateLimitResult {
    allowed: boolean;
    limit: number;
    remaining: number;
    resetAt: number;
    retryAfter?: number;
}

// Audit Types
export type AuditCategory = "payment" | "webhook" | "license" | "security";

export type SecuritySeverity = "critical" | "high" | "medium";

export interface AuditEntry {
    id: string;
    category: AuditCategory;
    eventType: string;
    severity: SecuritySeverity | null;
    licenseId: string | null;
    requestId: string | null;
    details: Record<string, unknown>;
    createdAt: number;
}

// Service Result Type
export interface ServiceResult<T> {
    success: boolean;
    data?: T;
    error?: string;
    code?: ErrorCode;
}
