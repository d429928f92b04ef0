import type { Row } from "../utils/db";

/**
 * Database row types (snake_case to match the SQLite schema).
 */

export interface LicenseRow extends Row {
    [key: string]: unknown;
    id: string;
    key_hash: string;
    key_prefix: string;
    order_id: string | null;
    product_id: string;
    customer_email: string;
    customer_name: string | null;
    status: string;
    license_type: string;
    requires_machine_id: number;
    max_activations: number;
    activation_count: number;
    expires_at: number | null;
    revoked_at: number | null;
    revoked_reason: string | null;
    created_at: number;
    updated_at: number;
}

export interface ActivationRow extends Row {
    [key: string]: unknown;
    id: string;
    license_id: string;
    machine_fingerprint_hash: string;
    machine_id_hash: string;
    machine_fingerprint_partial: string;
    machine_id_partial: string | null;
    active: number;
    revoked: number;
    revoked_reason: string | null;
    ip_address: string | null;
    user_agent: string | null;
    activated_at: number;
    deactivated_at: number | null;
    revoked_at: number | null;
}

export interface SubscriptionRow extends Row {
    [key: string]: unknown;
    id: string;
    license_id: string;
    provider: string | null;
    external_subscription_id: string | null;
    status: string;
    auto_renew: number;
    current_period_end: number | null;
    last_payment_at: number | null;
    canceled_at: number | null;
    created_at: number;
    updated_at: number;
}

export interface ProductRow extends Row {
    [key: string]: unknown;
    id: string;
    name: string;
    max_activations: number;
    license_duration_days: number | null;
    subscription: number;
    requires_machine_id: number;
    created_at: number;
}

export interface OrderRow extends Row {
    [key: string]: unknown;
    id: string;
    product_id: string;
    email: string;
    customer_name: string | null;
    status: string;
    provider: string | null;
    payment_reference: string | null;
    transaction_id: string | null;
    created_at: number;
    completed_at: number | null;
}

export interface AuditLogRow extends Row {
    [key: string]: unknown;
    id: string;
    category: string;
    event_type: string;
    severity: string | null;
    license_id: string | null;
    request_id: string | null;
    details: string;
    created_at: number;
}

export interface CountRow extends Row {
    [key: string]: unknown;
    count: number;
}
