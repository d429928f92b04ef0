import type { Activation, License, LicenseSummary } from '../../types';
import { toIso } from '../shared';

// JSON shapes returned by the public license API.

export interface LicenseView {
    key: string;
    status: string;
    license_type: string;
    expires_at: string | null;
    max_activations: number;
    activation_count: number;
    activations_remaining: number;
}

export interface ValidationView {
    valid: true;
    license: LicenseView;
    activation: { id: string; activated_at: string | null } | null;
}

export interface ActivationView {
    activation_id: string;
    already_active: boolean;
    activations_remaining: number;
    license: LicenseView;
}

export interface DeactivationView {
    deactivated: number;
    activations_remaining: number;
}

export interface StatusView extends LicenseView {
    requires_machine_id: boolean;
    created_at: string | null;
}

export interface JwtValidationView extends ValidationView {
    jwt_token: string;
    token_expires_at: string | null;
}

export function toLicenseView(summary: LicenseSummary): LicenseView {
    return {
        key: summary.key,
        status: summary.status,
        license_type: summary.licenseType,
        expires_at: toIso(summary.expiresAt),
        max_activations: summary.maxActivations,
        activation_count: summary.activationCount,
        activations_remaining: summary.activationsRemaining,
    };
}

export function toStatusView(summary: LicenseSummary): StatusView {
    return {
        ...toLicenseView(summary),
        requires_machine_id: summary.requiresMachineId,
        created_at: toIso(summary.createdAt),
    };
}

export function toValidationView(summary: LicenseSummary, activation: Activation | null): ValidationView {
    return {
        valid: true,
        license: toLicenseView(summary),
        activation: activation ? { id: activation.id, activated_at: toIso(activation.activatedAt) } : null,
    };
}

export function remainingActivations(license: License): number {
    return Math.max(0, license.maxActivations - license.activationCount);
}
