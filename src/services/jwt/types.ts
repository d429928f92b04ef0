import type { JWTPayload as JoseJWTPayload } from 'jose';
import type { LicenseState } from '../../types';

// License validation token payload.
// Lets downstream services trust a validation result without calling back.
export interface LicenseTokenPayload extends JoseJWTPayload {
    sub: string;                   // License ID
    license_key: string;           // Masked key
    status: LicenseState;
    valid: boolean;
    max_activations: number;
    activation_count: number;
    license_expires_at: number | null;  // Milliseconds, null for perpetual
    activation_id?: string;
}

export interface SignLicenseTokenOptions {
    licenseId: string;
    maskedKey: string;
    status: LicenseState;
    valid: boolean;
    maxActivations: number;
    activationCount: number;
    expiresAt: number | null;
    activationId?: string | null;
    expiresInSeconds?: number;
}

export interface SignedLicenseToken {
    token: string;
    expiresAt: number;  // Seconds since epoch
}

export interface LicenseTokenVerifyResult {
    valid: boolean;
    payload?: LicenseTokenPayload;
    error?: string;
}
