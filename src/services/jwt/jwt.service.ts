import { SignJWT, jwtVerify } from 'jose';
import { z } from 'zod';
import { LICENSE_TOKEN_TTL_SECONDS } from '../../constants/license';
import { nowSeconds } from '../shared';
import type {
    LicenseTokenPayload,
    LicenseTokenVerifyResult,
    SignLicenseTokenOptions,
    SignedLicenseToken,
} from './types';

const AUDIENCE = 'license-validation';

const licenseClaimsSchema = z.object({
    sub: z.string().min(1),
    license_key: z.string(),
    status: z.enum(['active', 'suspended', 'revoked', 'expired']),
    valid: z.boolean(),
    max_activations: z.number().int(),
    activation_count: z.number().int(),
    license_expires_at: z.number().nullable(),
    activation_id: z.string().optional(),
});

// LicenseTokenService - signs and verifies license validation tokens.
// Uses HS256 with a symmetric secret and a short default lifetime.
export class LicenseTokenService {
    private secret: Uint8Array;
    private defaultExpiresIn: number;

    constructor(secret: string, defaultExpiresInSeconds: number = LICENSE_TOKEN_TTL_SECONDS) {
        this.secret = new TextEncoder().encode(secret);
        this.defaultExpiresIn = defaultExpiresInSeconds;
    }

    async signLicenseToken(options: SignLicenseTokenOptions): Promise<SignedLicenseToken> {
        const expiresIn = options.expiresInSeconds ?? this.defaultExpiresIn;
        const now = nowSeconds();

        const payload: LicenseTokenPayload = {
            sub: options.licenseId,
            license_key: options.maskedKey,
            status: options.status,
            valid: options.valid,
            max_activations: options.maxActivations,
            activation_count: options.activationCount,
            license_expires_at: options.expiresAt,
            ...(options.activationId ? { activation_id: options.activationId } : {}),
        };

        const token = await new SignJWT(payload)
            .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
            .setAudience(AUDIENCE)
            .setIssuedAt(now)
            .setExpirationTime(now + expiresIn)
            .sign(this.secret);

        return { token, expiresAt: now + expiresIn };
    }

    async verifyLicenseToken(token: string): Promise<LicenseTokenVerifyResult> {
        try {
            const { payload } = await jwtVerify(token, this.secret, {
                algorithms: ['HS256'],
                audience: AUDIENCE,
            });

            const claims = licenseClaimsSchema.safeParse(payload);
            if (!claims.success) {
                return { valid: false, error: 'Invalid license token structure' };
            }

            return { valid: true, payload: { ...payload, ...claims.data } };
        } catch (error) {
            const message = error instanceof Error ? error.message : 'Unknown error';
            return { valid: false, error: message };
        }
    }
}
