import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { LicenseTokenService, type SignLicenseTokenOptions } from '../jwt';

const claims: SignLicenseTokenOptions = {
    licenseId: 'lic_test',
    maskedKey: 'ABCD****MNOP',
    status: 'active',
    valid: true,
    maxActivations: 3,
    activationCount: 1,
    expiresAt: null,
    activationId: 'act_test',
};

describe('LicenseTokenService', () => {
    let tokens: LicenseTokenService;

    beforeEach(() => {
        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
        tokens = new LicenseTokenService('test-jwt-secret-test-jwt-secret-0000');
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('should sign a token that verifies with its claims', async () => {
        const signed = await tokens.signLicenseToken(claims);
        const verified = await tokens.verifyLicenseToken(signed.token);

        expect(signed.expiresAt).toBe(Date.parse('2026-03-01T12:05:00.000Z') / 1000);
        expect(verified.valid).toBe(true);
        expect(verified.payload).toMatchObject({
            sub: 'lic_test',
            license_key: 'ABCD****MNOP',
            status: 'active',
            valid: true,
            max_activations: 3,
            activation_count: 1,
            license_expires_at: null,
            activation_id: 'act_test',
            aud: 'license-validation',
            exp: signed.expiresAt,
        });
    });

    it('should leave out the activation id when there is none', async () => {
        const signed = await tokens.signLicenseToken({ ...claims, activationId: null });
        const verified = await tokens.verifyLicenseToken(signed.token);

        expect(verified.payload?.activation_id).toBeUndefined();
    });

    it('should reject a token signed with another secret', async () => {
        const other = new LicenseTokenService('another-secret-another-secret-0000');
        const signed = await other.signLicenseToken(claims);

        const verified = await tokens.verifyLicenseToken(signed.token);

        expect(verified.valid).toBe(false);
        expect(verified.payload).toBeUndefined();
    });

    it('should reject an expired token', async () => {
        const signed = await tokens.signLicenseToken({ ...claims, expiresInSeconds: -10 });

        const verified = await tokens.verifyLicenseToken(signed.token);

        expect(verified.valid).toBe(false);
    });

    it('should reject a token whose payload was altered', async () => {
        const signed = await tokens.signLicenseToken(claims);
        const [header, , signature] = signed.token.split('.');
        const forged = Buffer.from(JSON.stringify({ sub: 'lic_other', aud: 'license-validation' })).toString('base64url');

        const verified = await tokens.verifyLicenseToken(`${header}.${forged}.${signature}`);

        expect(verified.valid).toBe(false);
    });
});
