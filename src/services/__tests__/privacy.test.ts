import { describe, it, expect } from 'vitest';
import {
    hashMachineData,
    hashSHA256,
    maskLicensePath,
    partialEmail,
    partialLicenseKey,
    partialMachineData,
    sanitizeDetails,
} from '../shared';

describe('privacy helpers', () => {
    describe('hashMachineData', () => {
        it('should hash the trimmed value with the salt', async () => {
            const hashed = await hashMachineData('  machine-a  ', 'test-salt');

            expect(hashed).toBe(await hashSHA256('test-salt:machine-a'));
            expect(hashed).toMatch(/^[0-9a-f]{64}$/);
        });

        it('should return null for absent or blank input', async () => {
            expect(await hashMachineData(null, 'test-salt')).toBeNull();
            expect(await hashMachineData(undefined, 'test-salt')).toBeNull();
            expect(await hashMachineData('', 'test-salt')).toBeNull();
            expect(await hashMachineData('   ', 'test-salt')).toBeNull();
        });

        it('should produce different digests for different salts', async () => {
            const a = await hashMachineData('machine-a', 'salt-one');
            const b = await hashMachineData('machine-a', 'salt-two');

            expect(a).not.toBe(b);
        });
    });

    describe('partialLicenseKey', () => {
        it('should keep the first and last four characters', () => {
            expect(partialLicenseKey('ABCD-EFGH-JKLM-NPQR')).toBe('ABCD****NPQR');
        });

        it('should fully mask short keys', () => {
            expect(partialLicenseKey('SHORT')).toBe('****');
        });

        it('should report missing keys as unknown', () => {
            expect(partialLicenseKey(null)).toBe('unknown');
            expect(partialLicenseKey('')).toBe('unknown');
        });
    });

    describe('maskLicensePath', () => {
        it('should mask the key segment of license routes', () => {
            expect(maskLicensePath('/api/v1/ABCD-EFGH-JKLM-NPQR/validate')).toBe('/api/v1/ABCD****NPQR/validate');
            expect(maskLicensePath('/api/v1/ABCD-EFGH-JKLM-NPQR/validate/jwt')).toBe('/api/v1/ABCD****NPQR/validate/jwt');
            expect(maskLicensePath('/api/v1/ABCD-EFGH-JKLM-NPQR')).toBe('/api/v1/ABCD****NPQR');
        });

        it('should leave other paths untouched', () => {
            expect(maskLicensePath('/api/v1/licenses/batch')).toBe('/api/v1/licenses/batch');
            expect(maskLicensePath('/api/admin/licenses/lic_1')).toBe('/api/admin/licenses/lic_1');
            expect(maskLicensePath('/health')).toBe('/health');
        });
    });

    describe('partialMachineData', () => {
        it('should keep the first six characters', () => {
            expect(partialMachineData('fingerprint-123')).toBe('finger****');
        });

        it('should fully mask values of six characters or fewer', () => {
            expect(partialMachineData('abcdef')).toBe('****');
        });

        it('should report missing values as unknown', () => {
            expect(partialMachineData(undefined)).toBe('unknown');
        });
    });

    describe('partialEmail', () => {
        it('should keep the first character and the domain', () => {
            expect(partialEmail('jane.doe@example.com')).toBe('j***@example.com');
        });

        it('should mask values without a local part', () => {
            expect(partialEmail('not-an-email')).toBe('****');
            expect(partialEmail('@example.com')).toBe('****');
        });
    });

    describe('sanitizeDetails', () => {
        it('should mask identifiers and redact credentials by field name', () => {
            const sanitized = sanitizeDetails({
                license_key: 'ABCD-EFGH-JKLM-NPQR',
                machine_fingerprint: 'fingerprint-123',
                customer_email: 'jane@example.com',
                card: { number: '4242424242424242', exp_month: 12 },
                nested: { password: 'hunter2', attempts: 3 },
                items: [{ token: 'tok_placeholder' }],
                endpoint: 'validate',
            });

            expect(sanitized).toEqual({
                license_key: 'ABCD****NPQR',
                machine_fingerprint: 'finger****',
                customer_email: 'j***@example.com',
                card: '[REDACTED]',
                nested: { password: '[REDACTED]', attempts: 3 },
                items: [{ token: '[REDACTED]' }],
                endpoint: 'validate',
            });
        });

        it('should match field names case-insensitively', () => {
            expect(sanitizeDetails({ LicenseKey: 'ABCD-EFGH-JKLM-NPQR', API_KEY: 'placeholder' })).toEqual({
                LicenseKey: 'ABCD****NPQR',
                API_KEY: '[REDACTED]',
            });
        });

        it('should keep null and undefined values under sensitive names', () => {
            expect(sanitizeDetails({ email: null, machine_id: undefined })).toEqual({
                email: null,
                machine_id: undefined,
            });
        });

        it('should not mutate the input', () => {
            const input = { license_key: 'ABCD-EFGH-JKLM-NPQR' };
            sanitizeDetails(input);

            expect(input.license_key).toBe('ABCD-EFGH-JKLM-NPQR');
        });
    });
});
