// Privacy helpers for machine data, license keys and log payloads.
// Nothing here throws on null or empty input.

import { hashSHA256 } from './crypto';

const UNKNOWN = 'unknown';
const MASK = '****';
const REDACTED = '[REDACTED]';
const MAX_SANITIZE_DEPTH = 6;

export async function hashMachineData(raw: string | null | undefined, salt: string): Promise<string | null> {
    const trimmed = raw?.trim();
    if (!trimmed) {
        return null;
    }
    return hashSHA256(`${salt}:${trimmed}`);
}

export function partialLicenseKey(key: string | null | undefined): string {
    if (!key) {
        return UNKNOWN;
    }
    if (key.length <= 8) {
        return MASK;
    }
    return `${key.slice(0, 4)}${MASK}${key.slice(-4)}`;
}

export function partialMachineData(raw: string | null | undefined): string {
    if (!raw) {
        return UNKNOWN;
    }
    if (raw.length <= 6) {
        return MASK;
    }
    return `${raw.slice(0, 6)}${MASK}`;
}

export function partialEmail(email: string | null | undefined): string {
    if (!email) {
        return UNKNOWN;
    }
    const at = email.lastIndexOf('@');
    if (at <= 0) {
        return MASK;
    }
    return `${email.charAt(0)}***${email.slice(at)}`;
}

const LICENSE_PATH = /^(\/api\/v1\/)([^/]+)(?=\/|$)/;

/** Request path with the `/api/v1/:key` segment masked; other paths pass through. */
export function maskLicensePath(path: string): string {
    return path.replace(LICENSE_PATH, (_match, prefix: string, segment: string) =>
        segment === 'licenses' ? `${prefix}${segment}` : `${prefix}${partialLicenseKey(segment)}`
    );
}

type Masker = (value: string) => string;

const LICENSE_KEY_FIELDS = new Set(['license_key', 'licensekey', 'key']);
const MACHINE_FIELDS = new Set([
    'machine_fingerprint',
    'machinefingerprint',
    'fingerprint',
    'machine_id',
    'machineid',
]);
const EMAIL_FIELDS = new Set(['email', 'customer_email', 'customeremail', 'receipt_email', 'payer_email']);
const SECRET_FIELDS = new Set([
    'card',
    'card_number',
    'cardnumber',
    'number',
    'cvc',
    'cvv',
    'exp_month',
    'exp_year',
    'account_number',
    'routing_number',
    'iban',
    'password',
    'secret',
    'token',
    'access_token',
    'authorization',
    'api_key',
]);

function maskerFor(field: string): Masker | null {
    const name = field.toLowerCase();
    if (SECRET_FIELDS.has(name)) {
        return () => REDACTED;
    }
    if (LICENSE_KEY_FIELDS.has(name)) {
        return partialLicenseKey;
    }
    if (MACHINE_FIELDS.has(name)) {
        return partialMachineData;
    }
    if (EMAIL_FIELDS.has(name)) {
        return partialEmail;
    }
    return null;
}

function sanitizeValue(value: unknown, depth: number): unknown {
    if (depth > MAX_SANITIZE_DEPTH) {
        return REDACTED;
    }
    if (Array.isArray(value)) {
        return value.map((item) => sanitizeValue(item, depth + 1));
    }
    if (value !== null && typeof value === 'object') {
        const out: Record<string, unknown> = {};
        for (const [field, nested] of Object.entries(value)) {
            out[field] = sanitizeField(field, nested, depth + 1);
        }
        return out;
    }
    return value;
}

function sanitizeField(field: string, value: unknown, depth: number): unknown {
    const masker = maskerFor(field);
    if (!masker) {
        return sanitizeValue(value, depth);
    }
    if (value === null || value === undefined) {
        return value;
    }
    // Objects under a credential name (e.g. `card: {...}`) are dropped whole.
    return typeof value === 'string' ? masker(value) : REDACTED;
}

export function sanitizeDetails(details: Record<string, unknown>): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [field, value] of Object.entries(details)) {
        out[field] = sanitizeField(field, value, 0);
    }
    return out;
}
