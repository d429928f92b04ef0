import {
    LICENSE_KEY_ALPHABET,
    LICENSE_KEY_SEGMENTS,
    LICENSE_KEY_SEGMENT_LENGTH,
} from '../../constants/license';

const BASE62_CHARS = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';

// Use rejection sampling for uniform distribution.
// 256 (byte range) is not divisible by 62, so using modulo creates bias.
// Values 0-247 map to 0-61 uniformly (248 = 62 * 4).
// Values 248-255 are in the biased range and must be resampled.
const MAX_UNBIASED_BYTE = 247; // 62 * 4 - 1

export function bytesToBase62(bytes: Uint8Array): string {
    const result: string[] = [];
    let pool = bytes;
    let i = 0;

    while (result.length < bytes.length) {
        if (i >= pool.length) {
            pool = generateRandomBytes(bytes.length - result.length);
            i = 0;
        }
        const byte = pool[i++] ?? 255;
        if (byte <= MAX_UNBIASED_BYTE) {
            result.push(BASE62_CHARS.charAt(byte % 62));
        }
    }

    return result.join('');
}

export function generateRandomBytes(length: number): Uint8Array {
    const bytes = new Uint8Array(length);
    crypto.getRandomValues(bytes);
    return bytes;
}

export async function hashSHA256(data: string): Promise<string> {
    const encoder = new TextEncoder();
    const hashBuffer = await crypto.subtle.digest('SHA-256', encoder.encode(data));
    return Array.from(new Uint8Array(hashBuffer))
        .map(b => b.toString(16).padStart(2, '0'))
        .join('');
}

export function generateRandomToken(length: number = 32): string {
    const bytes = generateRandomBytes(length);
    return bytesToBase62(bytes);
}

// XXXX-XXXX-XXXX-XXXX over a 32-symbol alphabet; 256 % 32 === 0 so modulo is unbiased.
export function generateLicenseKey(): string {
    const bytes = generateRandomBytes(LICENSE_KEY_SEGMENTS * LICENSE_KEY_SEGMENT_LENGTH);
    const chars = Array.from(bytes, (b) => LICENSE_KEY_ALPHABET.charAt(b % LICENSE_KEY_ALPHABET.length));

    const segments: string[] = [];
    for (let i = 0; i < LICENSE_KEY_SEGMENTS; i++) {
        segments.push(chars.slice(i * LICENSE_KEY_SEGMENT_LENGTH, (i + 1) * LICENSE_KEY_SEGMENT_LENGTH).join(''));
    }
    return segments.join('-');
}

// Keys are looked up by digest; normalization makes lookups case-insensitive.
export function normalizeLicenseKey(key: string): string {
    return key.trim().toUpperCase();
}

export async function hashLicenseKey(key: string): Promise<string> {
    return hashSHA256(normalizeLicenseKey(key));
}
