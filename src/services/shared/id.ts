import { generateRandomToken } from './crypto';

// Prefixed, URL-safe identifier, e.g. `lic_3kTq...`.
export function generateId(prefix: string): string {
    return `${prefix}_${generateRandomToken(20)}`;
}
