// Shared time utilities.

// Get current timestamp in milliseconds.
export function nowMs(): number {
    return Date.now();
}

// Get current timestamp in seconds (Unix timestamp).
export function nowSeconds(): number {
    return Math.floor(Date.now() / 1000);
}

// Check if a timestamp has expired.
export function isExpired(expiresAt: number | null, now: number = Date.now()): boolean {
    return expiresAt !== null && expiresAt < now;
}

// Convert a millisecond timestamp to ISO-8601, keeping null.
export function toIso(timestamp: number | null): string | null {
    return timestamp === null ? null : new Date(timestamp).toISOString();
}
