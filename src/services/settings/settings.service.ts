import type { LicenseRepository } from '../../repositories';
import type { PaymentProvider } from '../../types';
import { nowMs } from '../shared';

interface SettingRow {
    [key: string]: unknown;
    key: string;
    value: string;
}

const FALSE_VALUES = new Set(['false', '0', 'off', 'no']);

// SettingsService - dotted-key string settings stored in the database.
// Read-only from the request path; admin writes go through set().
export class SettingsService {
    constructor(private repository: LicenseRepository) {}

    async get(key: string): Promise<string | null> {
        const row = await this.repository.rawFirst<SettingRow>(
            'SELECT key, value FROM settings WHERE key = ?',
            [key]
        );
        return row?.value ?? null;
    }

    // Missing keys fall back to the default.
    async getBoolean(key: string, defaultValue: boolean): Promise<boolean> {
        const value = await this.get(key);
        if (value === null) {
            return defaultValue;
        }
        return !FALSE_VALUES.has(value.trim().toLowerCase());
    }

    async set(key: string, value: string): Promise<void> {
        await this.repository.rawRun(
            `INSERT INTO settings (key, value, updated_at) VALUES (?, ?, ?)
             ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
            [key, value, nowMs()]
        );
    }

    async list(prefix = ''): Promise<Record<string, string>> {
        const result = await this.repository.rawAll<SettingRow>(
            "SELECT key, value FROM settings WHERE key LIKE ? ESCAPE '\\' ORDER BY key",
            [`${prefix.replace(/[\\%_]/g, (c) => `\\${c}`)}%`]
        );
        return Object.fromEntries(result.results.map((row) => [row.key, row.value]));
    }

    async isWebhookEventEnabled(provider: PaymentProvider, eventType: string): Promise<boolean> {
        return this.getBoolean(webhookSettingKey(provider, eventType), true);
    }
}

export function webhookSettingKey(provider: PaymentProvider, eventType: string): string {
    return `webhooks.${provider}.${eventType.toLowerCase().replace(/\./g, '_')}`;
}
