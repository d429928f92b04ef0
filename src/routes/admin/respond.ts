import type { Context } from 'hono';
import { statusForError } from '../../constants/http';
import type { AppEnv } from '../../env';
import type { ServiceResult } from '../../types';

// Writes a failed service result in the shared error shape.
export function sendFailure(c: Context<AppEnv>, result: ServiceResult<unknown>): Response {
    return c.json({
        success: false,
        error: result.error,
        code: result.code,
        timestamp: new Date().toISOString(),
    }, statusForError(result.code));
}

export async function auditAdminAction(
    c: Context<AppEnv>,
    action: string,
    licenseId: string | null,
    details: Record<string, unknown> = {}
): Promise<void> {
    await c.get('services').audit.logEvent('license', `admin_${action}`, details, {
        requestId: c.get('requestId'),
        licenseId,
    });
}
