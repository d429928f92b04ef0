/**
 * License lifecycle rules.
 *
 * Stored statuses are active, suspended and revoked. "expired" is derived at
 * read time from expiresAt, so a license can be stored as active and still
 * be expired.
 */

import { ERROR_CODES, ERROR_MESSAGES, type ErrorCode } from '../../constants/errors';
import type { License, LicenseState, LicenseStatus } from '../../types';
import { isExpired } from '../shared';

export type LicenseEvent = 'suspend' | 'reactivate' | 'revoke' | 'extend';

interface Transition {
    from: readonly LicenseStatus[];
    to: LicenseStatus;
}

export const TRANSITIONS = {
    suspend: { from: ['active'], to: 'suspended' },
    reactivate: { from: ['suspended'], to: 'active' },
    revoke: { from: ['active', 'suspended'], to: 'revoked' },
    extend: { from: ['active'], to: 'active' },
} as const satisfies Record<LicenseEvent, Transition>;

export interface TransitionOptions {
    // Admin-only escape hatch for revoked → active.
    adminOverride?: boolean;
}

export type TransitionCheck =
    | { allowed: true; to: LicenseStatus; changed: boolean }
    | { allowed: false; error: string; code: ErrorCode };

export interface StateBlock {
    error: string;
    code: ErrorCode;
}

export function effectiveState(license: Pick<License, 'status' | 'expiresAt'>, now: number): LicenseState {
    if (license.status === 'active' && isExpired(license.expiresAt, now)) {
        return 'expired';
    }
    return license.status;
}

// Why a license in this state cannot be validated, or null when it can.
export function validationBlock(state: LicenseState): StateBlock | null {
    switch (state) {
        case 'active':
            return null;
        case 'expired':
            return { error: ERROR_MESSAGES.LICENSE.EXPIRED, code: ERROR_CODES.LICENSE_EXPIRED };
        case 'suspended':
            return { error: ERROR_MESSAGES.LICENSE.SUSPENDED, code: ERROR_CODES.LICENSE_SUSPENDED };
        case 'revoked':
            return { error: ERROR_MESSAGES.LICENSE.REVOKED, code: ERROR_CODES.LICENSE_REVOKED };
    }
}

// Activation reports every blocking state under a single code.
export function activationBlock(state: LicenseState): StateBlock | null {
    const block = validationBlock(state);
    return block ? { error: block.error, code: ERROR_CODES.LICENSE_INVALID_STATE } : null;
}

export function checkTransition(
    current: LicenseStatus,
    event: LicenseEvent,
    options: TransitionOptions = {}
): TransitionCheck {
    const transition: Transition = TRANSITIONS[event];

    if (event === 'reactivate' && current === 'revoked') {
        if (options.adminOverride) {
            return { allowed: true, to: 'active', changed: true };
        }
        return {
            allowed: false,
            error: ERROR_MESSAGES.LICENSE.REACTIVATE_REVOKED,
            code: ERROR_CODES.LICENSE_INVALID_STATE,
        };
    }

    // Already in the target state: a no-op rather than an error.
    if (event !== 'extend' && current === transition.to) {
        return { allowed: true, to: current, changed: false };
    }

    if (!transition.from.includes(current)) {
        return {
            allowed: false,
            error: `Cannot ${event} a ${current} license`,
            code: ERROR_CODES.LICENSE_INVALID_STATE,
        };
    }

    return { allowed: true, to: transition.to, changed: true };
}
