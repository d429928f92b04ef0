/**
 * License Constants
 */

// Unambiguous alphabet: no 0/O or 1/I.
export const LICENSE_KEY_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';
export const LICENSE_KEY_SEGMENTS = 4;
export const LICENSE_KEY_SEGMENT_LENGTH = 4;

export const LICENSE_TOKEN_TTL_SECONDS = 300;

export const MAX_BATCH_OPERATIONS = 10;

export const ACTIVATION_HISTORY_LIMIT = 50;

export const BATCH_OPERATION_TYPES = ['validate', 'activate', 'deactivate', 'status'] as const;

export type BatchOperationType = typeof BATCH_OPERATION_TYPES[number];

export const DAY_MS = 24 * 60 * 60 * 1000;
