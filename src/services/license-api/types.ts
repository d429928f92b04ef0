import type { RateLimitResult, ServiceResult } from '../../types';
import type { MachineIdentifiers } from '../license';

export interface ApiResult<T> extends ServiceResult<T> {
    rateLimit?: RateLimitResult;
    timestamp: string;
}

export interface ClientContext {
    ipAddress: string;
    userAgent?: string | null;
    requestId?: string;
}

export interface BatchOperation extends MachineIdentifiers {
    type: string;
    licenseKey: string;
}

export interface BatchOperationResult {
    index: number;
    type: string;
    license_key: string;
    success: boolean;
    data?: unknown;
    error?: string;
    code?: string;
}

export interface BatchResponse {
    batch_id: string;
    operations_count: number;
    results: BatchOperationResult[];
}
