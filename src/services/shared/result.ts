import type { ServiceResult } from '../../types';
import type { ErrorCode } from '../../constants/errors';

export function ok<T>(data: T): ServiceResult<T> {
    return { success: true, data };
}

export function err<T = never>(error: string, code?: ErrorCode): ServiceResult<T> {
    return { success: false, error, code };
}

export function mapResult<T, U>(result: ServiceResult<T>, map: (data: T) => U): ServiceResult<U> {
    if (result.success && result.data !== undefined) {
        return ok(map(result.data));
    }
    return err(result.error ?? 'Unknown error', result.code);
}
