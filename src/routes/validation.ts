import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ZodError } from 'zod';
import { ERROR_MESSAGES } from '../constants/errors';
import { HTTP_STATUS } from '../constants/http';

type ValidationResult = { success: true } | { success: false; error: ZodError };

// zValidator hook: malformed input becomes a 400 through the global error handler.
export function validationHook(result: ValidationResult, _c: Context): void {
    if (!result.success) {
        throw new HTTPException(HTTP_STATUS.BAD_REQUEST, {
            message: ERROR_MESSAGES.VALIDATION.FAILED,
            cause: result.error.flatten(),
        });
    }
}
