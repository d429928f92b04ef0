import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { ZodError } from "zod";
import { ERROR_CODES, ERROR_MESSAGES, type ErrorCode } from "../constants/errors";
import { HTTP_STATUS } from "../constants/http";
import type { AppEnv } from "../env";
import { maskLicensePath } from "../services/shared";

export interface ErrorResponse {
    success: false;
    error: string;
    code: ErrorCode | "Unauthorized" | "NotFound" | "HttpError";
    details?: unknown;
    timestamp: string;
}

function codeForHttpStatus(status: number): ErrorResponse["code"] {
    switch (status) {
        case HTTP_STATUS.BAD_REQUEST:
            return ERROR_CODES.VALIDATION_FAILED;
        case HTTP_STATUS.UNAUTHORIZED:
            return "Unauthorized";
        case HTTP_STATUS.NOT_FOUND:
            return "NotFound";
        default:
            return status >= 500 ? ERROR_CODES.INTERNAL_ERROR : "HttpError";
    }
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
    const timestamp = new Date().toISOString();

    if (err instanceof HTTPException) {
        return c.json<ErrorResponse>(
            { success: false, error: err.message, code: codeForHttpStatus(err.status), timestamp },
            err.status
        );
    }

    if (err instanceof ZodError) {
        return c.json<ErrorResponse>(
            {
                success: false,
                error: ERROR_MESSAGES.VALIDATION.FAILED,
                code: ERROR_CODES.VALIDATION_FAILED,
                details: err.errors.map(e => ({ path: e.path, message: e.message })),
                timestamp,
            },
            HTTP_STATUS.BAD_REQUEST
        );
    }

    const logger = c.get("logger") ?? c.get("services")?.logger;
    logger?.error("Unhandled error", err, { requestId: c.get("requestId") });
    c.get("services")?.errorTracker.capture(err, { request_id: c.get("requestId"), path: maskLicensePath(c.req.path) });

    return c.json<ErrorResponse>(
        {
            success: false,
            error: ERROR_MESSAGES.GENERIC.INTERNAL_ERROR,
            code: ERROR_CODES.INTERNAL_ERROR,
            timestamp,
        },
        HTTP_STATUS.INTERNAL_SERVER_ERROR
    );
}
