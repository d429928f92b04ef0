/**
 * Standardized Error Codes and Messages
 * Stable codes are part of the API contract; messages are user-facing text.
 */

export const ERROR_CODES = {
    LICENSE_NOT_FOUND: 'LicenseNotFound',
    LICENSE_EXPIRED: 'LicenseExpired',
    LICENSE_SUSPENDED: 'LicenseSuspended',
    LICENSE_REVOKED: 'LicenseRevoked',
    LICENSE_INVALID_STATE: 'LicenseInvalidState',
    ACTIVATION_LIMIT_EXCEEDED: 'ActivationLimitExceeded',
    ACTIVATION_NOT_FOUND: 'ActivationNotFound',
    SUBSCRIPTION_NOT_FOUND: 'SubscriptionNotFound',
    ORDER_NOT_FOUND: 'OrderNotFound',
    PRODUCT_NOT_FOUND: 'ProductNotFound',
    RATE_LIMIT_EXCEEDED: 'RateLimitExceeded',
    VALIDATION_FAILED: 'ValidationFailed',
    MACHINE_ID_REQUIRED: 'MachineIdRequired',
    BATCH_INVALID: 'BatchInvalid',
    SIGNATURE_INVALID: 'SignatureInvalid',
    INTERNAL_ERROR: 'InternalError',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

export type ErrorCategory =
    | 'NotFound'
    | 'InvalidState'
    | 'LimitExceeded'
    | 'ValidationError'
    | 'SignatureInvalid'
    | 'InternalError';

export const ERROR_CATEGORIES: Record<ErrorCode, ErrorCategory> = {
    LicenseNotFound: 'NotFound',
    ActivationNotFound: 'NotFound',
    SubscriptionNotFound: 'NotFound',
    OrderNotFound: 'NotFound',
    ProductNotFound: 'NotFound',
    LicenseExpired: 'InvalidState',
    LicenseSuspended: 'InvalidState',
    LicenseRevoked: 'InvalidState',
    LicenseInvalidState: 'InvalidState',
    ActivationLimitExceeded: 'LimitExceeded',
    RateLimitExceeded: 'LimitExceeded',
    ValidationFailed: 'ValidationError',
    MachineIdRequired: 'ValidationError',
    BatchInvalid: 'ValidationError',
    SignatureInvalid: 'SignatureInvalid',
    InternalError: 'InternalError',
};

export const ERROR_MESSAGES = {
    // License errors
    LICENSE: {
        NOT_FOUND: 'License not found',
        EXPIRED: 'License has expired',
        SUSPENDED: 'License is suspended',
        REVOKED: 'License is revoked',
        REACTIVATE_REVOKED: 'Revoked licenses can only be reactivated with an admin override',
        INVALID_EXTENSION: 'Extension days must be a positive integer',
        PERPETUAL: 'Perpetual licenses do not expire',
    },

    // Activation errors
    ACTIVATION: {
        LIMIT_EXCEEDED: 'No activations remaining',
        NOT_FOUND: 'License not activated on this machine',
        FINGERPRINT_REQUIRED: 'Machine fingerprint is required',
        MACHINE_ID_REQUIRED: 'Machine ID is required for this license',
    },

    // Order errors
    ORDER: {
        NOT_FOUND: 'Order not found',
        REFUNDED: 'Order has been refunded',
        PRODUCT_NOT_FOUND: 'Product not found',
    },

    // Rate limit errors
    RATE_LIMIT: {
        EXCEEDED: 'Rate limit exceeded',
        UNAVAILABLE: 'Rate limiter unavailable',
    },

    // Batch errors
    BATCH: {
        EMPTY: 'Batch cannot be empty',
        TOO_LARGE: 'Batch size exceeds maximum (10 operations)',
        INVALID_OPERATION: 'Invalid operation type',
    },

    // Webhook errors
    WEBHOOK: {
        INVALID_SIGNATURE: 'Invalid webhook signature',
        MISSING_SIGNATURE: 'Missing webhook signature',
        INVALID_PAYLOAD: 'Invalid webhook payload',
        NOT_CONFIGURED: 'Webhook provider is not configured',
        TIMEOUT: 'Webhook processing timed out',
    },

    // Validation errors
    VALIDATION: {
        FAILED: 'Validation failed',
        INVALID_INPUT: 'Invalid input',
    },

    // Generic errors
    GENERIC: {
        INTERNAL_ERROR: 'Internal server error',
        NOT_FOUND: 'Resource not found',
        UNAUTHORIZED: 'Unauthorized',
        SERVICE_UNAVAILABLE: 'Service temporarily unavailable',
    },
} as const;
