import type { HttpBindings } from "@hono/node-server";
import { DEFAULT_RATE_LIMITS, type RateLimitFailMode, type RateLimitPolicy } from "./constants/rate-limit";
import { LICENSE_TOKEN_TTL_SECONDS } from "./constants/license";
import { isLogLevel, logger, type LogLevel } from "./utils/logger";

export type Environment = "production" | "development" | "staging" | "test";

export interface Bindings {
    NODE_ENV?: string;
    ENVIRONMENT?: string;
    PORT?: string;
    DATABASE_PATH?: string;
    JWT_SECRET?: string;
    MACHINE_HASH_SALT?: string;
    ADMIN_SECRET?: string;
    LICENSE_TOKEN_TTL_SECONDS?: string;
    STRIPE_SECRET_KEY?: string;
    STRIPE_WEBHOOK_SECRET?: string;
    PAYPAL_CLIENT_ID?: string;
    PAYPAL_CLIENT_SECRET?: string;
    PAYPAL_WEBHOOK_ID?: string;
    PAYPAL_API_BASE?: string;
    RESEND_API_KEY?: string;
    FROM_EMAIL?: string;
    SLACK_WEBHOOK_URL?: string;
    SECURITY_WEBHOOK_URL?: string;
    ERROR_TRACKING_URL?: string;
    OUTBOUND_TIMEOUT_MS?: string;
    OUTBOUND_MAX_IN_FLIGHT?: string;
    WEBHOOK_TIMEOUT_MS?: string;
    WEBHOOK_MARKER_RETENTION_DAYS?: string;
    RATE_LIMIT_FAIL_MODE?: string;
    TRUST_PROXY?: string;
    ALLOWED_ORIGINS?: string;
    LOG_LEVEL?: string;
    [key: string]: string | undefined;
}

export interface AppConfig {
    environment: Environment;
    port: number;
    databasePath: string;
    jwtSecret: string;
    machineHashSalt: string;
    adminSecret: string;
    licenseTokenTtlSeconds: number;
    stripeSecretKey?: string;
    stripeWebhookSecret?: string;
    paypalClientId?: string;
    paypalClientSecret?: string;
    paypalWebhookId?: string;
    paypalApiBase: string;
    resendApiKey?: string;
    fromEmail: string;
    slackWebhookUrl?: string;
    securityWebhookUrl?: string;
    errorTrackingUrl?: string;
    outboundTimeoutMs: number;
    outboundMaxInFlight: number;
    webhookTimeoutMs: number;
    webhookMarkerRetentionDays: number;
    rateLimits: RateLimitPolicy;
    rateLimitFailMode: RateLimitFailMode;
    trustProxy: boolean;
    allowedOrigins: string[];
    logLevel: LogLevel;
    isProduction: boolean;
    isTest: boolean;
}

export interface AppEnv {
    Bindings: Partial<HttpBindings>;
    Variables: {
        services: import("./services").AppServices;
        config: AppConfig;
        requestId: string;
        logger: import("./utils/logger").Logger;
    };
}

const PAYPAL_LIVE_API = "https://api-m.paypal.com";

function parseEnvironment(value: string | undefined): Environment {
    switch (value) {
        case "development":
        case "staging":
        case "test":
        case "production":
            return value;
        default:
            return "production";
    }
}

function parseInteger(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === "") {
        return fallback;
    }
    const parsed = parseInt(value, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

function optional(value: string | undefined): string | undefined {
    return value && value.trim() !== "" ? value : undefined;
}

export function loadConfig(bindings: Bindings): AppConfig {
    const environment = parseEnvironment(bindings.ENVIRONMENT ?? bindings.NODE_ENV);
    const logLevel = bindings.LOG_LEVEL?.toLowerCase();

    return Object.freeze({
        environment,
        port: parseInteger(bindings.PORT, 3000),
        databasePath: bindings.DATABASE_PATH || "data/licenses.db",
        jwtSecret: bindings.JWT_SECRET ?? "",
        machineHashSalt: bindings.MACHINE_HASH_SALT ?? "",
        adminSecret: bindings.ADMIN_SECRET ?? "",
        licenseTokenTtlSeconds: parseInteger(bindings.LICENSE_TOKEN_TTL_SECONDS, LICENSE_TOKEN_TTL_SECONDS),
        stripeSecretKey: optional(bindings.STRIPE_SECRET_KEY),
        stripeWebhookSecret: optional(bindings.STRIPE_WEBHOOK_SECRET),
        paypalClientId: optional(bindings.PAYPAL_CLIENT_ID),
        paypalClientSecret: optional(bindings.PAYPAL_CLIENT_SECRET),
        paypalWebhookId: optional(bindings.PAYPAL_WEBHOOK_ID),
        paypalApiBase: bindings.PAYPAL_API_BASE || PAYPAL_LIVE_API,
        resendApiKey: optional(bindings.RESEND_API_KEY),
        fromEmail: bindings.FROM_EMAIL || "licenses@example.com",
        slackWebhookUrl: optional(bindings.SLACK_WEBHOOK_URL),
        securityWebhookUrl: optional(bindings.SECURITY_WEBHOOK_URL),
        errorTrackingUrl: optional(bindings.ERROR_TRACKING_URL),
        outboundTimeoutMs: parseInteger(bindings.OUTBOUND_TIMEOUT_MS, 5000),
        outboundMaxInFlight: Math.max(1, parseInteger(bindings.OUTBOUND_MAX_IN_FLIGHT, 100)),
        webhookTimeoutMs: parseInteger(bindings.WEBHOOK_TIMEOUT_MS, 30000),
        webhookMarkerRetentionDays: parseInteger(bindings.WEBHOOK_MARKER_RETENTION_DAYS, 90),
        rateLimits: DEFAULT_RATE_LIMITS,
        rateLimitFailMode: bindings.RATE_LIMIT_FAIL_MODE === "closed" ? "closed" : "open",
        trustProxy: bindings.TRUST_PROXY === "true",
        allowedOrigins: bindings.ALLOWED_ORIGINS?.split(",").map(o => o.trim()).filter(Boolean) || ["*"],
        logLevel: isLogLevel(logLevel) ? logLevel : "info",
        isProduction: environment === "production",
        isTest: environment === "test",
    });
}

export interface EnvValidation {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

export function validateEnv(bindings: Bindings): EnvValidation {
    const errors: string[] = [];
    const warnings: string[] = [];

    // Critical requirements
    if (!bindings.JWT_SECRET) {
        errors.push("Missing required secret: JWT_SECRET");
    } else if (bindings.JWT_SECRET.length < 32) {
        errors.push("JWT_SECRET must be at least 32 characters long");
    }

    if (!bindings.MACHINE_HASH_SALT) {
        errors.push("Missing required secret: MACHINE_HASH_SALT");
    } else if (bindings.MACHINE_HASH_SALT.length < 16) {
        errors.push("MACHINE_HASH_SALT must be at least 16 characters long");
    }

    if (!bindings.ADMIN_SECRET) {
        errors.push("Missing required secret: ADMIN_SECRET");
    } else if (bindings.ADMIN_SECRET.length < 32) {
        errors.push("ADMIN_SECRET must be at least 32 characters long");
    }

    // Payment providers (all or nothing)
    if (!!bindings.STRIPE_SECRET_KEY !== !!bindings.STRIPE_WEBHOOK_SECRET) {
        warnings.push("STRIPE_SECRET_KEY and STRIPE_WEBHOOK_SECRET should both be set - Stripe webhooks will be rejected");
    }

    const paypalKeys = [bindings.PAYPAL_CLIENT_ID, bindings.PAYPAL_CLIENT_SECRET, bindings.PAYPAL_WEBHOOK_ID];
    const paypalConfigured = paypalKeys.filter(Boolean).length;
    if (paypalConfigured > 0 && paypalConfigured < paypalKeys.length) {
        errors.push("PAYPAL_CLIENT_ID, PAYPAL_CLIENT_SECRET and PAYPAL_WEBHOOK_ID must all be set or all be unset");
    }

    if (bindings.RESEND_API_KEY && !bindings.FROM_EMAIL) {
        warnings.push("RESEND_API_KEY is set but FROM_EMAIL is missing - using the default sender");
    }

    // Validate numeric configurations
    const numeric: (keyof Bindings)[] = [
        "PORT",
        "LICENSE_TOKEN_TTL_SECONDS",
        "OUTBOUND_TIMEOUT_MS",
        "OUTBOUND_MAX_IN_FLIGHT",
        "WEBHOOK_TIMEOUT_MS",
        "WEBHOOK_MARKER_RETENTION_DAYS",
    ];
    for (const key of numeric) {
        const value = bindings[key];
        if (value !== undefined && value !== "" && !/^\d+$/.test(value)) {
            errors.push(`${String(key)} must be a valid positive integer`);
        }
    }

    if (bindings.RATE_LIMIT_FAIL_MODE && !["open", "closed"].includes(bindings.RATE_LIMIT_FAIL_MODE)) {
        errors.push("RATE_LIMIT_FAIL_MODE must be 'open' or 'closed'");
    }

    if (bindings.LOG_LEVEL && !isLogLevel(bindings.LOG_LEVEL.toLowerCase())) {
        warnings.push(`Unknown LOG_LEVEL '${bindings.LOG_LEVEL}' - defaulting to info`);
    }

    if (warnings.length > 0) {
        logger.warn("Environment warnings", { warnings });
    }

    if (errors.length > 0) {
        logger.error("Environment validation failed", undefined, { errors });
    }

    return { valid: errors.length === 0, errors, warnings };
}
