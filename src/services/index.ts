import Stripe from 'stripe';
import type { AppConfig } from '../env';
import { LicenseRepository } from '../repositories';
import type { LicenseDB } from '../utils/db';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { HttpErrorTracker, type ErrorTracker } from './alerts/error-tracker';
import { WebhookAlertSink, type AlertSink } from './alerts/security-alerts';
import { AuditLogger } from './audit';
import { CatalogService } from './catalog';
import { EmailService } from './email/email.service';
import { LicenseTokenService } from './jwt';
import { LicenseService } from './license';
import { LicenseApiService } from './license-api';
import { NotificationService, type Notifier } from './notification/notification.service';
import { RateLimitService } from './ratelimit';
import { SettingsService } from './settings';
import { BackgroundTasks } from './tasks/background-tasks';
import {
    LicenseFinder,
    PaypalRestClient,
    ProviderGateway,
    StripeWebhookVerifier,
    WebhookDispatcher,
    type PaypalClient,
} from './webhook';

export interface AppServices {
    repository: LicenseRepository;
    tasks: BackgroundTasks;
    audit: AuditLogger;
    rateLimit: RateLimitService;
    license: LicenseService;
    catalog: CatalogService;
    licenseApi: LicenseApiService;
    tokens: LicenseTokenService;
    webhooks: WebhookDispatcher;
    notifications: Notifier;
    errorTracker: ErrorTracker;
    settings: SettingsService;
    finder: LicenseFinder;
    logger: Logger;
}

// Collaborators that reach outside the process; tests swap them for fakes.
export interface ServiceOverrides {
    logger?: Logger;
    notifier?: Notifier;
    errorTracker?: ErrorTracker;
    alerts?: AlertSink;
    stripe?: Stripe | null;
    paypal?: PaypalClient | null;
}

function createStripe(config: AppConfig): Stripe | null {
    return config.stripeSecretKey ? new Stripe(config.stripeSecretKey) : null;
}

function createPaypal(config: AppConfig): PaypalClient | null {
    const { paypalClientId, paypalClientSecret, paypalWebhookId, paypalApiBase } = config;
    if (!paypalClientId || !paypalClientSecret || !paypalWebhookId) {
        return null;
    }
    return new PaypalRestClient({
        clientId: paypalClientId,
        clientSecret: paypalClientSecret,
        webhookId: paypalWebhookId,
        apiBase: paypalApiBase,
    });
}

/**
 * Builds the service graph once per process. Every service shares one
 * repository (and so one SQLite connection) and one background task queue.
 */
export function createServices(config: AppConfig, db: LicenseDB, overrides: ServiceOverrides = {}): AppServices {
    const logger = overrides.logger ?? rootLogger;
    const repository = new LicenseRepository(db);
    const tasks = new BackgroundTasks(config.outboundTimeoutMs, logger, config.outboundMaxInFlight);

    const alerts = overrides.alerts ?? new WebhookAlertSink(tasks, logger, config.securityWebhookUrl);
    const errorTracker = overrides.errorTracker
        ?? new HttpErrorTracker(tasks, logger, config.errorTrackingUrl, config.environment);
    const audit = new AuditLogger(repository, alerts, logger);

    const email = config.resendApiKey
        ? new EmailService({ resendApiKey: config.resendApiKey, fromEmail: config.fromEmail })
        : null;
    const notifications = overrides.notifier
        ?? new NotificationService(tasks, email, { slackWebhookUrl: config.slackWebhookUrl });

    const stripe = overrides.stripe !== undefined ? overrides.stripe : createStripe(config);
    const paypal = overrides.paypal !== undefined ? overrides.paypal : createPaypal(config);
    const gateway = new ProviderGateway(tasks, logger, { stripe, paypal });

    const license = new LicenseService({
        repository,
        notifier: notifications,
        canceler: gateway,
        logger,
        machineHashSalt: config.machineHashSalt,
    });

    const rateLimit = new RateLimitService(repository, logger, config.rateLimitFailMode);
    const tokens = new LicenseTokenService(config.jwtSecret, config.licenseTokenTtlSeconds);
    const settings = new SettingsService(repository);
    const catalog = new CatalogService(repository);
    const finder = new LicenseFinder(repository);

    const licenseApi = new LicenseApiService({
        license,
        rateLimit,
        tokens,
        audit,
        errorTracker,
        logger,
        limits: config.rateLimits,
    });

    const webhooks = new WebhookDispatcher({
        repository,
        license,
        finder,
        settings,
        audit,
        errorTracker,
        logger,
        stripe: stripe && config.stripeWebhookSecret ? new StripeWebhookVerifier(stripe, config.stripeWebhookSecret) : null,
        paypal,
        timeoutMs: config.webhookTimeoutMs,
    });

    return {
        repository,
        tasks,
        audit,
        rateLimit,
        license,
        catalog,
        licenseApi,
        tokens,
        webhooks,
        notifications,
        errorTracker,
        settings,
        finder,
        logger,
    };
}
