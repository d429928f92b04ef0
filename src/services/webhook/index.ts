export { WebhookDispatcher, WebhookTimeoutError, type WebhookDispatcherDeps } from './dispatcher';
export { LicenseFinder, type LicenseHints } from './license-finder';
export { StripeWebhookVerifier } from './stripe.verifier';
export { PaypalRestClient, type PaypalClientConfig } from './paypal.client';
export { ProviderGateway, type ProviderClients } from './provider-gateway';
export { STRIPE_EVENT_TYPES, stripeHandlers, type StripeEventType } from './stripe.handlers';
export { PAYPAL_EVENT_TYPES, paypalHandlers, type PaypalEventType } from './paypal.handlers';
export type * from './types';
