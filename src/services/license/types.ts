import type { Activation, License, PaymentProvider, Subscription } from '../../types';

export interface MachineIdentifiers {
    fingerprint?: string | null;
    machineId?: string | null;
}

export interface ActivationRequest extends MachineIdentifiers {
    ipAddress?: string | null;
    userAgent?: string | null;
}

export interface ValidationOutcome {
    license: License;
    activation: Activation | null;
}

export interface ActivationOutcome {
    license: License;
    activation: Activation;
    alreadyActive: boolean;
}

export interface DeactivationOutcome {
    license: License;
    deactivated: number;
}

export interface IssuedLicense {
    license: License;
    // Plaintext key; only present the first time the license is created.
    licenseKey: string | null;
    created: boolean;
}

export interface TransitionOutcome {
    license: License;
    changed: boolean;
    activationsRevoked: number;
    subscription: Subscription | null;
}

export interface ManualIssueInput {
    productId: string;
    email: string;
    customerName?: string | null;
}

/**
 * One state change requested by a payment-provider event. The license
 * service applies it together with the event's processed marker.
 */
export type LicenseCommand =
    | {
          kind: 'issue';
          orderId: string;
          provider: PaymentProvider;
          externalSubscriptionId?: string | null;
          periodEnd?: number | null;
      }
    | {
          kind: 'renew';
          licenseId: string;
          provider: PaymentProvider;
          externalSubscriptionId?: string | null;
          periodEnd?: number | null;
      }
    | {
          kind: 'link_subscription';
          licenseId: string;
          provider: PaymentProvider;
          externalSubscriptionId: string;
          periodEnd?: number | null;
      }
    | { kind: 'suspend'; licenseId: string; reason: string }
    | { kind: 'reactivate'; licenseId: string; periodEnd?: number | null }
    | {
          kind: 'revoke';
          licenseId: string;
          reason: string;
          refundOrderId?: string | null;
          cancelAtProvider: boolean;
      }
    | { kind: 'notify_payment_failed'; licenseId: string }
    | { kind: 'none'; reason: string };

export type LicenseCommandKind = LicenseCommand['kind'];

export interface CommandOutcome {
    action: LicenseCommandKind | 'skipped';
    licenseId: string | null;
    changed: boolean;
    detail?: string;
}

// Cancels the external subscription at the payment provider, off the request path.
export interface SubscriptionCanceler {
    requestCancellation(provider: PaymentProvider, externalSubscriptionId: string, reason: string): void;
}
