/**
 * Repository exports.
 */

export { LicenseRepository } from './license.repository';
export {
    LicenseTransaction,
    DuplicateEventError,
    type ProcessedEventMarker,
    type ActivationMatch,
    type SubscriptionPatch,
} from './license.tx';
