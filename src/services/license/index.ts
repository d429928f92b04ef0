export { LicenseService } from './license.service';
export type { LicenseServiceDeps, IssueOptions, ReactivateOptions, RevokeOptions } from './license.service';
export { TRANSITIONS, effectiveState, validationBlock, activationBlock, checkTransition } from './state-machine';
export type { LicenseEvent, TransitionCheck } from './state-machine';
export type * from './types';
