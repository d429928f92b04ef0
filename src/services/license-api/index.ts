export { LicenseApiService, type LicenseApiServiceDeps } from './license-api.service';
export type * from './types';
export * from './views';
