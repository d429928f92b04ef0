export { LicenseTokenService } from './jwt.service';
export type * from './types';
