export { AuditLogger, type AuditContext, type LicenseOperationLog } from './audit.service';
export { classifySecurityEvent, shouldAlert, SECURITY_EVENT_SEVERITY } from './severity';
