import { z } from 'zod';

const machineValue = z.string().trim().min(1).max(512);
const reason = z.string().trim().min(1).max(255);

export const CreateProductSchema = z.object({
    name: z.string().trim().min(1).max(255),
    max_activations: z.number().int().positive().max(1000),
    license_duration_days: z.number().int().positive().nullable().optional(),
    subscription: z.boolean().optional(),
    requires_machine_id: z.boolean().optional(),
});

export const CreateOrderSchema = z.object({
    product_id: z.string().min(1),
    email: z.string().email(),
    customer_name: z.string().trim().max(255).optional(),
    provider: z.enum(['stripe', 'paypal', 'manual']).optional(),
    payment_reference: z.string().min(1).max(255).optional(),
    transaction_id: z.string().min(1).max(255).optional(),
});

export const IssueLicenseSchema = z.object({
    product_id: z.string().min(1),
    email: z.string().email(),
    customer_name: z.string().trim().max(255).optional(),
});

export const SuspendLicenseSchema = z.object({
    reason: reason.default('admin_suspended'),
});

export const ReactivateLicenseSchema = z.object({
    override: z.boolean().default(false),
});

export const RevokeLicenseSchema = z.object({
    reason: reason.default('admin_revoked'),
});

export const ExtendLicenseSchema = z.object({
    days: z.number().int().positive().max(3650),
});

export const RevokeActivationsSchema = z.object({
    machine_fingerprint: machineValue.optional(),
    machine_id: machineValue.optional(),
    reason: reason.default('admin_revoked'),
});

export const HistoryQuerySchema = z.object({
    limit: z.coerce.number().int().positive().max(50).optional(),
});

export const UpdateSettingSchema = z.object({
    value: z.string().max(1024),
});

export const SettingsQuerySchema = z.object({
    prefix: z.string().max(255).optional(),
});

export const AuditQuerySchema = z.object({
    category: z.enum(['payment', 'webhook', 'license', 'security']),
    limit: z.coerce.number().int().positive().max(200).optional(),
});

export type CreateProductInput = z.infer<typeof CreateProductSchema>;
export type CreateOrderInput = z.infer<typeof CreateOrderSchema>;
export type IssueLicenseInput = z.infer<typeof IssueLicenseSchema>;
