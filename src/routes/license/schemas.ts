import { z } from 'zod';

const machineValue = z.string().trim().min(1).max(512);

export const MachineQuerySchema = z.object({
    machine_fingerprint: machineValue.optional(),
    machine_id: machineValue.optional(),
});

// The fingerprint is checked by the license service so that a missing one
// reports the same error code through the single and batch endpoints.
export const MachineBodySchema = z.object({
    machine_fingerprint: machineValue.optional(),
    machine_id: machineValue.optional(),
});

export const BatchRequestSchema = z.object({
    operations: z.array(z.object({
        type: z.string(),
        license_key: z.string().trim().min(1).max(128),
        machine_fingerprint: machineValue.optional(),
        machine_id: machineValue.optional(),
    })),
});

export type MachineQuery = z.infer<typeof MachineQuerySchema>;
export type MachineBody = z.infer<typeof MachineBodySchema>;
export type BatchRequest = z.infer<typeof BatchRequestSchema>;
