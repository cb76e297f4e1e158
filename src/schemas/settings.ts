/**
 * Submission attribute schemas and types.
 *
 * @module
 */

import { z } from 'zod';

/** Execution environments accepted by the scheduler. */
export const universeSchema = z.enum([
  'vanilla',
  'standard',
  'java',
  'scheduler',
  'local',
  'grid',
  'vm',
]);

/** Whether input and output files are transferred to the execution host. */
export const transferFilesSchema = z.enum(['YES', 'NO', 'IF_NEEDED']);

/** When output files are transferred back. */
export const whenToTransferOutputSchema = z.enum([
  'ON_EXIT',
  'ON_EXIT_OR_EVICT',
]);

/** Which job events trigger an e-mail to the submitter. */
export const notificationSchema = z.enum([
  'Always',
  'Complete',
  'Error',
  'Never',
]);

/** Resource requests: CPU count and megabytes. */
export const resourceSchema = z.number().int().positive();

/** Settings that can be given for a job or a batch entry. */
export const jobSettingsSchema = z
  .object({
    universe: universeSchema.optional(),
    initialDirectory: z.string().min(1).optional(),
    input: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    error: z.string().min(1).optional(),
    log: z.string().min(1).optional(),
    requirements: z.string().min(1).optional(),
    /** Take one MATLAB license token while running. */
    matlabLock: z.boolean().optional(),
    cpus: resourceSchema.optional(),
    memoryMb: resourceSchema.optional(),
    diskMb: resourceSchema.optional(),
    transferExecutable: z.boolean().optional(),
    shouldTransferFiles: transferFilesSchema.optional(),
    whenToTransferOutput: whenToTransferOutputSchema.optional(),
    notification: notificationSchema.optional(),
    /** Notification address; overrides the address map. */
    email: z.string().min(1).optional(),
  })
  .strict();

export type Universe = z.infer<typeof universeSchema>;
export type TransferFiles = z.infer<typeof transferFilesSchema>;
export type WhenToTransferOutput = z.infer<typeof whenToTransferOutputSchema>;
export type Notification = z.infer<typeof notificationSchema>;
export type JobSettings = z.infer<typeof jobSettingsSchema>;
