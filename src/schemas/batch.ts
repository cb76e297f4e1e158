/**
 * Batch description schema: stanzas to enqueue into one submission.
 *
 * @module
 */

import { z } from 'zod';

import { jobSettingsSchema } from './settings.js';

/** One command to enqueue. */
export const batchEntrySchema = z
  .object({
    /** Command line; the first word is the executable. */
    command: z.string().trim().min(1),
    /** Number of processes queued for the command. */
    times: z.number().int().positive().default(1),
    /** Settings for this stanza only, applied after the defaults. */
    settings: jobSettingsSchema.optional(),
  })
  .strict();

/** Full batch description. */
export const batchSchema = z
  .object({
    /** Settings applied to every stanza. */
    defaults: jobSettingsSchema.optional(),
    jobs: z.array(batchEntrySchema).min(1),
  })
  .strict();

export type BatchEntry = z.infer<typeof batchEntrySchema>;
export type Batch = z.infer<typeof batchSchema>;
