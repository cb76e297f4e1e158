/**
 * Batch descriptions: apply settings and enqueue every entry into one job.
 *
 * @module
 */

import { readFile } from 'node:fs/promises';

import { type Batch, batchSchema } from '../schemas/batch.js';
import type { JobSettings } from '../schemas/settings.js';
import type { Job } from './job.js';

/** Read and validate a JSON batch description. */
export async function readBatchFile(path: string): Promise<Batch> {
  const raw = await readFile(path, 'utf-8');
  return batchSchema.parse(JSON.parse(raw));
}

/** Set every attribute present in `settings` on the job's current stanza. */
export function applySettings(job: Job, settings: JobSettings): void {
  const target = job.settings;

  if (settings.universe !== undefined) target.setUniverse(settings.universe);
  if (settings.initialDirectory !== undefined) {
    target.setInitialDirectory(settings.initialDirectory);
  }
  if (settings.input !== undefined) target.setInput(settings.input);
  if (settings.output !== undefined) target.setOutput(settings.output);
  if (settings.error !== undefined) target.setError(settings.error);
  if (settings.log !== undefined) target.setLog(settings.log);
  if (settings.requirements !== undefined) {
    target.setRequirements(settings.requirements);
  }
  if (settings.matlabLock !== undefined) target.setMatlabLock(settings.matlabLock);
  if (settings.cpus !== undefined) target.setCpus(settings.cpus);
  if (settings.memoryMb !== undefined) target.setMemory(settings.memoryMb);
  if (settings.diskMb !== undefined) target.setDisk(settings.diskMb);
  if (settings.transferExecutable !== undefined) {
    target.setTransferExecutable(settings.transferExecutable);
  }
  if (settings.shouldTransferFiles !== undefined) {
    target.setShouldTransferFiles(settings.shouldTransferFiles);
  }
  if (settings.whenToTransferOutput !== undefined) {
    target.setWhenToTransferOutput(settings.whenToTransferOutput);
  }
  if (settings.notification !== undefined) {
    target.setNotification(settings.notification);
  }
  if (settings.email !== undefined) target.setNotifyUser(settings.email);
}

/**
 * Enqueue every entry of `batch`. Enqueueing empties the stanza attributes, so the defaults are applied again before each entry, followed by the entry's own settings.
 *
 * @returns The number of stanzas enqueued.
 */
export async function enqueueBatch(job: Job, batch: Batch): Promise<number> {
  for (const entry of batch.jobs) {
    if (batch.defaults) applySettings(job, batch.defaults);
    if (entry.settings) applySettings(job, entry.settings);
    await job.enqueue(entry.command, entry.times);
  }
  return batch.jobs.length;
}
