/**
 * Configuration schema and types.
 *
 * @module
 */

import { z } from 'zod';

import { universeSchema } from './settings.js';

/** Scheduler binaries sub-schema. */
const binariesSchema = z.object({
  /** Submit command; invoked as `<submit> -remote <server>`. */
  submit: z.string().default('condor_submit'),
  /** Queue-status command; invoked as `<queue> <cluster>`. */
  queue: z.string().default('condor_q'),
});

/** Remote login sub-schema. */
const sshSchema = z.object({
  /** Login program. */
  command: z.string().default('ssh'),
  /** Arguments placed before the target. Must keep the login non-interactive. */
  options: z.array(z.string()).default(['-o', 'BatchMode=yes']),
});

/** Default resource requests of a new job. */
const resourcesSchema = z.object({
  /** CPUs per job. */
  cpus: z.number().int().positive().default(1),
  /** Memory per job in megabytes. */
  memoryMb: z.number().int().positive().default(1024),
  /** Disk per job in megabytes. */
  diskMb: z.number().int().positive().default(32),
});

/** Notification sub-schema. */
const notificationsSchema = z.object({
  /** Path of the address map on the submit host. */
  mailMapPath: z.string().default('/etc/condor-jobs/mail-map.json'),
  /** Address used when the map has neither the identity nor a default entry. */
  fallbackAddress: z.string().optional(),
});

/** Log configuration sub-schema. */
const logSchema = z.object({
  /** Log level threshold (trace, debug, info, warn, error, fatal). */
  level: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
    .default('info'),
  /** Optional log file path. */
  file: z.string().optional(),
});

/** Full configuration schema. Validates and provides defaults. */
export const condorConfigSchema = z.object({
  /** Scheduler host: the `-remote` target, and the login target when submitting remotely. */
  server: z.string().default('localhost'),
  /** Submission identity. Defaults to the local account. */
  username: z.string().optional(),
  /** Universe of new jobs. */
  universe: universeSchema.default('vanilla'),
  /** Upper bound of the wait() poll interval in milliseconds. */
  maxPollIntervalMs: z.number().int().positive().default(30000),
  /** Scheduler binaries. */
  binaries: binariesSchema.default({}),
  /** Remote login command. */
  ssh: sshSchema.default({}),
  /** Default resource requests. */
  resources: resourcesSchema.default({}),
  /** Notification address resolution. */
  notifications: notificationsSchema.default({}),
  /** Logging configuration. */
  log: logSchema.default({ level: 'info' }),
});

/** Inferred configuration type. */
export type CondorConfig = z.infer<typeof condorConfigSchema>;
