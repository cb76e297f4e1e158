/**
 * Public API exports for condor-jobs.
 *
 * @module
 */

// Schemas
export type { CondorConfig } from './schemas/config.js';
export { condorConfigSchema } from './schemas/config.js';
export type {
  JobSettings,
  Notification,
  TransferFiles,
  Universe,
  WhenToTransferOutput,
} from './schemas/settings.js';
export { jobSettingsSchema, universeSchema } from './schemas/settings.js';
export type { Batch, BatchEntry } from './schemas/batch.js';
export { batchSchema } from './schemas/batch.js';

// Errors
export {
  AlreadySubmittedError,
  BadFormatError,
  BadQuotes,
  CondorError,
  EmptySetting,
  InvalidSettingError,
  InvalidUniverseError,
  ProcessDeadError,
  RequiredSetting,
  SettingError,
  SubmissionError,
} from './lib/errors.js';

// Config and logging
export { loadConfig } from './lib/config.js';
export type { LoggerOptions } from './lib/logger.js';
export { createLogger } from './lib/logger.js';

// Processes and shells
export type { LaunchOptions, ProcessHandle } from './process/child-process.js';
export { launchProcess } from './process/child-process.js';
export type {
  CommandInput,
  CommandResult,
  CommandRunner,
  Launcher,
  LoginOptions,
  ShellOptions,
} from './shell/command-runner.js';
export {
  createLocalShell,
  createRemoteShell,
  createShell,
  DEFAULT_LOGIN,
} from './shell/command-runner.js';
export type { IdentityResolver } from './shell/identity.js';
export { createIdentityResolver, fixedIdentity } from './shell/identity.js';
export { shellQuote } from './shell/quote.js';
export type {
  InteractiveIO,
  InteractiveOptions,
  InteractiveSession,
  InteractiveState,
} from './shell/interactive.js';
export {
  createConsoleIO,
  createInteractiveSession,
  executeInteractive,
} from './shell/interactive.js';

// Submission
export type { SettingName } from './submit/settings.js';
export { SubmissionSettings } from './submit/settings.js';
export type {
  JobBinaries,
  JobOverrides,
  JobParams,
  JobResources,
  NotificationOptions,
} from './submit/job.js';
export { countClusterProcesses, createJob, Job } from './submit/job.js';
export { applySettings, enqueueBatch, readBatchFile } from './submit/batch.js';

// Notification addresses
export type { AddressMatch, MailMap } from './notify/mail-map.js';
export {
  DEFAULT_MAIL_KEY,
  loadMailMap,
  lookupAddress,
} from './notify/mail-map.js';
